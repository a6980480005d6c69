export * from './types';
export * from './memory';
export * from './text';
export * from './applier';

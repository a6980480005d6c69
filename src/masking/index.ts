export * from './types';
export * from './engine';
export * from './overlay';
export * from './lineIndex';
export * from './api';

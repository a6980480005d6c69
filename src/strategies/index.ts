export * from './types';
export * from './schema';
export * from './strategy';
export * from './registry';
export { BUILTIN_STRATEGIES, FALLBACK_STRATEGY, fullStrategy, partialStrategy, noneStrategy } from './builtin';

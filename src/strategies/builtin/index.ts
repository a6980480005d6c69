import { StrategyDefinition } from '../types';
import { fullStrategy } from './full';
import { noneStrategy } from './none';
import { partialStrategy } from './partial';

export { fullStrategy, maskFull } from './full';
export { partialStrategy } from './partial';
export { noneStrategy } from './none';

export const BUILTIN_STRATEGIES: Readonly<Record<string, StrategyDefinition>> = {
  full: fullStrategy,
  partial: partialStrategy,
  none: noneStrategy,
};

export const FALLBACK_STRATEGY = 'full';

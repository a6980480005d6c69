import { FALLBACK_STRATEGY } from '../strategies/builtin';
import { StrategyRegistry } from '../strategies/registry';
import type { MaskRequestContext, StrategyOptions } from '../strategies/types';

export interface MaskValueOptions {
  /** Strategy name; defaults to `full`. Unknown names fall back to `full`. */
  mode?: string;
  maskChar?: string;
  /** Per-call strategy options, applied to a private copy of the strategy. */
  options?: StrategyOptions;
  key?: string;
  source?: string;
  registry?: StrategyRegistry;
}

/**
 * Mask a single value outside of any document. Without a `registry` a fresh one is
 * used, so only built-in strategies are available.
 */
export function maskValue(value: string, options: MaskValueOptions = {}): string {
  const registry = options.registry ?? new StrategyRegistry();
  const mode = options.mode ?? FALLBACK_STRATEGY;
  const context: MaskRequestContext = {
    key: options.key ?? '',
    source: options.source,
    lineNumber: 0,
    quote: 'none',
    isComment: false,
  };

  if (!registry.has(mode) || (options.maskChar === undefined && options.options === undefined)) {
    return registry.apply(mode, value, context);
  }

  const base = registry.get(mode);
  const overrides: StrategyOptions = { ...options.options };
  if (options.maskChar !== undefined && base.schema.mask_char && overrides.mask_char === undefined) {
    overrides.mask_char = options.maskChar;
  }
  return registry.applyWith(registry.clone(base, overrides), value, context);
}

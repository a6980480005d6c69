import { Counter, Registry } from 'prom-client';
import type { FallbackReason } from '../strategies/types';

/**
 * Counters for one masker. Each instance owns its own prom-client registry so two
 * maskers in the same process never share or double-register series.
 */
export class MaskingMetrics {
  readonly registry = new Registry();

  private readonly cacheLookups = new Counter({
    name: 'envshroud_cache_lookups_total',
    help: 'Parsed-document cache lookups by result',
    labelNames: ['result'] as const,
    registers: [this.registry],
  });

  private readonly masksApplied = new Counter({
    name: 'envshroud_masks_applied_total',
    help: 'Values masked, by strategy',
    labelNames: ['strategy'] as const,
    registers: [this.registry],
  });

  private readonly fallbacks = new Counter({
    name: 'envshroud_strategy_fallbacks_total',
    help: 'Soft fallbacks taken while masking, by strategy and reason',
    labelNames: ['strategy', 'reason'] as const,
    registers: [this.registry],
  });

  private readonly parseFailures = new Counter({
    name: 'envshroud_parse_failures_total',
    help: 'Documents that failed to parse',
    registers: [this.registry],
  });

  recordCacheLookup(hit: boolean): void {
    this.cacheLookups.inc({ result: hit ? 'hit' : 'miss' });
  }

  recordMask(strategy: string): void {
    this.masksApplied.inc({ strategy });
  }

  recordFallback(strategy: string, reason: FallbackReason): void {
    this.fallbacks.inc({ strategy, reason });
  }

  recordParseFailure(): void {
    this.parseFailures.inc();
  }

  async snapshot(): Promise<string> {
    return this.registry.metrics();
  }
}

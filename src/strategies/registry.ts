import { StrategyDefinitionError, StrategyNotFoundError } from '../common/errors';
import { getLogger, Logger } from '../common/logger';
import type { MaskingMetrics } from '../observability/metrics';
import { BUILTIN_STRATEGIES, FALLBACK_STRATEGY } from './builtin';
import { MaskStrategy } from './strategy';
import {
  FallbackEvent,
  MaskRequestContext,
  StrategyDefinition,
  StrategyInfo,
  StrategyOptions,
} from './types';

export interface StrategyRegistryOptions {
  logger?: Logger;
  metrics?: MaskingMetrics;
}

export type StrategyConfigEntry = StrategyOptions | StrategyDefinition;

export interface StrategySetupConfig {
  /** Applied to every strategy whose schema declares `mask_char`, before per-strategy options. */
  maskChar?: string;
  /** Option tables for existing strategies, or full definitions for new ones. */
  strategies?: Record<string, StrategyConfigEntry>;
}

const MINIMAL_CONTEXT: MaskRequestContext = {
  key: '',
  lineNumber: 0,
  quote: 'none',
  isComment: false,
};

export function isStrategyDefinition(entry: StrategyConfigEntry): entry is StrategyDefinition {
  return typeof entry.apply === 'function';
}

/**
 * Registry of masking strategies. Definitions are looked up by name; `get` hands out
 * one lazily created default instance per name, `create` and `clone` hand out
 * independent ones.
 */
export class StrategyRegistry {
  private readonly definitions = new Map<string, StrategyDefinition>();
  private readonly instances = new Map<string, MaskStrategy>();
  private readonly logger: Logger;
  private readonly metrics?: MaskingMetrics;
  private initialized = false;

  constructor(options: StrategyRegistryOptions = {}) {
    this.logger = options.logger ?? getLogger('strategies');
    this.metrics = options.metrics;
  }

  define(name: string, definition: StrategyDefinition): void {
    this.ensureInitialized();
    if (typeof definition.apply !== 'function') {
      throw new StrategyDefinitionError(name, 'must provide an apply function');
    }
    if (this.isBuiltin(name)) {
      this.logger.info(`Overriding built-in strategy "${name}" with a custom definition`);
    }
    this.definitions.set(name, { ...definition, name });
    this.instances.delete(name);
  }

  undefine(name: string): boolean {
    this.ensureInitialized();
    if (this.isBuiltin(name)) {
      this.logger.warn(`Cannot undefine built-in strategy "${name}"`);
      return false;
    }
    this.instances.delete(name);
    return this.definitions.delete(name);
  }

  has(name: string): boolean {
    this.ensureInitialized();
    return this.definitions.has(name);
  }

  isBuiltin(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(BUILTIN_STRATEGIES, name);
  }

  list(): string[] {
    this.ensureInitialized();
    return [...this.definitions.keys()].sort();
  }

  definitionOf(name: string): StrategyDefinition | undefined {
    this.ensureInitialized();
    return this.definitions.get(name);
  }

  create(name: string, options?: StrategyOptions): MaskStrategy {
    const definition = this.definitionOf(name);
    if (!definition) {
      throw new StrategyNotFoundError(name, this.list());
    }
    const strategy = MaskStrategy.fromDefinition(name, definition);
    if (options) {
      strategy.configure(options);
    }
    return strategy;
  }

  get(name: string): MaskStrategy {
    const cached = this.instances.get(name);
    if (cached) {
      return cached;
    }
    const strategy = this.create(name);
    this.instances.set(name, strategy);
    return strategy;
  }

  configure(name: string, options: StrategyOptions): MaskStrategy {
    return this.get(name).configure(options);
  }

  clone(instance: MaskStrategy, options?: StrategyOptions): MaskStrategy {
    return instance.clone(options);
  }

  /**
   * Mask `value` with the named strategy. Unknown names fall back to `full` with a
   * warning; this never throws for lookup reasons.
   */
  apply(name: string, value: string, context: Partial<MaskRequestContext> = {}): string {
    let effective = name;
    if (!this.has(name)) {
      this.logger.warn(`Unknown strategy "${name}", falling back to "${FALLBACK_STRATEGY}"`);
      this.onFallback({ strategy: name, reason: 'unknown-strategy', fallback: FALLBACK_STRATEGY, key: context.key }, context);
      effective = FALLBACK_STRATEGY;
    }
    return this.applyWith(this.get(effective), value, context);
  }

  /** Mask with a specific (for instance cloned) instance, with the registry's fallback reporting. */
  applyWith(strategy: MaskStrategy, value: string, context: Partial<MaskRequestContext> = {}): string {
    const request: MaskRequestContext = {
      ...MINIMAL_CONTEXT,
      ...context,
      report: (event) => this.onFallback(event, context),
    };
    const masked = strategy.apply(value, request);
    this.metrics?.recordMask(strategy.name);
    return masked;
  }

  info(name: string): StrategyInfo | undefined {
    if (!this.has(name)) {
      return undefined;
    }
    const strategy = this.get(name);
    return {
      name,
      description: strategy.description,
      options: strategy.currentOptions(),
      schema: { ...strategy.schema },
      builtin: this.isBuiltin(name),
    };
  }

  infoAll(): Record<string, StrategyInfo> {
    const all: Record<string, StrategyInfo> = {};
    for (const name of this.list()) {
      const info = this.info(name);
      if (info) {
        all[name] = info;
      }
    }
    return all;
  }

  setup(config: StrategySetupConfig): void {
    this.ensureInitialized();
    const entries = Object.entries(config.strategies ?? {});

    for (const [name, entry] of entries) {
      if (isStrategyDefinition(entry)) {
        this.define(name, entry);
      }
    }

    if (config.maskChar !== undefined) {
      for (const name of this.list()) {
        const strategy = this.get(name);
        if (strategy.schema.mask_char) {
          strategy.configure({ mask_char: config.maskChar });
        }
      }
    }

    for (const [name, entry] of entries) {
      if (isStrategyDefinition(entry)) {
        continue;
      }
      if (!this.has(name)) {
        this.logger.warn(`Cannot configure unknown strategy "${name}"`);
        continue;
      }
      this.configure(name, entry);
    }
  }

  /** Drop custom definitions and cached instances, leaving only the built-ins. */
  reset(): void {
    this.definitions.clear();
    this.instances.clear();
    this.initialized = false;
    this.ensureInitialized();
  }

  private onFallback(event: FallbackEvent, context: Partial<MaskRequestContext>): void {
    if (event.reason !== 'unknown-strategy') {
      this.logger.debug(`Strategy "${event.strategy}" used "${event.fallback}" fallback`, {
        reason: event.reason,
        key: event.key,
      });
    }
    this.metrics?.recordFallback(event.strategy, event.reason);
    context.report?.(event);
  }

  private ensureInitialized(): void {
    if (this.initialized) {
      return;
    }
    for (const [name, definition] of Object.entries(BUILTIN_STRATEGIES)) {
      this.definitions.set(name, definition);
    }
    this.initialized = true;
  }
}

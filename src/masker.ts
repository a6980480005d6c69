import { basename } from 'node:path';
import { minimatch } from 'minimatch';
import { LruCache } from './cache/lru';
import { getLogger, Logger } from './common/logger';
import { TaskScheduler } from './common/scheduler';
import { resolveConfig } from './config/resolve';
import { MaskerConfig, MaskerConfigInput } from './config/types';
import { MaskEngine } from './masking/engine';
import { LineIndex } from './masking/lineIndex';
import { mapMasksToOverlays } from './masking/overlay';
import { MaskResult } from './masking/types';
import { maskValue as maskSingleValue, MaskValueOptions } from './masking/api';
import { MaskingMetrics } from './observability/metrics';
import { DotenvParser } from './parser/dotenv';
import { ParsedDocument } from './parser/types';
import { PatternResolver } from './patterns/resolver';
import { renderMaskedText } from './render/text';
import { OverlaySpan } from './render/types';
import { RevealState } from './state/reveal';
import { StrategyRegistry } from './strategies/registry';

/** A logger tree of the masker's own, starting from the process-wide level and format. */
function createOwnLogger(config: MaskerConfig): Logger {
  const root = getLogger();
  return new Logger({
    scope: 'masker',
    level: config.logging?.level ?? root.getLevel(),
    format: config.logging?.format ?? root.getFormat(),
  });
}

export interface EnvMaskerOptions {
  /** Used as given; the config's `logging` section only applies to a masker's own logger. */
  logger?: Logger;
  metrics?: MaskingMetrics;
}

/**
 * One masking context: configuration, strategies, pattern rules, the parsed-document
 * cache and reveal state. Independent instances share no masking or logging state.
 */
export class EnvMasker {
  readonly logger: Logger;
  readonly metrics: MaskingMetrics;
  readonly registry: StrategyRegistry;
  readonly resolver = new PatternResolver();
  readonly scheduler: TaskScheduler;
  readonly reveal: RevealState;
  private readonly parser = new DotenvParser();
  private readonly ownsLogger: boolean;
  private config: MaskerConfig;
  private cache: LruCache<ParsedDocument>;
  private engine: MaskEngine;

  constructor(config: MaskerConfigInput = {}, options: EnvMaskerOptions = {}) {
    this.config = resolveConfig(config);
    this.ownsLogger = options.logger === undefined;
    this.logger = options.logger ?? createOwnLogger(this.config);
    this.metrics = options.metrics ?? new MaskingMetrics();
    this.registry = new StrategyRegistry({ logger: this.logger.child('strategies'), metrics: this.metrics });
    this.scheduler = new TaskScheduler(this.logger.child('scheduler'));
    this.reveal = new RevealState(this.scheduler);

    this.cache = new LruCache(this.config.cacheCapacity);
    this.engine = this.createEngine();
    this.apply(this.config);
  }

  getConfig(): Readonly<MaskerConfig> {
    return this.config;
  }

  /**
   * Layer `partial` over the current configuration and rebuild everything derived
   * from it. Custom strategies from earlier calls are dropped unless `partial`
   * (or the current configuration) defines them again.
   */
  configure(partial: MaskerConfigInput): void {
    const next = resolveConfig(partial, this.config);
    if (next.cacheCapacity !== this.cache.capacity) {
      this.cache = new LruCache(next.cacheCapacity);
      this.engine = this.createEngine();
    } else {
      this.cache.clear();
    }
    this.config = next;
    this.apply(next);
  }

  maskValue(value: string, options: Omit<MaskValueOptions, 'registry'> = {}): string {
    return maskSingleValue(value, {
      ...options,
      mode: options.mode ?? this.resolver.determineStrategy(options.key ?? '', options.source ? basename(options.source) : undefined),
      registry: this.registry,
    });
  }

  generateMasks(content: string, source?: string): MaskResult {
    return this.engine.generateMasks(content, source);
  }

  overlaysFor(content: string, source?: string, revealed: ReadonlySet<number> = this.reveal.asSet()): OverlaySpan[] {
    const result = this.engine.generateMasks(content, source);
    const lines = LineIndex.fromContent(content);
    return mapMasksToOverlays(result.maskedLines, lines, revealed, this.config.maskChar);
  }

  /** The document with every masked value replaced in place. */
  maskText(content: string, source?: string, revealed?: ReadonlySet<number>): string {
    const spans = this.overlaysFor(content, source, revealed);
    return renderMaskedText(content, LineIndex.fromContent(content), spans);
  }

  /** Reveal `line` for the configured peek duration; `onChange` runs when it shows and when it hides. */
  peek(line: number, onChange: () => void): void {
    this.reveal.peek(line, onChange, this.config.peekDurationMs);
  }

  isEnvFile(path: string): boolean {
    const name = basename(path);
    return this.config.envFilePatterns.some((pattern) => minimatch(name, pattern, { dot: true }));
  }

  cacheStats(): { hits: number; misses: number; size: number } {
    return this.engine.stats();
  }

  dispose(): void {
    this.scheduler.cancelAll();
    this.reveal.reset();
    this.cache.clear();
  }

  private createEngine(): MaskEngine {
    return new MaskEngine({
      parser: this.parser,
      cache: this.cache,
      resolver: this.resolver,
      registry: this.registry,
      settings: { skipComments: true },
      metrics: this.metrics,
      logger: this.logger.child('engine'),
    });
  }

  private apply(config: MaskerConfig): void {
    if (config.logging && this.ownsLogger) {
      this.logger.configure({ level: config.logging.level, format: config.logging.format });
    }
    this.resolver.compile(config.patterns, config.sources, config.defaultStrategy);
    this.registry.reset();
    this.registry.setup({ maskChar: config.maskChar, strategies: config.strategies });
    this.engine.updateSettings({ skipComments: config.skipComments });
    this.logger.debug('Configured masker', {
      defaultStrategy: config.defaultStrategy,
      keyPatterns: Object.keys(config.patterns).length,
      sourcePatterns: Object.keys(config.sources).length,
      cacheCapacity: config.cacheCapacity,
    });
  }
}

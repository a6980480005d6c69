import { basename } from 'node:path';
import { fingerprint } from '../cache/fingerprint';
import { LruCache } from '../cache/lru';
import { errorMessage } from '../common/errors';
import { getLogger, Logger } from '../common/logger';
import type { MaskingMetrics } from '../observability/metrics';
import type { EdfParser, ParsedDocument } from '../parser/types';
import { PatternResolver } from '../patterns/resolver';
import { StrategyRegistry } from '../strategies/registry';
import type { MaskRequestContext } from '../strategies/types';
import { MaskEngineSettings, MaskEngineStats, MaskResult, MaskedLineDescriptor } from './types';

export interface MaskEngineDependencies {
  parser: EdfParser;
  cache: LruCache<ParsedDocument>;
  resolver: PatternResolver;
  registry: StrategyRegistry;
  settings: MaskEngineSettings;
  metrics?: MaskingMetrics;
  logger?: Logger;
}

interface Lookup {
  document: ParsedDocument;
  fromCache: boolean;
}

export class MaskEngine {
  private readonly parser: EdfParser;
  private readonly cache: LruCache<ParsedDocument>;
  private readonly resolver: PatternResolver;
  private readonly registry: StrategyRegistry;
  private readonly metrics?: MaskingMetrics;
  private readonly logger: Logger;
  private settings: MaskEngineSettings;
  private hits = 0;
  private misses = 0;

  constructor(deps: MaskEngineDependencies) {
    this.parser = deps.parser;
    this.cache = deps.cache;
    this.resolver = deps.resolver;
    this.registry = deps.registry;
    this.settings = { ...deps.settings };
    this.metrics = deps.metrics;
    this.logger = deps.logger ?? getLogger('engine');
  }

  updateSettings(settings: Partial<MaskEngineSettings>): void {
    this.settings = { ...this.settings, ...settings };
  }

  parse(content: string): ParsedDocument {
    return this.lookup(content).document;
  }

  /**
   * Mask every entry of `content`. Entries are handled in parse order and
   * independently of one another; the strategy for a key is resolved once per call.
   */
  generateMasks(content: string, sourcePath?: string): MaskResult {
    const { document, fromCache } = this.lookup(content);
    const sourceBasename = sourcePath ? basename(sourcePath) : undefined;
    const strategyByKey = new Map<string, string>();
    const maskedLines: MaskedLineDescriptor[] = [];

    for (const entry of document.entries) {
      if (entry.isComment && this.settings.skipComments) {
        continue;
      }

      let strategy = strategyByKey.get(entry.key);
      if (strategy === undefined) {
        strategy = this.resolver.determineStrategy(entry.key, sourceBasename);
        strategyByKey.set(entry.key, strategy);
      }

      const mask = this.registry.apply(strategy, entry.value, {
        key: entry.key,
        source: sourcePath,
        lineNumber: entry.startLine,
        quote: entry.quote,
        isComment: entry.isComment,
      });

      maskedLines.push({
        key: entry.key,
        strategy,
        startLine: entry.startLine,
        endLine: entry.endLine,
        mask,
        valueStart: entry.valueStart,
        valueEnd: entry.valueEnd,
        quote: entry.quote,
        isComment: entry.isComment,
      });
    }

    this.logger.debug('Generated masks', {
      source: sourceBasename,
      entries: document.entries.length,
      masked: maskedLines.length,
      cached: fromCache,
    });

    return { maskedLines, lineOffsets: document.lineOffsets, fromCache };
  }

  /** Mask a single value, resolving the strategy from the context unless one is given. */
  maskValue(value: string, context: MaskRequestContext, strategy?: string): string {
    const name =
      strategy ?? this.resolver.determineStrategy(context.key, context.source ? basename(context.source) : undefined);
    return this.registry.apply(name, value, context);
  }

  clearCache(): void {
    this.cache.clear();
  }

  stats(): MaskEngineStats {
    return { hits: this.hits, misses: this.misses, size: this.cache.size() };
  }

  private lookup(content: string): Lookup {
    const key = fingerprint(content);
    const cached = this.cache.get(key);
    this.metrics?.recordCacheLookup(cached !== undefined);
    if (cached) {
      this.hits += 1;
      return { document: cached, fromCache: true };
    }

    this.misses += 1;
    let document: ParsedDocument;
    try {
      document = this.parser.parse(content);
    } catch (error) {
      this.metrics?.recordParseFailure();
      this.logger.debug(`Parse failed: ${errorMessage(error)}`);
      throw error;
    }
    this.cache.put(key, document);
    return { document, fromCache: false };
  }
}

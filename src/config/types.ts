import type { LogFormat, LogLevel } from '../common/logger';
import type { PatternMap } from '../patterns/resolver';
import type { StrategyConfigEntry } from '../strategies/registry';

export interface LoggingConfig {
  level?: LogLevel;
  format?: LogFormat;
}

export interface MaskerConfig {
  /** Single mask character applied to every strategy with a `mask_char` option. */
  maskChar: string;
  defaultStrategy: string;
  /** Leave `# KEY=value` entries unmasked. */
  skipComments: boolean;
  /** Key glob -> strategy name. */
  patterns: PatternMap;
  /** Source file name glob -> strategy name. */
  sources: PatternMap;
  /** Per-strategy option tables, or definitions of new strategies. */
  strategies: Record<string, StrategyConfigEntry>;
  /** File names treated as env documents by the CLI and watchers. */
  envFilePatterns: string[];
  cacheCapacity: number;
  debounceMs: number;
  peekDurationMs: number;
  logging?: LoggingConfig;
}

export type MaskerConfigInput = Partial<MaskerConfig>;

export interface MaskerConfigFile extends MaskerConfigInput {
  profiles?: Record<string, MaskerConfigInput>;
}

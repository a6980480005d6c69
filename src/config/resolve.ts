import { ConfigurationError, OptionValidationError } from '../common/errors';
import { isLogFormat, isLogLevel } from '../common/logger';
import { validateOptions } from '../strategies/schema';
import type { OptionSchemaMap, StrategyOptions } from '../strategies/types';
import { DEFAULT_CONFIG } from './defaults';
import { LoggingConfig, MaskerConfig, MaskerConfigFile, MaskerConfigInput } from './types';

const SCALAR_SCHEMA: OptionSchemaMap = {
  maskChar: { kind: 'string', minLength: 1, maxLength: 1 },
  defaultStrategy: { kind: 'string', minLength: 1 },
  skipComments: { kind: 'boolean' },
  cacheCapacity: { kind: 'number', min: 1, integer: true },
  debounceMs: { kind: 'number', min: 0 },
  peekDurationMs: { kind: 'number', min: 0 },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringMap(value: unknown, field: string, origin: string): Record<string, string> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(`${origin}: "${field}" must map patterns to strategy names`);
  }
  const result: Record<string, string> = {};
  for (const [pattern, strategy] of Object.entries(value)) {
    if (typeof strategy !== 'string' || strategy === '') {
      throw new ConfigurationError(`${origin}: "${field}.${pattern}" must be a strategy name`);
    }
    result[pattern] = strategy;
  }
  return result;
}

function strategyTables(value: unknown, origin: string): Record<string, StrategyOptions> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(`${origin}: "strategies" must map strategy names to option tables`);
  }
  const result: Record<string, StrategyOptions> = {};
  for (const [name, table] of Object.entries(value)) {
    if (!isRecord(table)) {
      throw new ConfigurationError(`${origin}: "strategies.${name}" must be an option table`);
    }
    result[name] = table;
  }
  return result;
}

function stringList(value: unknown, field: string, origin: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigurationError(`${origin}: "${field}" must be a list of strings`);
  }
  return [...value];
}

function loggingSection(value: unknown, origin: string): LoggingConfig | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(`${origin}: "logging" must be a mapping`);
  }
  const logging: LoggingConfig = {};
  if (value.level !== undefined) {
    if (typeof value.level !== 'string' || !isLogLevel(value.level)) {
      throw new ConfigurationError(`${origin}: "logging.level" must be one of silent, error, warn, info, debug`);
    }
    logging.level = value.level;
  }
  if (value.format !== undefined) {
    if (typeof value.format !== 'string' || !isLogFormat(value.format)) {
      throw new ConfigurationError(`${origin}: "logging.format" must be text or json`);
    }
    logging.format = value.format;
  }
  return logging;
}

/** Validate one config mapping (top level or profile) into a typed partial config. */
export function parseConfigSection(raw: unknown, origin = 'config'): MaskerConfigInput {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${origin} must be a mapping`);
  }
  const scalars = validateOptions(SCALAR_SCHEMA, raw);
  if (!scalars.ok) {
    throw new OptionValidationError(origin, scalars.option, scalars.constraint);
  }

  const section: MaskerConfigInput = {};
  if (typeof raw.maskChar === 'string') section.maskChar = raw.maskChar;
  if (typeof raw.defaultStrategy === 'string') section.defaultStrategy = raw.defaultStrategy;
  if (typeof raw.skipComments === 'boolean') section.skipComments = raw.skipComments;
  if (typeof raw.cacheCapacity === 'number') section.cacheCapacity = raw.cacheCapacity;
  if (typeof raw.debounceMs === 'number') section.debounceMs = raw.debounceMs;
  if (typeof raw.peekDurationMs === 'number') section.peekDurationMs = raw.peekDurationMs;

  const patterns = stringMap(raw.patterns, 'patterns', origin);
  if (patterns) section.patterns = patterns;
  const sources = stringMap(raw.sources, 'sources', origin);
  if (sources) section.sources = sources;
  const strategies = strategyTables(raw.strategies, origin);
  if (strategies) section.strategies = strategies;
  const envFilePatterns = stringList(raw.envFilePatterns, 'envFilePatterns', origin);
  if (envFilePatterns) section.envFilePatterns = envFilePatterns;
  const logging = loggingSection(raw.logging, origin);
  if (logging) section.logging = logging;

  return section;
}

export function parseConfigFile(raw: unknown, origin = 'config'): MaskerConfigFile {
  const file: MaskerConfigFile = parseConfigSection(raw, origin);
  const profiles = isRecord(raw) ? raw.profiles : undefined;
  if (profiles === undefined || profiles === null) {
    return file;
  }
  if (!isRecord(profiles)) {
    throw new ConfigurationError(`${origin}: "profiles" must map profile names to config sections`);
  }
  file.profiles = {};
  for (const [name, profile] of Object.entries(profiles)) {
    file.profiles[name] = parseConfigSection(profile, `${origin} profile "${name}"`);
  }
  return file;
}

/** Layer `overlay` on `base`: scalars replace, pattern and strategy maps merge per key. */
export function mergeConfigs(base: MaskerConfigInput, overlay: MaskerConfigInput): MaskerConfigInput {
  const merged: MaskerConfigInput = { ...base, ...overlay };
  if (base.patterns || overlay.patterns) {
    merged.patterns = { ...base.patterns, ...overlay.patterns };
  }
  if (base.sources || overlay.sources) {
    merged.sources = { ...base.sources, ...overlay.sources };
  }
  if (base.strategies || overlay.strategies) {
    merged.strategies = { ...base.strategies, ...overlay.strategies };
  }
  if (base.logging || overlay.logging) {
    merged.logging = { ...base.logging, ...overlay.logging };
  }
  return merged;
}

/**
 * Complete `input` with defaults. Unknown keys are ignored; malformed known keys
 * throw `ConfigurationError`.
 */
export function resolveConfig(input: MaskerConfigInput = {}, base: Readonly<MaskerConfig> = DEFAULT_CONFIG): MaskerConfig {
  const section = parseConfigSection(input, 'config');
  return {
    ...base,
    ...section,
    patterns: { ...(section.patterns ?? base.patterns) },
    sources: { ...(section.sources ?? base.sources) },
    strategies: { ...(section.strategies ?? base.strategies) },
    envFilePatterns: [...(section.envFilePatterns ?? base.envFilePatterns)],
  };
}

export * from './common/errors';
export { Logger, getLogger, configureLogger } from './common/logger';
export type { LogLevel, LogFormat, LoggerOptions } from './common/logger';
export { TaskScheduler } from './common/scheduler';
export * from './config';
export * from './parser';
export * from './cache';
export * from './strategies';
export * from './patterns';
export * from './masking';
export * from './render';
export { RevealState, DEFAULT_PEEK_DURATION_MS } from './state/reveal';
export { MaskingMetrics } from './observability/metrics';
export { EnvMasker } from './masker';
export type { EnvMaskerOptions } from './masker';

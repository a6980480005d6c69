import { Writable } from 'node:stream';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';
export type LogFormat = 'text' | 'json';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  destination?: Writable;
  scope?: string;
  bindings?: Record<string, unknown>;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
  silent: 100,
  error: 40,
  warn: 30,
  info: 20,
  debug: 10,
};

const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, 'scope' | 'bindings'>> = {
  level: 'info',
  format: 'text',
  destination: process.stderr,
};

function formatScope(scope?: string): string {
  if (!scope) {
    return '';
  }
  return `[${scope}] `;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function isLogFormat(value: string): value is LogFormat {
  return value === 'text' || value === 'json';
}

interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
  destination: Writable;
}

/**
 * Line-oriented logger writing either human readable text or one JSON object per line.
 * Children share their parent's settings, so `configure` on any of them applies to the whole tree.
 */
export class Logger {
  private readonly settings: LoggerSettings;
  private scope?: string;
  private readonly bindings: Record<string, unknown>;

  constructor(options: LoggerOptions = {}, shared?: LoggerSettings) {
    this.settings = shared ?? {
      level: options.level ?? DEFAULT_OPTIONS.level,
      format: options.format ?? DEFAULT_OPTIONS.format,
      destination: options.destination ?? DEFAULT_OPTIONS.destination,
    };
    this.scope = options.scope;
    this.bindings = options.bindings ?? {};
  }

  /** Fields in `bindings` are attached to every line the child writes. */
  child(scope: string, bindings: Record<string, unknown> = {}): Logger {
    return new Logger(
      {
        scope: this.scope ? `${this.scope}:${scope}` : scope,
        bindings: { ...this.bindings, ...bindings },
      },
      this.settings,
    );
  }

  configure(options: LoggerOptions): void {
    if (options.level) {
      this.settings.level = options.level;
    }
    if (options.format) {
      this.settings.format = options.format;
    }
    if (options.destination) {
      this.settings.destination = options.destination;
    }
    if (options.scope !== undefined) {
      this.scope = options.scope;
    }
  }

  getLevel(): LogLevel {
    return this.settings.level;
  }

  getFormat(): LogFormat {
    return this.settings.format;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_VALUES[this.settings.level] <= LEVEL_VALUES[level];
  }

  debug(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('error', message, metadata);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, extra: Record<string, unknown>) {
    if (!this.isEnabled(level)) {
      return;
    }

    const metadata = { ...this.bindings, ...extra };

    const timestamp = new Date().toISOString();
    if (this.settings.format === 'json') {
      const payload = {
        level,
        time: timestamp,
        message,
        scope: this.scope,
        ...metadata,
      };
      this.settings.destination.write(`${JSON.stringify(payload)}\n`);
      return;
    }

    const prefix = `${timestamp} ${level.toUpperCase()} `;
    const strMetadata = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
    this.settings.destination.write(`${prefix}${formatScope(this.scope)}${message}${strMetadata}\n`);
  }
}

const globalLogger = new Logger();

export function getLogger(scope?: string): Logger {
  return scope ? globalLogger.child(scope) : globalLogger;
}

export function configureLogger(options: LoggerOptions): void {
  globalLogger.configure(options);
}

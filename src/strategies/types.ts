import type { QuoteKind } from '../parser/types';

export type StrategyOptions = Record<string, unknown>;

export type FallbackReason = 'unknown-strategy' | 'value-too-short';

export interface FallbackEvent {
  strategy: string;
  reason: FallbackReason;
  fallback: string;
  key?: string;
}

/** Where a value being masked came from. */
export interface MaskRequestContext {
  key: string;
  source?: string;
  lineNumber: number;
  quote: QuoteKind;
  isComment: boolean;
  /** Receives soft fallbacks taken while masking; never expected to throw. */
  report?: (event: FallbackEvent) => void;
}

export interface MaskContext extends MaskRequestContext {
  value: string;
  /** The applying strategy's current options. */
  options: Readonly<StrategyOptions>;
}

export type TransformFn = (value: string, context: MaskContext) => string;

export type OptionSchema =
  | { kind: 'number'; default?: number; min?: number; max?: number; integer?: boolean; description?: string }
  | { kind: 'string'; default?: string; minLength?: number; maxLength?: number; description?: string }
  | { kind: 'boolean'; default?: boolean; description?: string }
  | { kind: 'enumeration'; values: readonly string[]; default?: string; description?: string }
  | { kind: 'function'; description?: string };

export type OptionSchemaMap = Record<string, OptionSchema>;

export type ValidationResult =
  | { ok: true }
  | { ok: false; option?: string; constraint: string };

export interface StrategyInstance {
  readonly name: string;
  readonly description: string;
  readonly schema: Readonly<OptionSchemaMap>;
  apply(value: string, context: MaskRequestContext): string;
  getOption(key: string): unknown;
}

export type ApplyFn = (value: string, context: MaskContext, strategy: StrategyInstance) => string;

export interface StrategyDefinition {
  name?: string;
  description?: string;
  schema?: OptionSchemaMap;
  defaultOptions?: StrategyOptions;
  apply: ApplyFn;
  /** Runs before the schema check; a failure rejects the options. */
  validate?: (options: StrategyOptions) => ValidationResult;
  onConfigure?: (strategy: StrategyInstance, options: StrategyOptions) => void;
  onRegister?: (strategy: StrategyInstance) => void;
}

export interface StrategyInfo {
  name: string;
  description: string;
  options: StrategyOptions;
  schema: OptionSchemaMap;
  builtin: boolean;
}

export function isTransformFn(value: unknown): value is TransformFn {
  return typeof value === 'function';
}

import { OptionValidationError } from '../common/errors';
import { schemaDefaults, validateOptions } from './schema';
import {
  MaskRequestContext,
  OptionSchemaMap,
  StrategyDefinition,
  StrategyInstance,
  StrategyOptions,
  ValidationResult,
} from './types';

/**
 * A configured masking strategy. Instances built from the same definition share its
 * transform and hooks but each keeps its own option set.
 */
export class MaskStrategy implements StrategyInstance {
  readonly name: string;
  readonly description: string;
  readonly schema: Readonly<OptionSchemaMap>;
  private options: StrategyOptions;

  private constructor(private readonly definition: StrategyDefinition, name: string, options: StrategyOptions) {
    this.name = name;
    this.description = definition.description ?? `Custom strategy: ${name}`;
    this.schema = definition.schema ?? {};
    this.options = options;
  }

  static fromDefinition(name: string, definition: StrategyDefinition): MaskStrategy {
    const schema = definition.schema ?? {};
    const strategy = new MaskStrategy(definition, definition.name ?? name, {
      ...schemaDefaults(schema),
      ...definition.defaultOptions,
    });
    definition.onRegister?.(strategy);
    return strategy;
  }

  apply(value: string, context: MaskRequestContext): string {
    return this.definition.apply(value, { ...context, value, options: this.options }, this);
  }

  validate(options: StrategyOptions): ValidationResult {
    const custom = this.definition.validate?.(options);
    if (custom && !custom.ok) {
      return custom;
    }
    return validateOptions(this.schema, options);
  }

  /** Validate, then merge schema defaults, current options and `options` (in that order). */
  configure(options: StrategyOptions): this {
    const result = this.validate(options);
    if (!result.ok) {
      throw new OptionValidationError(this.name, result.option, result.constraint);
    }
    this.options = { ...schemaDefaults(this.schema), ...this.options, ...options };
    this.definition.onConfigure?.(this, options);
    return this;
  }

  clone(options?: StrategyOptions): MaskStrategy {
    const copy = new MaskStrategy(this.definition, this.name, { ...this.options });
    if (options) {
      copy.configure(options);
    }
    return copy;
  }

  getOption(key: string): unknown {
    const value = this.options[key];
    if (value !== undefined) {
      return value;
    }
    const schema = this.schema[key];
    return schema && schema.kind !== 'function' ? schema.default : undefined;
  }

  currentOptions(): StrategyOptions {
    return { ...this.options };
  }
}

export function numberOption(strategy: StrategyInstance, key: string, fallback: number): number {
  const value = strategy.getOption(key);
  return typeof value === 'number' ? value : fallback;
}

export function optionalNumberOption(strategy: StrategyInstance, key: string): number | undefined {
  const value = strategy.getOption(key);
  return typeof value === 'number' ? value : undefined;
}

export function stringOption(strategy: StrategyInstance, key: string, fallback: string): string {
  const value = strategy.getOption(key);
  return typeof value === 'string' ? value : fallback;
}

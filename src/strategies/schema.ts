import { OptionSchema, OptionSchemaMap, StrategyOptions, ValidationResult } from './types';

const VALID: ValidationResult = { ok: true };

function fail(option: string, constraint: string): ValidationResult {
  return { ok: false, option, constraint };
}

function describeKind(schema: OptionSchema): string {
  switch (schema.kind) {
    case 'number':
      return schema.integer ? 'an integer' : 'a number';
    case 'string':
      return 'a string';
    case 'boolean':
      return 'a boolean';
    case 'enumeration':
      return `one of: ${schema.values.join(', ')}`;
    case 'function':
      return 'a function';
  }
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'number' && Number.isNaN(value)) {
    return 'NaN';
  }
  return typeof value;
}

export function validateOption(option: string, schema: OptionSchema, value: unknown): ValidationResult {
  switch (schema.kind) {
    case 'number': {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        return fail(option, `must be ${describeKind(schema)}, got ${describeValue(value)}`);
      }
      if (schema.integer && !Number.isInteger(value)) {
        return fail(option, `must be an integer, got ${value}`);
      }
      if (schema.min !== undefined && value < schema.min) {
        return fail(option, `must be >= ${schema.min}, got ${value}`);
      }
      if (schema.max !== undefined && value > schema.max) {
        return fail(option, `must be <= ${schema.max}, got ${value}`);
      }
      return VALID;
    }
    case 'string': {
      if (typeof value !== 'string') {
        return fail(option, `must be a string, got ${describeValue(value)}`);
      }
      if (schema.minLength !== undefined && schema.minLength === schema.maxLength && value.length !== schema.minLength) {
        return fail(option, `must be exactly ${schema.minLength} character(s) long, got ${value.length}`);
      }
      if (schema.minLength !== undefined && value.length < schema.minLength) {
        return fail(option, `must be at least ${schema.minLength} character(s) long, got ${value.length}`);
      }
      if (schema.maxLength !== undefined && value.length > schema.maxLength) {
        return fail(option, `must be at most ${schema.maxLength} character(s) long, got ${value.length}`);
      }
      return VALID;
    }
    case 'boolean':
      return typeof value === 'boolean' ? VALID : fail(option, `must be a boolean, got ${describeValue(value)}`);
    case 'enumeration':
      return typeof value === 'string' && schema.values.includes(value)
        ? VALID
        : fail(option, `must be ${describeKind(schema)}, got ${typeof value === 'string' ? JSON.stringify(value) : describeValue(value)}`);
    case 'function':
      return typeof value === 'function' ? VALID : fail(option, `must be a function, got ${describeValue(value)}`);
  }
}

/**
 * Check every option present in `options` against its schema entry.
 * Options without a schema entry are passed through unchecked; `undefined` means "unset".
 */
export function validateOptions(schema: Readonly<OptionSchemaMap>, options: StrategyOptions): ValidationResult {
  for (const [option, optionSchema] of Object.entries(schema)) {
    const value = options[option];
    if (value === undefined) {
      continue;
    }
    const result = validateOption(option, optionSchema, value);
    if (!result.ok) {
      return result;
    }
  }
  return VALID;
}

export function schemaDefaults(schema: Readonly<OptionSchemaMap>): StrategyOptions {
  const defaults: StrategyOptions = {};
  for (const [option, optionSchema] of Object.entries(schema)) {
    if (optionSchema.kind !== 'function' && optionSchema.default !== undefined) {
      defaults[option] = optionSchema.default;
    }
  }
  return defaults;
}

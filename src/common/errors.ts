export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when options handed to a strategy (or to the masker config) break the
 * option schema or a strategy's own validator.
 */
export class OptionValidationError extends ConfigurationError {
  constructor(
    readonly target: string,
    readonly option: string | undefined,
    readonly constraint: string,
  ) {
    super(
      option
        ? `Invalid options for "${target}": option "${option}" ${constraint}`
        : `Invalid options for "${target}": ${constraint}`,
    );
    this.name = 'OptionValidationError';
  }
}

export class StrategyDefinitionError extends ConfigurationError {
  constructor(readonly strategy: string, reason: string) {
    super(`Strategy "${strategy}" ${reason}`);
    this.name = 'StrategyDefinitionError';
  }
}

export class StrategyNotFoundError extends Error {
  constructor(readonly strategy: string, readonly available: string[]) {
    super(`Strategy "${strategy}" not found. Available strategies: ${available.join(', ')}`);
    this.name = 'StrategyNotFoundError';
  }
}

export class EdfParseError extends Error {
  constructor(message: string, readonly line: number, readonly column: number) {
    super(`${message} (line ${line}, column ${column})`);
    this.name = 'EdfParseError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error Types
 */

export class MarketSizingError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'MarketSizingError';
    this.code = code;
    this.context = options?.context;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Raised when a formula template cannot be turned into a number:
 * unbound placeholder, forbidden characters after substitution,
 * syntax error, division by zero or non-finite result.
 */
export class FormulaError extends MarketSizingError {
  public readonly formula: string;

  constructor(message: string, formula: string, context?: Record<string, unknown>) {
    super(message, 'FORMULA_ERROR', { context: { ...context, formula } });
    this.name = 'FormulaError';
    this.formula = formula;
  }
}

export class ConfigError extends MarketSizingError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', { context });
    this.name = 'ConfigError';
  }
}

export class FactValidationError extends MarketSizingError {
  public readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message, 'FACT_VALIDATION_ERROR', { context: { issues } });
    this.name = 'FactValidationError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

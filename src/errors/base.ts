/**
 * Base error class for all StatsD client errors.
 *
 * Provides structured error information with a category and optional
 * cause tracking.
 */

/**
 * Error category for classifying StatsD client errors
 */
export type ErrorCategory =
  | 'configuration'
  | 'connection'
  | 'transport'
  | 'lifecycle'
  | 'internal';

/**
 * Base error class for all StatsD client errors.
 */
export abstract class StatsDError extends Error {
  /**
   * The category of error for classification and handling
   */
  public readonly category: ErrorCategory;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  /**
   * The original error that caused this error, if any
   */
  declare readonly cause?: Error;

  constructor(options: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'StatsDError';
    this.category = options.category;
    this.details = options.details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      cause: this.cause?.message,
    };
  }

  /**
   * Returns a human-readable string representation of the error
   */
  toString(): string {
    let result = `${this.name}: ${this.message}`;
    if (this.cause) {
      result += `\nCaused by: ${this.cause.message}`;
    }
    return result;
  }
}

/**
 * Type guard to check if an error is a StatsDError
 */
export function isStatsDError(error: unknown): error is StatsDError {
  return error instanceof StatsDError;
}

/**
 * Type guard to check if an error belongs to a specific category
 */
export function isErrorCategory(
  error: unknown,
  category: ErrorCategory
): boolean {
  return isStatsDError(error) && error.category === category;
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : String(value));
}

/**
 * WatchError - structured error class for observable values and bindings
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a WatchError
 */
export interface WatchErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a WatchError
 */
export interface SerializedWatchError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedWatchError | { name: string; message: string; stack?: string };
}

/**
 * Error raised by observables, combiners and bindings.
 *
 * Every failure in this library is synchronous and surfaces to the caller of
 * the operation that caused it, so the error carries enough context
 * (observable name, source count, offending argument) to locate the fault.
 *
 * @example
 * ```typescript
 * try {
 *   new CombinedObservable([], (values) => values.length);
 * } catch (error) {
 *   if (WatchError.isCode(error, 'WATCH_C100')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 */
export class WatchError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: WatchErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'WatchError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WatchError);
    }
  }

  /**
   * Create a WatchError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): WatchError {
    return new WatchError({ code, context });
  }

  /**
   * Wrap an existing error with a WatchError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): WatchError {
    return new WatchError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isWatchError(error: unknown): error is WatchError {
    return error instanceof WatchError;
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return WatchError.isWatchError(error) && error.code === code;
  }

  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return WatchError.isWatchError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedWatchError {
    const result: SerializedWatchError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (WatchError.isWatchError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Normalise any thrown value into a WatchError, keeping existing ones as-is.
 */
export function ensureWatchError(
  error: unknown,
  defaultCode: ErrorCode = 'WATCH_D300',
  context?: Record<string, unknown>
): WatchError {
  if (WatchError.isWatchError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return WatchError.wrap(error, defaultCode, context);
  }

  return new WatchError({
    code: defaultCode,
    message: String(error),
    context,
  });
}

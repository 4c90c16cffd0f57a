/**
 * TidewatchError - Structured error class with codes, categories and context
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a TidewatchError
 */
export interface TidewatchErrorOptions {
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
 * Serialized format of a TidewatchError
 */
export interface SerializedTidewatchError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedTidewatchError | { name: string; message: string; stack?: string };
}

/**
 * Error class for every failure the synchronizers and backends report.
 *
 * @example
 * ```typescript
 * try {
 *   await settings.write.execute({ model });
 * } catch (error) {
 *   if (TidewatchError.isCode(error, 'TIDEWATCH_A100')) {
 *     showSignInPrompt();
 *   }
 * }
 * ```
 */
export class TidewatchError extends Error {
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

  constructor(options: TidewatchErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'TidewatchError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TidewatchError);
    }
  }

  /**
   * Create a TidewatchError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): TidewatchError {
    return new TidewatchError({ code, context });
  }

  /**
   * Wrap an existing error with a TidewatchError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): TidewatchError {
    return new TidewatchError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isTidewatchError(error: unknown): error is TidewatchError {
    return error instanceof TidewatchError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return TidewatchError.isTidewatchError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return TidewatchError.isTidewatchError(error) && error.category === category;
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
  toJSON(): SerializedTidewatchError {
    const result: SerializedTidewatchError = {
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
      if (TidewatchError.isTidewatchError(this.cause)) {
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
 * Raised when a read or write needs a location but the identity source is empty
 */
export class UnauthenticatedError extends TidewatchError {
  /** Which operation was attempted */
  readonly operation: string;

  constructor(operation: string) {
    super({
      code: 'TIDEWATCH_A100',
      context: { operation },
    });

    this.name = 'UnauthenticatedError';
    this.operation = operation;
  }
}

/**
 * Raised when a model's fromJson rejects a raw field map
 */
export class MaterializationError extends TidewatchError {
  /** Identifier of the document that failed to convert */
  readonly documentId: string;

  constructor(documentId: string, cause: Error) {
    super({
      code: 'TIDEWATCH_M300',
      message: `Could not materialize document "${documentId}": ${cause.message}`,
      context: { documentId },
      cause,
    });

    this.name = 'MaterializationError';
    this.documentId = documentId;
  }
}

/**
 * Ensure an error is a TidewatchError, wrapping if necessary
 */
export function ensureTidewatchError(
  error: unknown,
  defaultCode: ErrorCode = 'TIDEWATCH_X900'
): TidewatchError {
  if (TidewatchError.isTidewatchError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return TidewatchError.wrap(error, defaultCode);
  }

  return new TidewatchError({
    code: defaultCode,
    message: String(error),
  });
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

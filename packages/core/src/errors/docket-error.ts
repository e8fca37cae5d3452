/**
 * DocketError - structured error class shared by every Docket package
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a DocketError
 */
export interface DocketErrorOptions {
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
 * Serialized format of a DocketError
 */
export interface SerializedDocketError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedDocketError | { name: string; message: string; stack?: string };
}

/**
 * Base error class for Docket with structured error information.
 *
 * Every error Docket raises itself carries a code, a category, a
 * suggestion and a context object naming the operation and document it
 * concerns. Errors raised by observers or by the store driver are not
 * wrapped; they reach the caller unchanged.
 *
 * @example
 * ```typescript
 * try {
 *   await users.remove(user);
 * } catch (error) {
 *   if (DocketError.isCode(error, 'DOCKET_D402')) {
 *     console.log('Already removed');
 *   }
 * }
 * ```
 */
export class DocketError extends Error {
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

  constructor(options: DocketErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'DocketError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create a DocketError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): DocketError {
    return new DocketError({ code, context });
  }

  /**
   * Wrap an existing error with a DocketError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): DocketError {
    return new DocketError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isDocketError(error: unknown): error is DocketError {
    return error instanceof DocketError;
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return DocketError.isDocketError(error) && error.code === code;
  }

  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return DocketError.isDocketError(error) && error.category === category;
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

  toJSON(): SerializedDocketError {
    const result: SerializedDocketError = {
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
      if (DocketError.isDocketError(this.cause)) {
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
 * Field validation error detail
 */
export interface FieldValidationError {
  /** Field path (e.g., 'address.city'); empty for errors on the whole document */
  path: string;
  /** Human-readable error message */
  message: string;
}

/**
 * Raised only when a caller opts into treating an `invalid` write result as
 * fatal (see `expectWritten`). Validation itself never throws.
 */
export class ValidationError extends DocketError {
  /** Field-level validation errors */
  readonly errors: FieldValidationError[];

  constructor(errors: FieldValidationError[], context?: Record<string, unknown>) {
    const message = errors
      .map((e) => (e.path ? `${e.path}: ${e.message}` : e.message))
      .join('; ');

    super({
      code: 'DOCKET_V100',
      message: `Validation failed: ${message}`,
      context: {
        ...context,
        fieldErrors: errors,
      },
    });

    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/**
 * A lifecycle operation was called on a document in a state that does not
 * allow it (second insert, update of a new document, remove of a removed one).
 */
export class PreconditionError extends DocketError {
  /** Operation that was attempted */
  readonly operation: string;

  constructor(
    code: ErrorCode,
    operation: string,
    context: Record<string, unknown> = {},
    message?: string
  ) {
    super({
      code,
      message: message ?? `Cannot ${operation}: ${getErrorInfo(code).message.toLowerCase()}`,
      context: { ...context, operation },
    });

    this.name = 'PreconditionError';
    this.operation = operation;
  }
}

/**
 * The record behind a persisted document is gone from the store
 */
export class DocumentNotFoundError extends DocketError {
  readonly collection: string;
  readonly documentId: string;

  constructor(collection: string, documentId: string) {
    super({
      code: 'DOCKET_D401',
      message: `Document with id "${documentId}" not found in collection "${collection}"`,
      context: { collection, documentId },
    });

    this.name = 'DocumentNotFoundError';
    this.collection = collection;
    this.documentId = documentId;
  }
}

/**
 * A store-enforced rule (typically a unique index) rejected a write.
 *
 * Store drivers raise this for duplicate keys; repositories turn it into a
 * `constraint-violation` write result unless the `*OrThrow` variant is used.
 */
export class ConstraintViolationError extends DocketError {
  /** Name of the violated index, when the driver reports it */
  readonly index?: string;

  constructor(
    message: string,
    options: { index?: string; context?: Record<string, unknown>; cause?: Error } = {}
  ) {
    super({
      code: options.index ? 'DOCKET_I603' : 'DOCKET_I600',
      message,
      context: { ...options.context, ...(options.index ? { index: options.index } : {}) },
      cause: options.cause,
    });

    this.name = 'ConstraintViolationError';
    this.index = options.index;
  }
}

/**
 * Query or cursor error
 */
export class QueryError extends DocketError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'QueryError';
  }
}

/**
 * Storage error
 */
export class StorageError extends DocketError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'StorageError';
  }
}

/**
 * Helper function to ensure errors are DocketErrors
 */
export function ensureDocketError(
  error: unknown,
  defaultCode: ErrorCode = 'DOCKET_X900'
): DocketError {
  if (DocketError.isDocketError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return DocketError.wrap(error, defaultCode);
  }

  return new DocketError({
    code: defaultCode,
    message: String(error),
  });
}

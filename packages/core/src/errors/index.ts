/**
 * Docket Error System
 *
 * Structured errors with codes (DOCKET_D402, DOCKET_I603, ...), categories,
 * suggestions and context. Validation failures are not errors: they are
 * reported through write results and `document.errors`.
 *
 * @example
 * ```typescript
 * import { ConstraintViolationError, DocketError } from '@docket/core';
 *
 * try {
 *   await users.insertOrThrow(user);
 * } catch (error) {
 *   if (error instanceof ConstraintViolationError) {
 *     console.log('Email already taken');
 *   } else if (DocketError.isCategory(error, 'document')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  ConstraintViolationError,
  DocketError,
  DocumentNotFoundError,
  PreconditionError,
  QueryError,
  StorageError,
  ValidationError,
  ensureDocketError,
  type DocketErrorOptions,
  type FieldValidationError,
  type SerializedDocketError,
} from './docket-error.js';

import { ConstraintViolationError } from '@docket/core';
import { MongoServerError } from 'mongodb';

/** Server codes for duplicate keys in a unique index */
const DUPLICATE_KEY_CODES = new Set([11000, 11001]);

const NAMESPACE_NOT_FOUND = 26;
const INDEX_NOT_FOUND = 27;

function serverCode(error: unknown): number | undefined {
  if (error instanceof MongoServerError && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

export function isDuplicateKeyError(error: unknown): error is MongoServerError {
  const code = serverCode(error);
  return code !== undefined && DUPLICATE_KEY_CODES.has(code);
}

/**
 * The collection does not exist
 */
export function isNamespaceNotFound(error: unknown): boolean {
  return serverCode(error) === NAMESPACE_NOT_FOUND;
}

export function isIndexNotFound(error: unknown): boolean {
  return serverCode(error) === INDEX_NOT_FOUND;
}

/**
 * Index named in a duplicate key message, e.g.
 * `E11000 duplicate key error collection: app.users index: idx_email dup key: { ... }`
 */
export function duplicateKeyIndex(message: string): string | undefined {
  const match = /index: (\S+) dup key/.exec(message);
  return match?.[1];
}

/**
 * Convert a duplicate key error into a ConstraintViolationError. Any other
 * error comes back unchanged.
 */
export function mapWriteError(error: unknown, collection: string): unknown {
  if (!isDuplicateKeyError(error)) {
    return error;
  }

  const index = duplicateKeyIndex(error.message);
  return new ConstraintViolationError(
    index
      ? `Duplicate key in unique index "${index}" on ${collection}`
      : `Duplicate key on ${collection}`,
    {
      ...(index ? { index } : {}),
      context: { collection },
      cause: error,
    }
  );
}

/**
 * Input validation utilities for Docket core.
 *
 * Guards collection names and field paths before they reach a document or
 * a store driver.
 *
 * @module validation
 */

import { DocketError } from '../errors/docket-error.js';

/** Validation result */
export interface InputValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
}

function invalidArgument(errors: readonly string[], context: Record<string, unknown>): DocketError {
  return new DocketError({
    code: 'DOCKET_X902',
    message: errors.join('; '),
    context,
  });
}

// ── Collection Name Validation ───────────────────────────────────────────────

const COLLECTION_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_.-]{0,119}$/;

/** Validate a collection name */
export function validateCollectionName(name: unknown): InputValidationResult {
  const errors: string[] = [];
  if (typeof name !== 'string') {
    return { valid: false, errors: ['Collection name must be a string'] };
  }
  if (name.length === 0) {
    errors.push('Collection name cannot be empty');
  } else if (name.length > 120) {
    errors.push(`Collection name too long (${name.length} chars, max 120)`);
  } else if (!COLLECTION_NAME_PATTERN.test(name)) {
    errors.push(
      'Collection name must start with a letter or underscore and contain only alphanumeric characters, dots, underscores, or hyphens'
    );
  }
  if (name.startsWith('system.')) {
    errors.push(`"${name}" is a reserved collection name`);
  }
  return { valid: errors.length === 0, errors };
}

/** Assert a collection name is valid */
export function assertCollectionName(name: unknown): asserts name is string {
  const result = validateCollectionName(name);
  if (!result.valid) {
    throw invalidArgument(result.errors, { collection: name });
  }
}

// ── Field Path Validation ────────────────────────────────────────────────────

const DANGEROUS_SEGMENTS = new Set(['__proto__', 'constructor', 'prototype']);

/** Validate a field path (e.g., "address.city") */
export function validateFieldPath(path: unknown): InputValidationResult {
  if (typeof path !== 'string') {
    return { valid: false, errors: ['Field path must be a string'] };
  }
  if (path.length === 0) {
    return { valid: false, errors: ['Field path cannot be empty'] };
  }

  const errors: string[] = [];
  for (const segment of path.split('.')) {
    if (segment.length === 0) {
      errors.push(`Field path "${path}" has an empty segment`);
    } else if (segment.startsWith('$')) {
      errors.push(`Field path segment "${segment}" cannot start with "$"`);
    } else if (DANGEROUS_SEGMENTS.has(segment)) {
      errors.push(`Field path segment "${segment}" is not allowed`);
    }
  }
  return { valid: errors.length === 0, errors };
}

/** Assert a field path is valid */
export function assertFieldPath(path: unknown): asserts path is string {
  const result = validateFieldPath(path);
  if (!result.valid) {
    throw invalidArgument(result.errors, { path });
  }
}

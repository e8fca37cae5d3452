/**
 * Declarative checks used inside `validate()` hooks.
 *
 * Every check appends at most one entry to the collector and reports
 * whether it passed. Checks never stop later checks from running, so one
 * validation pass records every failure.
 *
 * @module validation/expectations
 */

import { DocketError } from '../errors/docket-error.js';
import { tagValue, type FieldValue } from '../types/value.js';
import { ErrorCollector, type FieldPath } from './error-collector.js';

/**
 * Error recorded when a check fails: a `[path, message]` pair, or a bare
 * message for errors on the whole document
 */
export type ExpectationMessage = string | readonly [FieldPath, string];

/** Value under test; `undefined` is treated like `null` */
export type CheckedValue = FieldValue | undefined;

export interface NilOptions {
  /** Let `null` pass regardless of the check */
  allowNil?: boolean;
}

export interface MatchOptions extends NilOptions {
  /** Pattern the value is matched against */
  with: RegExp | string;
}

export interface LengthOptions extends NilOptions {
  minimum?: number;
  maximum?: number;
  /** Inclusive `[minimum, maximum]` */
  range?: readonly [number, number];
}

function isNil(value: CheckedValue): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Whether a value counts as present: not null, not a blank string, not an
 * empty array or map
 */
export function isPresent(value: CheckedValue): boolean {
  if (value === undefined) return false;

  const tagged = tagValue(value);
  switch (tagged.kind) {
    case 'null':
      return false;
    case 'string':
      return tagged.value.trim().length > 0;
    case 'array':
      return tagged.value.length > 0;
    case 'map':
      return Object.keys(tagged.value).length > 0;
    case 'number':
    case 'boolean':
    case 'date':
    case 'identifier':
      return true;
  }
}

/**
 * Whether a value is a finite number or a string holding one
 */
export function isNumeric(value: CheckedValue): boolean {
  if (typeof value === 'number') return Number.isFinite(value);
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 && Number.isFinite(Number(trimmed));
  }
  return false;
}

/**
 * Text a pattern is matched against; null for values that have none
 */
function matchableText(value: CheckedValue): string | null {
  if (value === undefined) return null;

  const tagged = tagValue(value);
  switch (tagged.kind) {
    case 'string':
      return tagged.value;
    case 'number':
    case 'boolean':
      return String(tagged.value);
    case 'date':
      return tagged.value.toISOString();
    case 'identifier':
      return tagged.value.toHexString();
    case 'null':
    case 'array':
    case 'map':
      return null;
  }
}

function matches(value: CheckedValue, pattern: RegExp | string): boolean {
  const text = matchableText(value);
  if (text === null) return false;

  const regex = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
  // global and sticky patterns carry state between calls
  regex.lastIndex = 0;
  return regex.test(text);
}

/**
 * Length of strings and arrays, key count of maps; null counts as 0
 */
export function lengthOf(value: CheckedValue): number {
  if (value === undefined) return 0;

  const tagged = tagValue(value);
  switch (tagged.kind) {
    case 'null':
      return 0;
    case 'string':
    case 'array':
      return tagged.value.length;
    case 'map':
      return Object.keys(tagged.value).length;
    case 'number':
    case 'boolean':
      return String(tagged.value).length;
    case 'date':
      return tagged.value.toISOString().length;
    case 'identifier':
      return tagged.value.toHexString().length;
  }
}

/**
 * Expectation engine bound to one ErrorCollector.
 *
 * @example
 * ```typescript
 * class User extends Document implements Validatable {
 *   validate(expect: Expectations): void {
 *     expect.expectPresent(this.get('name'), ['name', "can't be empty"]);
 *     expect.expectMatch(this.get('email'), ['email', 'is invalid'], { with: /@/ });
 *     expect.expectLength(this.get('password'), ['password', 'is too short'], { minimum: 8 });
 *   }
 * }
 * ```
 */
export class Expectations {
  constructor(readonly errors: ErrorCollector = new ErrorCollector()) {}

  /** Fails when the value is null, a blank string, or an empty array or map */
  expectPresent(value: CheckedValue, error: ExpectationMessage): boolean {
    return this.check(isPresent(value), error);
  }

  /** Fails when the value is present */
  notExpectPresent(value: CheckedValue, error: ExpectationMessage): boolean {
    return this.check(!isPresent(value), error);
  }

  /** Fails unless the value is exactly `true` */
  expectTrue(value: CheckedValue, error: ExpectationMessage): boolean {
    return this.check(value === true, error);
  }

  /** Fails unless the value is exactly `false` */
  expectFalse(value: CheckedValue, error: ExpectationMessage): boolean {
    return this.check(value === false, error);
  }

  /** Fails unless the value is a finite number or a numeric string */
  expectNumeric(value: CheckedValue, error: ExpectationMessage, options: NilOptions = {}): boolean {
    if (options.allowNil && isNil(value)) return true;
    return this.check(isNumeric(value), error);
  }

  /** Fails when the value is a number or a numeric string */
  notExpectNumeric(
    value: CheckedValue,
    error: ExpectationMessage,
    options: NilOptions = {}
  ): boolean {
    if (options.allowNil && isNil(value)) return true;
    return this.check(!isNumeric(value), error);
  }

  /** Fails unless the value matches `options.with`; null never matches */
  expectMatch(value: CheckedValue, error: ExpectationMessage, options: MatchOptions): boolean {
    if (options.allowNil && isNil(value)) return true;
    return this.check(matches(value, options.with), error);
  }

  /** Fails when the value matches `options.with` */
  notExpectMatch(value: CheckedValue, error: ExpectationMessage, options: MatchOptions): boolean {
    if (options.allowNil && isNil(value)) return true;
    return this.check(!matches(value, options.with), error);
  }

  /**
   * Fails when the value's length falls outside the given bounds. Every
   * supplied bound applies; at least one must be supplied.
   */
  expectLength(value: CheckedValue, error: ExpectationMessage, options: LengthOptions): boolean {
    const { minimum, maximum, range } = options;
    if (minimum === undefined && maximum === undefined && range === undefined) {
      throw new DocketError({
        code: 'DOCKET_X902',
        message: 'expectLength requires minimum, maximum or range',
      });
    }
    if (options.allowNil && isNil(value)) return true;

    const length = lengthOf(value);
    let ok = true;
    if (minimum !== undefined && length < minimum) ok = false;
    if (maximum !== undefined && length > maximum) ok = false;
    if (range !== undefined && (length < range[0] || length > range[1])) ok = false;

    return this.check(ok, error);
  }

  /** Fails unless the value is an array */
  expectArray(value: CheckedValue, error: ExpectationMessage): boolean {
    return this.check(Array.isArray(value), error);
  }

  /** Fails when the value is an array */
  notExpectArray(value: CheckedValue, error: ExpectationMessage): boolean {
    return this.check(!Array.isArray(value), error);
  }

  /** Fails when the predicate returns false */
  expectThat(predicate: () => boolean, error: ExpectationMessage): boolean {
    return this.check(predicate(), error);
  }

  private check(passed: boolean, error: ExpectationMessage): boolean {
    if (!passed) {
      if (typeof error === 'string') {
        this.errors.addToBase(error);
      } else {
        this.errors.add(error[0], error[1]);
      }
    }
    return passed;
  }
}

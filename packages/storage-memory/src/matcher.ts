/**
 * Filter evaluation for the in-memory store.
 *
 * Covers the MongoDB subset Docket's tests and examples rely on:
 *
 * - Implicit equality, matching array elements as well as whole arrays
 * - `$eq`, `$ne`, `$gt`, `$gte`, `$lt`, `$lte`, `$in`, `$nin`
 * - `$exists`, `$regex` (with `$options`), `$size`, `$all`, `$not`
 * - `$and`, `$or`, `$nor` at the top level
 *
 * Missing fields compare equal to null.
 *
 * @module matcher
 */

import {
  QueryError,
  getPath,
  isObjectIdentifier,
  type Filter,
  type FieldValue,
  type RawRecord,
} from '@docket/core';

type Value = FieldValue | undefined;

const LOGICAL_OPERATORS = new Set(['$and', '$or', '$nor']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof RegExp) &&
    !isObjectIdentifier(value)
  );
}

function isOperatorObject(condition: unknown): condition is Record<string, unknown> {
  if (!isPlainObject(condition)) return false;
  const keys = Object.keys(condition);
  return keys.length > 0 && keys.every((key) => key.startsWith('$'));
}

/**
 * Deep equality between a stored value and a filter operand.
 * `undefined` and `null` are equal.
 */
export function isEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a === null || a === undefined) return b === null || b === undefined;
  if (b === null || b === undefined) return false;

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }

  if (isObjectIdentifier(a) && isObjectIdentifier(b)) {
    return a.toHexString() === b.toHexString();
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((item, index) => isEqual(item, b[index]));
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    return aKeys.every((key) => key in b && isEqual(a[key], b[key]));
  }

  return false;
}

/**
 * Sort order between two values. Null and missing values sort first, as
 * in MongoDB; values of different types compare equal.
 */
export function compareValues(a: unknown, b: unknown): number {
  const aNil = a === null || a === undefined;
  const bNil = b === null || b === undefined;
  if (aNil || bNil) return aNil === bNil ? 0 : aNil ? -1 : 1;

  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (typeof a === 'boolean' && typeof b === 'boolean') return a === b ? 0 : a ? 1 : -1;
  if (isObjectIdentifier(a) && isObjectIdentifier(b)) {
    const left = a.toHexString();
    const right = b.toHexString();
    return left < right ? -1 : left > right ? 1 : 0;
  }

  return 0;
}

function isComparable(a: unknown, b: unknown): boolean {
  return (
    (typeof a === 'number' && typeof b === 'number') ||
    (typeof a === 'string' && typeof b === 'string') ||
    (a instanceof Date && b instanceof Date)
  );
}

/**
 * The value itself, or each element when it is an array
 */
function candidates(value: Value): unknown[] {
  return Array.isArray(value) ? [value, ...value] : [value];
}

function matchesValue(value: Value, expected: unknown): boolean {
  return candidates(value).some((candidate) => isEqual(candidate, expected));
}

function toRegExp(pattern: unknown, options: unknown): RegExp {
  if (pattern instanceof RegExp) return pattern;
  if (typeof pattern !== 'string') {
    throw new QueryError('DOCKET_Q200', '$regex requires a string or RegExp', { pattern });
  }
  return new RegExp(pattern, typeof options === 'string' ? options : undefined);
}

function requireArray(operator: string, operand: unknown): unknown[] {
  if (!Array.isArray(operand)) {
    throw new QueryError('DOCKET_Q200', `${operator} requires an array`, { operator });
  }
  return operand;
}

function matchesOperator(
  value: Value,
  operator: string,
  operand: unknown,
  operators: Record<string, unknown>
): boolean {
  switch (operator) {
    case '$eq':
      return matchesValue(value, operand);
    case '$ne':
      return !matchesValue(value, operand);
    case '$gt':
      return candidates(value).some((c) => isComparable(c, operand) && compareValues(c, operand) > 0);
    case '$gte':
      return candidates(value).some((c) => isComparable(c, operand) && compareValues(c, operand) >= 0);
    case '$lt':
      return candidates(value).some((c) => isComparable(c, operand) && compareValues(c, operand) < 0);
    case '$lte':
      return candidates(value).some((c) => isComparable(c, operand) && compareValues(c, operand) <= 0);
    case '$in':
      return requireArray(operator, operand).some((expected) => matchesValue(value, expected));
    case '$nin':
      return !requireArray(operator, operand).some((expected) => matchesValue(value, expected));
    case '$exists':
      return (value !== undefined) === Boolean(operand);
    case '$regex': {
      const regex = toRegExp(operand, operators.$options);
      return candidates(value).some((c) => {
        if (typeof c !== 'string') return false;
        regex.lastIndex = 0;
        return regex.test(c);
      });
    }
    case '$options':
      return true;
    case '$size':
      return Array.isArray(value) && value.length === operand;
    case '$all': {
      if (!Array.isArray(value)) return false;
      const items = value;
      return requireArray(operator, operand).every((expected) =>
        items.some((item) => isEqual(item, expected))
      );
    }
    case '$not':
      return !matchesCondition(value, operand);
    default:
      throw new QueryError('DOCKET_Q200', `Unsupported query operator "${operator}"`, {
        operator,
      });
  }
}

/**
 * Test one field value against a condition: an operator object, or a value
 * for implicit equality
 */
export function matchesCondition(value: Value, condition: unknown): boolean {
  if (condition instanceof RegExp) {
    return matchesOperator(value, '$regex', condition, {});
  }

  if (!isOperatorObject(condition)) {
    return matchesValue(value, condition);
  }

  return Object.entries(condition).every(([operator, operand]) =>
    matchesOperator(value, operator, operand, condition)
  );
}

function subFilters(operator: string, operand: unknown): Filter[] {
  return requireArray(operator, operand).map((filter) => {
    if (!isPlainObject(filter)) {
      throw new QueryError('DOCKET_Q200', `${operator} requires an array of filters`, {
        operator,
      });
    }
    return filter;
  });
}

/**
 * Test a record against a filter. An empty filter matches everything.
 *
 * @example
 * ```typescript
 * matchesFilter({ age: 30, tags: ['a', 'b'] }, { age: { $gte: 18 }, tags: 'a' }); // true
 * matchesFilter({ age: 30 }, { $or: [{ age: 20 }, { name: { $exists: true } }] }); // false
 * ```
 */
export function matchesFilter(record: RawRecord, filter: Filter): boolean {
  for (const [key, condition] of Object.entries(filter)) {
    if (LOGICAL_OPERATORS.has(key)) {
      const filters = subFilters(key, condition);
      if (key === '$and' && !filters.every((f) => matchesFilter(record, f))) return false;
      if (key === '$or' && !filters.some((f) => matchesFilter(record, f))) return false;
      if (key === '$nor' && filters.some((f) => matchesFilter(record, f))) return false;
      continue;
    }

    if (key.startsWith('$')) {
      throw new QueryError('DOCKET_Q200', `Unsupported top-level operator "${key}"`, {
        operator: key,
      });
    }

    if (!matchesCondition(getPath(record, key), condition)) {
      return false;
    }
  }

  return true;
}

import {
  ID_FIELD,
  QueryError,
  cloneFields,
  cloneValue,
  getPath,
  isFieldValue,
  setPath,
  unsetPath,
  type FieldValue,
  type RawRecord,
  type UpdateExpression,
} from '@docket/core';
import { isEqual, matchesCondition } from './matcher.js';

function invalidUpdate(message: string, context: Record<string, unknown> = {}): QueryError {
  return new QueryError('DOCKET_Q200', message, context);
}

function operandFields(operator: string, operand: unknown): [string, unknown][] {
  if (typeof operand !== 'object' || operand === null || Array.isArray(operand)) {
    throw invalidUpdate(`${operator} requires an object of field paths`, { operator });
  }
  return Object.entries(operand);
}

function storable(operator: string, path: string, value: unknown): FieldValue {
  if (!isFieldValue(value)) {
    throw invalidUpdate(`${operator} value for "${path}" cannot be stored`, { operator, path });
  }
  return cloneValue(value);
}

/**
 * Values of a `$push` or `$addToSet` operand, unwrapping `{ $each: [...] }`
 */
function eachValues(operator: string, path: string, operand: unknown): FieldValue[] {
  if (typeof operand === 'object' && operand !== null && '$each' in operand) {
    const values = operand.$each;
    if (!Array.isArray(values)) {
      throw invalidUpdate(`$each for "${path}" requires an array`, { operator, path });
    }
    return values.map((value) => storable(operator, path, value));
  }
  return [storable(operator, path, operand)];
}

function arrayAt(record: RawRecord, operator: string, path: string): FieldValue[] {
  const current = getPath(record, path);
  if (current === undefined || current === null) return [];
  if (!Array.isArray(current)) {
    throw invalidUpdate(`Cannot apply ${operator} to non-array field "${path}"`, {
      operator,
      path,
    });
  }
  return [...current];
}

/**
 * Apply a MongoDB-style update expression to a copy of a record.
 *
 * Supports `$set`, `$unset`, `$inc`, `$push`, `$addToSet` (both with
 * `$each`) and `$pull` (with a value or a condition). `_id` cannot be
 * modified.
 *
 * @example
 * ```typescript
 * applyUpdate({ visits: 1, tags: ['a'] }, { $inc: { visits: 1 }, $push: { tags: 'b' } });
 * // { visits: 2, tags: ['a', 'b'] }
 * ```
 */
export function applyUpdate(record: RawRecord, update: UpdateExpression): RawRecord {
  const next = cloneFields(record);
  const operators = Object.entries(update);

  if (operators.length === 0) {
    throw invalidUpdate('Update expression is empty');
  }

  for (const [operator, operand] of operators) {
    if (!operator.startsWith('$')) {
      throw invalidUpdate(`Update expression must contain only operators, got "${operator}"`);
    }
    for (const [path, value] of operandFields(operator, operand)) {
      if (path === ID_FIELD || path.startsWith(`${ID_FIELD}.`)) {
        throw invalidUpdate(`${operator} cannot modify the immutable field "${ID_FIELD}"`, {
          operator,
        });
      }

      switch (operator) {
        case '$set':
          setPath(next, path, storable(operator, path, value));
          break;

        case '$unset':
          unsetPath(next, path);
          break;

        case '$inc': {
          if (typeof value !== 'number') {
            throw invalidUpdate(`$inc amount for "${path}" must be a number`, { path });
          }
          const current = getPath(next, path);
          if (current !== undefined && typeof current !== 'number') {
            throw invalidUpdate(`Cannot apply $inc to non-numeric field "${path}"`, { path });
          }
          setPath(next, path, (current ?? 0) + value);
          break;
        }

        case '$push':
          setPath(next, path, [...arrayAt(next, operator, path), ...eachValues(operator, path, value)]);
          break;

        case '$addToSet': {
          const items = arrayAt(next, operator, path);
          for (const item of eachValues(operator, path, value)) {
            if (!items.some((existing) => isEqual(existing, item))) {
              items.push(item);
            }
          }
          setPath(next, path, items);
          break;
        }

        case '$pull':
          setPath(
            next,
            path,
            arrayAt(next, operator, path).filter((item) => !matchesCondition(item, value))
          );
          break;

        default:
          throw invalidUpdate(`Unsupported update operator "${operator}"`, { operator });
      }
    }
  }

  return next;
}

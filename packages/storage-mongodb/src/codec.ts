/**
 * Conversion between Docket values and BSON values.
 *
 * Records read from the server are walked once: plain values pass through,
 * `Long` and `Decimal128` become numbers when a number holds them exactly,
 * ObjectIds stay identifiers. Any other BSON value is refused.
 *
 * @module storage-mongodb/codec
 */

import {
  ID_FIELD,
  StorageError,
  isObjectIdentifier,
  type FieldMap,
  type FieldValue,
  type Filter,
  type Identity,
  type RawRecord,
} from '@docket/core';
import { Decimal128, Long, ObjectId, type Document as MongoDocument } from 'mongodb';

const OBJECT_ID_HEX = /^[0-9a-f]{24}$/i;

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function decodeValue(value: unknown, path: string): FieldValue {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return value;
    case 'object':
      break;
    default:
      throw unsupported(path, typeof value);
  }

  if (value instanceof Date) return value;
  if (value instanceof Long) return decodeLong(value, path);
  if (value instanceof Decimal128) return decodeDecimal(value, path);
  if (isObjectIdentifier(value)) return value;
  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => decodeValue(item, `${path}.${index}`));
  }
  if (isPlainObject(value)) {
    const map: FieldMap = {};
    for (const [key, item] of Object.entries(value)) {
      map[key] = decodeValue(item, path ? `${path}.${key}` : key);
    }
    return map;
  }

  throw unsupported(path, value.constructor.name);
}

/**
 * Digits and exponent of a decimal literal with leading and trailing zeros
 * removed, e.g. `1.50` and `15E-1` both give `15e-1`
 */
function canonicalDecimal(text: string): string | null {
  const match = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/.exec(text);
  if (!match) return null;

  const [, sign = '', whole = '', fraction = '', exponent = '0'] = match;
  const digits = `${whole}${fraction}`.replace(/^0+/, '');
  if (digits === '') return '0';

  const trimmed = digits.replace(/0+$/, '');
  const scale = Number(exponent) - fraction.length + (digits.length - trimmed.length);
  return `${sign === '-' ? '-' : ''}${trimmed}e${scale}`;
}

function decodeLong(value: Long, path: string): number {
  const number = value.toNumber();
  if (!Number.isSafeInteger(number)) {
    throw inexact(path, 'Long', value.toString());
  }
  return number;
}

function decodeDecimal(value: Decimal128, path: string): number {
  const text = value.toString();
  const number = Number(text);
  const canonical = canonicalDecimal(text);
  if (!Number.isFinite(number) || canonical === null || canonical !== canonicalDecimal(String(number))) {
    throw inexact(path, 'Decimal128', text);
  }
  return number;
}

function inexact(path: string, type: string, text: string): StorageError {
  return new StorageError(
    'DOCKET_S300',
    `BSON ${type} ${text} at "${path}" cannot be represented exactly as a number`,
    { path, type, value: text }
  );
}

function unsupported(path: string, type: string): StorageError {
  return new StorageError('DOCKET_S300', `Unsupported BSON value of type ${type} at "${path}"`, {
    path,
    type,
  });
}

/**
 * Decode a server document into a raw record
 */
export function decodeRecord(document: MongoDocument): RawRecord {
  const record: RawRecord = {};
  for (const [key, value] of Object.entries(document)) {
    record[key] = decodeValue(value, key);
  }
  return record;
}

/**
 * Identity as the server stores it. With `objectIdStrings`, 24-character hex
 * strings and foreign identifiers become ObjectIds.
 */
export function encodeIdentity(id: Identity, objectIdStrings: boolean): string | number | ObjectId {
  if (id instanceof ObjectId) return id;
  if (typeof id === 'number') return id;

  const text = typeof id === 'string' ? id : id.toHexString();
  if ((objectIdStrings || typeof id !== 'string') && OBJECT_ID_HEX.test(text)) {
    return new ObjectId(text);
  }
  return text;
}

/**
 * Identity reported by the server after an insert
 *
 * @throws StorageError `DOCKET_S300` for an `_id` Docket cannot represent
 */
export function decodeIdentity(value: unknown): Identity {
  if (typeof value === 'string' || value instanceof ObjectId) return value;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (isObjectIdentifier(value)) return value;
  throw new StorageError('DOCKET_S300', 'Store returned an unsupported _id', {
    type: typeof value,
  });
}

/**
 * Encode the `_id` of a record about to be inserted
 */
export function encodeRecord(record: RawRecord, objectIdStrings: boolean): MongoDocument {
  const id = record[ID_FIELD];
  if (id === undefined) return { ...record };

  if (typeof id === 'string' || typeof id === 'number' || isObjectIdentifier(id)) {
    return { ...record, [ID_FIELD]: encodeIdentity(id, objectIdStrings) };
  }
  throw new StorageError('DOCKET_S300', 'Record _id must be a string, number or identifier', {
    type: typeof id,
  });
}

function encodeIdCondition(condition: unknown, objectIdStrings: boolean): unknown {
  if (typeof condition === 'string' || isObjectIdentifier(condition)) {
    return encodeIdentity(condition, objectIdStrings);
  }
  if (typeof condition !== 'object' || condition === null || Array.isArray(condition)) {
    return condition;
  }

  const operators: Record<string, unknown> = {};
  for (const [operator, operand] of Object.entries(condition)) {
    if ((operator === '$in' || operator === '$nin') && Array.isArray(operand)) {
      operators[operator] = operand.map((item: unknown) => encodeIdCondition(item, objectIdStrings));
    } else if (operator === '$eq' || operator === '$ne') {
      operators[operator] = encodeIdCondition(operand, objectIdStrings);
    } else {
      operators[operator] = operand;
    }
  }
  return operators;
}

/**
 * Encode identities in the top-level `_id` condition of a filter. The rest
 * of the filter passes through untouched.
 */
export function encodeFilter(filter: Filter, objectIdStrings: boolean): MongoDocument {
  if (!(ID_FIELD in filter)) return { ...filter };
  return { ...filter, [ID_FIELD]: encodeIdCondition(filter[ID_FIELD], objectIdStrings) };
}

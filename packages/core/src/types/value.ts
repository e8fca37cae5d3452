/**
 * Opaque identifier produced by a store (a BSON ObjectId, for example).
 * Docket only relies on the hex representation.
 */
export interface ObjectIdentifier {
  toHexString(): string;
}

/**
 * Nested mapping stored inside a document
 */
export interface FieldMap {
  [key: string]: FieldValue;
}

/**
 * Any value a document field can hold
 */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | Date
  | FieldValue[]
  | FieldMap
  | ObjectIdentifier;

/**
 * Raw record exchanged with a store driver. Same shape as document fields,
 * plus the `_id` key once the store has assigned one.
 */
export type RawRecord = FieldMap;

/**
 * Unique identifier of a stored record
 */
export type Identity = string | number | ObjectIdentifier;

/**
 * Name of the identity key in raw records
 */
export const ID_FIELD = '_id';

/**
 * Field value tagged with its kind, for exhaustive handling
 */
export type TaggedValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null'; value: null }
  | { kind: 'date'; value: Date }
  | { kind: 'array'; value: FieldValue[] }
  | { kind: 'map'; value: FieldMap }
  | { kind: 'identifier'; value: ObjectIdentifier };

export type ValueKind = TaggedValue['kind'];

/**
 * Check whether a value is an opaque store identifier
 */
export function isObjectIdentifier(value: unknown): value is ObjectIdentifier {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    'toHexString' in value &&
    typeof value.toHexString === 'function'
  );
}

/**
 * Check whether an arbitrary value can be stored as a field value.
 * Rejects `undefined`, functions, symbols, bigints and non-finite numbers.
 */
export function isFieldValue(value: unknown): value is FieldValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      break;
    default:
      return false;
  }
  if (value instanceof Date) return !Number.isNaN(value.getTime());
  if (Array.isArray(value)) return value.every(isFieldValue);
  if (isObjectIdentifier(value)) return true;
  return Object.values(value).every(isFieldValue);
}

/**
 * Tag a field value with its kind.
 *
 * @example
 * ```typescript
 * tagValue(['a']);        // { kind: 'array', value: ['a'] }
 * tagValue({ city: 'X' }); // { kind: 'map', value: { city: 'X' } }
 * ```
 */
export function tagValue(value: FieldValue): TaggedValue {
  if (value === null) return { kind: 'null', value };
  if (typeof value === 'string') return { kind: 'string', value };
  if (typeof value === 'number') return { kind: 'number', value };
  if (typeof value === 'boolean') return { kind: 'boolean', value };
  if (value instanceof Date) return { kind: 'date', value };
  if (Array.isArray(value)) return { kind: 'array', value };
  if (isObjectIdentifier(value)) return { kind: 'identifier', value };
  return { kind: 'map', value };
}

export function classifyValue(value: FieldValue): ValueKind {
  return tagValue(value).kind;
}

/**
 * Check whether a field value is a nested mapping
 */
export function isFieldMap(value: FieldValue | undefined): value is FieldMap {
  return value !== undefined && classifyValue(value) === 'map';
}

/**
 * Check whether a value can be used as a bare identity (as opposed to a
 * filter mapping)
 */
export function isIdentity(value: unknown): value is Identity {
  return typeof value === 'string' || typeof value === 'number' || isObjectIdentifier(value);
}

/**
 * Stable map key for an identity. Keeps `'1'`, `1` and an identifier whose
 * hex is `'1'` distinct, like the store does.
 */
export function identityKey(id: Identity): string {
  if (typeof id === 'string') return `s:${id}`;
  if (typeof id === 'number') return `n:${id}`;
  return `o:${id.toHexString()}`;
}

/**
 * Human-readable identity, for messages and log context
 */
export function displayIdentity(id: Identity): string {
  if (typeof id === 'string') return id;
  if (typeof id === 'number') return String(id);
  return id.toHexString();
}

export function identitiesEqual(a: Identity, b: Identity): boolean {
  return identityKey(a) === identityKey(b);
}

/**
 * Deep copy a field value. Identifiers are immutable and kept by reference.
 */
export function cloneValue(value: FieldValue): FieldValue {
  const tagged = tagValue(value);
  switch (tagged.kind) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'null':
    case 'identifier':
      return tagged.value;
    case 'date':
      return new Date(tagged.value.getTime());
    case 'array':
      return tagged.value.map(cloneValue);
    case 'map':
      return cloneFields(tagged.value);
  }
}

export function cloneFields(fields: FieldMap): FieldMap {
  const copy: FieldMap = {};
  for (const [key, value] of Object.entries(fields)) {
    copy[key] = cloneValue(value);
  }
  return copy;
}

/**
 * Deep equality over field values. Map key order is ignored, array order is not.
 */
export function valuesEqual(a: FieldValue, b: FieldValue): boolean {
  const left = tagValue(a);
  const right = tagValue(b);

  switch (left.kind) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'null':
      return left.value === right.value;
    case 'date':
      return right.kind === 'date' && left.value.getTime() === right.value.getTime();
    case 'identifier':
      return right.kind === 'identifier' && identitiesEqual(left.value, right.value);
    case 'array': {
      if (right.kind !== 'array' || left.value.length !== right.value.length) return false;
      const items = left.value;
      const other = right.value;
      return items.every((item, index) => {
        const counterpart = other[index];
        return counterpart !== undefined && valuesEqual(item, counterpart);
      });
    }
    case 'map': {
      if (right.kind !== 'map') return false;
      const fields = left.value;
      const other = right.value;
      const leftKeys = Object.keys(fields);
      if (leftKeys.length !== Object.keys(other).length) return false;
      return leftKeys.every((key) => {
        const counterpart = other[key];
        const value = fields[key];
        return counterpart !== undefined && value !== undefined && valuesEqual(value, counterpart);
      });
    }
  }
}

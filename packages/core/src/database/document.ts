import { DocketError, PreconditionError } from '../errors/docket-error.js';
import {
  ID_FIELD,
  cloneFields,
  cloneValue,
  displayIdentity,
  identitiesEqual,
  isFieldMap,
  isIdentity,
  valuesEqual,
  type FieldMap,
  type FieldValue,
  type Identity,
  type RawRecord,
} from '../types/value.js';
import { ErrorCollector } from '../validation/error-collector.js';
import { Expectations } from '../validation/expectations.js';
import { assertFieldPath } from '../validation/input-validation.js';
import type { DocumentState, LifecycleOperation } from './lifecycle.js';

/**
 * Capability implemented by document subtypes that validate themselves.
 *
 * The hook runs on every `isValid()` call with a fresh collector. It can add
 * entries through the expectations or directly through `this.errors`.
 */
export interface Validatable {
  validate(expect: Expectations): void;
}

/**
 * Constructor of a document subtype
 */
export interface DocumentClass<T extends Document = Document> {
  new (fields?: FieldMap): T;
  readonly name: string;
  /** Collection the subtype is stored in; defaults to the class name */
  readonly collectionName?: string;
}

export function isValidatable<T extends Document>(doc: T): doc is T & Validatable {
  return 'validate' in doc && typeof doc.validate === 'function';
}

/**
 * Collection name for a document class
 */
export function collectionNameOf(model: DocumentClass): string {
  return model.collectionName ?? model.name;
}

/**
 * Build a persisted document of the given class from a raw store record
 */
export function hydrate<T extends Document>(model: DocumentClass<T>, record: RawRecord): T {
  const document = new model();
  document.loadRecord(record);
  return document;
}

/**
 * Read a nested value by dot path. Missing segments yield `undefined`.
 *
 * @example
 * ```typescript
 * getPath({ address: { city: 'Oslo' } }, 'address.city'); // 'Oslo'
 * getPath({ address: null }, 'address.city');             // undefined
 * ```
 */
export function getPath(fields: FieldMap, path: string): FieldValue | undefined {
  const parts = path.split('.');
  let current: FieldValue | undefined = fields;

  for (const part of parts) {
    if (!isFieldMap(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Write a nested value by dot path, creating (or replacing non-map)
 * intermediate values with maps
 */
export function setPath(fields: FieldMap, path: string, value: FieldValue): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;

  let current = fields;
  for (const part of parts) {
    const next = current[part];
    if (isFieldMap(next)) {
      current = next;
    } else {
      const created: FieldMap = {};
      current[part] = created;
      current = created;
    }
  }

  current[last] = value;
}

/**
 * Remove a nested value by dot path. Returns whether anything was removed.
 */
export function unsetPath(fields: FieldMap, path: string): boolean {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return false;

  let current = fields;
  for (const part of parts) {
    const next = current[part];
    if (!isFieldMap(next)) return false;
    current = next;
  }

  if (!(last in current)) return false;
  delete current[last];
  return true;
}

/**
 * In-memory representation of one stored record.
 *
 * A document holds a nested field map, a lifecycle state and, once
 * persisted, an identity that never changes afterwards. Subclass it to bind
 * a collection and, optionally, implement {@link Validatable}.
 *
 * @example
 * ```typescript
 * class User extends Document implements Validatable {
 *   static override readonly collectionName = 'users';
 *
 *   validate(expect: Expectations): void {
 *     expect.expectPresent(this.get('name'), ['name', "can't be empty"]);
 *   }
 * }
 *
 * const user = new User({ name: 'Ada' });
 * user.set('address.city', 'London');
 * user.get('address.city'); // 'London'
 * user.get('missing');      // null
 * ```
 */
export class Document {
  /** Collection name for this subtype; the class name when unset */
  static readonly collectionName?: string;

  private data: FieldMap;
  private snapshot: FieldMap = {};
  private identity: Identity | null = null;
  private lifecycle: DocumentState = 'new';
  private transition: LifecycleOperation | null = null;
  private collector = new ErrorCollector();

  constructor(fields: FieldMap = {}) {
    this.data = cloneFields(fields);
  }

  /**
   * Identity assigned by the store; null while the document is new
   */
  get id(): Identity | null {
    return this.identity;
  }

  get state(): DocumentState {
    return this.lifecycle;
  }

  /**
   * Insert or remove still waiting on the store; null when none
   */
  get pending(): LifecycleOperation | null {
    return this.transition;
  }

  /**
   * Errors from the most recent `isValid()` call
   */
  get errors(): ErrorCollector {
    return this.collector;
  }

  isNew(): boolean {
    return this.lifecycle === 'new';
  }

  isPersisted(): boolean {
    return this.lifecycle === 'persisted';
  }

  isRemoved(): boolean {
    return this.lifecycle === 'removed';
  }

  /**
   * Read a field by dot path. Unset fields read as null.
   */
  get(path: string): FieldValue {
    if (path === ID_FIELD && this.identity !== null) {
      return this.identity;
    }
    return getPath(this.data, path) ?? null;
  }

  has(path: string): boolean {
    if (path === ID_FIELD && this.identity !== null) return true;
    return getPath(this.data, path) !== undefined;
  }

  /**
   * Write a field by dot path. `_id` may only be preset on new documents.
   */
  set(path: string, value: FieldValue): this {
    assertFieldPath(path);

    if (path === ID_FIELD) {
      this.assertIdentityWritable();
      if (!isIdentity(value)) {
        throw new DocketError({
          code: 'DOCKET_X902',
          message: '_id must be a string, a number or an object identifier',
        });
      }
    }

    setPath(this.data, path, cloneValue(value));
    return this;
  }

  unset(path: string): this {
    assertFieldPath(path);
    if (path === ID_FIELD) {
      this.assertIdentityWritable();
    }
    unsetPath(this.data, path);
    return this;
  }

  /**
   * Shallow-merge top-level fields
   */
  merge(fields: FieldMap): this {
    for (const [key, value] of Object.entries(fields)) {
      this.set(key, value);
    }
    return this;
  }

  /**
   * Copy of the fields, without `_id`
   */
  get fields(): FieldMap {
    const copy = cloneFields(this.data);
    if (this.identity !== null) {
      delete copy[ID_FIELD];
    }
    return copy;
  }

  /**
   * Raw record for the store: the fields plus `_id` when known
   */
  toRecord(): RawRecord {
    const record = cloneFields(this.data);
    if (this.identity !== null) {
      record[ID_FIELD] = this.identity;
    }
    return record;
  }

  toJSON(): RawRecord {
    return this.toRecord();
  }

  /**
   * Whether the fields differ from what was last written to or read from
   * the store. New documents are dirty as soon as they hold any field.
   */
  isDirty(): boolean {
    return !valuesEqual(this.data, this.snapshot);
  }

  /**
   * Top-level fields changed since the last sync with the store
   */
  changedFields(): string[] {
    const keys = new Set([...Object.keys(this.data), ...Object.keys(this.snapshot)]);
    const changed: string[] = [];

    for (const key of keys) {
      const current = this.data[key];
      const previous = this.snapshot[key];
      if (current === undefined || previous === undefined) {
        if (current !== previous) changed.push(key);
      } else if (!valuesEqual(current, previous)) {
        changed.push(key);
      }
    }

    return changed;
  }

  /**
   * Run validation with a fresh ErrorCollector. True iff nothing was recorded.
   */
  isValid(): boolean {
    const collector = new ErrorCollector();
    this.collector = collector;

    const subject: Document = this;
    if (isValidatable(subject)) {
      subject.validate(new Expectations(collector));
    }

    return collector.isEmpty();
  }

  /**
   * Record the identity assigned on insert and enter the persisted state.
   *
   * @internal Called by Repository.
   */
  markInserted(id: Identity): void {
    if (this.lifecycle !== 'new') {
      throw new PreconditionError('DOCKET_D404', 'insert', { id: displayIdentity(id) });
    }
    this.identity = id;
    delete this.data[ID_FIELD];
    this.lifecycle = 'persisted';
    this.snapshot = cloneFields(this.data);
  }

  /**
   * Claim the document for a state-changing write.
   *
   * @internal Called by Repository.
   * @throws PreconditionError `DOCKET_D406` while another one is in flight
   */
  beginTransition(operation: LifecycleOperation): void {
    if (this.transition !== null) {
      throw new PreconditionError('DOCKET_D406', operation, { pending: this.transition });
    }
    this.transition = operation;
  }

  /**
   * @internal Called by Repository.
   */
  endTransition(): void {
    this.transition = null;
  }

  /**
   * Mark the current fields as matching the store.
   *
   * @internal Called by Repository.
   */
  markSaved(): void {
    this.snapshot = cloneFields(this.data);
  }

  /**
   * @internal Called by Repository.
   */
  markRemoved(): void {
    this.lifecycle = 'removed';
  }

  /**
   * Replace the fields with a record read from the store.
   *
   * @internal Called by Repository and Cursor.
   */
  loadRecord(record: RawRecord): void {
    const id = record[ID_FIELD];
    if (!isIdentity(id)) {
      throw new DocketError({
        code: 'DOCKET_S300',
        message: 'Store returned a record without a usable _id',
      });
    }
    if (this.identity !== null && !identitiesEqual(this.identity, id)) {
      throw new PreconditionError('DOCKET_D405', 'reload', {
        id: displayIdentity(this.identity),
        received: displayIdentity(id),
      });
    }

    const fields = cloneFields(record);
    delete fields[ID_FIELD];

    this.identity = id;
    this.data = fields;
    this.snapshot = cloneFields(fields);
    this.lifecycle = 'persisted';
  }

  /**
   * Apply a change already written by an atomic modifier, keeping it out of
   * the dirty set.
   *
   * @internal Called by Repository.
   */
  applyStored(path: string, value: FieldValue | undefined): void {
    if (value === undefined) {
      unsetPath(this.data, path);
      unsetPath(this.snapshot, path);
    } else {
      setPath(this.data, path, cloneValue(value));
      setPath(this.snapshot, path, cloneValue(value));
    }
  }

  private assertIdentityWritable(): void {
    if (this.lifecycle !== 'new') {
      throw new PreconditionError('DOCKET_D405', 'set _id', {
        ...(this.identity !== null ? { id: displayIdentity(this.identity) } : {}),
      });
    }
  }
}

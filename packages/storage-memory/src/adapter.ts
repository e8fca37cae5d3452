import { randomUUID } from 'node:crypto';
import {
  ConstraintViolationError,
  ID_FIELD,
  StorageError,
  cloneFields,
  displayIdentity,
  getPath,
  identityKey,
  isIdentity,
  normalizeIndex,
  setPath,
  tagValue,
  unsetPath,
  type CollectionStore,
  type DriverCursor,
  type FieldValue,
  type Filter,
  type FindOptions,
  type Identity,
  type IndexDefinition,
  type NormalizedIndex,
  type RawRecord,
  type StorageConfig,
  type StoreDriver,
  type UpdateExpression,
} from '@docket/core';
import { compareValues, matchesFilter } from './matcher.js';
import { applyUpdate } from './update.js';

/**
 * Options for the in-memory driver
 */
export interface MemoryStorageOptions {
  /** Identity for records inserted without `_id` (default: a random UUID) */
  generateId?: () => Identity;
}

/**
 * Stable string for an index key part. Distinguishes types the way the
 * store does, so `1` and `'1'` never collide.
 */
function serializeValue(value: FieldValue | undefined): string {
  if (value === undefined) return 'null';

  const tagged = tagValue(value);
  switch (tagged.kind) {
    case 'null':
      return 'null';
    case 'string':
      return `s:${tagged.value}`;
    case 'number':
      return `n:${tagged.value}`;
    case 'boolean':
      return `b:${tagged.value}`;
    case 'date':
      return `d:${tagged.value.getTime()}`;
    case 'identifier':
      return `o:${tagged.value.toHexString()}`;
    case 'array':
      return `a:[${tagged.value.map(serializeValue).join(',')}]`;
    case 'map': {
      const fields = tagged.value;
      const parts = Object.keys(fields)
        .sort()
        .map((key) => `${JSON.stringify(key)}=${serializeValue(fields[key])}`);
      return `m:{${parts.join(',')}}`;
    }
  }
}

/**
 * Index over one collection. Unique indexes reject a second record with the
 * same key.
 */
class MemoryIndex {
  readonly definition: NormalizedIndex;

  private entries = new Map<string, Set<string>>();

  constructor(definition: NormalizedIndex) {
    this.definition = definition;
  }

  /**
   * Throw if adding the record under `recordKey` would break uniqueness
   */
  check(record: RawRecord, recordKey: string, collection: string): void {
    if (!this.definition.unique) return;

    const key = this.keyOf(record);
    if (key === null) return;

    const holders = this.entries.get(key);
    if (!holders) return;

    for (const holder of holders) {
      if (holder !== recordKey) {
        const fields = this.definition.fields.map((f) => f.field);
        throw new ConstraintViolationError(
          `Duplicate key in unique index "${this.definition.name}" on ${collection} (${fields.join(', ')})`,
          { index: this.definition.name, context: { collection, fields } }
        );
      }
    }
  }

  add(record: RawRecord, recordKey: string): void {
    const key = this.keyOf(record);
    if (key === null) return;

    let holders = this.entries.get(key);
    if (!holders) {
      holders = new Set();
      this.entries.set(key, holders);
    }
    holders.add(recordKey);
  }

  remove(record: RawRecord, recordKey: string): void {
    const key = this.keyOf(record);
    if (key === null) return;

    const holders = this.entries.get(key);
    if (holders) {
      holders.delete(recordKey);
      if (holders.size === 0) {
        this.entries.delete(key);
      }
    }
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Index key of a record; null when a sparse index skips it
   */
  private keyOf(record: RawRecord): string | null {
    const values = this.definition.fields.map((f) => getPath(record, f.field));

    if (this.definition.sparse && values.every((value) => value === undefined)) {
      return null;
    }

    return values.map(serializeValue).join('|');
  }
}

/**
 * Keep or drop top-level and nested paths. A projection with any `1`
 * includes only those paths (and `_id` unless it is `0`).
 */
function project(record: RawRecord, projection: Record<string, 0 | 1>): RawRecord {
  const entries = Object.entries(projection);
  const inclusive = entries.some(([path, flag]) => flag === 1 && path !== ID_FIELD);

  if (!inclusive) {
    const result = cloneFields(record);
    for (const [path, flag] of entries) {
      if (flag === 0) unsetPath(result, path);
    }
    return result;
  }

  const result: RawRecord = {};
  const id = record[ID_FIELD];
  if (id !== undefined && projection[ID_FIELD] !== 0) {
    result[ID_FIELD] = id;
  }
  for (const [path, flag] of entries) {
    if (flag !== 1 || path === ID_FIELD) continue;
    const value = getPath(record, path);
    if (value !== undefined) setPath(result, path, value);
  }
  return cloneFields(result);
}

/**
 * Cursor over a result set computed on the first `next()`
 */
class MemoryCursor implements DriverCursor {
  private results: RawRecord[] | null = null;
  private position = 0;
  private closed = false;

  constructor(private readonly execute: () => RawRecord[]) {}

  async next(): Promise<RawRecord | null> {
    if (this.closed) return null;

    this.results ??= this.execute();
    const record = this.results[this.position];
    if (record === undefined) return null;

    this.position++;
    return record;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.results = null;
  }
}

/**
 * One in-memory collection. Records are copied on the way in and out.
 */
export class MemoryCollectionStore implements CollectionStore {
  readonly name: string;

  private records = new Map<string, RawRecord>();
  private indexes = new Map<string, MemoryIndex>();

  constructor(
    name: string,
    private readonly generateId: () => Identity
  ) {
    this.name = name;
  }

  get size(): number {
    return this.records.size;
  }

  async insertOne(record: RawRecord): Promise<Identity> {
    const provided = record[ID_FIELD];
    if (provided !== undefined && !isIdentity(provided)) {
      throw new StorageError('DOCKET_S300', '_id must be a string, a number or an object identifier', {
        collection: this.name,
      });
    }

    const id = provided ?? this.generateId();
    const key = identityKey(id);

    if (this.records.has(key)) {
      throw new ConstraintViolationError(
        `Duplicate key in unique index "_id_" on ${this.name} (_id: ${displayIdentity(id)})`,
        { index: '_id_', context: { collection: this.name } }
      );
    }

    const stored = cloneFields(record);
    stored[ID_FIELD] = id;

    this.checkIndexes(stored, key);
    this.records.set(key, stored);
    for (const index of this.indexes.values()) {
      index.add(stored, key);
    }

    return id;
  }

  async replaceOne(id: Identity, record: RawRecord): Promise<number> {
    const key = identityKey(id);
    const existing = this.records.get(key);
    if (!existing) return 0;

    const next = cloneFields(record);
    next[ID_FIELD] = id;
    this.swap(key, existing, next);
    return 1;
  }

  async updateOne(id: Identity, update: UpdateExpression): Promise<number> {
    const key = identityKey(id);
    const existing = this.records.get(key);
    if (!existing) return 0;

    this.swap(key, existing, applyUpdate(existing, update));
    return 1;
  }

  async deleteOne(id: Identity): Promise<number> {
    const key = identityKey(id);
    const existing = this.records.get(key);
    if (!existing) return 0;

    this.records.delete(key);
    for (const index of this.indexes.values()) {
      index.remove(existing, key);
    }
    return 1;
  }

  find(filter: Filter, options: FindOptions = {}): DriverCursor {
    return new MemoryCursor(() => this.query(filter, options));
  }

  async findOne(filter: Filter, options: FindOptions = {}): Promise<RawRecord | null> {
    return this.query(filter, { ...options, limit: 1 })[0] ?? null;
  }

  async count(filter: Filter = {}): Promise<number> {
    let count = 0;
    for (const record of this.records.values()) {
      if (matchesFilter(record, filter)) count++;
    }
    return count;
  }

  async createIndex(definition: IndexDefinition): Promise<string> {
    const normalized = normalizeIndex(definition);
    if (this.indexes.has(normalized.name)) {
      return normalized.name;
    }

    const index = new MemoryIndex(normalized);
    for (const [key, record] of this.records) {
      index.check(record, key, this.name);
      index.add(record, key);
    }

    this.indexes.set(normalized.name, index);
    return normalized.name;
  }

  async dropIndex(name: string): Promise<void> {
    if (!this.indexes.delete(name)) {
      throw new StorageError('DOCKET_S300', `Index "${name}" not found on ${this.name}`, {
        collection: this.name,
        index: name,
      });
    }
  }

  async getIndexes(): Promise<NormalizedIndex[]> {
    return Array.from(this.indexes.values()).map((index) => index.definition);
  }

  async drop(): Promise<void> {
    this.records.clear();
    this.indexes.clear();
  }

  private query(filter: Filter, options: FindOptions): RawRecord[] {
    let results = Array.from(this.records.values()).filter((record) =>
      matchesFilter(record, filter)
    );

    const sort = options.sort;
    if (sort) {
      const keys = Object.entries(sort);
      results = [...results].sort((a, b) => {
        for (const [path, direction] of keys) {
          const order = compareValues(getPath(a, path), getPath(b, path)) * direction;
          if (order !== 0) return order;
        }
        return 0;
      });
    }

    const skip = options.skip ?? 0;
    const end = options.limit !== undefined && options.limit > 0 ? skip + options.limit : undefined;
    results = results.slice(skip, end);

    const projection = options.projection;
    return results.map((record) => (projection ? project(record, projection) : cloneFields(record)));
  }

  private checkIndexes(record: RawRecord, key: string): void {
    for (const index of this.indexes.values()) {
      index.check(record, key, this.name);
    }
  }

  private swap(key: string, previous: RawRecord, next: RawRecord): void {
    this.checkIndexes(next, key);

    for (const index of this.indexes.values()) {
      index.remove(previous, key);
      index.add(next, key);
    }
    this.records.set(key, next);
  }
}

/**
 * In-memory store driver. Data lives for the life of the driver instance
 * and is discarded on `close()`.
 */
export class MemoryStorageAdapter implements StoreDriver {
  readonly name = 'memory';

  private stores = new Map<string, MemoryCollectionStore>();
  private readonly generateId: () => Identity;

  constructor(options: MemoryStorageOptions = {}) {
    this.generateId = options.generateId ?? (() => randomUUID());
  }

  isAvailable(): boolean {
    return true;
  }

  async initialize(_config: StorageConfig): Promise<void> {
    // nothing to connect to
  }

  async close(): Promise<void> {
    this.stores.clear();
  }

  getStore(name: string): MemoryCollectionStore {
    let store = this.stores.get(name);

    if (!store) {
      store = new MemoryCollectionStore(name, this.generateId);
      this.stores.set(name, store);
    }

    return store;
  }

  async listStores(): Promise<string[]> {
    return Array.from(this.stores.keys());
  }
}

/**
 * Create an in-memory store driver
 *
 * @example
 * ```typescript
 * let next = 0;
 * const storage = createMemoryStorage({ generateId: () => ++next });
 * const db = await Database.create({ name: 'test', storage });
 * ```
 */
export function createMemoryStorage(options?: MemoryStorageOptions): MemoryStorageAdapter {
  return new MemoryStorageAdapter(options);
}

import type { Identity, RawRecord } from './value.js';

/**
 * Filter passed through to the store unchanged. Docket never interprets it
 * beyond building `{ _id: identity }` for lookups by identity.
 */
export type Filter = Record<string, unknown>;

/**
 * Update expression passed through to the store unchanged
 * (for example `{ $inc: { visits: 1 } }`).
 */
export type UpdateExpression = Record<string, unknown>;

/**
 * Sort specification: field path to direction (1 ascending, -1 descending)
 */
export type SortSpec = Record<string, 1 | -1>;

/**
 * Options for a find operation
 */
export interface FindOptions {
  sort?: SortSpec;
  skip?: number;
  limit?: number;
  /** Field projection, passed through to the store */
  projection?: Record<string, 0 | 1>;
}

/**
 * Index field specification
 */
export interface IndexField {
  /** Field name */
  field: string;
  /** Sort direction for this field */
  direction?: 'asc' | 'desc';
}

/**
 * Index definition
 */
export interface IndexDefinition {
  /** Index name (auto-generated if not provided) */
  name?: string;
  /** Fields to index */
  fields: (string | IndexField)[];
  /** Whether index values must be unique */
  unique?: boolean;
  /** Sparse index (skip documents without indexed fields) */
  sparse?: boolean;
}

/**
 * Normalized index definition (after processing)
 */
export interface NormalizedIndex {
  name: string;
  fields: IndexField[];
  unique: boolean;
  sparse: boolean;
}

/**
 * Storage configuration handed to a driver on initialization
 */
export interface StorageConfig {
  /** Database name */
  name: string;
  /** Driver-specific options */
  options?: Record<string, unknown>;
}

/**
 * Native result iterator of a store. Yields raw records one at a time.
 */
export interface DriverCursor {
  /** Next raw record, or null once the result set is exhausted */
  next(): Promise<RawRecord | null>;

  /** Release server-side resources */
  close(): Promise<void>;
}

/**
 * One collection of the external store.
 *
 * Implementations must raise `ConstraintViolationError` when a write is
 * rejected by a unique index, and let every other failure propagate.
 */
export interface CollectionStore {
  /** Collection name */
  readonly name: string;

  /**
   * Insert one record. Returns the record's identity, generated by the store
   * when the record has no `_id`.
   */
  insertOne(record: RawRecord): Promise<Identity>;

  /**
   * Replace the record with the given identity. Returns the matched count.
   */
  replaceOne(id: Identity, record: RawRecord): Promise<number>;

  /**
   * Apply an update expression to the record with the given identity.
   * Returns the matched count.
   */
  updateOne(id: Identity, update: UpdateExpression): Promise<number>;

  /**
   * Delete the record with the given identity. Returns the deleted count.
   */
  deleteOne(id: Identity): Promise<number>;

  /**
   * Open a result iterator. Execution may be deferred until the first `next()`.
   */
  find(filter: Filter, options?: FindOptions): DriverCursor;

  /**
   * First record matching the filter, or null
   */
  findOne(filter: Filter, options?: FindOptions): Promise<RawRecord | null>;

  /**
   * Count records matching the filter (all records without one)
   */
  count(filter?: Filter): Promise<number>;

  /**
   * Create an index. Returns the index name.
   */
  createIndex(index: IndexDefinition): Promise<string>;

  dropIndex(name: string): Promise<void>;

  getIndexes(): Promise<NormalizedIndex[]>;

  /**
   * Remove every record and index of the collection
   */
  drop(): Promise<void>;
}

/**
 * Store driver interface (pluggable backend)
 */
export interface StoreDriver {
  /** Driver name for identification */
  readonly name: string;

  /**
   * Connect and prepare the driver
   */
  initialize(config: StorageConfig): Promise<void>;

  /**
   * Close the driver and release resources
   */
  close(): Promise<void>;

  /**
   * Check if this driver can run in the current environment
   */
  isAvailable(): boolean;

  /**
   * Get the store for a collection
   */
  getStore(name: string): CollectionStore;

  /**
   * List all collection names
   */
  listStores(): Promise<string[]>;
}

/**
 * Normalize an index definition, generating a name from its fields
 */
export function normalizeIndex(index: IndexDefinition): NormalizedIndex {
  const fields: IndexField[] = index.fields.map((f) =>
    typeof f === 'string'
      ? { field: f, direction: 'asc' }
      : { field: f.field, direction: f.direction ?? 'asc' }
  );

  const name = index.name ?? `idx_${fields.map((f) => f.field).join('_')}`;

  return {
    name,
    fields,
    unique: index.unique ?? false,
    sparse: index.sparse ?? false,
  };
}

/**
 * MongoDB store driver for Docket.
 *
 * Each Docket collection maps to one server collection. Filters, sort specs,
 * projections and update expressions are handed to the server as they are;
 * only identities are encoded (see {@link encodeIdentity}).
 *
 * @module storage-mongodb
 *
 * @example
 * ```typescript
 * import { Database } from '@docket/core';
 * import { createMongoStorage } from '@docket/storage-mongodb';
 *
 * const db = await Database.create({
 *   name: 'app',
 *   storage: createMongoStorage({ uri: 'mongodb://localhost:27017' }),
 * });
 * ```
 */

import {
  StorageError,
  createLogger,
  normalizeIndex,
  type CollectionStore,
  type DocketLogger,
  type DriverCursor,
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
import {
  MongoClient,
  type Collection,
  type Db,
  type FindCursor,
  type FindOptions as MongoFindOptions,
  type Document as MongoDocument,
  type WithId,
} from 'mongodb';
import { z } from 'zod';
import { decodeIdentity, decodeRecord, encodeFilter, encodeIdentity, encodeRecord } from './codec.js';
import { parseMongoConfig, type MongoStorageConfig, type ResolvedMongoStorageConfig } from './config.js';
import { isIndexNotFound, isNamespaceNotFound, mapWriteError } from './errors.js';

/**
 * Options that are not connection settings
 */
export interface MongoStorageOptions {
  /**
   * Connected client to use instead of creating one. The driver does not
   * close a client it did not create.
   */
  client?: MongoClient;
  /** Parent logger */
  logger?: DocketLogger;
}

const IndexInfoSchema = z.object({
  name: z.string(),
  key: z.record(z.union([z.number(), z.string()])),
  unique: z.boolean().optional(),
  sparse: z.boolean().optional(),
});

/**
 * Describe a server index in Docket's terms. Returns null for the built-in
 * `_id_` index and for descriptions that are not plain key indexes.
 */
export function describeIndex(info: unknown): NormalizedIndex | null {
  const parsed = IndexInfoSchema.safeParse(info);
  if (!parsed.success || parsed.data.name === '_id_') return null;

  const { name, key, unique, sparse } = parsed.data;
  return {
    name,
    fields: Object.entries(key).map(([field, direction]) => ({
      field,
      direction: direction === -1 ? 'desc' : 'asc',
    })),
    unique: unique ?? false,
    sparse: sparse ?? false,
  };
}

/**
 * Find options in the server's terms
 */
export function toFindOptions(options: FindOptions = {}): MongoFindOptions {
  return {
    ...(options.sort ? { sort: options.sort } : {}),
    ...(options.skip !== undefined ? { skip: options.skip } : {}),
    ...(options.limit !== undefined ? { limit: options.limit } : {}),
    ...(options.projection ? { projection: options.projection } : {}),
  };
}

class MongoDriverCursor implements DriverCursor {
  constructor(private readonly cursor: FindCursor<WithId<MongoDocument>>) {}

  async next(): Promise<RawRecord | null> {
    const document = await this.cursor.next();
    return document ? decodeRecord(document) : null;
  }

  async close(): Promise<void> {
    await this.cursor.close();
  }
}

/**
 * One server collection
 */
export class MongoCollectionStore implements CollectionStore {
  constructor(
    readonly name: string,
    private readonly collection: Collection<MongoDocument>,
    private readonly config: ResolvedMongoStorageConfig,
    private readonly logger: DocketLogger
  ) {}

  async insertOne(record: RawRecord): Promise<Identity> {
    try {
      const result = await this.collection.insertOne(encodeRecord(record, this.config.objectIdStrings));
      return decodeIdentity(result.insertedId);
    } catch (error) {
      throw mapWriteError(error, this.name);
    }
  }

  async replaceOne(id: Identity, record: RawRecord): Promise<number> {
    try {
      const result = await this.collection.replaceOne(this.byId(id), { ...record });
      return result.matchedCount;
    } catch (error) {
      throw mapWriteError(error, this.name);
    }
  }

  async updateOne(id: Identity, update: UpdateExpression): Promise<number> {
    try {
      const result = await this.collection.updateOne(this.byId(id), update);
      return result.matchedCount;
    } catch (error) {
      throw mapWriteError(error, this.name);
    }
  }

  async deleteOne(id: Identity): Promise<number> {
    const result = await this.collection.deleteOne(this.byId(id));
    return result.deletedCount;
  }

  find(filter: Filter, options?: FindOptions): DriverCursor {
    return new MongoDriverCursor(this.collection.find(this.encode(filter), toFindOptions(options)));
  }

  async findOne(filter: Filter, options?: FindOptions): Promise<RawRecord | null> {
    const document = await this.collection.findOne(this.encode(filter), toFindOptions(options));
    return document ? decodeRecord(document) : null;
  }

  async count(filter: Filter = {}): Promise<number> {
    return this.collection.countDocuments(this.encode(filter));
  }

  async createIndex(index: IndexDefinition): Promise<string> {
    const normalized = normalizeIndex(index);
    const keys: Record<string, 1 | -1> = {};
    for (const f of normalized.fields) {
      keys[f.field] = f.direction === 'desc' ? -1 : 1;
    }

    try {
      return await this.collection.createIndex(keys, {
        name: normalized.name,
        unique: normalized.unique,
        sparse: normalized.sparse,
      });
    } catch (error) {
      throw mapWriteError(error, this.name);
    }
  }

  async dropIndex(name: string): Promise<void> {
    try {
      await this.collection.dropIndex(name);
    } catch (error) {
      if (isIndexNotFound(error) || isNamespaceNotFound(error)) {
        throw new StorageError(
          'DOCKET_S300',
          `Index "${name}" does not exist on ${this.name}`,
          { collection: this.name, index: name },
          error instanceof Error ? error : undefined
        );
      }
      throw error;
    }
  }

  async getIndexes(): Promise<NormalizedIndex[]> {
    let infos: unknown[];
    try {
      infos = await this.collection.indexes();
    } catch (error) {
      if (isNamespaceNotFound(error)) return [];
      throw error;
    }

    const indexes: NormalizedIndex[] = [];
    for (const info of infos) {
      const index = describeIndex(info);
      if (index) indexes.push(index);
    }
    return indexes;
  }

  async drop(): Promise<void> {
    try {
      await this.collection.drop();
    } catch (error) {
      if (!isNamespaceNotFound(error)) throw error;
      this.logger.debug('Drop skipped, collection does not exist', { collection: this.name });
    }
  }

  private byId(id: Identity): MongoDocument {
    return { _id: encodeIdentity(id, this.config.objectIdStrings) };
  }

  private encode(filter: Filter): MongoDocument {
    return encodeFilter(filter, this.config.objectIdStrings);
  }
}

/**
 * Store driver over the official `mongodb` client
 */
export class MongoStorageAdapter implements StoreDriver {
  readonly name = 'mongodb';

  private config: ResolvedMongoStorageConfig;
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private readonly ownsClient: boolean;
  private readonly stores = new Map<string, MongoCollectionStore>();
  private readonly logger: DocketLogger;

  /**
   * @throws StorageError `DOCKET_S302` when the settings are invalid
   */
  constructor(
    config: MongoStorageConfig,
    private readonly options: MongoStorageOptions = {}
  ) {
    this.config = parseMongoConfig(config);
    this.ownsClient = options.client === undefined;
    this.logger = options.logger?.child('mongodb') ?? createLogger({ module: 'docket:mongodb' });
  }

  /** Settings with defaults applied */
  get settings(): Readonly<ResolvedMongoStorageConfig> {
    return this.config;
  }

  get connected(): boolean {
    return this.db !== null;
  }

  isAvailable(): boolean {
    return true;
  }

  /**
   * Connect and select the database. Options passed through
   * `Database.create({ storageOptions })` override the constructor settings.
   */
  async initialize(storageConfig: StorageConfig): Promise<void> {
    if (storageConfig.options) {
      this.config = parseMongoConfig({ ...this.config, ...storageConfig.options });
    }

    const client =
      this.options.client ??
      new MongoClient(this.config.uri, {
        maxPoolSize: this.config.maxPoolSize,
        serverSelectionTimeoutMS: this.config.timeoutMs,
        connectTimeoutMS: this.config.timeoutMs,
        ...(this.config.appName ? { appName: this.config.appName } : {}),
      });

    if (this.ownsClient) {
      await client.connect();
    }

    const database = this.config.database ?? storageConfig.name;
    this.client = client;
    this.db = client.db(database);
    this.logger.debug('Connected', { database, maxPoolSize: this.config.maxPoolSize });
  }

  async close(): Promise<void> {
    this.stores.clear();
    const client = this.client;
    this.client = null;
    this.db = null;

    if (client && this.ownsClient) {
      await client.close();
      this.logger.debug('Disconnected');
    }
  }

  getStore(name: string): MongoCollectionStore {
    let store = this.stores.get(name);

    if (!store) {
      store = new MongoCollectionStore(
        name,
        this.database().collection(name),
        this.config,
        this.logger.child(name, { collection: name })
      );
      this.stores.set(name, store);
    }

    return store;
  }

  async listStores(): Promise<string[]> {
    const collections = await this.database()
      .listCollections({}, { nameOnly: true })
      .toArray();
    return collections.map((c) => c.name);
  }

  private database(): Db {
    if (!this.db) {
      throw new StorageError('DOCKET_S300', 'MongoDB driver is not initialized', {
        driver: this.name,
      });
    }
    return this.db;
  }
}

/**
 * Create a MongoDB store driver
 *
 * @example
 * ```typescript
 * const storage = createMongoStorage({
 *   uri: 'mongodb://localhost:27017',
 *   database: 'app',
 *   appName: 'billing',
 * });
 * ```
 */
export function createMongoStorage(
  config: MongoStorageConfig,
  options?: MongoStorageOptions
): MongoStorageAdapter {
  return new MongoStorageAdapter(config, options);
}

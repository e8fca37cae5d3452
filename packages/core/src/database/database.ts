import { DocketError, StorageError } from '../errors/docket-error.js';
import { createLogger, type DocketLogger } from '../observability/logger.js';
import { ObserverDispatcher } from '../observers/dispatcher.js';
import { ObserverRegistry } from '../observers/registry.js';
import type { StoreDriver } from '../types/storage.js';
import { assertCollectionName } from '../validation/input-validation.js';
import { collectionNameOf, type Document, type DocumentClass } from './document.js';
import { Repository } from './repository.js';

/**
 * Options for {@link Database.create}.
 *
 * @example
 * ```typescript
 * import { Database, ObserverRegistry } from '@docket/core';
 * import { createMemoryStorage } from '@docket/storage-memory';
 *
 * const options: DatabaseOptions = {
 *   name: 'app',
 *   storage: createMemoryStorage(),
 *   observers: new ObserverRegistry().register(User, new AuditObserver()),
 * };
 * ```
 */
export interface DatabaseOptions {
  /** Database name handed to the driver */
  name: string;

  /** Store driver */
  storage: StoreDriver;

  /** Observers per document class (default: an empty registry) */
  observers?: ObserverRegistry;

  /** Parent logger; repositories log through children of it */
  logger?: DocketLogger;

  /** Driver-specific options passed to `initialize` */
  storageOptions?: Record<string, unknown>;
}

/**
 * Entry point: owns the store driver and one repository per document class.
 *
 * @example
 * ```typescript
 * const db = await Database.create({ name: 'app', storage: createMemoryStorage() });
 *
 * const users = db.repository(User);
 * await users.createIndex({ fields: ['email'], unique: true });
 * await users.insertOrThrow(new User({ name: 'Ada', email: 'ada@example.com' }));
 *
 * await db.close();
 * ```
 */
export class Database {
  readonly name: string;
  readonly observers: ObserverRegistry;

  private readonly storage: StoreDriver;
  private readonly logger: DocketLogger;
  private readonly dispatcher: ObserverDispatcher;
  private readonly repositories = new Map<DocumentClass, Repository<Document>>();
  private isInitialized = false;
  private isClosed = false;

  private constructor(options: DatabaseOptions) {
    this.name = options.name;
    this.storage = options.storage;
    this.observers = options.observers ?? new ObserverRegistry();
    this.logger = options.logger ?? createLogger();
    this.dispatcher = new ObserverDispatcher(this.observers, this.logger.child('observers'));
  }

  /**
   * Check the driver is usable, initialize it and return an open database
   *
   * @throws StorageError `DOCKET_S301` when the driver is unavailable,
   * `DOCKET_S303` when it fails to initialize
   */
  static async create(options: DatabaseOptions): Promise<Database> {
    const db = new Database(options);
    await db.initialize(options.storageOptions);
    return db;
  }

  private async initialize(storageOptions?: Record<string, unknown>): Promise<void> {
    if (this.isInitialized) return;

    if (!this.storage.isAvailable()) {
      throw new StorageError(
        'DOCKET_S301',
        `Storage driver "${this.storage.name}" is not available in this environment`,
        { driver: this.storage.name }
      );
    }

    try {
      await this.storage.initialize({
        name: this.name,
        ...(storageOptions ? { options: storageOptions } : {}),
      });
    } catch (error) {
      if (DocketError.isDocketError(error)) throw error;
      throw new StorageError(
        'DOCKET_S303',
        `Storage driver "${this.storage.name}" failed to initialize`,
        { driver: this.storage.name, database: this.name },
        error instanceof Error ? error : undefined
      );
    }

    this.isInitialized = true;
    this.logger.debug('Database opened', { database: this.name, driver: this.storage.name });
  }

  /**
   * Repository bound to a document class. Repeated calls return the same
   * instance.
   */
  repository<T extends Document>(model: DocumentClass<T>): Repository<T> {
    this.ensureOpen();

    const cached = this.repositories.get(model);
    if (cached) {
      // keyed by the class it was built for
      return cached as Repository<T>;
    }

    const collection = collectionNameOf(model);
    assertCollectionName(collection);

    const repository = new Repository<T>({
      model,
      store: this.storage.getStore(collection),
      dispatcher: this.dispatcher,
      logger: this.logger.child(collection, { collection }),
      ensureOpen: () => this.ensureOpen(),
    });
    this.repositories.set(model, repository);
    return repository;
  }

  async listCollections(): Promise<string[]> {
    this.ensureOpen();
    return this.storage.listStores();
  }

  /**
   * Close the driver. Every later call on this database or its
   * repositories throws `DOCKET_S305`.
   */
  async close(): Promise<void> {
    if (this.isClosed) return;

    this.isClosed = true;
    for (const repository of this.repositories.values()) {
      repository.dispose();
    }
    this.repositories.clear();
    await this.storage.close();
    this.logger.debug('Database closed', { database: this.name });
  }

  get isOpen(): boolean {
    return this.isInitialized && !this.isClosed;
  }

  private ensureOpen(): void {
    if (this.isClosed) {
      throw new StorageError('DOCKET_S305', `Database "${this.name}" is closed`, {
        database: this.name,
      });
    }
  }
}

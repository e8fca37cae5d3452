import { Observable, Subject } from 'rxjs';
import {
  ConstraintViolationError,
  DocumentNotFoundError,
  PreconditionError,
  ValidationError,
} from '../errors/docket-error.js';
import type { DocketLogger } from '../observability/logger.js';
import type { ObserverDispatcher } from '../observers/dispatcher.js';
import type { HookContext, HookOperation, LifecycleHook } from '../observers/types.js';
import type {
  CollectionStore,
  Filter,
  FindOptions,
  IndexDefinition,
  NormalizedIndex,
  UpdateExpression,
} from '../types/storage.js';
import {
  ID_FIELD,
  displayIdentity,
  isIdentity,
  type FieldMap,
  type FieldValue,
  type Identity,
} from '../types/value.js';
import type { ErrorCollector } from '../validation/error-collector.js';
import { assertFieldPath } from '../validation/input-validation.js';
import { Cursor } from './cursor.js';
import { collectionNameOf, getPath, hydrate, type Document, type DocumentClass } from './document.js';
import { assertTransition, type LifecycleOperation } from './lifecycle.js';

/**
 * Options for insert and update
 */
export interface WriteOptions {
  /** Run `isValid()` before writing (default: true) */
  validate?: boolean;
}

/**
 * The document was written
 */
export interface WrittenResult<T extends Document> {
  status: 'written';
  document: T;
  id: Identity;
  /** Records matched by the store; 0 when an update found nothing to replace */
  affected: number;
}

/**
 * Validation failed; the document's collector holds the errors
 */
export interface InvalidResult<T extends Document> {
  status: 'invalid';
  document: T;
  errors: ErrorCollector;
}

/**
 * The store rejected the write, usually on a unique index
 */
export interface ConstraintViolationResult<T extends Document> {
  status: 'constraint-violation';
  document: T;
  error: ConstraintViolationError;
}

/**
 * Outcome of an insert or update. Precondition failures are thrown, never
 * returned.
 */
export type WriteResult<T extends Document> =
  | WrittenResult<T>
  | InvalidResult<T>
  | ConstraintViolationResult<T>;

/**
 * Outcome of an `*OrThrow` write
 */
export type CheckedWriteResult<T extends Document> = WrittenResult<T> | InvalidResult<T>;

export interface RemoveResult<T extends Document> {
  status: 'removed';
  document: T;
  id: Identity;
  /** Records deleted by the store */
  affected: number;
}

export type ChangeOperation = 'insert' | 'update' | 'modify' | 'remove';

/**
 * Emitted on `changes()` after each successful write
 */
export interface ChangeEvent {
  operation: ChangeOperation;
  collection: string;
  documentId: Identity;
  /** Fields after the write; null for removals */
  fields: FieldMap | null;
  /** Update expression sent by an atomic modifier */
  update?: UpdateExpression;
  timestamp: number;
  /** Per-repository counter, starting at 1 */
  sequence: number;
}

/**
 * Collaborators a repository is built from
 */
export interface RepositoryConfig<T extends Document> {
  model: DocumentClass<T>;
  store: CollectionStore;
  dispatcher: ObserverDispatcher;
  logger: DocketLogger;
  /** Throws when the owning database can no longer be used */
  ensureOpen?: () => void;
}

export function isWritten<T extends Document>(result: WriteResult<T>): result is WrittenResult<T> {
  return result.status === 'written';
}

/**
 * Narrow a write result to `written`, throwing a ValidationError for
 * `invalid` and the store's ConstraintViolationError for
 * `constraint-violation`.
 *
 * @example
 * ```typescript
 * const { id } = expectWritten(await users.insert(user));
 * ```
 */
export function expectWritten<T extends Document>(result: WriteResult<T>): WrittenResult<T> {
  switch (result.status) {
    case 'written':
      return result;
    case 'invalid':
      throw new ValidationError(result.errors.toFieldErrors(), {
        document: result.document.constructor.name,
      });
    case 'constraint-violation':
      throw result.error;
  }
}

function rethrowConstraint<T extends Document>(result: WriteResult<T>): CheckedWriteResult<T> {
  if (result.status === 'constraint-violation') {
    throw result.error;
  }
  return result;
}

/**
 * Binds a Document class to one collection of the store.
 *
 * Writes validate the document, run the class's observers around the store
 * call and move the document through its lifecycle. Reads decode raw
 * records into persisted documents of the class.
 *
 * @example
 * ```typescript
 * const users = db.repository(User);
 *
 * const user = new User({ name: 'Ada', email: 'ada@example.com' });
 * const result = await users.insert(user);
 * if (result.status === 'invalid') {
 *   console.log(user.errors.fullMessages());
 * }
 *
 * user.set('name', 'Ada Lovelace');
 * await users.updateOrThrow(user);
 *
 * const found = await users.findOne(user.id);
 * ```
 */
export class Repository<T extends Document> {
  readonly model: DocumentClass<T>;
  readonly collection: string;

  private readonly store: CollectionStore;
  private readonly dispatcher: ObserverDispatcher;
  private readonly logger: DocketLogger;
  private readonly ensureOpen: () => void;
  private readonly changes$ = new Subject<ChangeEvent>();
  private sequence = 0;

  constructor(config: RepositoryConfig<T>) {
    this.model = config.model;
    this.collection = collectionNameOf(config.model);
    this.store = config.store;
    this.dispatcher = config.dispatcher;
    this.logger = config.logger;
    this.ensureOpen = config.ensureOpen ?? (() => undefined);
  }

  /**
   * Insert a new document.
   *
   * Order: beforeValidate, validation, afterValidate, beforeInsert,
   * beforeInsertOrUpdate, store insert, afterInsert, afterInsertOrUpdate.
   */
  async insert(document: T, options: WriteOptions = {}): Promise<WriteResult<T>> {
    this.ensureOpen();
    this.assertState(document, 'insert');
    document.beginTransition('insert');
    try {
      return await this.performInsert(document, options);
    } finally {
      document.endTransition();
    }
  }

  /**
   * Insert, throwing the store's ConstraintViolationError instead of
   * returning it. Validation runs exactly as in `insert`.
   */
  async insertOrThrow(document: T, options: WriteOptions = {}): Promise<CheckedWriteResult<T>> {
    return rethrowConstraint(await this.insert(document, options));
  }

  private async performInsert(document: T, options: WriteOptions): Promise<WriteResult<T>> {
    const context = this.hookContext('insert');
    const end = this.logger.time('insert');

    if (!(await this.runValidation(document, context, options))) {
      return this.invalid(document, 'insert');
    }

    await this.dispatch('beforeInsert', document, context);
    await this.dispatch('beforeInsertOrUpdate', document, context);

    let id: Identity;
    try {
      id = await this.store.insertOne(document.toRecord());
    } catch (error) {
      return this.constraintViolation(error, document, 'insert');
    }

    document.markInserted(id);
    this.emit('insert', id, document.fields);

    await this.dispatch('afterInsert', document, context);
    await this.dispatch('afterInsertOrUpdate', document, context);

    end({ id: displayIdentity(id) });
    return { status: 'written', document, id, affected: 1 };
  }

  /**
   * Replace the stored record of a persisted document with its current
   * fields.
   *
   * Order: beforeValidate, validation, afterValidate, beforeUpdate,
   * beforeInsertOrUpdate, store replace, afterUpdate, afterInsertOrUpdate.
   */
  async update(document: T, options: WriteOptions = {}): Promise<WriteResult<T>> {
    this.ensureOpen();
    this.assertState(document, 'update');
    const id = this.identityOf(document, 'update');
    const context = this.hookContext('update');
    const end = this.logger.time('update');

    if (!(await this.runValidation(document, context, options))) {
      return this.invalid(document, 'update');
    }

    await this.dispatch('beforeUpdate', document, context);
    await this.dispatch('beforeInsertOrUpdate', document, context);

    let affected: number;
    try {
      affected = await this.store.replaceOne(id, document.fields);
    } catch (error) {
      return this.constraintViolation(error, document, 'update');
    }

    if (affected === 0) {
      this.logger.warn('Update matched no record', { id: displayIdentity(id) });
    }

    document.markSaved();
    this.emit('update', id, document.fields);

    await this.dispatch('afterUpdate', document, context);
    await this.dispatch('afterInsertOrUpdate', document, context);

    end({ id: displayIdentity(id), affected });
    return { status: 'written', document, id, affected };
  }

  /**
   * Update, throwing the store's ConstraintViolationError instead of
   * returning it
   */
  async updateOrThrow(document: T, options: WriteOptions = {}): Promise<CheckedWriteResult<T>> {
    return rethrowConstraint(await this.update(document, options));
  }

  /**
   * Delete the record of a persisted document and mark it removed.
   *
   * Order: beforeRemove, store delete, afterRemove.
   */
  async remove(document: T): Promise<RemoveResult<T>> {
    this.ensureOpen();
    this.assertState(document, 'remove');
    const id = this.identityOf(document, 'remove');
    document.beginTransition('remove');
    try {
      return await this.performRemove(document, id);
    } finally {
      document.endTransition();
    }
  }

  private async performRemove(document: T, id: Identity): Promise<RemoveResult<T>> {
    const context = this.hookContext('remove');
    const end = this.logger.time('remove');

    await this.dispatch('beforeRemove', document, context);

    const affected = await this.store.deleteOne(id);

    document.markRemoved();
    this.emit('remove', id, null);

    await this.dispatch('afterRemove', document, context);

    end({ id: displayIdentity(id), affected });
    return { status: 'removed', document, id, affected };
  }

  /**
   * First document matching a filter, or the document with the given
   * identity. Null when nothing matches.
   */
  async findOne(filterOrId: Filter | Identity = {}, options?: FindOptions): Promise<T | null> {
    this.ensureOpen();
    const filter = isIdentity(filterOrId) ? { [ID_FIELD]: filterOrId } : filterOrId;
    const end = this.logger.time('findOne');

    const record = await this.store.findOne(filter, options);

    end({ found: record !== null });
    return record ? hydrate(this.model, record) : null;
  }

  /**
   * Lazy cursor over the documents matching a filter. The store is not
   * queried until the cursor is first advanced.
   */
  find(filter: Filter = {}, options: FindOptions = {}): Cursor<T> {
    this.ensureOpen();
    return new Cursor(this.store, this.model, filter, options, this.logger);
  }

  async count(filter?: Filter): Promise<number> {
    this.ensureOpen();
    return this.store.count(filter);
  }

  async isEmpty(): Promise<boolean> {
    return (await this.count()) === 0;
  }

  /**
   * Replace a persisted document's fields with the stored record
   */
  async reload(document: T): Promise<T> {
    this.ensureOpen();
    this.assertState(document, 'reload');
    const id = this.identityOf(document, 'reload');

    const record = await this.store.findOne({ [ID_FIELD]: id });
    if (!record) {
      throw new DocumentNotFoundError(this.collection, displayIdentity(id));
    }

    document.loadRecord(record);
    return document;
  }

  // ── Atomic modifiers ─────────────────────────────────────────────────
  //
  // Sent to the store as single-record update expressions. When the record
  // was matched, the touched paths are read back into the document. No
  // validation, no hooks.

  /** `$set` the given paths */
  async set(document: T, fields: FieldMap): Promise<number> {
    return this.modify(document, { $set: fields }, Object.keys(fields));
  }

  /** `$unset` the given paths */
  async unset(document: T, ...paths: string[]): Promise<number> {
    const update = Object.fromEntries(paths.map((path) => [path, '']));
    return this.modify(document, { $unset: update }, paths);
  }

  /** `$inc` numeric paths; a missing path starts from 0 */
  async inc(document: T, amounts: Record<string, number>): Promise<number> {
    return this.modify(document, { $inc: amounts }, Object.keys(amounts));
  }

  /** `$push` values onto an array path */
  async push(document: T, path: string, ...values: FieldValue[]): Promise<number> {
    return this.modify(document, { $push: { [path]: { $each: values } } }, [path]);
  }

  /**
   * `$pull` from an array path every element equal to `value`, or matching
   * it when `value` is an operator condition such as `{ $gte: 5 }`
   */
  async pull(document: T, path: string, value: FieldValue): Promise<number> {
    return this.modify(document, { $pull: { [path]: value } }, [path]);
  }

  /** `$addToSet` values not already present in an array path */
  async addToSet(document: T, path: string, ...values: FieldValue[]): Promise<number> {
    return this.modify(document, { $addToSet: { [path]: { $each: values } } }, [path]);
  }

  // ── Indexes ──────────────────────────────────────────────────────────

  async createIndex(index: IndexDefinition): Promise<string> {
    this.ensureOpen();
    const name = await this.store.createIndex(index);
    this.logger.debug('Index created', { index: name, unique: index.unique ?? false });
    return name;
  }

  async dropIndex(name: string): Promise<void> {
    this.ensureOpen();
    await this.store.dropIndex(name);
  }

  async getIndexes(): Promise<NormalizedIndex[]> {
    this.ensureOpen();
    return this.store.getIndexes();
  }

  /**
   * Remove every record and index of the collection. Documents already in
   * memory keep their state.
   */
  async drop(): Promise<void> {
    this.ensureOpen();
    await this.store.drop();
    this.logger.debug('Collection dropped');
  }

  /**
   * Stream of successful writes
   */
  changes(): Observable<ChangeEvent> {
    return this.changes$.asObservable();
  }

  /**
   * Complete the change stream
   *
   * @internal Called by Database on close.
   */
  dispose(): void {
    this.changes$.complete();
  }

  // ── Private ──────────────────────────────────────────────────────────

  private async modify(
    document: T,
    update: UpdateExpression,
    paths: readonly string[]
  ): Promise<number> {
    this.ensureOpen();
    this.assertState(document, 'modify');
    const id = this.identityOf(document, 'modify');

    for (const path of paths) {
      assertFieldPath(path);
      if (path === ID_FIELD) {
        throw new PreconditionError('DOCKET_D405', 'modify', {
          collection: this.collection,
          id: displayIdentity(id),
        });
      }
    }

    const end = this.logger.time('modify');
    const affected = await this.store.updateOne(id, update);

    if (affected === 0) {
      this.logger.warn('Modifier matched no record', { id: displayIdentity(id) });
    } else {
      const record = await this.store.findOne({ [ID_FIELD]: id });
      if (record) {
        for (const path of paths) {
          document.applyStored(path, getPath(record, path));
        }
      } else {
        this.logger.warn('Modified record is gone', { id: displayIdentity(id) });
      }
      this.emit('modify', id, document.fields, update);
    }

    end({ id: displayIdentity(id), operators: Object.keys(update), affected });
    return affected;
  }

  private async runValidation(
    document: T,
    context: HookContext,
    options: WriteOptions
  ): Promise<boolean> {
    if (options.validate === false) return true;

    await this.dispatch('beforeValidate', document, context);
    const valid = document.isValid();
    await this.dispatch('afterValidate', document, context);
    return valid;
  }

  private invalid(document: T, operation: HookOperation): InvalidResult<T> {
    this.logger.warn(`${operation} rejected by validation`, {
      ...(document.id !== null ? { id: displayIdentity(document.id) } : {}),
      errors: document.errors.fullMessages(),
    });
    return { status: 'invalid', document, errors: document.errors };
  }

  private constraintViolation(
    error: unknown,
    document: T,
    operation: HookOperation
  ): ConstraintViolationResult<T> {
    if (!(error instanceof ConstraintViolationError)) {
      throw error;
    }
    this.logger.warn(`${operation} rejected by the store`, {
      code: error.code,
      ...(error.index ? { index: error.index } : {}),
    });
    return { status: 'constraint-violation', document, error };
  }

  private dispatch(
    hook: LifecycleHook,
    document: T,
    context: HookContext
  ): Promise<void> {
    return this.dispatcher.dispatch(this.model, hook, document, context);
  }

  private hookContext(operation: HookOperation): HookContext {
    return { operation, collection: this.collection, timestamp: Date.now() };
  }

  /**
   * Throw unless the operation is legal from the document's state and no
   * insert or remove of the document is still in flight
   */
  private assertState(document: T, operation: LifecycleOperation): void {
    const context = {
      collection: this.collection,
      ...(document.id !== null ? { id: displayIdentity(document.id) } : {}),
    };
    if (document.pending !== null) {
      throw new PreconditionError('DOCKET_D406', operation, { ...context, pending: document.pending });
    }
    assertTransition(document.state, operation, context);
  }

  private identityOf(document: T, operation: LifecycleOperation): Identity {
    const id = document.id;
    if (id === null) {
      throw new PreconditionError('DOCKET_D403', operation, { collection: this.collection });
    }
    return id;
  }

  private emit(
    operation: ChangeOperation,
    documentId: Identity,
    fields: FieldMap | null,
    update?: UpdateExpression
  ): void {
    this.sequence++;
    this.changes$.next({
      operation,
      collection: this.collection,
      documentId,
      fields,
      ...(update ? { update } : {}),
      timestamp: Date.now(),
      sequence: this.sequence,
    });
  }
}

import { QueryError } from '../errors/docket-error.js';
import type { DocketLogger } from '../observability/logger.js';
import type { CollectionStore, DriverCursor, Filter, FindOptions, SortSpec } from '../types/storage.js';
import { hydrate, type Document, type DocumentClass } from './document.js';

/**
 * Lazy, forward-only iterator over a query's results.
 *
 * Nothing is sent to the store until the first advance. Each advance decodes
 * one raw record into a persisted document of the bound class. Once
 * exhausted or closed the cursor returns null forever; run `find` again to
 * re-query.
 *
 * @example
 * ```typescript
 * const cursor = users.find({ active: true }).sort({ name: 1 }).limit(10);
 *
 * for await (const user of cursor) {
 *   console.log(user.get('name'));
 * }
 * ```
 */
export class Cursor<T extends Document> implements AsyncIterable<T> {
  private handle: DriverCursor | null = null;
  private options: FindOptions;
  private lookahead: T | null = null;
  private done = false;

  constructor(
    private readonly store: CollectionStore,
    private readonly model: DocumentClass<T>,
    private readonly filter: Filter = {},
    options: FindOptions = {},
    private readonly logger?: DocketLogger
  ) {
    this.options = { ...options };
  }

  /**
   * Whether the driver cursor has been opened
   */
  get started(): boolean {
    return this.handle !== null || this.done;
  }

  get exhausted(): boolean {
    return this.done;
  }

  sort(spec: SortSpec): this {
    this.assertNotStarted('sort');
    this.options.sort = { ...this.options.sort, ...spec };
    return this;
  }

  skip(count: number): this {
    this.assertNotStarted('skip');
    this.assertCount('skip', count);
    this.options.skip = count;
    return this;
  }

  limit(count: number): this {
    this.assertNotStarted('limit');
    this.assertCount('limit', count);
    this.options.limit = count;
    return this;
  }

  /**
   * Next document, or null once the results are exhausted
   */
  async next(): Promise<T | null> {
    if (this.lookahead) {
      const document = this.lookahead;
      this.lookahead = null;
      return document;
    }
    return this.advance();
  }

  /**
   * Whether another document is available. Reads one record ahead.
   */
  async hasNext(): Promise<boolean> {
    if (this.lookahead) return true;
    this.lookahead = await this.advance();
    return this.lookahead !== null;
  }

  /**
   * Drain the remaining documents
   */
  async toArray(): Promise<T[]> {
    const documents: T[] = [];
    for await (const document of this) {
      documents.push(document);
    }
    return documents;
  }

  async forEach(callback: (document: T, index: number) => void | Promise<void>): Promise<void> {
    let index = 0;
    for await (const document of this) {
      await callback(document, index++);
    }
  }

  /**
   * Count matching records in the store, ignoring skip, limit and progress
   */
  count(): Promise<number> {
    return this.store.count(this.filter);
  }

  /**
   * Release the driver cursor. Later advances return null.
   */
  async close(): Promise<void> {
    this.lookahead = null;
    this.done = true;

    const handle = this.handle;
    this.handle = null;
    if (handle) {
      await handle.close();
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    let document = await this.next();
    while (document !== null) {
      yield document;
      document = await this.next();
    }
  }

  private async advance(): Promise<T | null> {
    if (this.done) return null;

    if (!this.handle) {
      this.logger?.debug('Opening cursor', {
        collection: this.store.name,
        filter: this.filter,
        ...this.options,
      });
      this.handle = this.store.find(this.filter, this.options);
    }

    const record = await this.handle.next();
    if (record === null) {
      await this.close();
      return null;
    }

    return hydrate(this.model, record);
  }

  private assertNotStarted(method: string): void {
    if (this.started) {
      throw new QueryError(
        'DOCKET_Q204',
        `Cannot call ${method}() after the cursor has started`,
        { collection: this.store.name, method }
      );
    }
  }

  private assertCount(method: string, count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new QueryError(
        'DOCKET_Q205',
        `${method}() requires a non-negative integer, got ${count}`,
        { collection: this.store.name, method }
      );
    }
  }
}

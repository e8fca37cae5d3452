/**
 * @packageDocumentation
 *
 * In-memory store driver for Docket.
 *
 * Keeps every collection in process memory and evaluates a practical subset
 * of MongoDB filters and update operators. Use it for tests and local
 * development.
 *
 * ```typescript
 * import { Database } from '@docket/core';
 * import { createMemoryStorage } from '@docket/storage-memory';
 *
 * const db = await Database.create({ name: 'app', storage: createMemoryStorage() });
 * const users = db.repository(User);
 * ```
 *
 * Limitations: no persistence, no transactions, and filters on array
 * positions (`tags.0`) are not supported.
 *
 * @module @docket/storage-memory
 */
export * from './adapter.js';
export { compareValues, isEqual, matchesCondition, matchesFilter } from './matcher.js';
export { applyUpdate } from './update.js';

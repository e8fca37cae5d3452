/**
 * @packageDocumentation
 *
 * MongoDB store driver for Docket, built on the official `mongodb` client.
 *
 * ```typescript
 * import { Database } from '@docket/core';
 * import { createMongoStorage, loadMongoConfigFromEnv } from '@docket/storage-mongodb';
 *
 * const db = await Database.create({
 *   name: 'app',
 *   storage: createMongoStorage(loadMongoConfigFromEnv()),
 * });
 * ```
 *
 * Unique index conflicts (server codes 11000 and 11001) surface as
 * `ConstraintViolationError`; every other server error propagates unchanged.
 *
 * @module @docket/storage-mongodb
 */
export * from './adapter.js';
export {
  MongoStorageConfigSchema,
  loadMongoConfigFromEnv,
  parseMongoConfig,
  type MongoStorageConfig,
  type ResolvedMongoStorageConfig,
} from './config.js';
export { decodeIdentity, decodeRecord, encodeFilter, encodeIdentity, encodeRecord } from './codec.js';
export { duplicateKeyIndex, isDuplicateKeyError, mapWriteError } from './errors.js';

export { ObjectId } from 'mongodb';

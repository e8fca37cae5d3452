/**
 * Documents, their lifecycle, and the repositories and cursors that move
 * them in and out of a store.
 *
 * - {@link Database}: owns the store driver and hands out repositories
 * - {@link Repository}: per-class insert, update, remove and queries
 * - {@link Cursor}: lazy iteration over query results
 * - {@link Document}: field access, validation and lifecycle state
 *
 * @module database
 */
export * from './cursor.js';
export * from './database.js';
export * from './document.js';
export * from './lifecycle.js';
export * from './repository.js';

import type { Document } from '../database/document.js';

/**
 * Lifecycle hook points, in the order they can fire around a write
 */
export type LifecycleHook =
  | 'beforeValidate'
  | 'afterValidate'
  | 'beforeInsert'
  | 'beforeUpdate'
  | 'beforeInsertOrUpdate'
  | 'afterInsert'
  | 'afterUpdate'
  | 'afterInsertOrUpdate'
  | 'beforeRemove'
  | 'afterRemove';

/**
 * Write operation a hook fires around
 */
export type HookOperation = 'insert' | 'update' | 'remove';

/**
 * Context passed to every hook alongside the document
 */
export interface HookContext {
  operation: HookOperation;
  collection: string;
  timestamp: number;
}

/**
 * Observer of a document class.
 *
 * Implement only the hooks you need. Hooks run sequentially in registration
 * order and are awaited; a hook that throws aborts the remaining hooks and
 * the write that triggered them.
 *
 * An observer that writes documents of the class it observes re-enters
 * these hooks; nothing stops that recursion.
 */
export interface Observer<T extends Document = Document> {
  beforeValidate?(document: T, context: HookContext): void | Promise<void>;
  afterValidate?(document: T, context: HookContext): void | Promise<void>;
  beforeInsert?(document: T, context: HookContext): void | Promise<void>;
  afterInsert?(document: T, context: HookContext): void | Promise<void>;
  beforeUpdate?(document: T, context: HookContext): void | Promise<void>;
  afterUpdate?(document: T, context: HookContext): void | Promise<void>;
  beforeInsertOrUpdate?(document: T, context: HookContext): void | Promise<void>;
  afterInsertOrUpdate?(document: T, context: HookContext): void | Promise<void>;
  beforeRemove?(document: T, context: HookContext): void | Promise<void>;
  afterRemove?(document: T, context: HookContext): void | Promise<void>;
}

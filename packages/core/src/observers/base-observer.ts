import type { Document } from '../database/document.js';
import type { HookContext, Observer } from './types.js';

/**
 * Observer with a no-op for every hook. Extend it and override the hooks
 * you need.
 *
 * @example
 * ```typescript
 * class AuditObserver extends BaseObserver<User> {
 *   override async afterInsert(user: User): Promise<void> {
 *     await audit.record('user.created', user.id);
 *   }
 * }
 * ```
 */
export class BaseObserver<T extends Document = Document> implements Required<Observer<T>> {
  beforeValidate(_document: T, _context: HookContext): void | Promise<void> {}
  afterValidate(_document: T, _context: HookContext): void | Promise<void> {}
  beforeInsert(_document: T, _context: HookContext): void | Promise<void> {}
  afterInsert(_document: T, _context: HookContext): void | Promise<void> {}
  beforeUpdate(_document: T, _context: HookContext): void | Promise<void> {}
  afterUpdate(_document: T, _context: HookContext): void | Promise<void> {}
  beforeInsertOrUpdate(_document: T, _context: HookContext): void | Promise<void> {}
  afterInsertOrUpdate(_document: T, _context: HookContext): void | Promise<void> {}
  beforeRemove(_document: T, _context: HookContext): void | Promise<void> {}
  afterRemove(_document: T, _context: HookContext): void | Promise<void> {}
}

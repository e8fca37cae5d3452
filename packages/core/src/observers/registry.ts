import type { Document, DocumentClass } from '../database/document.js';
import type { Observer } from './types.js';

/**
 * Maps document classes to their ordered observers.
 *
 * Registration order is call order. Populate the registry while wiring the
 * application, before any write runs through a repository that uses it.
 * Observers are bound to the exact class they were registered for;
 * subclasses do not inherit them.
 *
 * @example
 * ```typescript
 * const observers = new ObserverRegistry()
 *   .register(User, new AuditObserver())
 *   .register(User, new WelcomeMailObserver());
 *
 * const db = await Database.create({ name: 'app', storage, observers });
 * ```
 */
export class ObserverRegistry {
  private readonly observers = new Map<DocumentClass, Observer[]>();

  /**
   * Append observers to a class's list
   */
  register<T extends Document>(model: DocumentClass<T>, ...observers: Observer<T>[]): this {
    const list = this.observers.get(model) ?? [];
    list.push(...observers);
    this.observers.set(model, list);
    return this;
  }

  /**
   * Remove one observer instance. Returns whether it was registered.
   */
  unregister<T extends Document>(model: DocumentClass<T>, observer: Observer<T>): boolean {
    const list = this.observers.get(model);
    if (!list) return false;

    const index = list.indexOf(observer);
    if (index === -1) return false;

    list.splice(index, 1);
    return true;
  }

  /**
   * Observers of a class, in registration order
   */
  observersFor<T extends Document>(model: DocumentClass<T>): readonly Observer<T>[] {
    return this.observers.get(model) ?? [];
  }

  has<T extends Document>(model: DocumentClass<T>): boolean {
    return (this.observers.get(model)?.length ?? 0) > 0;
  }

  /**
   * Drop the observers of one class, or of every class
   */
  clear<T extends Document>(model?: DocumentClass<T>): void {
    if (model) {
      this.observers.delete(model);
    } else {
      this.observers.clear();
    }
  }
}

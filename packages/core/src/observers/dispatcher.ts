import type { Document, DocumentClass } from '../database/document.js';
import type { DocketLogger } from '../observability/logger.js';
import type { ObserverRegistry } from './registry.js';
import type { HookContext, LifecycleHook } from './types.js';

/**
 * Invokes one hook on every observer registered for a class.
 *
 * Observers run one after another in registration order and each call is
 * awaited before the next starts. The first error stops the chain and is
 * rethrown as is.
 */
export class ObserverDispatcher {
  constructor(
    private readonly registry: ObserverRegistry,
    private readonly logger?: DocketLogger
  ) {}

  async dispatch<T extends Document>(
    model: DocumentClass<T>,
    hook: LifecycleHook,
    document: T,
    context: HookContext
  ): Promise<void> {
    const observers = this.registry.observersFor(model);

    for (const [position, observer] of observers.entries()) {
      const handler = observer[hook];
      if (!handler) continue;

      try {
        await handler.call(observer, document, context);
      } catch (error) {
        this.logger?.debug('Observer hook failed', {
          hook,
          position,
          collection: context.collection,
          operation: context.operation,
        });
        throw error;
      }
    }
  }
}

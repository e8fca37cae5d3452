export { BaseObserver } from './base-observer.js';
export { ObserverDispatcher } from './dispatcher.js';
export { ObserverRegistry } from './registry.js';
export type { HookContext, HookOperation, LifecycleHook, Observer } from './types.js';

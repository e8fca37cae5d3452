import type { ErrorCode } from '../errors/error-codes.js';
import { PreconditionError } from '../errors/docket-error.js';

/**
 * Lifecycle state of a document.
 *
 * ```
 *        insert            remove
 *  new ─────────▶ persisted ───────▶ removed
 *                  │    ▲
 *                  └────┘ update / modify / reload
 * ```
 */
export type DocumentState = 'new' | 'persisted' | 'removed';

/**
 * Operations that depend on the lifecycle state
 */
export type LifecycleOperation = 'insert' | 'update' | 'remove' | 'reload' | 'modify';

/**
 * State each operation starts from, and where it leads
 */
const TRANSITIONS: Record<LifecycleOperation, { from: DocumentState; to: DocumentState }> = {
  insert: { from: 'new', to: 'persisted' },
  update: { from: 'persisted', to: 'persisted' },
  modify: { from: 'persisted', to: 'persisted' },
  reload: { from: 'persisted', to: 'persisted' },
  remove: { from: 'persisted', to: 'removed' },
};

function violationCode(state: DocumentState): ErrorCode {
  switch (state) {
    case 'new':
      return 'DOCKET_D403';
    case 'persisted':
      return 'DOCKET_D404';
    case 'removed':
      return 'DOCKET_D402';
  }
}

/**
 * State a document ends in after the operation succeeds
 */
export function nextState(operation: LifecycleOperation): DocumentState {
  return TRANSITIONS[operation].to;
}

export function canTransition(state: DocumentState, operation: LifecycleOperation): boolean {
  return TRANSITIONS[operation].from === state;
}

/**
 * Throw a PreconditionError unless the operation is legal from `state`
 */
export function assertTransition(
  state: DocumentState,
  operation: LifecycleOperation,
  context: Record<string, unknown> = {}
): void {
  if (!canTransition(state, operation)) {
    throw new PreconditionError(violationCode(state), operation, { ...context, state });
  }
}

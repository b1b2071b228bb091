// Guarded lifecycle transitions
//
// Unlike softDelete/restore in model.ts, these follow the transition
// table strictly and report illegal moves as a failed Result.

import type {
  EntityState,
  LifecycleEvent,
  LifecycleTransition,
  Result,
  SoftDeletable,
  Timestamped,
  Identified,
} from '@ledgerkit/protocol';
import { LIFECYCLE_TRANSITIONS, ok, fail } from '@ledgerkit/protocol';
import { InvalidTransitionError } from '../errors.js';
import type { LifecycleOptions } from './model.js';
import { touch } from './model.js';

function findTransition(state: EntityState, event: LifecycleEvent): LifecycleTransition | undefined {
  return LIFECYCLE_TRANSITIONS.find((t) => t.event === event && t.from.includes(state));
}

/**
 * Target state of `event` from `state`, or null when the move is illegal.
 */
export function nextState(state: EntityState, event: LifecycleEvent): EntityState | null {
  return findTransition(state, event)?.to ?? null;
}

export function canTransition(state: EntityState, event: LifecycleEvent): boolean {
  return findTransition(state, event) !== undefined;
}

/**
 * Events that are legal from `state`, in table order.
 */
export function availableEvents(state: EntityState): LifecycleEvent[] {
  return LIFECYCLE_TRANSITIONS.filter((t) => t.from.includes(state)).map((t) => t.event);
}

/**
 * Apply a lifecycle event to an entity.
 *
 * On success the entity is mutated in place (state set, `updatedAt`
 * refreshed) and returned. An illegal move leaves the entity untouched.
 *
 * @example
 * ```ts
 * const result = applyTransition(invoice, 'promote');
 * if (!result.success) {
 *   return errorResponseFrom(result.error);
 * }
 * ```
 */
export function applyTransition<T extends Identified & SoftDeletable & Timestamped>(
  entity: T,
  event: LifecycleEvent,
  options: LifecycleOptions = {}
): Result<T, InvalidTransitionError> {
  const target = nextState(entity.state, event);
  if (target === null) {
    return fail(new InvalidTransitionError(entity.id, entity.state, event));
  }

  entity.state = target;
  return ok(touch(entity, options));
}

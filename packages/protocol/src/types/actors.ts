// Actor types
//
// The actor is whoever a write is attributed to: a signed-in user, an
// agent, or a system job. Lifecycle and audit code receives the actor as
// an explicit argument; there is no ambient "current user".

import type { Id } from './common.js';

/**
 * The actor behind the current unit of work.
 *
 * Implementations usually wrap a request's auth context. Reading
 * `actorId` may throw when that context is broken (expired session,
 * missing claims); callers decide how to degrade.
 */
export interface CurrentActor {
  /** Identifier of the actor, or null when nobody is signed in */
  readonly actorId: Id | null;

  /** Display name, if known */
  readonly actorName: string | null;

  /** Email address, if known */
  readonly actorEmail: string | null;

  /** Whether the actor is authenticated */
  readonly isAuthenticated: boolean;

  /**
   * Check whether the actor holds a role.
   */
  hasRole(role: string): Promise<boolean>;
}

/**
 * Plain-data description of an actor, used to build a CurrentActor.
 */
export type ActorIdentity = {
  actorId: Id;
  actorName?: string;
  actorEmail?: string;
  roles?: string[];
};

// Current-actor providers and actor resolution

import type { ActorFailureMode, ActorIdentity, CurrentActor, Id } from '@ledgerkit/protocol';
import { ActorResolutionError } from '../errors.js';
import type { AuditLogger } from '../logging.js';
import { consoleLogger } from '../logging.js';

/**
 * Build an authenticated actor from plain identity data.
 */
export function createActor(identity: ActorIdentity): CurrentActor {
  const roles = new Set(identity.roles ?? []);

  return {
    actorId: identity.actorId,
    actorName: identity.actorName ?? null,
    actorEmail: identity.actorEmail ?? null,
    isAuthenticated: true,
    async hasRole(role: string) {
      return roles.has(role);
    },
  };
}

/**
 * The actor of unattended work: nobody is signed in.
 */
export const anonymousActor: CurrentActor = {
  actorId: null,
  actorName: null,
  actorEmail: null,
  isAuthenticated: false,
  async hasRole() {
    return false;
  },
};

export type ResolveActorOptions = {
  /** What to do when reading the actor throws (default: 'anonymous') */
  failureMode?: ActorFailureMode;
  logger?: AuditLogger;
};

/**
 * Read the actor id for attribution.
 *
 * A missing actor resolves to null. When the lookup throws, the failure is
 * logged and treated as "no actor" unless `failureMode` is 'propagate', in
 * which case an ActorResolutionError is thrown.
 */
export function resolveActorId(
  actor: CurrentActor | null,
  options: ResolveActorOptions = {}
): Id | null {
  if (!actor) return null;

  try {
    return actor.actorId;
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));

    if (options.failureMode === 'propagate') {
      throw new ActorResolutionError(cause);
    }

    (options.logger ?? consoleLogger).warn('Actor lookup failed; continuing without an actor', {
      error: cause.message,
    });
    return null;
  }
}

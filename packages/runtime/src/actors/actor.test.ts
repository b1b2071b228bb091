// Tests for actor providers and resolution

import { describe, it, expect } from 'vitest';
import type { CurrentActor } from '@ledgerkit/protocol';
import { createActor, anonymousActor, resolveActorId } from './actor.js';
import { ActorResolutionError } from '../errors.js';
import { createCapturingLogger } from '../logging.js';

function createBrokenActor(message = 'session expired'): CurrentActor {
  return {
    get actorId(): string | null {
      throw new Error(message);
    },
    actorName: null,
    actorEmail: null,
    isAuthenticated: true,
    async hasRole() {
      return false;
    },
  };
}

describe('createActor', () => {
  it('exposes identity fields', () => {
    const actor = createActor({ actorId: 'user-1', actorName: 'Test User' });

    expect(actor.actorId).toBe('user-1');
    expect(actor.actorName).toBe('Test User');
    expect(actor.actorEmail).toBeNull();
    expect(actor.isAuthenticated).toBe(true);
  });

  it('checks roles', async () => {
    const actor = createActor({ actorId: 'user-1', roles: ['admin'] });

    expect(await actor.hasRole('admin')).toBe(true);
    expect(await actor.hasRole('auditor')).toBe(false);
  });
});

describe('anonymousActor', () => {
  it('has no identity and no roles', async () => {
    expect(anonymousActor.actorId).toBeNull();
    expect(anonymousActor.isAuthenticated).toBe(false);
    expect(await anonymousActor.hasRole('admin')).toBe(false);
  });
});

describe('resolveActorId', () => {
  it('returns the actor id', () => {
    expect(resolveActorId(createActor({ actorId: 'user-1' }))).toBe('user-1');
  });

  it('returns null without an actor', () => {
    expect(resolveActorId(null)).toBeNull();
    expect(resolveActorId(anonymousActor)).toBeNull();
  });

  it('degrades a failing lookup to no actor and warns', () => {
    const logger = createCapturingLogger();

    const actorId = resolveActorId(createBrokenActor(), { logger });

    expect(actorId).toBeNull();
    expect(logger.entries).toHaveLength(1);
    expect(logger.entries[0].level).toBe('warn');
    expect(logger.entries[0].data).toEqual({ error: 'session expired' });
  });

  it('throws ActorResolutionError when configured to propagate', () => {
    const logger = createCapturingLogger();

    expect(() =>
      resolveActorId(createBrokenActor('missing claims'), { failureMode: 'propagate', logger })
    ).toThrow(ActorResolutionError);
    expect(() => resolveActorId(createBrokenActor('missing claims'), { failureMode: 'propagate' })).toThrow(
      'Failed to resolve the current actor: missing claims'
    );
    expect(logger.entries).toHaveLength(0);
  });
});

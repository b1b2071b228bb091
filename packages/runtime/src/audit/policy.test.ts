// Tests for the audit enforcement policy

import { describe, it, expect, vi } from 'vitest';
import type { AuditRecord, CurrentActor, DomainRecord, EntityRecord } from '@ledgerkit/protocol';
import { createChangeSet } from '@ledgerkit/repositories';
import { enforceAuditPolicy, createAuditHook } from './policy.js';
import { createActor } from '../actors/index.js';
import { ActorResolutionError } from '../errors.js';
import { createCapturingLogger, silentLogger } from '../logging.js';

// --- Test Fixtures ---

const T1 = '2024-01-01T00:00:00.000Z';
const T2 = '2024-02-01T00:00:00.000Z';

const clockAt = (iso: string) => () => new Date(iso);

function createRecord(id: string, overrides: Partial<DomainRecord> = {}): DomainRecord {
  return {
    id,
    kind: 'invoice',
    attributes: {},
    createdAt: T1,
    updatedAt: T1,
    state: 'active',
    createdBy: 'user-1',
    updatedBy: 'user-1',
    ...overrides,
  };
}

function createBrokenActor(): CurrentActor {
  return {
    get actorId(): string | null {
      throw new Error('token expired');
    },
    actorName: null,
    actorEmail: null,
    isAuthenticated: false,
    async hasRole() {
      return false;
    },
  };
}

const userOne = createActor({ actorId: 'user-1' });
const userTwo = createActor({ actorId: 'user-2' });

describe('enforceAuditPolicy', () => {
  describe('insert', () => {
    it('stamps creation fields with the actor and the current time', () => {
      const entity = createRecord('inv-1', {
        createdAt: '2023-06-01T00:00:00.000Z',
        updatedAt: '2023-06-01T00:00:00.000Z',
        createdBy: null,
        updatedBy: null,
      });
      const changeSet = createChangeSet([{ entity, kind: 'insert', original: null }]);

      const result = enforceAuditPolicy(changeSet, userOne, {
        clock: clockAt(T2),
        logger: silentLogger,
      });

      expect(entity.createdAt).toBe(T2);
      expect(entity.updatedAt).toBe(T2);
      expect(entity.createdBy).toBe('user-1');
      expect(entity.updatedBy).toBe('user-1');
      expect(result.records).toEqual([
        {
          entityId: 'inv-1',
          requestedKind: 'insert',
          action: 'created',
          actorId: 'user-1',
          timestamp: T2,
          protectedFields: [],
        },
      ]);
    });

    it('leaves the initial state untouched', () => {
      const entity = createRecord('inv-1', { state: 'created' });
      const changeSet = createChangeSet([{ entity, kind: 'insert', original: null }]);

      enforceAuditPolicy(changeSet, userOne, { logger: silentLogger });

      expect(entity.state).toBe('created');
    });

    it('stamps only timestamps without an actor', () => {
      const entity = createRecord('inv-1', { createdBy: null, updatedBy: null });
      const changeSet = createChangeSet([{ entity, kind: 'insert', original: null }]);

      const result = enforceAuditPolicy(changeSet, null, {
        clock: clockAt(T2),
        logger: silentLogger,
      });

      expect(entity.createdAt).toBe(T2);
      expect(entity.createdBy).toBeNull();
      expect(entity.updatedBy).toBeNull();
      expect(result.actorId).toBeNull();
    });

    it('skips capabilities the record does not carry', () => {
      const entity: EntityRecord = { id: 'plain-1', kind: 'tag', attributes: { label: 'x' } };
      const changeSet = createChangeSet([{ entity, kind: 'insert', original: null }]);

      enforceAuditPolicy(changeSet, userOne, { clock: clockAt(T2), logger: silentLogger });

      expect(entity).toEqual({ id: 'plain-1', kind: 'tag', attributes: { label: 'x' } });
    });
  });

  describe('update', () => {
    it('refreshes modification fields and reverts forged creation fields', () => {
      const original = createRecord('inv-1');
      const entity = createRecord('inv-1', {
        createdAt: '2020-01-01T00:00:00.000Z',
        createdBy: 'user-forged',
        attributes: { total: 20 },
      });
      const changeSet = createChangeSet([{ entity, kind: 'update', original }]);

      const result = enforceAuditPolicy(changeSet, userTwo, {
        clock: clockAt(T2),
        logger: silentLogger,
      });

      expect(entity.createdAt).toBe(T1);
      expect(entity.createdBy).toBe('user-1');
      expect(entity.updatedAt).toBe(T2);
      expect(entity.updatedBy).toBe('user-2');
      expect(entity.attributes).toEqual({ total: 20 });
      expect(changeSet.entries()[0].suppressedFields).toEqual(['createdAt', 'createdBy']);
      expect(result.records[0].action).toBe('updated');
      expect(result.records[0].protectedFields).toEqual(['createdAt', 'createdBy']);
    });

    it('protects createdBy without an actor by default', () => {
      const original = createRecord('inv-1');
      const entity = createRecord('inv-1', { createdBy: null, updatedBy: 'user-1' });
      const changeSet = createChangeSet([{ entity, kind: 'update', original }]);

      enforceAuditPolicy(changeSet, null, { clock: clockAt(T2), logger: silentLogger });

      expect(entity.createdBy).toBe('user-1');
      expect(entity.updatedBy).toBe('user-1');
      expect(entity.updatedAt).toBe(T2);
      expect(changeSet.entries()[0].suppressedFields).toEqual(['createdAt', 'createdBy']);
    });

    it('only protects createdBy while an actor is known when protectCreatedBy is off', () => {
      const original = createRecord('inv-1');
      const entity = createRecord('inv-1', { createdBy: null });
      const changeSet = createChangeSet([{ entity, kind: 'update', original }]);

      enforceAuditPolicy(changeSet, null, {
        clock: clockAt(T2),
        logger: silentLogger,
        protectCreatedBy: false,
      });

      expect(entity.createdBy).toBeNull();
      expect(changeSet.entries()[0].suppressedFields).toEqual(['createdAt']);
    });

    it('still suppresses creation fields when the stored record is missing', () => {
      const entity = createRecord('inv-1', { createdAt: '2020-01-01T00:00:00.000Z' });
      const changeSet = createChangeSet([{ entity, kind: 'update', original: null }]);

      enforceAuditPolicy(changeSet, userTwo, { clock: clockAt(T2), logger: silentLogger });

      expect(entity.createdAt).toBe('2020-01-01T00:00:00.000Z');
      expect(changeSet.entries()[0].suppressedFields).toEqual(['createdAt', 'createdBy']);
    });
  });

  describe('delete', () => {
    it('redirects a soft-deletable delete into a termination', () => {
      const original = createRecord('inv-1');
      const entity = createRecord('inv-1');
      const changeSet = createChangeSet([{ entity, kind: 'delete', original }]);
      const logger = createCapturingLogger();

      const result = enforceAuditPolicy(changeSet, userTwo, { clock: clockAt(T2), logger });

      const entry = changeSet.entries()[0];
      expect(entry.kind).toBe('update');
      expect(entry.requestedKind).toBe('delete');
      expect(entity.state).toBe('terminated');
      expect(entity.updatedAt).toBe(T2);
      expect(entity.updatedBy).toBe('user-2');
      expect(entity.createdAt).toBe(T1);
      expect(entity.createdBy).toBe('user-1');
      expect(result.records[0].action).toBe('soft_deleted');
      expect(logger.entries.map((e) => [e.level, e.message])).toEqual([
        ['info', 'Delete redirected to soft delete'],
        ['debug', 'Audit applied'],
      ]);
    });

    it('lets the delete through when soft delete is disabled', () => {
      const entity = createRecord('inv-1');
      const changeSet = createChangeSet([{ entity, kind: 'delete', original: createRecord('inv-1') }]);

      const result = enforceAuditPolicy(changeSet, userTwo, {
        clock: clockAt(T2),
        logger: silentLogger,
        softDeleteEnabled: false,
      });

      expect(changeSet.entries()[0].kind).toBe('delete');
      expect(entity.state).toBe('active');
      expect(entity.updatedAt).toBe(T1);
      expect(result.records[0].action).toBe('deleted');
    });

    it('lets the delete through for records without a state', () => {
      const entity: EntityRecord = { id: 'plain-1', kind: 'tag', attributes: {} };
      const changeSet = createChangeSet([{ entity, kind: 'delete', original: entity }]);

      const result = enforceAuditPolicy(changeSet, userTwo, { logger: silentLogger });

      expect(changeSet.entries()[0].kind).toBe('delete');
      expect(result.records[0].action).toBe('deleted');
    });

    it('treats a delete cancelled by an earlier hook as a soft delete', () => {
      const entity = createRecord('inv-1', { state: 'terminated' });
      const changeSet = createChangeSet([{ entity, kind: 'delete', original: createRecord('inv-1') }]);
      changeSet.entries()[0].cancelDelete();

      const result = enforceAuditPolicy(changeSet, userTwo, {
        clock: clockAt(T2),
        logger: silentLogger,
      });

      expect(result.records[0].action).toBe('soft_deleted');
      expect(entity.updatedAt).toBe(T2);
    });
  });

  describe('actor resolution', () => {
    it('continues without an actor when the lookup throws', () => {
      const entity = createRecord('inv-1', { createdBy: null, updatedBy: null });
      const changeSet = createChangeSet([{ entity, kind: 'insert', original: null }]);
      const logger = createCapturingLogger();

      const result = enforceAuditPolicy(changeSet, createBrokenActor(), {
        clock: clockAt(T2),
        logger,
      });

      expect(result.actorId).toBeNull();
      expect(entity.createdBy).toBeNull();
      expect(entity.createdAt).toBe(T2);
      expect(logger.entries[0].level).toBe('warn');
    });

    it('aborts when configured to propagate lookup failures', () => {
      const entity = createRecord('inv-1', { createdBy: null, updatedBy: null });
      const changeSet = createChangeSet([{ entity, kind: 'insert', original: null }]);

      expect(() =>
        enforceAuditPolicy(changeSet, createBrokenActor(), {
          clock: clockAt(T2),
          logger: silentLogger,
          actorFailureMode: 'propagate',
        })
      ).toThrow(ActorResolutionError);
      expect(entity.createdAt).toBe(T1);
    });
  });

  it('processes entries once each, in change-set order, with one timestamp', () => {
    const clock = vi.fn(clockAt(T2));
    const onAudit = vi.fn<(record: AuditRecord) => void>();
    const changeSet = createChangeSet([
      { entity: createRecord('c'), kind: 'update', original: createRecord('c') },
      { entity: createRecord('a'), kind: 'insert', original: null },
      { entity: createRecord('b'), kind: 'delete', original: createRecord('b') },
    ]);

    const result = enforceAuditPolicy(changeSet, userOne, { clock, onAudit, logger: silentLogger });

    expect(clock).toHaveBeenCalledTimes(1);
    expect(onAudit).toHaveBeenCalledTimes(3);
    expect(onAudit.mock.calls.map(([record]) => record.entityId)).toEqual(['c', 'a', 'b']);
    expect(result.records.map((r) => r.action)).toEqual(['updated', 'created', 'soft_deleted']);
    expect(result.records.every((r) => r.timestamp === T2)).toBe(true);
  });

  it('gives the same fields when run again with the same inputs', () => {
    const original = createRecord('inv-1');
    const first = createRecord('inv-1', { createdAt: '2020-01-01T00:00:00.000Z' });
    const second = createRecord('inv-1', { createdAt: '2020-01-01T00:00:00.000Z' });
    const options = { clock: clockAt(T2), logger: silentLogger };

    enforceAuditPolicy(createChangeSet([{ entity: first, kind: 'delete', original }]), userTwo, options);
    enforceAuditPolicy(createChangeSet([{ entity: second, kind: 'delete', original }]), userTwo, options);
    enforceAuditPolicy(createChangeSet([{ entity: second, kind: 'delete', original }]), userTwo, options);

    expect(second).toEqual(first);
  });
});

describe('enforceAuditPolicy with partial records', () => {
  it('keeps creation fields the incoming update leaves out', () => {
    const original = createRecord('inv-1');
    const entity: EntityRecord = {
      id: 'inv-1',
      kind: 'invoice',
      attributes: { total: 20 },
      state: 'active',
      updatedBy: null,
    };
    const changeSet = createChangeSet([{ entity, kind: 'update', original }]);

    const result = enforceAuditPolicy(changeSet, userTwo, {
      clock: clockAt(T2),
      logger: silentLogger,
    });

    expect(entity).toEqual({
      id: 'inv-1',
      kind: 'invoice',
      attributes: { total: 20 },
      createdAt: T1,
      updatedAt: T2,
      state: 'active',
      createdBy: 'user-1',
      updatedBy: 'user-2',
    });
    expect(result.records[0].protectedFields).toEqual(['createdAt', 'createdBy']);
  });

  it('soft deletes through a bare handle when the stored record has a state', () => {
    const original = createRecord('inv-1', { attributes: { total: 10 } });
    const entity: EntityRecord = { id: 'inv-1', kind: 'invoice', attributes: {} };
    const changeSet = createChangeSet([{ entity, kind: 'delete', original }]);

    const result = enforceAuditPolicy(changeSet, userTwo, {
      clock: clockAt(T2),
      logger: silentLogger,
    });

    expect(changeSet.entries()[0].kind).toBe('update');
    expect(result.records[0].action).toBe('soft_deleted');
    expect(entity).toEqual({
      id: 'inv-1',
      kind: 'invoice',
      attributes: { total: 10 },
      createdAt: T1,
      updatedAt: T2,
      state: 'terminated',
      createdBy: 'user-1',
      updatedBy: 'user-2',
    });
  });

  it('physically deletes a bare handle when soft delete is disabled', () => {
    const entity: EntityRecord = { id: 'inv-1', kind: 'invoice', attributes: {} };
    const changeSet = createChangeSet([{ entity, kind: 'delete', original: createRecord('inv-1') }]);

    const result = enforceAuditPolicy(changeSet, userTwo, {
      logger: silentLogger,
      softDeleteEnabled: false,
    });

    expect(changeSet.entries()[0].kind).toBe('delete');
    expect(result.records[0].action).toBe('deleted');
  });

  it('terminates a delete that an earlier hook cancelled', () => {
    const entity = createRecord('inv-1');
    const changeSet = createChangeSet([{ entity, kind: 'delete', original: createRecord('inv-1') }]);
    changeSet.entries()[0].cancelDelete();

    enforceAuditPolicy(changeSet, userTwo, { clock: clockAt(T2), logger: silentLogger });

    expect(entity.state).toBe('terminated');
    expect(entity.updatedBy).toBe('user-2');
  });
});

describe('createAuditHook', () => {
  it('applies the policy to the change set it is given', async () => {
    const entity = createRecord('inv-1', { createdBy: null, updatedBy: null });
    const hook = createAuditHook(userTwo, { clock: clockAt(T2), logger: silentLogger });

    await hook(createChangeSet<EntityRecord>([{ entity, kind: 'insert', original: null }]));

    expect(entity.createdBy).toBe('user-2');
    expect(entity.createdAt).toBe(T2);
  });
});

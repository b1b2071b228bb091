// Tests for entity capability guards

import { describe, it, expect } from 'vitest';
import type { EntityRecord } from './entities.js';
import {
  isTimestamped,
  isSoftDeletable,
  isUserTracked,
  isOwned,
  getCapabilities,
  hasCapability,
} from './entities.js';
import {
  entityStateFromTag,
  isEntityState,
  ENTITY_STATE_TAGS,
  ENTITY_STATE_DESCRIPTIONS,
} from './lifecycle.js';

// --- Test Fixtures ---

function createPlainRecord(): EntityRecord {
  return { id: 'rec-1', kind: 'note', attributes: { body: 'hello' } };
}

function createFullRecord(): EntityRecord {
  return {
    id: 'rec-2',
    kind: 'invoice',
    attributes: {},
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
    state: 'active',
    createdBy: null,
    updatedBy: null,
    ownerId: 'user-1',
  };
}

// --- Tests ---

describe('capability guards', () => {
  it('should report no capabilities for a plain record', () => {
    const record = createPlainRecord();

    expect(isTimestamped(record)).toBe(false);
    expect(isSoftDeletable(record)).toBe(false);
    expect(isUserTracked(record)).toBe(false);
    expect(isOwned(record)).toBe(false);
    expect(getCapabilities(record)).toEqual([]);
  });

  it('should report every capability for a full record', () => {
    expect(getCapabilities(createFullRecord())).toEqual([
      'timestamps',
      'soft_delete',
      'user_tracking',
      'ownership',
    ]);
  });

  it('should treat null attribution as user-tracked', () => {
    const record = createFullRecord();
    expect(hasCapability(record, 'user_tracking')).toBe(true);
  });

  it('should reject a state outside the lifecycle', () => {
    const record = { ...createPlainRecord(), state: 'archived' };
    expect(isSoftDeletable(record)).toBe(false);
  });

  it('should require both timestamps', () => {
    const record = { ...createPlainRecord(), createdAt: '2024-01-01T00:00:00.000Z' };
    expect(isTimestamped(record)).toBe(false);
  });

  it('should reject non-string owner ids', () => {
    const record = { ...createPlainRecord(), ownerId: 42 };
    expect(isOwned(record)).toBe(false);
  });
});

describe('lifecycle states', () => {
  it('should map tags back to states', () => {
    expect(entityStateFromTag(0)).toBe('created');
    expect(entityStateFromTag(4)).toBe('terminated');
    expect(entityStateFromTag(9)).toBeNull();
  });

  it('should keep tags in declaration order', () => {
    expect(Object.values(ENTITY_STATE_TAGS)).toEqual([0, 1, 2, 3, 4]);
  });

  it('should recognise state strings', () => {
    expect(isEntityState('effective')).toBe(true);
    expect(isEntityState('Effective')).toBe(false);
    expect(isEntityState(2)).toBe(false);
  });

  it('should describe every state', () => {
    expect(ENTITY_STATE_DESCRIPTIONS).toEqual({
      created: 'Created but not yet active',
      inactive: 'Temporarily inactive',
      active: 'Active and available',
      effective: 'Effective and operational',
      terminated: 'Soft deleted/terminated',
    });
  });
});

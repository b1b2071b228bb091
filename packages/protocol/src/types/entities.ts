// Entity capabilities
//
// Entities opt into behaviour by carrying the fields of a capability.
// Nothing forces a single base shape: a record can be timestamped without
// being soft-deletable, or owned without being user-tracked. Code that
// needs a capability asks for it with the guards below.

import type { Id, Timestamp } from './common.js';
import type { EntityState } from './lifecycle.js';
import { isEntityState } from './lifecycle.js';

/**
 * Stable identity, assigned at construction and never changed.
 */
export type Identified = {
  id: Id;
};

/**
 * Creation and last-modification times.
 * `createdAt` is fixed at first commit; `updatedAt` never moves backwards.
 */
export type Timestamped = {
  createdAt: Timestamp;
  updatedAt: Timestamp;
};

/**
 * Entities whose deletion is a transition to `terminated`.
 */
export type SoftDeletable = {
  state: EntityState;
};

/**
 * Attribution of the actors that created and last modified the entity.
 * `null` means no actor was known at the time.
 */
export type UserTracked = {
  createdBy: Id | null;
  updatedBy: Id | null;
};

/**
 * Per-actor ownership. `null` marks a global (shared) entity.
 */
export type Owned = {
  ownerId: Id | null;
};

export type AuditableEntity = Identified & Timestamped & SoftDeletable;

/**
 * The usual business entity: auditable and attributed.
 */
export type DomainEntity = AuditableEntity & UserTracked;

export type OwnedEntity = DomainEntity & Owned;

export type EntityCapability = 'timestamps' | 'soft_delete' | 'user_tracking' | 'ownership';

/**
 * Persisted form of an entity.
 *
 * `kind` names the record type and `attributes` holds its domain payload.
 * Capability fields are optional; which ones are present decides how the
 * audit policy treats the record.
 */
export type EntityRecord = Identified &
  Partial<Timestamped & SoftDeletable & UserTracked & Owned> & {
    kind: string;
    attributes: Record<string, unknown>;
  };

export type DomainRecord = EntityRecord & DomainEntity;

export type OwnedRecord = DomainRecord & Owned;

function isNullableId(value: unknown): value is Id | null {
  return value === null || typeof value === 'string';
}

export function isTimestamped<T extends object>(entity: T): entity is T & Timestamped {
  return (
    'createdAt' in entity &&
    'updatedAt' in entity &&
    typeof entity.createdAt === 'string' &&
    typeof entity.updatedAt === 'string'
  );
}

export function isSoftDeletable<T extends object>(entity: T): entity is T & SoftDeletable {
  return 'state' in entity && isEntityState(entity.state);
}

export function isUserTracked<T extends object>(entity: T): entity is T & UserTracked {
  return (
    'createdBy' in entity &&
    'updatedBy' in entity &&
    isNullableId(entity.createdBy) &&
    isNullableId(entity.updatedBy)
  );
}

export function isOwned<T extends object>(entity: T): entity is T & Owned {
  return 'ownerId' in entity && isNullableId(entity.ownerId);
}

/**
 * List the capabilities an entity carries, in a fixed order.
 */
export function getCapabilities(entity: object): EntityCapability[] {
  const capabilities: EntityCapability[] = [];
  if (isTimestamped(entity)) capabilities.push('timestamps');
  if (isSoftDeletable(entity)) capabilities.push('soft_delete');
  if (isUserTracked(entity)) capabilities.push('user_tracking');
  if (isOwned(entity)) capabilities.push('ownership');
  return capabilities;
}

export function hasCapability(entity: object, capability: EntityCapability): boolean {
  switch (capability) {
    case 'timestamps':
      return isTimestamped(entity);
    case 'soft_delete':
      return isSoftDeletable(entity);
    case 'user_tracking':
      return isUserTracked(entity);
    case 'ownership':
      return isOwned(entity);
  }
}

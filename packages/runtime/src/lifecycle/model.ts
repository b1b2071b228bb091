// Entity lifecycle model
//
// Construction, unconditional state changes and predicates. Every
// operation works on the entity it is given and touches nothing else.

import type {
  Clock,
  DomainRecord,
  Id,
  Owned,
  OwnedRecord,
  SoftDeletable,
  Timestamped,
} from '@ledgerkit/protocol';
import { systemClock } from '@ledgerkit/protocol';
import { randomUUID } from 'node:crypto';

export type LifecycleOptions = {
  /** Time source (defaults to the system clock) */
  clock?: Clock;
};

/**
 * Input for creating a domain entity
 */
export type CreateDomainEntityInput = {
  /** Record type name, e.g. "invoice" */
  kind: string;

  /** Domain payload */
  attributes?: Record<string, unknown>;

  /** Explicit ID; a UUID is generated otherwise */
  id?: Id;
};

export type CreateOwnedEntityInput = CreateDomainEntityInput & {
  /** Owning actor, or null for a global entity */
  ownerId: Id | null;
};

/**
 * Create an in-memory domain entity.
 *
 * New entities start `active`, with both timestamps set to now and no
 * attribution; the audit policy fills `createdBy`/`updatedBy` and
 * re-stamps the timestamps when the entity is first committed.
 */
export function createDomainEntity(
  input: CreateDomainEntityInput,
  options: LifecycleOptions = {}
): DomainRecord {
  const now = (options.clock ?? systemClock)().toISOString();

  return {
    id: input.id ?? randomUUID(),
    kind: input.kind,
    attributes: input.attributes ?? {},
    createdAt: now,
    updatedAt: now,
    state: 'active',
    createdBy: null,
    updatedBy: null,
  };
}

/**
 * Create an in-memory domain entity with an owner.
 */
export function createOwnedEntity(
  input: CreateOwnedEntityInput,
  options: LifecycleOptions = {}
): OwnedRecord {
  return {
    ...createDomainEntity(input, options),
    ownerId: input.ownerId,
  };
}

/**
 * Move `updatedAt` to now, unless it already lies later.
 */
export function touch<T extends Timestamped>(entity: T, options: LifecycleOptions = {}): T {
  const now = (options.clock ?? systemClock)();
  if (Number.isNaN(Date.parse(entity.updatedAt)) || now.getTime() > Date.parse(entity.updatedAt)) {
    entity.updatedAt = now.toISOString();
  }
  return entity;
}

/**
 * Mark the entity terminated. Allowed from any state; repeating it only
 * refreshes `updatedAt`.
 */
export function softDelete<T extends SoftDeletable & Timestamped>(
  entity: T,
  options: LifecycleOptions = {}
): T {
  entity.state = 'terminated';
  return touch(entity, options);
}

/**
 * Return the entity to `active`, from any state.
 */
export function restore<T extends SoftDeletable & Timestamped>(
  entity: T,
  options: LifecycleOptions = {}
): T {
  entity.state = 'active';
  return touch(entity, options);
}

/**
 * Set the entity `active`, from any state.
 */
export function activate<T extends SoftDeletable & Timestamped>(
  entity: T,
  options: LifecycleOptions = {}
): T {
  entity.state = 'active';
  return touch(entity, options);
}

/**
 * Set the entity `inactive`, from any state.
 */
export function deactivate<T extends SoftDeletable & Timestamped>(
  entity: T,
  options: LifecycleOptions = {}
): T {
  entity.state = 'inactive';
  return touch(entity, options);
}

export function isActive(entity: SoftDeletable): boolean {
  return entity.state === 'active';
}

export function isInactive(entity: SoftDeletable): boolean {
  return entity.state === 'inactive';
}

export function isEffective(entity: SoftDeletable): boolean {
  return entity.state === 'effective';
}

export function isTerminated(entity: SoftDeletable): boolean {
  return entity.state === 'terminated';
}

/**
 * Whether the actor may treat the entity as its own: true for the owner,
 * and for everyone when the entity is global.
 */
export function isOwnedBy(entity: Owned, actorId: Id | null): boolean {
  return entity.ownerId === null || entity.ownerId === actorId;
}

export function isGlobal(entity: Owned): boolean {
  return entity.ownerId === null;
}

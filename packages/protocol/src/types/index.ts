// Protocol types

export type { Id, Timestamp, Result, Clock } from './common.js';
export { ok, fail, systemClock } from './common.js';

export type { EntityState, LifecycleEvent, LifecycleTransition } from './lifecycle.js';
export {
  ENTITY_STATES,
  ENTITY_STATE_TAGS,
  ENTITY_STATE_DESCRIPTIONS,
  LIFECYCLE_TRANSITIONS,
  isEntityState,
  entityStateFromTag,
} from './lifecycle.js';

export type {
  Identified,
  Timestamped,
  SoftDeletable,
  UserTracked,
  Owned,
  AuditableEntity,
  DomainEntity,
  OwnedEntity,
  EntityCapability,
  EntityRecord,
  DomainRecord,
  OwnedRecord,
} from './entities.js';
export {
  isTimestamped,
  isSoftDeletable,
  isUserTracked,
  isOwned,
  getCapabilities,
  hasCapability,
} from './entities.js';

export type { CurrentActor, ActorIdentity } from './actors.js';

export type { ChangeKind, ProtectedField, ChangeEntry, ChangeSet } from './changes.js';

export type { AuditAction, AuditRecord, ActorFailureMode, AuditConfig } from './audit.js';

export type {
  ApiResponse,
  PagedResponse,
  ValidationErrorMap,
  ValidationResponse,
} from './responses.js';

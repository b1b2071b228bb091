// Audit types
//
// The audit policy fills attribution and timestamp fields on every write
// and redirects deletes of soft-deletable entities into terminations.
// Each processed write is summarised as an AuditRecord.

import type { Id, Timestamp } from './common.js';
import type { ChangeKind, ProtectedField } from './changes.js';

/**
 * What the policy did with one pending write.
 *
 * - `created`: insert stamped with creation fields
 * - `updated`: update stamped with modification fields
 * - `soft_deleted`: delete redirected to a transition to `terminated`
 * - `deleted`: delete left as a physical removal
 */
export type AuditAction = 'created' | 'updated' | 'soft_deleted' | 'deleted';

/**
 * Summary of the policy's work on one entity.
 */
export type AuditRecord = {
  /** Entity ID, when the entity carries one */
  entityId: Id | null;

  /** Kind of write requested by the caller */
  requestedKind: ChangeKind;

  /** What the policy turned it into */
  action: AuditAction;

  /** Actor the write was attributed to (null if none) */
  actorId: Id | null;

  /** Timestamp applied to the entity */
  timestamp: Timestamp;

  /** Fields held at their stored values */
  protectedFields: ProtectedField[];
};

/**
 * How to treat a failing actor lookup.
 *
 * - `anonymous`: log it and continue with no actor
 * - `propagate`: abort the commit with the lookup error
 */
export type ActorFailureMode = 'anonymous' | 'propagate';

/**
 * Audit policy configuration.
 */
export type AuditConfig = {
  /** Redirect deletes of soft-deletable entities (default: true) */
  softDeleteEnabled?: boolean;

  /** Behaviour when the actor lookup throws (default: 'anonymous') */
  actorFailureMode?: ActorFailureMode;

  /**
   * Keep `createdBy` at its stored value on every update, even when no
   * actor is known (default: true). When false it is only held while an
   * actor is attributed.
   */
  protectCreatedBy?: boolean;

  /** Callback for each audit record (e.g., for external logging) */
  onAudit?: (record: AuditRecord) => void;
};

// Audit enforcement policy
//
// Runs once per commit attempt over the pending writes of a unit of work:
// stamps timestamps and attribution, keeps creation fields at their
// stored values, and turns deletes of soft-deletable entities into
// terminations. Entities without a capability are left alone for it.

import type {
  AuditAction,
  AuditConfig,
  AuditRecord,
  ChangeEntry,
  ChangeSet,
  Clock,
  CurrentActor,
  EntityRecord,
  Id,
  Timestamp,
} from '@ledgerkit/protocol';
import { isSoftDeletable, isTimestamped, isUserTracked, systemClock } from '@ledgerkit/protocol';
import type { CommitHook } from '@ledgerkit/repositories';
import { resolveActorId } from '../actors/index.js';
import type { ResolvedAuditConfig } from '../config.js';
import { resolveAuditConfig } from '../config.js';
import type { AuditLogger } from '../logging.js';
import { consoleLogger } from '../logging.js';

export type AuditPolicyOptions = AuditConfig & {
  /** Time source (defaults to the system clock) */
  clock?: Clock;
  logger?: AuditLogger;
};

/**
 * What one run of the policy did.
 */
export type AuditPolicyResult = {
  /** Actor every write was attributed to (null if none) */
  actorId: Id | null;

  /** The single timestamp applied throughout the run */
  timestamp: Timestamp;

  /** One record per change-set entry, in change-set order */
  records: AuditRecord[];
};

type EntryContext = {
  actorId: Id | null;
  timestamp: Timestamp;
  config: ResolvedAuditConfig;
  logger: AuditLogger;
};

/**
 * Apply the audit policy to every entry of a change set.
 *
 * - insert: `createdAt = updatedAt = now`; with a known actor,
 *   `createdBy = updatedBy = actor`. The state is left as constructed.
 * - update: `updatedAt = now`, and `updatedBy = actor` when known.
 *   `createdAt` and `createdBy` are reverted to their stored values and
 *   suppressed for the commit.
 * - delete of a soft-deletable entity: the physical delete is cancelled,
 *   the state becomes `terminated`, then the update rules apply.
 *   Either the entity or its stored record may carry the state.
 *   Other deletes go ahead untouched.
 *
 * Capability fields missing from an updated entity are taken from the
 * stored record before stamping.
 *
 * The actor and the clock are each read once per run.
 */
export function enforceAuditPolicy<T extends object>(
  changeSet: ChangeSet<T>,
  actor: CurrentActor | null,
  options: AuditPolicyOptions = {}
): AuditPolicyResult {
  const config = resolveAuditConfig(options);
  const logger = options.logger ?? consoleLogger;
  const actorId = resolveActorId(actor, { failureMode: config.actorFailureMode, logger });
  const timestamp = (options.clock ?? systemClock)().toISOString();
  const ctx: EntryContext = { actorId, timestamp, config, logger };

  const records: AuditRecord[] = [];

  for (const entry of changeSet.entries()) {
    const record = auditEntry(entry, ctx);
    logger.debug('Audit applied', {
      entityId: record.entityId,
      requestedKind: record.requestedKind,
      action: record.action,
    });
    config.onAudit(record);
    records.push(record);
  }

  return { actorId, timestamp, records };
}

/**
 * Wrap the policy as a unit-of-work commit hook.
 *
 * @example
 * ```ts
 * const unitOfWork = createUnitOfWork(repos, {
 *   hooks: [createAuditHook(actor, { logger })],
 * });
 * ```
 */
export function createAuditHook(
  actor: CurrentActor | null,
  options: AuditPolicyOptions = {}
): CommitHook {
  return (changeSet: ChangeSet<EntityRecord>) => {
    enforceAuditPolicy(changeSet, actor, options);
  };
}

function auditEntry<T extends object>(entry: ChangeEntry<T>, ctx: EntryContext): AuditRecord {
  const entity = entry.entity;
  let action: AuditAction;

  switch (entry.kind) {
    case 'insert':
      stampInsert(entity, ctx);
      action = 'created';
      break;

    case 'update':
      if (entry.requestedKind === 'delete') {
        // Cancelled by an earlier hook
        fillFromOriginal(entity, entry.original);
        markTerminated(entity);
        action = 'soft_deleted';
      } else {
        action = 'updated';
      }
      stampUpdate(entry, ctx);
      break;

    case 'delete': {
      const original = entry.original;
      const storedSoftDeletable = original !== null && isSoftDeletable(original);

      if (ctx.config.softDeleteEnabled && (isSoftDeletable(entity) || storedSoftDeletable)) {
        entry.cancelDelete();
        if (original !== null && !isSoftDeletable(entity)) {
          // A bare handle: write back the stored record
          Object.assign(entity, structuredClone(original));
        }
        markTerminated(entity);
        stampUpdate(entry, ctx);
        ctx.logger.info('Delete redirected to soft delete', { entityId: entityIdOf(entity) });
        action = 'soft_deleted';
      } else {
        action = 'deleted';
      }
      break;
    }
  }

  return {
    entityId: entityIdOf(entity),
    requestedKind: entry.requestedKind,
    action,
    actorId: ctx.actorId,
    timestamp: ctx.timestamp,
    protectedFields: [...entry.suppressedFields],
  };
}

const CAPABILITY_FIELDS: readonly string[] = [
  'createdAt',
  'updatedAt',
  'state',
  'createdBy',
  'updatedBy',
  'ownerId',
];

/**
 * Copy the capability fields the stored record carries but the incoming
 * entity leaves unset, so a partial record cannot drop them.
 */
function fillFromOriginal(entity: object, original: object | null): void {
  if (original === null) return;

  const present = new Set(
    Object.entries(entity)
      .filter(([, value]) => value !== undefined)
      .map(([key]) => key)
  );
  const missing = Object.entries(original).filter(
    ([key]) => CAPABILITY_FIELDS.includes(key) && !present.has(key)
  );

  Object.assign(entity, Object.fromEntries(missing));
}

function markTerminated(entity: object): void {
  if (isSoftDeletable(entity)) {
    entity.state = 'terminated';
  }
}

function stampInsert(entity: object, ctx: EntryContext): void {
  if (isTimestamped(entity)) {
    entity.createdAt = ctx.timestamp;
    entity.updatedAt = ctx.timestamp;
  }
  if (ctx.actorId !== null && isUserTracked(entity)) {
    entity.createdBy = ctx.actorId;
    entity.updatedBy = ctx.actorId;
  }
}

function stampUpdate<T extends object>(entry: ChangeEntry<T>, ctx: EntryContext): void {
  const { entity, original } = entry;
  fillFromOriginal(entity, original);

  if (isTimestamped(entity)) {
    entity.updatedAt = ctx.timestamp;
    if (original && isTimestamped(original)) {
      entity.createdAt = original.createdAt;
    }
    entry.suppressField('createdAt');
  }

  if (isUserTracked(entity)) {
    if (ctx.actorId !== null) {
      entity.updatedBy = ctx.actorId;
    }
    if (ctx.actorId !== null || ctx.config.protectCreatedBy) {
      if (original && isUserTracked(original)) {
        entity.createdBy = original.createdBy;
      }
      entry.suppressField('createdBy');
    }
  }
}

function entityIdOf(entity: object): Id | null {
  return 'id' in entity && typeof entity.id === 'string' ? entity.id : null;
}

import type { ChangeSet, EntityRecord, Id } from '@ledgerkit/protocol';

/**
 * A function run against the change set of every commit attempt, before
 * anything is written. Hooks may mutate tracked entities, cancel pending
 * deletes and suppress protected fields.
 */
export type CommitHook = (changeSet: ChangeSet<EntityRecord>) => void | Promise<void>;

/**
 * IDs touched by a commit, grouped by what was written.
 */
export type CommitResult = {
  inserted: Id[];
  updated: Id[];
  deleted: Id[];

  /** Deletes that hooks turned into updates (also listed in `updated`) */
  softDeleted: Id[];

  /** Updates and deletes whose stored record no longer exists */
  missing: Id[];
};

/**
 * Options for creating a unit of work.
 */
export type UnitOfWorkOptions = {
  /** Hooks run in order, once per commit attempt */
  hooks?: CommitHook[];
};

/**
 * Collects pending writes and commits them together.
 *
 * Each entity ID is tracked once, in the position of its first
 * registration:
 * - add then remove drops the entity
 * - add then update stays an insert
 * - update then remove becomes a delete
 * - remove then add or update becomes an update
 */
export interface UnitOfWork {
  /** Track a new entity for insertion */
  add(record: EntityRecord): void;

  /** Track a modified entity */
  update(record: EntityRecord): void;

  /** Track an entity for deletion */
  remove(record: EntityRecord): void;

  /** Number of tracked entities */
  pending(): number;

  /** Stop tracking everything */
  clear(): void;

  /**
   * Run hooks and write every tracked change.
   *
   * Tracking is cleared only when the commit succeeds, so a failed commit
   * can be retried as-is; hooks run again on the retry. Over a context
   * without transactions, entries written before the failure stay
   * persisted and are no longer tracked, so a retry writes only the rest.
   */
  commit(): Promise<CommitResult>;
}

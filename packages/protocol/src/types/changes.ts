// Change set types
//
// A change set is the batch of pending writes in one unit of work, as
// seen by commit hooks. Hooks may rewrite entity fields, turn a pending
// delete into an update, and keep selected fields from being persisted.

/**
 * Kind of write pending for an entity.
 */
export type ChangeKind = 'insert' | 'update' | 'delete';

/**
 * Fields that a hook can keep at their stored value for one commit.
 */
export type ProtectedField = 'createdAt' | 'createdBy';

/**
 * One pending write.
 */
export interface ChangeEntry<T extends object> {
  /** The tracked entity; hooks mutate it in place */
  readonly entity: T;

  /** Current kind of the write (changes to 'update' after cancelDelete) */
  readonly kind: ChangeKind;

  /** The kind the entry had when the change set was built */
  readonly requestedKind: ChangeKind;

  /**
   * Stored version of the entity, loaded before hooks run.
   * Null for inserts and for records that no longer exist.
   */
  readonly original: T | null;

  /** Fields suppressed so far for this commit */
  readonly suppressedFields: readonly ProtectedField[];

  /**
   * Turn a pending delete into an update of the entity's current fields.
   * Has no effect on inserts and updates.
   */
  cancelDelete(): void;

  /**
   * Keep a field at its stored value for this commit.
   */
  suppressField(field: ProtectedField): void;
}

/**
 * The pending writes of one commit attempt, in tracking order.
 */
export interface ChangeSet<T extends object> {
  entries(): readonly ChangeEntry<T>[];
}

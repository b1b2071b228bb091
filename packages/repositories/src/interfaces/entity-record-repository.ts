import type { EntityRecord, EntityState, Id, ProtectedField } from '@ledgerkit/protocol';

/**
 * Filter for listing entity records.
 *
 * Terminated records are hidden unless `includeTerminated` is set or
 * `states` names 'terminated' explicitly.
 */
export type EntityRecordFilter = {
  kind?: string;

  /** Only records in these states (records without a state never match) */
  states?: EntityState[];

  /** Include soft-deleted records (default: false) */
  includeTerminated?: boolean;

  /**
   * Restrict to records the given actor may see: global records, records
   * without ownership, and records it owns. `null` sees only the first two.
   */
  visibleTo?: Id | null;

  /** Maximum number of results. Default 100, max 1000. */
  limit?: number;

  offset?: number;
};

export const DEFAULT_LIST_LIMIT = 100;
export const MAX_LIST_LIMIT = 1000;

/**
 * Clamp a requested limit to the repository bounds.
 */
export function resolveListLimit(limit: number | undefined): number {
  if (limit === undefined || limit <= 0) return DEFAULT_LIST_LIMIT;
  return Math.min(limit, MAX_LIST_LIMIT);
}

/**
 * Options for updating a record.
 */
export type UpdateEntityRecordOptions = {
  /** Fields that keep their stored values */
  preserve?: readonly ProtectedField[];
};

/**
 * Thrown by `insert` when a record with the same ID already exists.
 */
export class DuplicateRecordError extends Error {
  readonly code = 'DUPLICATE_RECORD';
  readonly recordId: Id;

  constructor(recordId: Id) {
    super(`Entity record already exists: ${recordId}`);
    this.name = 'DuplicateRecordError';
    this.recordId = recordId;
  }
}

/**
 * Repository interface for entity records.
 *
 * Repositories store exactly what they are given. Timestamps, attribution
 * and soft-delete redirection are applied before records get here, by the
 * hooks of a unit of work.
 */
export interface EntityRecordRepository {
  /**
   * Get a record by ID, including terminated records
   * @returns Record or null if not found
   */
  get(id: Id): Promise<EntityRecord | null>;

  /**
   * List records with optional filtering
   */
  list(filter?: EntityRecordFilter): Promise<EntityRecord[]>;

  /**
   * Insert a new record
   * @throws DuplicateRecordError if the ID is taken
   */
  insert(record: EntityRecord): Promise<EntityRecord>;

  /**
   * Replace a stored record's fields with the given record's
   * @returns Updated record or null if not found
   */
  update(record: EntityRecord, options?: UpdateEntityRecordOptions): Promise<EntityRecord | null>;

  /**
   * Physically delete a record
   * @returns true if deleted, false if not found
   */
  delete(id: Id): Promise<boolean>;
}

// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing
//
// Records are cloned on the way in and out, so callers never hold a
// reference to stored state. Data does not persist between restarts.

import type { EntityRecord, Id } from '@ledgerkit/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  EntityRecordRepository,
  EntityRecordFilter,
} from '../interfaces/index.js';
import { DuplicateRecordError, resolveListLimit } from '../interfaces/index.js';

/**
 * In-memory data store exposed for testing.
 */
export interface InMemoryDataStore {
  records: Map<Id, EntityRecord>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

/**
 * Check a record against a list filter.
 */
export function matchesRecordFilter(record: EntityRecord, filter: EntityRecordFilter = {}): boolean {
  if (filter.kind !== undefined && record.kind !== filter.kind) return false;

  if (filter.states && filter.states.length > 0) {
    if (record.state === undefined || !filter.states.includes(record.state)) return false;
  } else if (!filter.includeTerminated && record.state === 'terminated') {
    return false;
  }

  if (filter.visibleTo !== undefined) {
    const ownerId = record.ownerId ?? null;
    if (ownerId !== null && ownerId !== filter.visibleTo) return false;
  }

  return true;
}

/**
 * Ordering used by list(): creation time (records without one first), then ID.
 */
export function compareRecords(a: EntityRecord, b: EntityRecord): number {
  const byCreated = (a.createdAt ?? '').localeCompare(b.createdAt ?? '');
  return byCreated !== 0 ? byCreated : a.id.localeCompare(b.id);
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * await repos.records.insert({ id: 'rec-1', kind: 'note', attributes: {} });
 *
 * // Access underlying data for debugging
 * console.log(repos._data.records.size);
 *
 * // Clear all data
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const records = new Map<Id, EntityRecord>();

  const recordRepo: EntityRecordRepository = {
    async get(id) {
      const record = records.get(id);
      return record ? structuredClone(record) : null;
    },

    async list(filter) {
      const limit = resolveListLimit(filter?.limit);
      const offset = filter?.offset ?? 0;

      return Array.from(records.values())
        .filter((r) => matchesRecordFilter(r, filter))
        .sort(compareRecords)
        .slice(offset, offset + limit)
        .map((r) => structuredClone(r));
    },

    async insert(record) {
      if (records.has(record.id)) {
        throw new DuplicateRecordError(record.id);
      }
      records.set(record.id, structuredClone(record));
      return structuredClone(record);
    },

    async update(record, options) {
      const stored = records.get(record.id);
      if (!stored) return null;

      const preserve = options?.preserve ?? [];
      const next: EntityRecord = structuredClone(record);
      if (preserve.includes('createdAt')) next.createdAt = stored.createdAt;
      if (preserve.includes('createdBy')) next.createdBy = stored.createdBy;

      records.set(record.id, next);
      return structuredClone(next);
    },

    async delete(id) {
      return records.delete(id);
    },
  };

  const context: RepositoryContext = {
    records: recordRepo,
  };

  return {
    ...context,
    // Writes made by a failing transaction are rolled back
    async transaction<T>(fn: (repos: RepositoryContext) => Promise<T>): Promise<T> {
      const snapshot = new Map(records);
      try {
        return await fn(context);
      } catch (error) {
        records.clear();
        for (const [id, record] of snapshot) {
          records.set(id, record);
        }
        throw error;
      }
    },
    _data: {
      records,
    },
    clear() {
      records.clear();
    },
  };
}

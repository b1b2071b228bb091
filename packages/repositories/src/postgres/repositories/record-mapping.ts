// Conversions between protocol records and entity_records rows

import type { EntityRecord, ProtectedField } from '@ledgerkit/protocol';
import { getCapabilities } from '@ledgerkit/protocol';
import type { EntityRecordRow, NewEntityRecordRow } from '../schema/index.js';

export function recordToRow(record: EntityRecord): NewEntityRecordRow {
  return {
    id: record.id,
    kind: record.kind,
    attributes: record.attributes,
    capabilities: getCapabilities(record),
    state: record.state ?? null,
    createdAt: record.createdAt ? new Date(record.createdAt) : null,
    updatedAt: record.updatedAt ? new Date(record.updatedAt) : null,
    createdBy: record.createdBy ?? null,
    updatedBy: record.updatedBy ?? null,
    ownerId: record.ownerId ?? null,
  };
}

/**
 * Rebuild a record, restoring only the fields of the capabilities the
 * row was written with.
 */
export function rowToRecord(row: EntityRecordRow): EntityRecord {
  const record: EntityRecord = {
    id: row.id,
    kind: row.kind,
    attributes: row.attributes,
  };
  const capabilities = new Set(row.capabilities);

  if (capabilities.has('timestamps') && row.createdAt && row.updatedAt) {
    record.createdAt = row.createdAt.toISOString();
    record.updatedAt = row.updatedAt.toISOString();
  }

  if (capabilities.has('soft_delete') && row.state) {
    record.state = row.state;
  }

  if (capabilities.has('user_tracking')) {
    record.createdBy = row.createdBy;
    record.updatedBy = row.updatedBy;
  }

  if (capabilities.has('ownership')) {
    record.ownerId = row.ownerId;
  }

  return record;
}

/**
 * Column values for an UPDATE: everything but the key, minus preserved fields.
 */
export function recordToUpdateSet(
  record: EntityRecord,
  preserve: readonly ProtectedField[] = []
): Partial<NewEntityRecordRow> {
  const row = recordToRow(record);
  const set: Partial<NewEntityRecordRow> = {
    kind: row.kind,
    attributes: row.attributes,
    capabilities: row.capabilities,
    state: row.state,
    updatedAt: row.updatedAt,
    updatedBy: row.updatedBy,
    ownerId: row.ownerId,
  };

  if (!preserve.includes('createdAt')) set.createdAt = row.createdAt;
  if (!preserve.includes('createdBy')) set.createdBy = row.createdBy;

  return set;
}

/**
 * Whether an error is a Postgres unique-constraint violation (SQLSTATE 23505).
 */
export function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === '23505';
}

import { pgTable, text, timestamp, jsonb, index } from 'drizzle-orm/pg-core';
import type { EntityCapability, EntityState } from '@ledgerkit/protocol';

/**
 * Entity records table.
 *
 * One row per record. Audit columns are nullable because records only
 * carry the capabilities they opt into; `capabilities` says which columns
 * are meaningful for the row, so a NULL `created_by` on a user-tracked
 * record ("no actor known") reads back differently from a record without
 * user tracking at all.
 */
export const entityRecords = pgTable(
  'entity_records',
  {
    id: text('id').primaryKey(),
    kind: text('kind').notNull(),
    attributes: jsonb('attributes').$type<Record<string, unknown>>().notNull().default({}),
    capabilities: jsonb('capabilities').$type<EntityCapability[]>().notNull().default([]),
    state: text('state', {
      enum: ['created', 'inactive', 'active', 'effective', 'terminated'],
    }).$type<EntityState>(),
    createdAt: timestamp('created_at', { withTimezone: true }),
    updatedAt: timestamp('updated_at', { withTimezone: true }),
    createdBy: text('created_by'),
    updatedBy: text('updated_by'),
    ownerId: text('owner_id'),
  },
  (table) => [
    index('entity_records_kind_idx').on(table.kind),
    index('entity_records_state_idx').on(table.state),
    index('entity_records_owner_idx').on(table.ownerId),
    index('entity_records_kind_state_idx').on(table.kind, table.state),
  ]
);

export type EntityRecordRow = typeof entityRecords.$inferSelect;
export type NewEntityRecordRow = typeof entityRecords.$inferInsert;

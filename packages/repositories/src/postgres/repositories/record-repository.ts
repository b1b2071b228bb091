import { eq, ne, and, or, asc, inArray, isNull, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { Database } from '../db.js';
import { entityRecords } from '../schema/index.js';
import type {
  EntityRecordRepository,
  EntityRecordFilter,
  UpdateEntityRecordOptions,
} from '../../interfaces/index.js';
import { DuplicateRecordError, resolveListLimit } from '../../interfaces/index.js';
import type { EntityRecord, Id } from '@ledgerkit/protocol';
import {
  recordToRow,
  rowToRecord,
  recordToUpdateSet,
  isUniqueViolation,
} from './record-mapping.js';

export class PgEntityRecordRepository implements EntityRecordRepository {
  constructor(private db: Database) {}

  async get(id: Id): Promise<EntityRecord | null> {
    const [row] = await this.db.select().from(entityRecords).where(eq(entityRecords.id, id));
    return row ? rowToRecord(row) : null;
  }

  async list(filter?: EntityRecordFilter): Promise<EntityRecord[]> {
    const conditions: (SQL | undefined)[] = [];

    if (filter?.kind) {
      conditions.push(eq(entityRecords.kind, filter.kind));
    }

    if (filter?.states && filter.states.length > 0) {
      conditions.push(inArray(entityRecords.state, filter.states));
    } else if (!filter?.includeTerminated) {
      conditions.push(or(isNull(entityRecords.state), ne(entityRecords.state, 'terminated')));
    }

    if (filter?.visibleTo !== undefined) {
      conditions.push(
        filter.visibleTo === null
          ? isNull(entityRecords.ownerId)
          : or(isNull(entityRecords.ownerId), eq(entityRecords.ownerId, filter.visibleTo))
      );
    }

    const rows = await this.db
      .select()
      .from(entityRecords)
      .where(and(...conditions))
      .orderBy(sql`${entityRecords.createdAt} asc nulls first`, asc(entityRecords.id))
      .limit(resolveListLimit(filter?.limit))
      .offset(filter?.offset ?? 0);

    return rows.map((r) => rowToRecord(r));
  }

  async insert(record: EntityRecord): Promise<EntityRecord> {
    try {
      const [row] = await this.db.insert(entityRecords).values(recordToRow(record)).returning();
      return rowToRecord(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateRecordError(record.id);
      }
      throw error;
    }
  }

  async update(
    record: EntityRecord,
    options?: UpdateEntityRecordOptions
  ): Promise<EntityRecord | null> {
    const [row] = await this.db
      .update(entityRecords)
      .set(recordToUpdateSet(record, options?.preserve))
      .where(eq(entityRecords.id, record.id))
      .returning();

    return row ? rowToRecord(row) : null;
  }

  async delete(id: Id): Promise<boolean> {
    const result = await this.db.delete(entityRecords).where(eq(entityRecords.id, id));
    return (result.count ?? 0) > 0;
  }
}

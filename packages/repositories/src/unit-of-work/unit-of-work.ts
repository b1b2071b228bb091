// Unit of work
//
// Tracks inserts, updates and deletes of entity records and commits them
// in one go. Every commit attempt builds a fresh change set, hands it to
// the configured hooks, then writes what the hooks left behind.

import type { ChangeKind, EntityRecord, Id } from '@ledgerkit/protocol';
import type {
  CommitHook,
  CommitResult,
  RepositoryContext,
  TransactionalRepositoryContext,
  UnitOfWork,
  UnitOfWorkOptions,
} from '../interfaces/index.js';
import { isTransactional } from '../interfaces/index.js';
import type { ChangeSetItem, TrackedChangeEntry } from './change-set.js';
import { createChangeSet } from './change-set.js';

type Tracked = {
  record: EntityRecord;
  kind: ChangeKind;
};

/**
 * Create a unit of work over a repository context.
 *
 * When the context supports transactions, loading originals, running hooks
 * and writing all happen inside one transaction.
 *
 * @example
 * ```ts
 * const unitOfWork = createUnitOfWork(repos, { hooks: [auditHook] });
 *
 * unitOfWork.add(invoice);
 * unitOfWork.remove(oldDraft);
 *
 * const result = await unitOfWork.commit();
 * ```
 */
export function createUnitOfWork(
  repos: RepositoryContext | TransactionalRepositoryContext,
  options: UnitOfWorkOptions = {}
): UnitOfWork {
  const hooks: CommitHook[] = options.hooks ?? [];
  const tracked = new Map<Id, Tracked>();

  async function run(
    ctx: RepositoryContext,
    onWritten: (id: Id) => void = () => {}
  ): Promise<CommitResult> {
    const items: ChangeSetItem<EntityRecord>[] = [];

    for (const { record, kind } of tracked.values()) {
      const original = kind === 'insert' ? null : await ctx.records.get(record.id);
      items.push({ entity: record, kind, original });
    }

    const changeSet = createChangeSet(items);

    for (const hook of hooks) {
      await hook(changeSet);
    }

    return persist(ctx, changeSet.entries(), onWritten);
  }

  return {
    add(record) {
      const existing = tracked.get(record.id);
      if (existing?.kind === 'delete') {
        tracked.set(record.id, { record, kind: 'update' });
        return;
      }
      tracked.set(record.id, { record, kind: existing?.kind ?? 'insert' });
    },

    update(record) {
      const existing = tracked.get(record.id);
      tracked.set(record.id, {
        record,
        kind: existing?.kind === 'insert' ? 'insert' : 'update',
      });
    },

    remove(record) {
      const existing = tracked.get(record.id);
      if (existing?.kind === 'insert') {
        tracked.delete(record.id);
        return;
      }
      tracked.set(record.id, { record, kind: 'delete' });
    },

    pending() {
      return tracked.size;
    },

    clear() {
      tracked.clear();
    },

    async commit() {
      if (isTransactional(repos)) {
        const result = await repos.transaction((ctx) => run(ctx));
        tracked.clear();
        return result;
      }

      // Without a transaction, writes before a failure stay persisted;
      // stop tracking those so a retry only repeats the rest.
      const written: Id[] = [];
      try {
        const result = await run(repos, (id) => written.push(id));
        tracked.clear();
        return result;
      } catch (error) {
        for (const id of written) {
          tracked.delete(id);
        }
        throw error;
      }
    },
  };
}

async function persist(
  ctx: RepositoryContext,
  entries: readonly TrackedChangeEntry<EntityRecord>[],
  onWritten: (id: Id) => void
): Promise<CommitResult> {
  const result: CommitResult = {
    inserted: [],
    updated: [],
    deleted: [],
    softDeleted: [],
    missing: [],
  };

  for (const entry of entries) {
    const { entity } = entry;

    switch (entry.kind) {
      case 'insert':
        await ctx.records.insert(entity);
        result.inserted.push(entity.id);
        break;

      case 'update': {
        if (!entry.original) {
          result.missing.push(entity.id);
          break;
        }
        const updated = await ctx.records.update(entity, { preserve: entry.suppressedFields });
        if (!updated) {
          result.missing.push(entity.id);
          break;
        }
        result.updated.push(entity.id);
        if (entry.deleteCancelled) {
          result.softDeleted.push(entity.id);
        }
        break;
      }

      case 'delete':
        if (await ctx.records.delete(entity.id)) {
          result.deleted.push(entity.id);
        } else {
          result.missing.push(entity.id);
        }
        break;
    }

    onWritten(entity.id);
  }

  return result;
}

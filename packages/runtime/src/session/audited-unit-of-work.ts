// Audited unit of work
//
// A unit of work with the audit policy attached as its first commit hook.
// Commit failures that belong to the error taxonomy come back as a
// Result; anything else is rethrown.

import type { CurrentActor, Result } from '@ledgerkit/protocol';
import { ok, fail } from '@ledgerkit/protocol';
import type {
  CommitHook,
  CommitResult,
  RepositoryContext,
  TransactionalRepositoryContext,
  UnitOfWork,
} from '@ledgerkit/repositories';
import { createUnitOfWork, DuplicateRecordError } from '@ledgerkit/repositories';
import type { AuditPolicyOptions } from '../audit/index.js';
import { createAuditHook } from '../audit/index.js';
import { ConflictError } from '../errors.js';

export type AuditedUnitOfWorkOptions = AuditPolicyOptions & {
  /** Extra hooks, run after the audit policy */
  hooks?: CommitHook[];
};

export interface AuditedUnitOfWork extends Omit<UnitOfWork, 'commit'> {
  /**
   * Audit and write every tracked change.
   * A duplicate insert fails with a ConflictError.
   */
  commit(): Promise<Result<CommitResult, ConflictError>>;
}

/**
 * Create a unit of work whose writes are audited under `actor`.
 *
 * @example
 * ```ts
 * const unitOfWork = createAuditedUnitOfWork(repos, actor, { logger });
 *
 * unitOfWork.add(createDomainEntity({ kind: 'invoice', attributes }));
 * const result = await unitOfWork.commit();
 * if (!result.success) {
 *   return errorResponseFrom(result.error);
 * }
 * ```
 */
export function createAuditedUnitOfWork(
  repos: RepositoryContext | TransactionalRepositoryContext,
  actor: CurrentActor | null,
  options: AuditedUnitOfWorkOptions = {}
): AuditedUnitOfWork {
  const { hooks = [], ...policyOptions } = options;
  const unitOfWork = createUnitOfWork(repos, {
    hooks: [createAuditHook(actor, policyOptions), ...hooks],
  });

  return {
    add: (record) => unitOfWork.add(record),
    update: (record) => unitOfWork.update(record),
    remove: (record) => unitOfWork.remove(record),
    pending: () => unitOfWork.pending(),
    clear: () => unitOfWork.clear(),

    async commit() {
      try {
        return ok(await unitOfWork.commit());
      } catch (error) {
        if (error instanceof DuplicateRecordError) {
          return fail(
            new ConflictError({
              entityName: 'EntityRecord',
              field: 'id',
              value: error.recordId,
              cause: error,
            })
          );
        }
        throw error;
      }
    },
  };
}

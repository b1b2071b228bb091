import type { EntityRecordRepository } from './entity-record-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * Pass a RepositoryContext to any code that needs data access, and you
 * can swap implementations (Postgres, in-memory) without changing the
 * consuming code.
 *
 * Example usage:
 * ```typescript
 * const repos = createPgRepositoryContext(db);
 * const unitOfWork = createUnitOfWork(repos, { hooks: [auditHook] });
 * ```
 */
export interface RepositoryContext {
  readonly records: EntityRecordRepository;
}

/**
 * Transaction wrapper type for atomic operations across repositories.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * Extended context with transaction support.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a database transaction.
   * All repository operations within the function will be atomic.
   *
   * @throws Rolls back the transaction if the function throws
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}

/**
 * Check if a repository context supports transactions.
 */
export function isTransactional(
  repos: RepositoryContext | TransactionalRepositoryContext
): repos is TransactionalRepositoryContext {
  return 'transaction' in repos && typeof repos.transaction === 'function';
}

import type { Database } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { PgEntityRecordRepository } from './record-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase(databaseConfigFromEnv());
 * const repos = createPgRepositoryContext(db);
 *
 * const record = await repos.records.get('rec-1');
 * ```
 */
export function createPgRepositoryContext(db: Database): RepositoryContext {
  return {
    records: new PgEntityRecordRepository(db),
  };
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * A unit of work over this context loads originals, runs its hooks and
 * writes every change inside a single transaction.
 */
export function createTransactionalPgRepositoryContext(
  db: Database
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly records: PgEntityRecordRepository;

  constructor(private db: Database) {
    this.records = new PgEntityRecordRepository(db);
  }

  /**
   * Execute a function within a database transaction.
   *
   * - If the function returns successfully, all changes are committed
   * - If the function throws, all changes are rolled back
   *
   * @throws Rolls back the transaction and rethrows if the function throws
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    return this.db.transaction(async (tx) => {
      // Cast tx to Database since Drizzle's transaction type is compatible
      const txDb = tx as unknown as Database;
      const txRepos: RepositoryContext = {
        records: new PgEntityRecordRepository(txDb),
      };

      return fn(txRepos);
    });
  }
}

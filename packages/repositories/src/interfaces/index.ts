// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  EntityRecordRepository,
  EntityRecordFilter,
  UpdateEntityRecordOptions,
} from './entity-record-repository.js';
export {
  DuplicateRecordError,
  DEFAULT_LIST_LIMIT,
  MAX_LIST_LIMIT,
  resolveListLimit,
} from './entity-record-repository.js';

export type {
  RepositoryContext,
  TransactionFn,
  TransactionalRepositoryContext,
} from './repository-context.js';
export { isTransactional } from './repository-context.js';

export type {
  CommitHook,
  CommitResult,
  UnitOfWorkOptions,
  UnitOfWork,
} from './unit-of-work.js';

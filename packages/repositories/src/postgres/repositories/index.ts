// Postgres repository implementations
export { PgEntityRecordRepository } from './record-repository.js';
export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
} from './context.js';
export { recordToRow, rowToRecord, recordToUpdateSet, isUniqueViolation } from './record-mapping.js';

// @ledgerkit/repositories
// Repository interfaces and implementations for substrate-independent data access.
//
// This package defines the "contract" for data operations. The actual implementations
// (Postgres, in-memory) fulfill these contracts, and the unit of work sits on top
// of any of them.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles all repositories for dependency injection
// - UnitOfWork batches writes and runs commit hooks (auditing) before persisting

export * from './interfaces/index.js';
export * from './unit-of-work/index.js';
export {
  createInMemoryRepositoryContext,
  matchesRecordFilter,
  compareRecords,
  type InMemoryRepositoryContext,
  type InMemoryDataStore,
} from './in-memory/index.js';
export * as postgres from './postgres/index.js';

export {
  createAuditedUnitOfWork,
  type AuditedUnitOfWork,
  type AuditedUnitOfWorkOptions,
} from './audited-unit-of-work.js';

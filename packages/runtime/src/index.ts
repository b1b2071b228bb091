// @ledgerkit/runtime
// Entity lifecycle and audit enforcement

// Error types
export {
  BusinessError,
  NotFoundError,
  ConflictError,
  ValidationError,
  UnauthorizedError,
  InvalidTransitionError,
  ActorResolutionError,
} from './errors.js';

// Entity lifecycle
export {
  // Construction
  createDomainEntity,
  createOwnedEntity,
  // Unconditional state changes
  touch,
  softDelete,
  restore,
  activate,
  deactivate,
  // Predicates
  isActive,
  isInactive,
  isEffective,
  isTerminated,
  isOwnedBy,
  isGlobal,
  // Guarded transitions
  nextState,
  canTransition,
  availableEvents,
  applyTransition,
  // Types
  type LifecycleOptions,
  type CreateDomainEntityInput,
  type CreateOwnedEntityInput,
} from './lifecycle/index.js';

// Actors
export {
  createActor,
  anonymousActor,
  resolveActorId,
  type ResolveActorOptions,
} from './actors/index.js';

// Audit enforcement
export {
  enforceAuditPolicy,
  createAuditHook,
  type AuditPolicyOptions,
  type AuditPolicyResult,
} from './audit/index.js';

// Audited unit of work
export {
  createAuditedUnitOfWork,
  type AuditedUnitOfWork,
  type AuditedUnitOfWorkOptions,
} from './session/index.js';

// Configuration
export {
  DEFAULT_AUDIT_CONFIG,
  resolveAuditConfig,
  loadAuditConfigFromEnv,
  type ResolvedAuditConfig,
} from './config.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type AuditLogger,
  type LogEntry,
} from './logging.js';

// Responses
export { toErrorResponse } from './responses.js';

export {
  createDomainEntity,
  createOwnedEntity,
  touch,
  softDelete,
  restore,
  activate,
  deactivate,
  isActive,
  isInactive,
  isEffective,
  isTerminated,
  isOwnedBy,
  isGlobal,
  type LifecycleOptions,
  type CreateDomainEntityInput,
  type CreateOwnedEntityInput,
} from './model.js';
export { nextState, canTransition, availableEvents, applyTransition } from './transitions.js';

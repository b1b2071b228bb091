// Runtime error types
//
// BusinessError is the root of every rule violation raised around the
// lifecycle core. The core itself only ever returns these inside a
// Result; repositories and API layers may throw them.

import type { EntityState, Id, LifecycleEvent, ValidationErrorMap } from '@ledgerkit/protocol';

/**
 * Base class for business rule violations.
 */
export class BusinessError extends Error {
  readonly code: string;

  constructor(message: string, options?: { code?: string; cause?: Error }) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'BusinessError';
    this.code = options?.code ?? 'BUSINESS_RULE_VIOLATION';
  }
}

/**
 * A requested resource does not exist.
 */
export class NotFoundError extends BusinessError {
  readonly entityName?: string;
  readonly key?: string;

  constructor(options: { entityName?: string; key?: string; message?: string; cause?: Error } = {}) {
    super(options.message ?? describeNotFound(options.entityName, options.key), {
      code: 'NOT_FOUND',
      cause: options.cause,
    });
    this.name = 'NotFoundError';
    this.entityName = options.entityName;
    this.key = options.key;
  }
}

function describeNotFound(entityName?: string, key?: string): string {
  if (entityName !== undefined && key !== undefined) {
    return `${entityName} with key '${key}' was not found`;
  }
  return 'The requested resource was not found';
}

/**
 * A write collides with existing data.
 */
export class ConflictError extends BusinessError {
  readonly entityName?: string;
  readonly field?: string;
  readonly value?: string;

  constructor(
    options: {
      entityName?: string;
      field?: string;
      value?: string;
      message?: string;
      cause?: Error;
    } = {}
  ) {
    super(options.message ?? describeConflict(options.entityName, options.field, options.value), {
      code: 'CONFLICT',
      cause: options.cause,
    });
    this.name = 'ConflictError';
    this.entityName = options.entityName;
    this.field = options.field;
    this.value = options.value;
  }
}

function describeConflict(entityName?: string, field?: string, value?: string): string {
  if (entityName !== undefined && field !== undefined && value !== undefined) {
    return `${entityName} with ${field} '${value}' already exists`;
  }
  return 'A conflict occurred with existing data';
}

/**
 * Input failed validation. `errors` maps each field to its messages.
 */
export class ValidationError extends BusinessError {
  readonly errors: ValidationErrorMap;

  constructor(errors: ValidationErrorMap = {}, message = 'One or more validation errors occurred') {
    super(message, { code: 'VALIDATION_FAILED' });
    this.name = 'ValidationError';
    this.errors = errors;
  }

  /**
   * A validation error for a single field; the message doubles as the
   * error's own message.
   */
  static forField(field: string, message: string): ValidationError {
    return new ValidationError({ [field]: [message] }, message);
  }
}

/**
 * The actor is not allowed to perform the operation.
 */
export class UnauthorizedError extends BusinessError {
  constructor(message = 'Unauthorized access', cause?: Error) {
    super(message, { code: 'UNAUTHORIZED', cause });
    this.name = 'UnauthorizedError';
  }
}

/**
 * A guarded lifecycle transition is not legal from the entity's state.
 */
export class InvalidTransitionError extends BusinessError {
  readonly entityId: Id;
  readonly currentState: EntityState;
  readonly event: LifecycleEvent;

  constructor(entityId: Id, currentState: EntityState, event: LifecycleEvent) {
    super(`Cannot ${event} entity ${entityId}: current state is "${currentState}"`, {
      code: 'INVALID_TRANSITION',
    });
    this.name = 'InvalidTransitionError';
    this.entityId = entityId;
    this.currentState = currentState;
    this.event = event;
  }
}

/**
 * The current actor could not be determined.
 * Only raised when the audit policy is configured to propagate lookup failures.
 */
export class ActorResolutionError extends BusinessError {
  constructor(cause: Error) {
    super(`Failed to resolve the current actor: ${cause.message}`, {
      code: 'ACTOR_RESOLUTION_FAILED',
      cause,
    });
    this.name = 'ActorResolutionError';
  }
}

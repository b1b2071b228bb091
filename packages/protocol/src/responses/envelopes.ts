// Response envelope factories
//
// Builders for the envelopes in types/responses.ts. Every builder stamps
// the envelope with the time it was built; pass a clock to pin it.

import type { Clock } from '../types/common.js';
import { systemClock } from '../types/common.js';
import type {
  ApiResponse,
  PagedResponse,
  ValidationErrorMap,
  ValidationResponse,
} from '../types/responses.js';

const VALIDATION_FAILED = 'Validation failed';

export function successResponse<T>(
  data: T,
  message?: string,
  clock: Clock = systemClock
): ApiResponse<T> {
  return {
    success: true,
    message,
    data,
    timestamp: clock().toISOString(),
  };
}

export function errorResponse<T = never>(
  message: string,
  errors?: string[],
  clock: Clock = systemClock
): ApiResponse<T> {
  return {
    success: false,
    message,
    errors,
    timestamp: clock().toISOString(),
  };
}

/**
 * Build an error envelope from a thrown error.
 * `errors` holds the error's string form (`Name: message`).
 */
export function errorResponseFrom<T = never>(
  error: Error,
  clock: Clock = systemClock
): ApiResponse<T> {
  return errorResponse<T>(error.message, [String(error)], clock);
}

/**
 * Number of pages needed for `totalCount` items, or 0 when the page size is 0.
 */
export function countPages(totalCount: number, pageSize: number): number {
  return pageSize > 0 ? Math.ceil(totalCount / pageSize) : 0;
}

export function pagedResponse<T>(
  data: T[],
  page: number,
  pageSize: number,
  totalCount: number,
  options: { message?: string; clock?: Clock } = {}
): PagedResponse<T> {
  const totalPages = countPages(totalCount, pageSize);

  return {
    success: true,
    message: options.message,
    data,
    page,
    pageSize,
    totalCount,
    totalPages,
    hasPreviousPage: page > 1,
    hasNextPage: page < totalPages,
    timestamp: (options.clock ?? systemClock)().toISOString(),
  };
}

/**
 * Failed page: empty data and zeroed paging fields.
 */
export function pagedErrorResponse<T>(
  message: string,
  errors?: string[],
  clock: Clock = systemClock
): PagedResponse<T> {
  return {
    success: false,
    message,
    errors,
    data: [],
    page: 0,
    pageSize: 0,
    totalCount: 0,
    totalPages: 0,
    hasPreviousPage: false,
    hasNextPage: false,
    timestamp: clock().toISOString(),
  };
}

/**
 * Build a validation envelope from a field map, or from a single field
 * and message.
 */
export function validationResponse(errors: ValidationErrorMap, clock?: Clock): ValidationResponse;
export function validationResponse(field: string, message: string, clock?: Clock): ValidationResponse;
export function validationResponse(
  errorsOrField: ValidationErrorMap | string,
  messageOrClock?: string | Clock,
  maybeClock?: Clock
): ValidationResponse {
  let validationErrors: ValidationErrorMap;
  let clock: Clock = systemClock;

  if (typeof errorsOrField === 'string') {
    validationErrors = { [errorsOrField]: [typeof messageOrClock === 'string' ? messageOrClock : ''] };
    clock = maybeClock ?? systemClock;
  } else {
    validationErrors = errorsOrField;
    if (typeof messageOrClock === 'function') clock = messageOrClock;
  }

  return {
    success: false,
    message: VALIDATION_FAILED,
    validationErrors,
    errors: Object.values(validationErrors).flat(),
    timestamp: clock().toISOString(),
  };
}

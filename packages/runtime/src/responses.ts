// Error to response envelope mapping

import type { ApiResponse, Clock } from '@ledgerkit/protocol';
import { errorResponseFrom, systemClock, validationResponse } from '@ledgerkit/protocol';
import { ValidationError } from './errors.js';

/**
 * Build the failure envelope for an error. Validation errors keep their
 * field map; everything else is reported by name and message.
 */
export function toErrorResponse(error: Error, clock: Clock = systemClock): ApiResponse<never> {
  if (error instanceof ValidationError) {
    return validationResponse(error.errors, clock);
  }
  return errorResponseFrom(error, clock);
}

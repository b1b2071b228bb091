export {
  successResponse,
  errorResponse,
  errorResponseFrom,
  countPages,
  pagedResponse,
  pagedErrorResponse,
  validationResponse,
} from './envelopes.js';

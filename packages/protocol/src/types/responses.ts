// Response envelopes for HTTP APIs

import type { Timestamp } from './common.js';

/**
 * Uniform envelope for API responses.
 */
export type ApiResponse<T> = {
  success: boolean;
  message?: string;
  data?: T;
  errors?: string[];
  /** When the response was built */
  timestamp: Timestamp;
};

/**
 * Envelope for one page of a list.
 */
export type PagedResponse<T> = ApiResponse<T[]> & {
  /** 1-based page number */
  page: number;
  pageSize: number;
  totalCount: number;
  totalPages: number;
  hasPreviousPage: boolean;
  hasNextPage: boolean;
};

/**
 * Field name to the messages raised against it.
 */
export type ValidationErrorMap = Record<string, string[]>;

/**
 * Envelope for a failed validation.
 */
export type ValidationResponse = ApiResponse<never> & {
  validationErrors: ValidationErrorMap;
};

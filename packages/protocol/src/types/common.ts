// Common types used across the protocol

/**
 * ISO 8601 timestamp string (always UTC)
 */
export type Timestamp = string;

/**
 * UUID string identifier
 */
export type Id = string;

/**
 * Outcome of an operation that can fail without throwing.
 *
 * Callers branch on `success`; the failure side carries a typed error
 * rather than a message string.
 */
export type Result<T, E = Error> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Build a successful Result.
 */
export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

/**
 * Build a failed Result.
 */
export function fail<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

/**
 * Source of the current time. Injected wherever timestamps are assigned
 * so tests can pin them.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

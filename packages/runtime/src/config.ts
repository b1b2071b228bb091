// Audit configuration
//
// Defaults live here; AuditConfig itself is a protocol type so other
// packages can accept it without depending on the runtime.

import { z } from 'zod';
import type { AuditConfig, Result } from '@ledgerkit/protocol';
import { ok, fail, toValidationErrorMap } from '@ledgerkit/protocol';
import { ValidationError } from './errors.js';

export type ResolvedAuditConfig = Required<AuditConfig>;

export const DEFAULT_AUDIT_CONFIG: ResolvedAuditConfig = {
  softDeleteEnabled: true,
  actorFailureMode: 'anonymous',
  protectCreatedBy: true,
  onAudit: () => {},
};

/**
 * Fill in defaults for every unset option.
 */
export function resolveAuditConfig(config: AuditConfig = {}): ResolvedAuditConfig {
  return {
    softDeleteEnabled: config.softDeleteEnabled ?? DEFAULT_AUDIT_CONFIG.softDeleteEnabled,
    actorFailureMode: config.actorFailureMode ?? DEFAULT_AUDIT_CONFIG.actorFailureMode,
    protectCreatedBy: config.protectCreatedBy ?? DEFAULT_AUDIT_CONFIG.protectCreatedBy,
    onAudit: config.onAudit ?? DEFAULT_AUDIT_CONFIG.onAudit,
  };
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const AuditEnvSchema = z.object({
  LEDGERKIT_SOFT_DELETE: booleanFlag.optional(),
  LEDGERKIT_ACTOR_FAILURE_MODE: z.enum(['anonymous', 'propagate']).optional(),
  LEDGERKIT_PROTECT_CREATED_BY: booleanFlag.optional(),
});

/**
 * Read audit options from environment variables.
 *
 * - `LEDGERKIT_SOFT_DELETE`: `true`/`false`/`1`/`0`
 * - `LEDGERKIT_ACTOR_FAILURE_MODE`: `anonymous` or `propagate`
 * - `LEDGERKIT_PROTECT_CREATED_BY`: `true`/`false`/`1`/`0`
 *
 * Unset variables are left out so resolveAuditConfig applies its defaults.
 */
export function loadAuditConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): Result<AuditConfig, ValidationError> {
  const parsed = AuditEnvSchema.safeParse(env);
  if (!parsed.success) {
    return fail(new ValidationError(toValidationErrorMap(parsed.error)));
  }

  const config: AuditConfig = {};
  if (parsed.data.LEDGERKIT_SOFT_DELETE !== undefined) {
    config.softDeleteEnabled = parsed.data.LEDGERKIT_SOFT_DELETE;
  }
  if (parsed.data.LEDGERKIT_ACTOR_FAILURE_MODE !== undefined) {
    config.actorFailureMode = parsed.data.LEDGERKIT_ACTOR_FAILURE_MODE;
  }
  if (parsed.data.LEDGERKIT_PROTECT_CREATED_BY !== undefined) {
    config.protectCreatedBy = parsed.data.LEDGERKIT_PROTECT_CREATED_BY;
  }
  return ok(config);
}

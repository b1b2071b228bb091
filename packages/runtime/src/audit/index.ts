export {
  enforceAuditPolicy,
  createAuditHook,
  type AuditPolicyOptions,
  type AuditPolicyResult,
} from './policy.js';

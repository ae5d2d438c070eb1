export type { AuditEvent, AuditEventType, AuditLog } from '#audit';
export type { ConnectionInfo } from '#fingerprint';
export type {
  RegisterSessionOptions,
  SessionInfo,
  SessionRecord,
  SessionSecurityManagerOptions,
  SessionTokenVerification,
} from '#manager';
export type { SessionTokenClaims } from '#token';

export {
  AuditTrail,
  JsonlAuditLog,
  MemoryAuditLog,
  createLogAuditLog,
  isSecurityAlert,
  toAuditLine,
} from '#audit';
export { computeConnectionFingerprint } from '#fingerprint';
export {
  DEFAULT_MAX_FAILED_ATTEMPTS,
  DEFAULT_MAX_PRINCIPALS_PER_SESSION,
  DEFAULT_SESSION_TIMEOUT_MS,
  MINIMUM_SESSION_SECRET_LENGTH,
  SessionSecurityManager,
} from '#manager';
export { FailedAttemptLimiter } from '#rate-limiter';
export { ANONYMOUS_PRINCIPAL, peekSessionId } from '#token';

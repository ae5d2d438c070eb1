import { randomBytes, timingSafeEqual } from 'node:crypto';

import { SecurityError, normalizePrincipal } from '@credgate/core';

import { AuditTrail } from '#audit';
import { FailedAttemptLimiter } from '#rate-limiter';
import {
  ANONYMOUS_PRINCIPAL,
  inspectSessionToken,
  signSessionToken,
} from '#token';

import type { Clock, JsonifibleObject, Log } from '@credgate/core';

import type { AuditEventType, AuditLog } from '#audit';

// CONSTANTS //

const MS_PER_MINUTE = 60_000;

/** default lifetime of an authenticated session */
export const DEFAULT_SESSION_TIMEOUT_MS = 30 * MS_PER_MINUTE;
/** default failures tolerated per identifier */
export const DEFAULT_MAX_FAILED_ATTEMPTS = 5;
/** default number of principals one session may be authorised for */
export const DEFAULT_MAX_PRINCIPALS_PER_SESSION = 5;
/** default period failures are remembered for */
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 15 * MS_PER_MINUTE;
/** shortest operator-supplied signing secret accepted */
export const MINIMUM_SESSION_SECRET_LENGTH = 32;

const GENERATED_SECRET_BYTES = 32;
const DEFAULT_AUTH_METHOD = 'oauth2';

// TYPES //

/** options for the session security manager */
export interface SessionSecurityManagerOptions {
  /** hmac secret; a random one is generated when omitted */
  secret?: string | Uint8Array;
  /** session and token lifetime in milliseconds */
  sessionTimeoutMs?: number;
  /** failures tolerated per identifier */
  maxFailedAttempts?: number;
  /** how long failures are remembered, in milliseconds */
  rateLimitWindowMs?: number;
  /** principals one session may be authorised for */
  maxPrincipalsPerSession?: number;
  /** audit destination; events are discarded when omitted */
  auditLog?: AuditLog;
  /** optional logger */
  log?: Log;
  /** clock, injectable for tests */
  now?: Clock;
}

/** an authenticated session */
export interface SessionRecord {
  sessionId: string;
  /** epoch milliseconds */
  createdAt: number;
  /** epoch milliseconds */
  expiresAt: number;
  /** epoch milliseconds */
  lastAccessed: number;
  /** most recently authenticated principal */
  principal: string;
  /** how the principal authenticated */
  authMethod: string;
}

/** introspection view of a session; never includes the fingerprint itself */
export interface SessionInfo extends SessionRecord {
  /** every principal the session is authorised for */
  principals: string[];
  /** whether a connection fingerprint is bound to the session */
  hasFingerprint: boolean;
}

/** options when registering an authenticated session */
export interface RegisterSessionOptions {
  /** connection fingerprint to bind */
  fingerprint?: string;
  /** lifetime override in milliseconds */
  ttlMs?: number;
  /** authentication method tag */
  authMethod?: string;
}

/** result of verifying a session token */
export type SessionTokenVerification =
  | { valid: true; principal?: string }
  | { valid: false };

/**
 * binds sessions to the principals they authenticated for and gates every credential access
 * each table is only mutated inside synchronous methods, so every call is atomic
 */
export class SessionSecurityManager {
  #secret: Buffer;
  #sessionTimeoutMs: number;
  #maxPrincipals: number;
  #limiter: FailedAttemptLimiter;
  #audit: AuditTrail;
  #log?: Log;
  #now: Clock;

  #sessions = new Map<string, SessionRecord>();
  #authorizations = new Map<string, Set<string>>();
  #fingerprints = new Map<string, string>();

  /**
   * creates a session security manager
   * @param options manager options
   * @throws {Error} when the supplied secret is shorter than 32 characters or bytes
   */
  constructor(options: SessionSecurityManagerOptions = {}) {
    this.#log = options.log;
    this.#now = options.now ?? Date.now;
    this.#secret = resolveSecret(options.secret, this.#log);
    this.#sessionTimeoutMs =
      options.sessionTimeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
    this.#maxPrincipals =
      options.maxPrincipalsPerSession ?? DEFAULT_MAX_PRINCIPALS_PER_SESSION;
    this.#limiter = new FailedAttemptLimiter({
      maxAttempts: options.maxFailedAttempts ?? DEFAULT_MAX_FAILED_ATTEMPTS,
      windowMs: options.rateLimitWindowMs ?? DEFAULT_RATE_LIMIT_WINDOW_MS,
      now: this.#now,
    });
    this.#audit = new AuditTrail(options.auditLog ?? { append: () => undefined }, {
      log: this.#log,
      now: this.#now,
    });
  }

  /** number of unexpired sessions */
  public get activeSessionCount(): number {
    const now = this.#now();

    return [...this.#sessions.values()].filter(
      (session) => session.expiresAt > now,
    ).length;
  }

  // TOKENS //

  /**
   * issues a signed token for a session
   * @param sessionId session identifier
   * @param principal authenticated principal, if any
   * @returns opaque bearer token
   */
  public generateSessionToken(sessionId: string, principal?: string): string {
    const sub =
      principal === undefined ? ANONYMOUS_PRINCIPAL : normalizePrincipal(principal);
    const token = signSessionToken(
      { sid: sessionId, sub, iat: this.#now() },
      this.#secret,
    );

    this.#record('session_token_generated', {
      session_id: sessionId,
      principal: sub,
    });

    return token;
  }

  /**
   * verifies a token presented under a session id
   * the reason for a rejection is only written to the audit log
   * @param token presented token
   * @param expectedSessionId session the token is presented under
   * @returns validity and the principal the token was issued for
   */
  public verifySessionToken(
    token: string,
    expectedSessionId: string,
  ): SessionTokenVerification {
    const inspection = inspectSessionToken(token, this.#secret);

    let reason: string | undefined;
    if (inspection.status === 'malformed') {
      reason = 'malformed';
    } else if (!safeEqual(inspection.claims.sid, expectedSessionId)) {
      reason = 'session_mismatch';
    } else if (inspection.status === 'invalid_signature') {
      reason = 'invalid_signature';
    } else if (this.#now() - inspection.claims.iat > this.#sessionTimeoutMs) {
      reason = 'expired';
    }

    if (reason !== undefined || inspection.status !== 'signed') {
      this.#record('session_token_rejected', {
        session_id: expectedSessionId,
        reason: reason ?? 'invalid_signature',
      });

      return { valid: false };
    }

    const { sub } = inspection.claims;
    this.#record('session_token_verified', { session_id: expectedSessionId });

    return sub === ANONYMOUS_PRINCIPAL
      ? { valid: true }
      : { valid: true, principal: sub };
  }

  // SESSIONS //

  /**
   * marks a session as authenticated for a principal
   * repeated calls add principals up to the configured bound
   * @param sessionId session identifier
   * @param principal principal that authenticated
   * @param options fingerprint, lifetime and method
   * @returns fresh session token for the principal
   * @throws {SecurityError} `unauthorized` when the principal bound is reached or the
   * session is already bound to a different connection
   */
  public registerAuthenticatedSession(
    sessionId: string,
    principal: string,
    options: RegisterSessionOptions = {},
  ): string {
    const id = normalizePrincipal(principal);
    const now = this.#now();
    const ttlMs = options.ttlMs ?? this.#sessionTimeoutMs;

    const existing = this.#sessions.get(sessionId);
    if (existing && existing.expiresAt <= now) {
      this.#dropSession(sessionId);
    }
    const current = existing && existing.expiresAt > now ? existing : undefined;

    const principals = this.#authorizations.get(sessionId) ?? new Set<string>();
    if (!principals.has(id) && principals.size >= this.#maxPrincipals) {
      this.#record('session_principal_limit_exceeded', {
        session_id: sessionId,
        principal: id,
        limit: this.#maxPrincipals,
      });
      throw new SecurityError(
        'unauthorized',
        `session ${sessionId} is already bound to ${this.#maxPrincipals} principals`,
      );
    }

    const boundFingerprint = this.#fingerprints.get(sessionId);
    if (
      boundFingerprint !== undefined &&
      options.fingerprint !== undefined &&
      !safeEqual(boundFingerprint, options.fingerprint)
    ) {
      this.#record('session_access_denied', {
        session_id: sessionId,
        principal: id,
        reason: 'fingerprint_mismatch',
      });
      throw new SecurityError(
        'unauthorized',
        `session ${sessionId} is bound to another connection`,
      );
    }

    principals.add(id);
    this.#authorizations.set(sessionId, principals);
    this.#sessions.set(sessionId, {
      sessionId,
      createdAt: current?.createdAt ?? now,
      expiresAt: now + ttlMs,
      lastAccessed: now,
      principal: id,
      authMethod: options.authMethod ?? DEFAULT_AUTH_METHOD,
    });
    if (boundFingerprint === undefined && options.fingerprint !== undefined) {
      this.#fingerprints.set(sessionId, options.fingerprint);
    }

    this.#record('session_registered', {
      session_id: sessionId,
      principal: id,
      principals: principals.size,
      has_fingerprint: this.#fingerprints.has(sessionId),
    });

    return this.generateSessionToken(sessionId, id);
  }

  /**
   * decides whether a session may access a principal's credential
   * exactly one audit event is written per call
   * @param sessionId session identifier
   * @param principal principal whose credential is requested
   * @param fingerprint fingerprint of the requesting connection
   * @returns true when access is allowed
   */
  public validateSessionAccess(
    sessionId: string,
    principal: string,
    fingerprint?: string,
  ): boolean {
    const id = normalizePrincipal(principal);
    const now = this.#now();
    const session = this.#sessions.get(sessionId);

    let reason: string | undefined;
    if (!session) {
      reason = 'session_not_found';
    } else if (session.expiresAt <= now) {
      reason = 'session_expired';
      this.#dropSession(sessionId);
    } else if (!this.#authorizations.get(sessionId)?.has(id)) {
      reason = 'principal_not_authorized';
    } else {
      const bound = this.#fingerprints.get(sessionId);
      if (
        bound !== undefined &&
        fingerprint !== undefined &&
        !safeEqual(bound, fingerprint)
      ) {
        reason = 'fingerprint_mismatch';
      }
    }

    if (reason !== undefined || !session) {
      this.#record('session_access_denied', {
        session_id: sessionId,
        principal: id,
        reason: reason ?? 'session_not_found',
      });

      return false;
    }

    session.lastAccessed = now;
    this.#record('session_access_granted', {
      session_id: sessionId,
      principal: id,
    });

    return true;
  }

  /**
   * checks whether a session is authenticated and unexpired
   * @param sessionId session identifier
   * @returns true for a live session
   */
  public hasActiveSession(sessionId: string): boolean {
    const session = this.#sessions.get(sessionId);

    return session !== undefined && session.expiresAt > this.#now();
  }

  /**
   * checks a connection against the fingerprint a session was bound to
   * sessions without a recorded fingerprint accept any connection
   * @param sessionId session identifier
   * @param fingerprint fingerprint of the requesting connection
   * @returns false on a mismatch, which is also audited
   */
  public verifyConnection(sessionId: string, fingerprint: string): boolean {
    const bound = this.#fingerprints.get(sessionId);
    if (bound === undefined || safeEqual(bound, fingerprint)) {
      return true;
    }

    this.#record('session_access_denied', {
      session_id: sessionId,
      reason: 'fingerprint_mismatch',
    });

    return false;
  }

  /**
   * deletes a session together with its principals and fingerprint
   * @param sessionId session identifier
   * @returns false when the session did not exist
   */
  public revokeSession(sessionId: string): boolean {
    const existed = this.#dropSession(sessionId);
    if (existed) {
      this.#record('session_revoked', { session_id: sessionId });
    }

    return existed;
  }

  /**
   * withdraws one principal from a session; removing the last one revokes the session
   * @param sessionId session identifier
   * @param principal principal to withdraw
   * @returns false when the session was not authorised for the principal
   */
  public revokePrincipal(sessionId: string, principal: string): boolean {
    const id = normalizePrincipal(principal);
    const principals = this.#authorizations.get(sessionId);
    if (!principals?.delete(id)) {
      return false;
    }

    this.#record('principal_revoked', {
      session_id: sessionId,
      principal: id,
      remaining: principals.size,
    });

    if (principals.size === 0) {
      this.revokeSession(sessionId);
    } else {
      const session = this.#sessions.get(sessionId);
      if (session && session.principal === id) {
        session.principal = [...principals].at(-1) ?? id;
      }
    }

    return true;
  }

  /**
   * revokes every session past its expiry; idempotent
   * @returns number of sessions removed
   */
  public cleanupExpiredSessions(): number {
    const now = this.#now();
    let removed = 0;
    for (const [sessionId, session] of [...this.#sessions]) {
      if (session.expiresAt <= now && this.#dropSession(sessionId)) {
        removed++;
      }
    }

    this.#limiter.prune();

    if (removed > 0) {
      this.#record('sessions_expired', { count: removed });
    }

    return removed;
  }

  /**
   * describes a live session
   * @param sessionId session identifier
   * @returns session info or null when absent or expired
   */
  public getSessionInfo(sessionId: string): SessionInfo | null {
    const session = this.#sessions.get(sessionId);
    if (!session || session.expiresAt <= this.#now()) {
      return null;
    }

    return {
      ...session,
      principals: [...(this.#authorizations.get(sessionId) ?? [])],
      hasFingerprint: this.#fingerprints.has(sessionId),
    };
  }

  // RATE LIMITING //

  /**
   * checks whether an identifier is below its failure limit
   * @param identifier key such as a peer address
   * @param maxAttempts override of the configured limit
   * @returns true when the caller may proceed
   */
  public checkRateLimit(identifier: string, maxAttempts?: number): boolean {
    const allowed = this.#limiter.isAllowed(identifier, maxAttempts);
    if (!allowed) {
      this.#record('rate_limit_exceeded', {
        identifier,
        attempts: this.#limiter.failures(identifier),
      });
    }

    return allowed;
  }

  /**
   * records one failed attempt
   * @param identifier key such as a peer address
   */
  public recordFailedAttempt(identifier: string): void {
    const attempts = this.#limiter.recordFailure(identifier);
    this.#record('failed_attempt_recorded', { identifier, attempts });
  }

  /**
   * clears the failures of an identifier, e.g. after a success
   * @param identifier key such as a peer address
   */
  public resetFailedAttempts(identifier: string): void {
    this.#limiter.reset(identifier);
  }

  // HELPER METHODS //

  #dropSession(sessionId: string): boolean {
    const existed = this.#sessions.delete(sessionId);
    this.#authorizations.delete(sessionId);
    this.#fingerprints.delete(sessionId);

    return existed;
  }

  #record(eventType: AuditEventType, fields: JsonifibleObject): void {
    this.#audit.record(eventType, fields);
  }
}

// HELPER FUNCTIONS //

/**
 * turns the configured secret into key bytes
 * @param secret operator-supplied secret
 * @param log optional logger
 * @returns secret bytes
 */
function resolveSecret(
  secret: string | Uint8Array | undefined,
  log?: Log,
): Buffer {
  if (secret === undefined) {
    log?.(
      'warn',
      'no session secret configured, generated one for this process; session tokens will not survive a restart',
    );

    return randomBytes(GENERATED_SECRET_BYTES);
  }

  const bytes =
    typeof secret === 'string' ? Buffer.from(secret, 'utf8') : Buffer.from(secret);
  if (bytes.length < MINIMUM_SESSION_SECRET_LENGTH) {
    throw new Error(
      `session secret must be at least ${MINIMUM_SESSION_SECRET_LENGTH} characters`,
    );
  }

  return bytes;
}

/**
 * compares two strings in constant time
 * @param left first value
 * @param right second value
 * @returns true when equal
 */
function safeEqual(left: string, right: string): boolean {
  const a = Buffer.from(left, 'utf8');
  const b = Buffer.from(right, 'utf8');

  return a.length === b.length && timingSafeEqual(a, b);
}

import {
  SecurityError,
  generateSessionId,
  isSecurityError,
  normalizePrincipal,
} from '@credgate/core';
import {
  computeConnectionFingerprint,
  peekSessionId,
} from '@credgate/session-security';

import {
  SESSION_ID_HEADER,
  extractConnectionInfo,
  extractSessionToken,
  lastHeader,
} from '#request-context';

import { toStoredCredential } from './credential';

import type { Clock, Log } from '@credgate/core';
import type {
  CredentialStore,
  StoredCredential,
} from '@credgate/credential-store';
import type {
  SessionInfo,
  SessionSecurityManager,
} from '@credgate/session-security';
import type { FastifyRequest } from 'fastify';

import type { CredentialProxy } from '#oauth/proxy/credential-proxy';

// TYPES //

/** the session a request runs under */
export interface SessionContext {
  sessionId: string;
  /** true when the request presented a valid token for a live session */
  authenticated: boolean;
  /** principal the presented token was issued for */
  principal?: string;
  /** fingerprint of the requesting connection */
  fingerprint: string;
  /** rate-limit key of the requesting peer */
  peer: string;
}

/** collaborators of the session binding */
export interface SessionBindingOptions {
  manager: SessionSecurityManager;
  store: CredentialStore;
  proxy: CredentialProxy;
  log?: Log;
  now?: Clock;
}

/**
 * gates every credential store access behind the session security manager
 * and records new bindings once a principal has authenticated
 */
export class SessionBinding {
  #manager: SessionSecurityManager;
  #store: CredentialStore;
  #proxy: CredentialProxy;
  #log?: Log;
  #now: Clock;
  #contexts = new WeakMap<FastifyRequest, SessionContext>();

  /**
   * creates a session binding
   * @param options collaborators
   */
  constructor(options: SessionBindingOptions) {
    this.#manager = options.manager;
    this.#store = options.store;
    this.#proxy = options.proxy;
    this.#log = options.log;
    this.#now = options.now ?? Date.now;
  }

  /**
   * resolves the session of a request; the result is cached per request
   * without a valid token for a live session the request gets a fresh session id,
   * never another session's bindings
   * @param request fastify request
   * @returns session context
   */
  public resolve(request: FastifyRequest): SessionContext {
    const cached = this.#contexts.get(request);
    if (cached) {
      return cached;
    }

    const connection = extractConnectionInfo(request);
    const peer = connection.ip ?? 'unknown';
    const fingerprint = computeConnectionFingerprint(connection);
    const presented = this.#verifyPresentedToken(request, peer, fingerprint);

    const context: SessionContext = {
      sessionId: presented?.sessionId ?? generateSessionId(),
      authenticated: presented !== undefined,
      principal: presented?.principal,
      fingerprint,
      peer,
    };
    this.#contexts.set(request, context);

    return context;
  }

  // SESSION LIFECYCLE //

  /**
   * describes an authenticated session
   * @param context session context
   * @returns session info
   * @throws {SecurityError} `unauthorized` when the request carries no valid session token
   */
  public describe(context: SessionContext): SessionInfo {
    const info = context.authenticated
      ? this.#manager.getSessionInfo(context.sessionId)
      : null;
    if (!info) {
      throw new SecurityError('unauthorized', 'no authenticated session');
    }

    return info;
  }

  /**
   * revokes an authenticated session with all its principals
   * @param context session context
   * @throws {SecurityError} `unauthorized` when the request carries no valid session token
   */
  public revoke(context: SessionContext): void {
    if (
      !context.authenticated ||
      !this.#manager.revokeSession(context.sessionId)
    ) {
      throw new SecurityError('unauthorized', 'no authenticated session');
    }
  }

  /**
   * withdraws one principal from an authenticated session
   * @param context session context
   * @param principal principal to withdraw
   * @returns false when the session was not authorised for the principal
   * @throws {SecurityError} `unauthorized` when the request carries no valid session token
   */
  public revokePrincipal(context: SessionContext, principal: string): boolean {
    if (!context.authenticated) {
      throw new SecurityError('unauthorized', 'no authenticated session');
    }

    return this.#manager.revokePrincipal(context.sessionId, principal);
  }

  // RATE LIMITING //

  /**
   * refuses peers that failed too often
   * @param context session context
   * @throws {SecurityError} `rate_limited` when the peer is over its limit
   */
  public assertWithinRateLimit(context: SessionContext): void {
    if (!this.#manager.checkRateLimit(context.peer)) {
      throw new SecurityError(
        'rate_limited',
        `too many failed attempts from ${context.peer}`,
      );
    }
  }

  /**
   * counts a failed attempt against the peer
   * @param context session context
   */
  public recordFailure(context: SessionContext): void {
    this.#manager.recordFailedAttempt(context.peer);
  }

  /**
   * clears the failures of the peer
   * @param context session context
   */
  public recordSuccess(context: SessionContext): void {
    this.#manager.resetFailedAttempts(context.peer);
  }

  // CREDENTIAL ACCESS //

  /**
   * loads a principal's credential if the session may access it
   * @param context session context
   * @param principal principal whose credential is requested
   * @returns the credential, or null when access is denied or nothing is stored
   * @throws {SecurityError} `rate_limited` when the peer is over its limit
   */
  public async loadCredential(
    context: SessionContext,
    principal: string,
  ): Promise<StoredCredential | null> {
    this.assertWithinRateLimit(context);

    if (
      !this.#manager.validateSessionAccess(
        context.sessionId,
        principal,
        context.fingerprint,
      )
    ) {
      this.recordFailure(context);

      return null;
    }

    this.recordSuccess(context);

    return this.#store.load(principal);
  }

  /**
   * loads a principal's credential, failing when it is not accessible
   * @param context session context
   * @param principal principal whose credential is requested
   * @returns the credential
   * @throws {SecurityError} `unauthorized` when access is denied or nothing is stored
   */
  public async requireCredential(
    context: SessionContext,
    principal: string,
  ): Promise<StoredCredential> {
    const credential = await this.loadCredential(context, principal);
    if (!credential) {
      throw new SecurityError(
        'unauthorized',
        `no accessible credential for ${normalizePrincipal(principal)}`,
      );
    }

    return credential;
  }

  /**
   * stores a freshly issued credential and authorises the session for its principal
   * a session that cannot take the principal is left alone and a fresh one is bound instead
   * @param context session context
   * @param principal principal the credential belongs to
   * @param credential credential to store
   * @returns session token for the principal
   */
  public async bindCredential(
    context: SessionContext,
    principal: string,
    credential: StoredCredential,
  ): Promise<string> {
    const id = normalizePrincipal(principal);
    const held = this.#manager.getSessionInfo(context.sessionId)?.principals ?? [];
    const { sessionId, token } = this.#register(context, id);
    const alreadyBound = sessionId === context.sessionId && held.includes(id);

    try {
      await this.#store.save(id, credential);
    } catch (error) {
      // only withdraw what this call granted
      if (!alreadyBound) {
        this.#manager.revokePrincipal(sessionId, id);
      }
      throw error;
    }

    this.#log?.('info', 'bound credential to session', {
      sessionId,
      principal: id,
    });

    return token;
  }

  /**
   * refreshes a principal's credential at the provider and stores the result
   * no lock is held while the provider call is in flight
   * @param context session context
   * @param principal principal whose credential is refreshed
   * @returns the refreshed credential
   * @throws {SecurityError} `unauthorized` when access is denied or there is no refresh token
   * @throws {UpstreamExchangeError} when the provider call fails
   */
  public async refreshCredential(
    context: SessionContext,
    principal: string,
  ): Promise<StoredCredential> {
    const current = await this.requireCredential(context, principal);
    if (!current.refreshToken) {
      throw new SecurityError(
        'unauthorized',
        `credential for ${normalizePrincipal(principal)} has no refresh token`,
      );
    }

    const { tokens, credentials } = await this.#proxy.refreshToken({
      refreshToken: current.refreshToken,
      clientId: current.clientId,
      clientSecret: current.clientSecret,
    });

    const refreshed = toStoredCredential(tokens, {
      tokenUri: current.tokenUri,
      client: credentials,
      receivedAt: this.#now(),
      previous: current,
    });
    await this.#store.save(principal, refreshed);

    this.#log?.('info', 'refreshed stored credential', {
      principal: normalizePrincipal(principal),
    });

    return refreshed;
  }

  // HELPER METHODS //

  #register(
    context: SessionContext,
    principal: string,
  ): { sessionId: string; token: string } {
    const options = { fingerprint: context.fingerprint };

    try {
      return {
        sessionId: context.sessionId,
        token: this.#manager.registerAuthenticatedSession(
          context.sessionId,
          principal,
          options,
        ),
      };
    } catch (error) {
      if (!isSecurityError(error, 'unauthorized')) {
        throw error;
      }

      const sessionId = generateSessionId();
      this.#log?.('warn', 'session cannot take the principal, binding a fresh session', {
        sessionId: context.sessionId,
        principal,
      });

      return {
        sessionId,
        token: this.#manager.registerAuthenticatedSession(
          sessionId,
          principal,
          options,
        ),
      };
    }
  }

  #verifyPresentedToken(
    request: FastifyRequest,
    peer: string,
    fingerprint: string,
  ): { sessionId: string; principal?: string } | undefined {
    const token = extractSessionToken(request.headers);
    if (!token) {
      return undefined;
    }

    const sessionId =
      lastHeader(request.headers, SESSION_ID_HEADER) ?? peekSessionId(token);
    if (!sessionId || !this.#manager.hasActiveSession(sessionId)) {
      return undefined;
    }

    const verification = this.#manager.verifySessionToken(token, sessionId);
    if (
      !verification.valid ||
      !this.#manager.verifyConnection(sessionId, fingerprint)
    ) {
      this.#manager.recordFailedAttempt(peer);

      return undefined;
    }

    return { sessionId, principal: verification.principal };
  }
}

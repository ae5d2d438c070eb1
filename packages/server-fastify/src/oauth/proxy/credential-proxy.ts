/**
 * @module oauth/proxy/credential-proxy
 * @description Issues temporary OAuth clients and swaps them for the operator's
 * real client whenever a request has to reach the provider.
 */

import { SecurityError } from '@credgate/core';
import { AuditTrail } from '@credgate/session-security';

import {
  DEFAULT_BASE_SCOPES,
  DEFAULT_CLIENT_NAME,
  DEFAULT_PROXY_CLIENT_EXPIRY_MS,
  DEFAULT_REDIRECT_URIS,
  DEFAULT_UPSTREAM_TIMEOUT_MS,
  REGISTRATION_SWEEP_THROTTLE_MS,
} from '#constants/defaults';
import { MS_PER_SECOND } from '#constants/time';

import { forwardTokenRequest } from './forwarder';
import { isCodeChallengeMethod, safeEqual, verifyPKCE } from './proxy-crypto';
import {
  generateClientId,
  generateClientSecret,
  generateRegistrationAccessToken,
  isProxyClientId,
  mergeClientMetadata,
  normalizeClientMetadata,
} from './registration';
import { MemoryProxyClientRegistry } from './registry';

import type { Clock, JsonifibleObject, Log } from '@credgate/core';
import type { AuditEventType, AuditLog } from '@credgate/session-security';

import type { RegistrationDefaults } from './registration';
import type { ProxyClientRegistry } from './registry';
import type {
  ClientRegistrationResponseWire,
  CodeChallengeMethod,
  ProviderClientConfig,
  ProviderTokenResponseWire,
  ProxyAuthorizeRequestWire,
  ProxyClientRecord,
  ProxyClientStats,
  RealClientCredentials,
} from './types';

// TYPES //

/** options for the credential proxy */
export interface CredentialProxyOptions {
  /** the operator's real client at the provider */
  provider: ProviderClientConfig;
  /** client table, in memory by default */
  registry?: ProxyClientRegistry;
  /** values for metadata fields a registration leaves out */
  defaults?: Partial<RegistrationDefaults>;
  /** lifetime of a proxy client in milliseconds */
  clientExpiryMs?: number;
  /** provider call timeout in milliseconds */
  upstreamTimeoutMs?: number;
  auditLog?: AuditLog;
  log?: Log;
  now?: Clock;
}

/** an authorization_code exchange */
export interface TokenExchangeRequest {
  code: string;
  redirectUri?: string;
  codeVerifier?: string;
  clientId: string;
  clientSecret?: string;
}

/** a refresh_token grant */
export interface TokenRefreshRequest {
  refreshToken: string;
  scope?: string;
  clientId: string;
  clientSecret?: string;
}

/** outcome of a successful provider call */
export interface TokenExchangeResult {
  /** provider response, to be relayed verbatim */
  tokens: ProviderTokenResponseWire;
  /** the credentials the provider saw */
  credentials: RealClientCredentials;
}

/** the provider redirect for an authorization request */
export type AuthorizationRedirect =
  | { status: 'redirect'; url: string }
  | { status: 'invalid_client' }
  | { status: 'invalid_request'; description: string };

/**
 * hides the operator's real client credentials behind per-caller proxy clients
 * every table access is synchronous; no state is touched while a provider call is in flight
 */
export class CredentialProxy {
  #provider: ProviderClientConfig;
  #registry: ProxyClientRegistry;
  #defaults: RegistrationDefaults;
  #clientExpiryMs: number;
  #upstreamTimeoutMs: number;
  #audit: AuditTrail;
  #log?: Log;
  #now: Clock;
  #lastSweep: number;

  /**
   * creates a credential proxy
   * @param options proxy options
   */
  constructor(options: CredentialProxyOptions) {
    this.#provider = options.provider;
    this.#registry = options.registry ?? new MemoryProxyClientRegistry();
    this.#defaults = {
      clientName: options.defaults?.clientName ?? DEFAULT_CLIENT_NAME,
      redirectUris: options.defaults?.redirectUris ?? DEFAULT_REDIRECT_URIS,
      scope: options.defaults?.scope ?? DEFAULT_BASE_SCOPES.join(' '),
    };
    this.#clientExpiryMs =
      options.clientExpiryMs ?? DEFAULT_PROXY_CLIENT_EXPIRY_MS;
    this.#upstreamTimeoutMs =
      options.upstreamTimeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS;
    this.#log = options.log;
    this.#now = options.now ?? Date.now;
    this.#audit = new AuditTrail(
      options.auditLog ?? { append: () => undefined },
      { log: this.#log, now: this.#now },
    );
    this.#lastSweep = this.#now();
  }

  /**
   * checks whether a client identifier was issued by the proxy
   * @param clientId client identifier
   * @returns true for proxy identifiers
   */
  public isProxyClientId(clientId: string): boolean {
    return isProxyClientId(clientId);
  }

  // REGISTRATION //

  /**
   * registers a proxy client
   * @param metadata RFC 7591 client metadata
   * @param baseUrl public base url, used for the registration client uri
   * @returns registration response carrying the temporary credentials
   * @throws {ClientRegistrationError} when the metadata is rejected
   */
  public registerClient(
    metadata: unknown,
    baseUrl: string,
  ): ClientRegistrationResponseWire {
    const normalized = normalizeClientMetadata(metadata, this.#defaults);
    const now = this.#now();

    let clientId: string;
    do {
      clientId = generateClientId();
    } while (
      clientId === this.#provider.clientId ||
      this.#registry.find(clientId)
    );

    let clientSecret: string;
    do {
      clientSecret = generateClientSecret();
    } while (clientSecret === this.#provider.clientSecret);

    const record: ProxyClientRecord = {
      clientId,
      clientSecret,
      realClientId: this.#provider.clientId,
      realClientSecret: this.#provider.clientSecret,
      metadata: normalized,
      createdAt: now,
      lastAccessed: now,
      registrationAccessToken: generateRegistrationAccessToken(),
    };
    this.#registry.upsert(record);

    this.#record('proxy_client_registered', {
      client_id: clientId,
      client_name: normalized.client_name,
      redirect_uris: normalized.redirect_uris,
    });
    this.#log?.('info', 'registered proxy client', {
      clientId,
      clientName: normalized.client_name,
    });

    if (now - this.#lastSweep >= REGISTRATION_SWEEP_THROTTLE_MS) {
      this.sweepExpiredClients();
    }

    return toRegistrationResponse(record, baseUrl);
  }

  /**
   * reads a registration
   * @param clientId proxy client identifier
   * @param registrationAccessToken bearer token issued at registration
   * @param baseUrl public base url
   * @returns registration response or null on any mismatch
   */
  public getClient(
    clientId: string,
    registrationAccessToken: string,
    baseUrl: string,
  ): ClientRegistrationResponseWire | null {
    const record = this.#authorizeManagement(clientId, registrationAccessToken);

    return record ? toRegistrationResponse(record, baseUrl) : null;
  }

  /**
   * merges new metadata into a registration and rotates its access token
   * fields the update leaves out keep their registered values
   * @param clientId proxy client identifier
   * @param metadata RFC 7591 client metadata to merge
   * @param registrationAccessToken bearer token issued at registration
   * @param baseUrl public base url
   * @returns updated registration or null on any mismatch
   * @throws {ClientRegistrationError} when the metadata is rejected
   */
  public updateClient(
    clientId: string,
    metadata: unknown,
    registrationAccessToken: string,
    baseUrl: string,
  ): ClientRegistrationResponseWire | null {
    const record = this.#authorizeManagement(clientId, registrationAccessToken);
    if (!record) {
      return null;
    }

    const updated: ProxyClientRecord = {
      ...record,
      metadata: normalizeClientMetadata(
        mergeClientMetadata(record.metadata, metadata),
        this.#defaults,
      ),
      registrationAccessToken: generateRegistrationAccessToken(),
    };
    this.#registry.upsert(updated);

    this.#record('proxy_client_updated', { client_id: clientId });

    return toRegistrationResponse(updated, baseUrl);
  }

  /**
   * deletes a registration
   * @param clientId proxy client identifier
   * @param registrationAccessToken bearer token issued at registration
   * @returns false on any mismatch
   */
  public deleteClient(
    clientId: string,
    registrationAccessToken: string,
  ): boolean {
    if (!this.#authorizeManagement(clientId, registrationAccessToken)) {
      return false;
    }

    this.#registry.remove(clientId);
    this.#record('proxy_client_deleted', { client_id: clientId });
    this.#log?.('info', 'deleted proxy client', { clientId });

    return true;
  }

  // RESOLUTION //

  /**
   * swaps temporary credentials for the real ones
   * unknown, mismatched and expired clients all read as null; the reason is only audited
   * @param clientId temporary client identifier
   * @param clientSecret temporary secret, not needed for public clients
   * @returns the real credentials or null
   */
  public resolveRealCredentials(
    clientId: string,
    clientSecret?: string,
  ): RealClientCredentials | null {
    const record = this.#findActive(clientId);
    if (!record) {
      return null;
    }

    const isPublic = record.metadata.token_endpoint_auth_method === 'none';
    if (
      !isPublic &&
      (clientSecret === undefined ||
        !safeEqual(clientSecret, record.clientSecret))
    ) {
      this.#record('proxy_client_rejected', {
        client_id: clientId,
        reason: 'invalid_secret',
      });

      return null;
    }

    this.#registry.upsert({ ...record, lastAccessed: this.#now() });

    return {
      clientId: record.realClientId,
      clientSecret: record.realClientSecret,
    };
  }

  /**
   * records the PKCE challenge presented at the authorization step
   * @param clientId proxy client identifier
   * @param codeChallenge challenge from the authorization request
   * @param method challenge method
   * @returns false when the client is unknown or expired
   */
  public storePkceParameters(
    clientId: string,
    codeChallenge: string,
    method: CodeChallengeMethod,
  ): boolean {
    const record = this.#findActive(clientId);
    if (!record) {
      return false;
    }

    this.#registry.upsert({
      ...record,
      codeChallenge,
      codeChallengeMethod: method,
    });

    return true;
  }

  /**
   * prepares the provider redirect for an authorization request
   * every query parameter is passed through, only the client id is replaced
   * @param query authorization request query
   * @returns redirect url or the reason the request was refused
   */
  public authorize(query: ProxyAuthorizeRequestWire): AuthorizationRedirect {
    const params = flattenQuery(query);
    const clientId = params.get('client_id');
    const record = clientId ? this.#findActive(clientId) : undefined;
    if (!clientId || !record) {
      return { status: 'invalid_client' };
    }

    const redirectUri = params.get('redirect_uri');
    if (redirectUri && !record.metadata.redirect_uris.includes(redirectUri)) {
      return {
        status: 'invalid_request',
        description: 'redirect_uri is not registered for this client',
      };
    }

    const challenge = params.get('code_challenge');
    if (challenge) {
      // RFC 7636 section 4.3: the method defaults to plain
      const method = params.get('code_challenge_method') ?? 'plain';
      if (!isCodeChallengeMethod(method)) {
        return {
          status: 'invalid_request',
          description: `unsupported code_challenge_method: ${method}`,
        };
      }
      this.storePkceParameters(clientId, challenge, method);
    }

    const url = new URL(this.#provider.authorizationEndpoint);
    for (const [key, value] of params) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('client_id', record.realClientId);

    return { status: 'redirect', url: url.toString() };
  }

  // TOKEN CALLS //

  /**
   * exchanges an authorization code at the provider with the real credentials
   * identifiers without the proxy prefix are taken as real credentials already
   * @param request exchange parameters
   * @returns provider response and the credentials used
   * @throws {SecurityError} `invalid_client_credentials` when the proxy client does not resolve
   * @throws {UpstreamExchangeError} when the provider call fails
   */
  public async exchangeToken(
    request: TokenExchangeRequest,
  ): Promise<TokenExchangeResult> {
    const credentials = this.#resolveForTokenCall(
      request.clientId,
      request.clientSecret,
    );

    if (isProxyClientId(request.clientId)) {
      this.#checkPkce(request.clientId, request.codeVerifier);
    }

    const tokens = await forwardTokenRequest({
      endpoint: this.#provider.tokenEndpoint,
      credentials,
      authMethod: this.#provider.tokenEndpointAuthMethod ?? 'client_secret_post',
      params: {
        grant_type: 'authorization_code',
        code: request.code,
        redirect_uri: request.redirectUri,
        code_verifier: request.codeVerifier,
      },
      timeoutMs: this.#upstreamTimeoutMs,
    });

    this.#record('token_exchanged', {
      client_id: request.clientId,
      grant_type: 'authorization_code',
    });

    return { tokens, credentials };
  }

  /**
   * refreshes an access token at the provider with the real credentials
   * @param request refresh parameters
   * @returns provider response and the credentials used
   * @throws {SecurityError} `invalid_client_credentials` when the proxy client does not resolve
   * @throws {UpstreamExchangeError} when the provider call fails
   */
  public async refreshToken(
    request: TokenRefreshRequest,
  ): Promise<TokenExchangeResult> {
    const credentials = this.#resolveForTokenCall(
      request.clientId,
      request.clientSecret,
    );

    const tokens = await forwardTokenRequest({
      endpoint: this.#provider.tokenEndpoint,
      credentials,
      authMethod: this.#provider.tokenEndpointAuthMethod ?? 'client_secret_post',
      params: {
        grant_type: 'refresh_token',
        refresh_token: request.refreshToken,
        scope: request.scope,
      },
      timeoutMs: this.#upstreamTimeoutMs,
    });

    this.#record('token_exchanged', {
      client_id: request.clientId,
      grant_type: 'refresh_token',
    });

    return { tokens, credentials };
  }

  // MAINTENANCE //

  /**
   * evicts every client past its expiry; idempotent
   * @returns number of clients removed
   */
  public sweepExpiredClients(): number {
    const now = this.#now();
    this.#lastSweep = now;

    let removed = 0;
    for (const record of this.#registry.list()) {
      if (this.#isExpired(record, now) && this.#registry.remove(record.clientId)) {
        removed++;
      }
    }

    if (removed > 0) {
      this.#record('proxy_clients_expired', { count: removed });
      this.#log?.('info', 'removed expired proxy clients', { count: removed });
    }

    return removed;
  }

  /**
   * counts registered clients
   * @returns client statistics
   */
  public stats(): ProxyClientStats {
    const now = this.#now();
    const records = this.#registry.list();
    const expiredClients = records.filter((record) =>
      this.#isExpired(record, now),
    ).length;

    return {
      totalClients: records.length,
      activeClients: records.length - expiredClients,
      expiredClients,
    };
  }

  // HELPER METHODS //

  #isExpired(record: ProxyClientRecord, now: number): boolean {
    return now - record.createdAt > this.#clientExpiryMs;
  }

  /**
   * finds a client, evicting it when it has expired
   * @param clientId proxy client identifier
   * @returns the live record or undefined
   */
  #findActive(clientId: string): ProxyClientRecord | undefined {
    const record = this.#registry.find(clientId);
    if (!record) {
      this.#record('proxy_client_rejected', {
        client_id: clientId,
        reason: 'unknown_client',
      });

      return undefined;
    }

    if (this.#isExpired(record, this.#now())) {
      this.#registry.remove(clientId);
      this.#record('proxy_client_rejected', {
        client_id: clientId,
        reason: 'expired',
      });

      return undefined;
    }

    return record;
  }

  #authorizeManagement(
    clientId: string,
    registrationAccessToken: string,
  ): ProxyClientRecord | undefined {
    const record = this.#findActive(clientId);
    if (!record) {
      return undefined;
    }

    if (!safeEqual(registrationAccessToken, record.registrationAccessToken)) {
      this.#record('proxy_client_rejected', {
        client_id: clientId,
        reason: 'invalid_registration_token',
      });

      return undefined;
    }

    return record;
  }

  #resolveForTokenCall(
    clientId: string,
    clientSecret: string | undefined,
  ): RealClientCredentials {
    if (!isProxyClientId(clientId)) {
      if (clientSecret === undefined) {
        throw new SecurityError(
          'invalid_client_credentials',
          `client ${clientId} presented no secret`,
        );
      }

      return { clientId, clientSecret };
    }

    const credentials = this.resolveRealCredentials(clientId, clientSecret);
    if (!credentials) {
      throw new SecurityError(
        'invalid_client_credentials',
        `proxy client ${clientId} could not be resolved`,
      );
    }

    return credentials;
  }

  /**
   * logs PKCE inconsistencies; the provider remains the authority on the verifier
   * @param clientId proxy client identifier
   * @param codeVerifier verifier presented at the token endpoint
   */
  #checkPkce(clientId: string, codeVerifier: string | undefined): void {
    const record = this.#registry.find(clientId);
    if (!record?.codeChallenge) {
      return;
    }

    if (codeVerifier === undefined) {
      this.#log?.('warn', 'code_verifier missing for a PKCE authorization', {
        clientId,
      });

      return;
    }

    if (
      !verifyPKCE(
        codeVerifier,
        record.codeChallenge,
        record.codeChallengeMethod ?? 'plain',
      )
    ) {
      this.#log?.('warn', 'code_verifier does not match the stored challenge', {
        clientId,
        method: record.codeChallengeMethod ?? 'plain',
      });
    }
  }

  #record(eventType: AuditEventType, fields: JsonifibleObject): void {
    this.#audit.record(eventType, fields);
  }
}

// HELPER FUNCTIONS //

/**
 * builds the RFC 7591 response for a record
 * @param record proxy client
 * @param baseUrl public base url
 * @returns registration response
 */
function toRegistrationResponse(
  record: ProxyClientRecord,
  baseUrl: string,
): ClientRegistrationResponseWire {
  const { extra, ...metadata } = record.metadata;

  return {
    ...extra,
    ...metadata,
    client_id: record.clientId,
    client_secret: record.clientSecret,
    client_id_issued_at: Math.floor(record.createdAt / MS_PER_SECOND),
    client_secret_expires_at: 0,
    registration_access_token: record.registrationAccessToken,
    registration_client_uri: `${baseUrl}/oauth/register/${record.clientId}`,
  };
}

/**
 * reduces a parsed query to one value per parameter, the last one winning
 * @param query parsed query
 * @returns ordered parameters
 */
function flattenQuery(query: ProxyAuthorizeRequestWire): Map<string, string> {
  const params = new Map<string, string>();
  for (const [key, value] of Object.entries(query)) {
    const last = Array.isArray(value) ? value.at(-1) : value;
    if (last !== undefined) {
      params.set(key, last);
    }
  }

  return params;
}

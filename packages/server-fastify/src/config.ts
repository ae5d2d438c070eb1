/**
 * @module config
 * @description Options of the credential gate and their loading from the environment.
 */

import { decodeEncryptionKey, isStorageMode } from '@credgate/credential-store';
import { MINIMUM_SESSION_SECRET_LENGTH } from '@credgate/session-security';

import { DEFAULT_HOST, DEFAULT_HTTP_PORT } from '#constants/defaults';
import { MINUTES_TO_MS } from '#constants/time';

import type { Clock, Log } from '@credgate/core';
import type { StorageMode } from '@credgate/credential-store';
import type { AuditLog } from '@credgate/session-security';

import type {
  ProviderAuthMethod,
  ProviderClientConfig,
} from '#oauth/proxy/types';

// TYPES //

/** session security settings */
export interface SessionOptions {
  /** hmac secret of at least 32 characters; generated per process when omitted */
  secret?: string;
  /** session and token lifetime in milliseconds */
  timeoutMs?: number;
  /** failures tolerated per peer */
  maxFailedAttempts?: number;
  /** how long failures are remembered, in milliseconds */
  rateLimitWindowMs?: number;
  /** principals one session may be authorised for */
  maxPrincipalsPerSession?: number;
}

/** credential storage settings */
export interface StorageOptions {
  mode: StorageMode;
  /** directory for credential files and the generated key */
  directory: string;
  /** externally supplied 32-byte key, base64 or base64url encoded */
  encryptionKey?: string;
}

/** proxy client settings */
export interface ProxyOptions {
  /** lifetime of a proxy client in milliseconds */
  clientExpiryMs?: number;
  /** provider call timeout in milliseconds */
  upstreamTimeoutMs?: number;
  /** redirect uris assumed when a registration has none */
  defaultRedirectUris?: string[];
  /** client name assumed when a registration has none */
  defaultClientName?: string;
  /** scope group whose scopes a registration gets when it asks for none */
  defaultScopeGroup?: string;
  /** scope lists keyed by group name */
  scopeGroups?: Record<string, string[]>;
}

/**
 * configuration of the credential gate
 * @example
 * ```typescript
 * const gate = new CredentialGateServer({
 *   provider: {
 *     clientId: 'gate-client',
 *     clientSecret: process.env.OAUTH_CLIENT_SECRET,
 *     authorizationEndpoint: 'https://auth.example.com/authorize',
 *     tokenEndpoint: 'https://auth.example.com/token',
 *   },
 *   storage: { mode: 'encrypted_file', directory: './credentials' },
 * });
 * ```
 */
export interface CredentialGateOptions {
  /** host address for the HTTP server (default: '0.0.0.0') */
  host?: string;
  /** port number for the HTTP server (default: 8000) */
  port?: number;
  /** base url of the server (default: dynamically extracted from the incoming request) */
  baseUrl?: string;
  /** the operator's real client at the provider */
  provider: ProviderClientConfig;
  session?: SessionOptions;
  storage: StorageOptions;
  proxy?: ProxyOptions;
  /** milliseconds between housekeeping sweeps (default: 5 minutes) */
  sweepIntervalMs?: number;
  /**
   * token for the management endpoints; if not provided,
   * falls back to CREDGATE_MANAGEMENT_TOKEN environment variable
   */
  managementToken?: string;
  /** file receiving audit events as json lines */
  auditLogPath?: string;
  /** audit destination, takes precedence over auditLogPath */
  auditLog?: AuditLog;
  log?: Log;
  now?: Clock;
}

// DEFAULTS //

/** storage mode when CREDENTIAL_STORAGE_MODE is unset */
export const DEFAULT_STORAGE_MODE: StorageMode = 'encrypted_file';

/** credential directory when CREDENTIALS_DIR is unset */
export const DEFAULT_CREDENTIALS_DIR = './credentials';

const MAX_PORT = 65535;

// HELPER FUNCTIONS //

/**
 * reads a non-empty environment variable
 * @param env environment
 * @param name variable name
 * @returns trimmed value or undefined
 */
function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();

  return value ? value : undefined;
}

/**
 * reads a positive integer environment variable
 * @param env environment
 * @param name variable name
 * @returns parsed value or undefined when unset
 * @throws {Error} when the value is not a positive integer
 */
function readPositiveInteger(
  env: NodeJS.ProcessEnv,
  name: string,
): number | undefined {
  const raw = readEnv(env, name);
  if (raw === undefined) {
    return undefined;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`credgate config: ${name} must be a positive integer`);
  }

  return value;
}

/**
 * narrows a provider authentication method
 * @param value raw value
 * @returns true for a supported method
 */
function isProviderAuthMethod(value: string): value is ProviderAuthMethod {
  return value === 'client_secret_basic' || value === 'client_secret_post';
}

// LOADING //

/**
 * builds gate options from environment variables
 * provider fields left unset become empty strings and are rejected by validateConfig
 * @param env environment, process.env by default
 * @returns gate options
 * @throws {Error} when a variable is set to an unusable value
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): CredentialGateOptions {
  const port = readPositiveInteger(env, 'CREDGATE_PORT');
  if (port !== undefined && port > MAX_PORT) {
    throw new Error('credgate config: CREDGATE_PORT must be a port number');
  }

  const mode = readEnv(env, 'CREDENTIAL_STORAGE_MODE') ?? DEFAULT_STORAGE_MODE;
  if (!isStorageMode(mode)) {
    throw new Error(
      `credgate config: unsupported CREDENTIAL_STORAGE_MODE: ${mode}`,
    );
  }

  const authMethod = readEnv(env, 'OAUTH_TOKEN_ENDPOINT_AUTH_METHOD');
  if (authMethod !== undefined && !isProviderAuthMethod(authMethod)) {
    throw new Error(
      `credgate config: unsupported OAUTH_TOKEN_ENDPOINT_AUTH_METHOD: ${authMethod}`,
    );
  }

  const timeoutMinutes = readPositiveInteger(env, 'SESSION_TIMEOUT_MINUTES');

  return {
    host: readEnv(env, 'CREDGATE_HOST') ?? DEFAULT_HOST,
    port: port ?? DEFAULT_HTTP_PORT,
    baseUrl: readEnv(env, 'CREDGATE_BASE_URL'),
    provider: {
      clientId: readEnv(env, 'OAUTH_CLIENT_ID') ?? '',
      clientSecret: readEnv(env, 'OAUTH_CLIENT_SECRET') ?? '',
      authorizationEndpoint: readEnv(env, 'OAUTH_AUTHORIZATION_ENDPOINT') ?? '',
      tokenEndpoint: readEnv(env, 'OAUTH_TOKEN_ENDPOINT') ?? '',
      userinfoEndpoint: readEnv(env, 'OAUTH_USERINFO_ENDPOINT'),
      tokenEndpointAuthMethod: authMethod,
    },
    session: {
      secret: readEnv(env, 'SESSION_SECRET'),
      timeoutMs:
        timeoutMinutes === undefined
          ? undefined
          : timeoutMinutes * MINUTES_TO_MS,
    },
    storage: {
      mode,
      directory: readEnv(env, 'CREDENTIALS_DIR') ?? DEFAULT_CREDENTIALS_DIR,
      encryptionKey: readEnv(env, 'ENCRYPTION_KEY'),
    },
    proxy: {
      defaultScopeGroup: readEnv(env, 'CREDGATE_SCOPE_GROUP'),
    },
    managementToken: readEnv(env, 'CREDGATE_MANAGEMENT_TOKEN'),
    auditLogPath: readEnv(env, 'CREDGATE_AUDIT_LOG'),
  };
}

// VALIDATION //

/**
 * validates the gate options
 * @param options options to validate
 * @throws {Error} when configuration is invalid
 */
export function validateConfig(options: CredentialGateOptions): void {
  const { provider, session, storage } = options;

  // validate provider client
  if (!provider.clientId) {
    throw new Error('credgate config: provider.clientId is required');
  }
  if (!provider.clientSecret) {
    throw new Error('credgate config: provider.clientSecret is required');
  }
  if (!provider.authorizationEndpoint) {
    throw new Error(
      'credgate config: provider.authorizationEndpoint is required',
    );
  }
  if (!provider.tokenEndpoint) {
    throw new Error('credgate config: provider.tokenEndpoint is required');
  }

  // validate session secret
  if (
    session?.secret !== undefined &&
    session.secret.length < MINIMUM_SESSION_SECRET_LENGTH
  ) {
    throw new Error(
      `credgate config: session.secret must be at least ${MINIMUM_SESSION_SECRET_LENGTH} characters`,
    );
  }

  // validate storage
  if (!storage.directory) {
    throw new Error('credgate config: storage.directory is required');
  }
  if (storage.encryptionKey !== undefined) {
    try {
      decodeEncryptionKey(storage.encryptionKey);
    } catch (error) {
      throw new Error('credgate config: storage.encryptionKey is invalid', {
        cause: error,
      });
    }
  }
}

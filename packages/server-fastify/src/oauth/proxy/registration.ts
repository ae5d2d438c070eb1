/**
 * @module oauth/proxy/registration
 * @description Client metadata normalisation and credential generation for
 * RFC 7591 dynamic client registration handled by the proxy itself.
 */

import { randomBytes } from 'node:crypto';

import { isJsonObject } from '@credgate/core';

import type { JsonObject, JsonValue } from '@credgate/core';

import type {
  ClientMetadata,
  GrantType,
  ResponseType,
  TokenEndpointAuthMethod,
} from './types';

/** prefix that makes proxy client identifiers recognisable */
export const PROXY_CLIENT_ID_PREFIX = 'proxy_';

// byte lengths for cryptographic operations
const CLIENT_ID_BYTES = 16;
const CLIENT_SECRET_BYTES = 32;
const REGISTRATION_TOKEN_BYTES = 32;

// supported OAuth features
const SUPPORTED_GRANT_TYPES: readonly GrantType[] = [
  'authorization_code',
  'refresh_token',
];
const SUPPORTED_RESPONSE_TYPES: readonly ResponseType[] = ['code'];
const SUPPORTED_AUTH_METHODS: readonly TokenEndpointAuthMethod[] = [
  'client_secret_basic',
  'client_secret_post',
  'none',
];

const KNOWN_FIELDS = new Set([
  'client_name',
  'redirect_uris',
  'grant_types',
  'response_types',
  'token_endpoint_auth_method',
  'scope',
]);

/** fields the proxy issues; a caller can never set them through metadata */
const ISSUED_FIELDS = new Set([
  'client_id',
  'client_secret',
  'client_id_issued_at',
  'client_secret_expires_at',
  'registration_access_token',
  'registration_client_uri',
]);

/**
 * Error thrown when client metadata is rejected.
 */
export class ClientRegistrationError extends Error {
  public readonly code: 'invalid_redirect_uri' | 'invalid_client_metadata';

  /**
   * Creates a new ClientRegistrationError.
   * @param code RFC 7591 error code
   * @param message error message describing the failure
   */
  constructor(
    code: 'invalid_redirect_uri' | 'invalid_client_metadata',
    message: string,
  ) {
    super(message);
    this.name = 'ClientRegistrationError';
    this.code = code;
  }
}

/** values applied to metadata fields a registration leaves out */
export interface RegistrationDefaults {
  clientName: string;
  redirectUris: string[];
  /** space separated scope string */
  scope: string;
}

// CREDENTIAL GENERATION //

/**
 * generates a client identifier carrying the proxy prefix
 * @returns `proxy_` followed by 32 hex characters
 */
export function generateClientId(): string {
  return PROXY_CLIENT_ID_PREFIX + randomBytes(CLIENT_ID_BYTES).toString('hex');
}

/**
 * generates a client secret
 * @returns 64 hex characters
 */
export function generateClientSecret(): string {
  return randomBytes(CLIENT_SECRET_BYTES).toString('hex');
}

/**
 * generates a registration access token
 * @returns 43 base64url characters
 */
export function generateRegistrationAccessToken(): string {
  return randomBytes(REGISTRATION_TOKEN_BYTES).toString('base64url');
}

/**
 * checks whether a client identifier was issued by the proxy
 * @param clientId client identifier
 * @returns true for proxy identifiers
 */
export function isProxyClientId(clientId: string): boolean {
  return clientId.startsWith(PROXY_CLIENT_ID_PREFIX);
}

// METADATA //

/**
 * validates registration metadata and fills in defaults for absent fields
 * @param input parsed request body
 * @param defaults values for absent fields
 * @returns normalised metadata
 * @throws {ClientRegistrationError} when a field is malformed or unsupported
 */
export function normalizeClientMetadata(
  input: unknown,
  defaults: RegistrationDefaults,
): ClientMetadata {
  const body = input ?? {};
  if (!isJsonObject(body)) {
    throw new ClientRegistrationError(
      'invalid_client_metadata',
      'client metadata must be a JSON object',
    );
  }

  const redirectUris =
    readStringArray(body, 'redirect_uris') ?? [...defaults.redirectUris];
  if (redirectUris.length === 0) {
    throw new ClientRegistrationError(
      'invalid_redirect_uri',
      'redirect_uris must contain at least one URI',
    );
  }
  redirectUris.forEach(validateRedirectUri);

  const extra: JsonObject = {};
  for (const [key, value] of Object.entries(body)) {
    if (!KNOWN_FIELDS.has(key) && !ISSUED_FIELDS.has(key)) {
      extra[key] = value;
    }
  }

  return {
    client_name: readString(body, 'client_name') ?? defaults.clientName,
    redirect_uris: redirectUris,
    grant_types: readSupported(
      body,
      'grant_types',
      SUPPORTED_GRANT_TYPES,
    ) ?? ['authorization_code', 'refresh_token'],
    response_types: readSupported(
      body,
      'response_types',
      SUPPORTED_RESPONSE_TYPES,
    ) ?? ['code'],
    token_endpoint_auth_method:
      readAuthMethod(body) ?? 'client_secret_basic',
    scope: readString(body, 'scope') ?? defaults.scope,
    extra,
  };
}

/**
 * overlays an update on registered metadata
 * a non-object update is returned as is so normalisation can reject it
 * @param current registered metadata
 * @param update parsed request body
 * @returns raw metadata to normalise
 */
export function mergeClientMetadata(
  current: ClientMetadata,
  update: unknown,
): unknown {
  const body = update ?? {};
  if (!isJsonObject(body)) {
    return body;
  }

  const { extra, ...known } = current;

  return { ...extra, ...known, ...body };
}

// HELPER FUNCTIONS //

/**
 * validates a single redirect URI.
 * @param uri redirect URI to validate
 * @throws {ClientRegistrationError} if URI is invalid
 */
function validateRedirectUri(uri: string): void {
  let parsed: URL;

  try {
    parsed = new URL(uri);
  } catch {
    throw new ClientRegistrationError(
      'invalid_redirect_uri',
      `invalid redirect_uri format: ${uri}`,
    );
  }

  // plain http is only accepted for loopback development clients
  const isLocalhost =
    parsed.hostname === 'localhost' || parsed.hostname === '127.0.0.1';
  if (
    parsed.protocol !== 'https:' &&
    !(parsed.protocol === 'http:' && isLocalhost)
  ) {
    throw new ClientRegistrationError(
      'invalid_redirect_uri',
      `redirect_uri must use https: ${uri}`,
    );
  }

  if (parsed.hash) {
    throw new ClientRegistrationError(
      'invalid_redirect_uri',
      `redirect_uri must not contain a fragment: ${uri}`,
    );
  }
}

/**
 * reads an optional string field
 * @param body metadata object
 * @param field field name
 * @returns the value or undefined when absent
 * @throws {ClientRegistrationError} when present but not a string
 */
function readString(body: JsonObject, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ClientRegistrationError(
      'invalid_client_metadata',
      `${field} must be a string`,
    );
  }

  return value;
}

/**
 * reads an optional array of strings
 * @param body metadata object
 * @param field field name
 * @returns the values or undefined when absent
 * @throws {ClientRegistrationError} when present but not an array of strings
 */
function readStringArray(
  body: JsonObject,
  field: string,
): string[] | undefined {
  const value: JsonValue | undefined = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ClientRegistrationError(
      'invalid_client_metadata',
      `${field} must be an array of strings`,
    );
  }

  return value.map((item) => {
    if (typeof item !== 'string') {
      throw new ClientRegistrationError(
        'invalid_client_metadata',
        `${field} must be an array of strings`,
      );
    }

    return item;
  });
}

/**
 * reads an optional array restricted to supported values
 * @param body metadata object
 * @param field field name
 * @param supported accepted values
 * @returns the values or undefined when absent
 * @throws {ClientRegistrationError} when a value is unsupported
 */
function readSupported<T extends string>(
  body: JsonObject,
  field: string,
  supported: readonly T[],
): T[] | undefined {
  return readStringArray(body, field)?.map((value) => {
    const match = supported.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new ClientRegistrationError(
        'invalid_client_metadata',
        `unsupported ${field.replace(/s$/, '')}: ${value}`,
      );
    }

    return match;
  });
}

/**
 * reads the declared token endpoint auth method
 * @param body metadata object
 * @returns the method or undefined when absent
 * @throws {ClientRegistrationError} when the method is unsupported
 */
function readAuthMethod(body: JsonObject): TokenEndpointAuthMethod | undefined {
  const value = readString(body, 'token_endpoint_auth_method');
  if (value === undefined) {
    return undefined;
  }

  const match = SUPPORTED_AUTH_METHODS.find((method) => method === value);
  if (match === undefined) {
    throw new ClientRegistrationError(
      'invalid_client_metadata',
      `unsupported token_endpoint_auth_method: ${value}`,
    );
  }

  return match;
}

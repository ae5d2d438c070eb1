/**
 * @module oauth/proxy/types
 * @description Wire and domain types of the credential proxy.
 */

import type { JsonObject, JsonValue } from '@credgate/core';

// ENUMERATIONS //

/** grant types a proxy client may declare */
export type GrantType = 'authorization_code' | 'refresh_token';

/** response types a proxy client may declare */
export type ResponseType = 'code';

/** how a proxy client authenticates at the token endpoint */
export type TokenEndpointAuthMethod =
  | 'client_secret_basic'
  | 'client_secret_post'
  | 'none';

/** how the real credentials are presented to the provider */
export type ProviderAuthMethod = 'client_secret_basic' | 'client_secret_post';

/** PKCE challenge methods (RFC 7636) */
export type CodeChallengeMethod = 'plain' | 'S256';

// DOMAIN //

/** client metadata after defaults were applied */
export interface ClientMetadata {
  client_name: string;
  redirect_uris: string[];
  grant_types: GrantType[];
  response_types: ResponseType[];
  token_endpoint_auth_method: TokenEndpointAuthMethod;
  scope: string;
  /** any other registration fields, echoed back verbatim */
  extra: JsonObject;
}

/** the operator's real client at the provider */
export interface ProviderClientConfig {
  clientId: string;
  clientSecret: string;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  /** queried when the token response has no id_token */
  userinfoEndpoint?: string;
  /** defaults to client_secret_post */
  tokenEndpointAuthMethod?: ProviderAuthMethod;
}

/** one registered proxy client */
export interface ProxyClientRecord {
  /** temporary identifier handed to the caller */
  clientId: string;
  /** temporary secret handed to the caller */
  clientSecret: string;
  /** the operator's identifier, never returned to callers */
  realClientId: string;
  /** the operator's secret, never returned to callers */
  realClientSecret: string;
  metadata: ClientMetadata;
  /** epoch milliseconds */
  createdAt: number;
  /** epoch milliseconds of the last successful resolution */
  lastAccessed: number;
  /** bearer token for reading, updating and deleting the registration */
  registrationAccessToken: string;
  codeChallenge?: string;
  codeChallengeMethod?: CodeChallengeMethod;
}

/** real credentials a proxy client resolves to */
export interface RealClientCredentials {
  clientId: string;
  clientSecret: string;
}

/** counts of registered proxy clients */
export interface ProxyClientStats {
  totalClients: number;
  activeClients: number;
  expiredClients: number;
}

// WIRE FORMATS //

/** RFC 7591 registration response, also returned by read and update */
export interface ClientRegistrationResponseWire {
  [field: string]: JsonValue;
  client_id: string;
  client_secret: string;
  /** epoch seconds */
  client_id_issued_at: number;
  /** proxy secrets do not expire on their own */
  client_secret_expires_at: 0;
  registration_access_token: string;
  registration_client_uri: string;
  client_name: string;
  redirect_uris: string[];
  grant_types: GrantType[];
  response_types: ResponseType[];
  token_endpoint_auth_method: TokenEndpointAuthMethod;
  scope: string;
}

/** body of POST /oauth/token */
export interface ProxyTokenRequestWire {
  grant_type?: string;
  code?: string;
  redirect_uri?: string;
  code_verifier?: string;
  refresh_token?: string;
  scope?: string;
  client_id?: string;
  client_secret?: string;
}

/** query of GET /oauth/authorize; every parameter is passed through */
export type ProxyAuthorizeRequestWire = Record<
  string,
  string | string[] | undefined
>;

/** oauth error response (RFC 6749 section 5.2) */
export interface ProxyOAuthErrorResponseWire {
  error: string;
  error_description?: string;
}

/**
 * provider token response, relayed verbatim
 * @description only the fields the proxy reads are typed.
 */
export type ProviderTokenResponseWire = JsonObject;

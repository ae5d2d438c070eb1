export { CredentialGateServer } from '#http';
export {
  DEFAULT_CREDENTIALS_DIR,
  DEFAULT_STORAGE_MODE,
  loadConfigFromEnv,
  validateConfig,
} from '#config';
export { ERROR_CODE_HEADER, UpstreamExchangeError } from '#errors';
export { CredentialProxy } from '#oauth/proxy/credential-proxy';
export {
  createBasicAuthHeader,
  forwardTokenRequest,
  parseBasicAuthHeader,
} from '#oauth/proxy/forwarder';
export {
  ClientRegistrationError,
  isProxyClientId,
  normalizeClientMetadata,
} from '#oauth/proxy/registration';
export { MemoryProxyClientRegistry } from '#oauth/proxy/registry';
export { PROXY_ROUTES } from '#oauth/proxy/routes';
export {
  SESSION_ID_HEADER,
  SESSION_TOKEN_HEADER,
} from '#request-context';
export { createScopeResolver } from '#scopes';
export { SessionBinding } from '#session/binding';
export { PeriodicTask } from '#sweeper';

export type {
  CredentialGateOptions,
  ProxyOptions,
  SessionOptions,
  StorageOptions,
} from '#config';
export type {
  AuthorizationRedirect,
  CredentialProxyOptions,
  TokenExchangeRequest,
  TokenExchangeResult,
  TokenRefreshRequest,
} from '#oauth/proxy/credential-proxy';
export type { ProxyClientRegistry } from '#oauth/proxy/registry';
export type {
  ClientMetadata,
  ClientRegistrationResponseWire,
  ProviderClientConfig,
  ProxyClientRecord,
  RealClientCredentials,
} from '#oauth/proxy/types';
export type { SweepResult } from '#routes/management';
export type { CredentialStatus } from '#routes/session';
export type { ResolveScopeGroup } from '#scopes';
export type { SessionContext } from '#session/binding';

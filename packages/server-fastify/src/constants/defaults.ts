import { HOURS_TO_MS, MINUTES_TO_MS, MS_PER_SECOND } from './time';

/**
 * default HTTP server port
 * @example
 * ```typescript
 * const port = Number(process.env.CREDGATE_PORT ?? DEFAULT_HTTP_PORT);
 * ```
 */
export const DEFAULT_HTTP_PORT = 8000;
/** default HTTP server host address */
export const DEFAULT_HOST = '0.0.0.0';

/**
 * lifetime of a registered proxy client
 * @description a client is rejected and evicted once it is older than this.
 */
export const DEFAULT_PROXY_CLIENT_EXPIRY_MS = 24 * HOURS_TO_MS;
/** minimum gap between two sweeps triggered by registrations */
export const REGISTRATION_SWEEP_THROTTLE_MS = HOURS_TO_MS;
/** time allowed for a provider token call before it is abandoned */
export const DEFAULT_UPSTREAM_TIMEOUT_MS = 30 * MS_PER_SECOND;
/** period of the background expiry sweep */
export const DEFAULT_SWEEP_INTERVAL_MS = 5 * MINUTES_TO_MS;

/** client name given to registrations that omit one */
export const DEFAULT_CLIENT_NAME = 'OAuth Client';
/** redirect uris given to registrations that omit them */
export const DEFAULT_REDIRECT_URIS = ['http://localhost:3000/auth/callback'];
/** scope group used when a registration omits its scope */
export const DEFAULT_SCOPE_GROUP = 'base';
/** scopes of the default group when the operator configures none */
export const DEFAULT_BASE_SCOPES = ['openid', 'email', 'profile'];

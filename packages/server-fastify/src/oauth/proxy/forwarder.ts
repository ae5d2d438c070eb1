/**
 * @module oauth/proxy/forwarder
 * @description Forwards token requests to the provider with the real client
 * credentials and turns every failure into an UpstreamExchangeError.
 */

import { isJsonObject, parseJson } from '@credgate/core';

import {
  HTTP_BAD_GATEWAY,
  HTTP_BAD_REQUEST,
  HTTP_GATEWAY_TIMEOUT,
} from '#constants/http';
import { UpstreamExchangeError } from '#errors';

import type {
  ProviderAuthMethod,
  ProviderTokenResponseWire,
  RealClientCredentials,
} from './types';

// HTTP CONSTANTS //

const CONTENT_TYPE_JSON = 'application/json';
const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';

/** length of "Basic " prefix in Authorization header */
const BASIC_PREFIX_LENGTH = 6;

// TYPES //

/** a token request bound for the provider */
export interface TokenForwardRequest {
  /** provider token endpoint */
  endpoint: string;
  /** the operator's real client credentials */
  credentials: RealClientCredentials;
  /** how the credentials are presented */
  authMethod: ProviderAuthMethod;
  /** grant parameters; undefined values are left out */
  params: Record<string, string | undefined>;
  /** milliseconds before the call is abandoned */
  timeoutMs: number;
}

// HEADER UTILITIES //

/**
 * creates basic authorization header from client credentials.
 * @param clientId client identifier
 * @param clientSecret client secret
 * @returns basic authorization header value
 */
export function createBasicAuthHeader(
  clientId: string,
  clientSecret: string,
): string {
  const credentials = `${encodeURIComponent(clientId)}:${encodeURIComponent(clientSecret)}`;
  const encoded = Buffer.from(credentials).toString('base64');

  return `Basic ${encoded}`;
}

/**
 * parses basic authorization header to extract credentials.
 * @param authHeader authorization header value
 * @returns parsed credentials or null if invalid
 */
export function parseBasicAuthHeader(
  authHeader: string | undefined,
): { clientId: string; clientSecret: string } | null {
  if (!authHeader?.match(/^basic /i)) {
    return null;
  }

  const decoded = Buffer.from(
    authHeader.slice(BASIC_PREFIX_LENGTH),
    'base64',
  ).toString('utf-8');
  const colonIndex = decoded.indexOf(':');

  if (colonIndex === -1) {
    return null;
  }

  const clientId = decodeFormComponent(decoded.slice(0, colonIndex));
  const clientSecret = decodeFormComponent(decoded.slice(colonIndex + 1));

  if (!clientId || !clientSecret) {
    return null;
  }

  return { clientId, clientSecret };
}

// REQUEST BUILDING //

/**
 * builds a form-encoded request body.
 * @param params key-value pairs to encode
 * @returns URLSearchParams-encoded string
 */
export function buildFormBody(
  params: Record<string, string | undefined>,
): string {
  const searchParams = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      searchParams.set(key, value);
    }
  }

  return searchParams.toString();
}

// FORWARDING //

/**
 * posts a token request to the provider
 * the call is made once; retrying is left to the caller
 * @param request token request
 * @returns the provider's json response
 * @throws {UpstreamExchangeError} when the provider rejects the request, answers
 * with something other than a json object, cannot be reached (502) or times out (504)
 */
export async function forwardTokenRequest(
  request: TokenForwardRequest,
): Promise<ProviderTokenResponseWire> {
  const { endpoint, credentials, authMethod, params, timeoutMs } = request;

  const headers: Record<string, string> = {
    'Content-Type': CONTENT_TYPE_FORM,
    'Accept': CONTENT_TYPE_JSON,
  };
  const form = { ...params };

  if (authMethod === 'client_secret_basic') {
    headers.Authorization = createBasicAuthHeader(
      credentials.clientId,
      credentials.clientSecret,
    );
  } else {
    form.client_id = credentials.clientId;
    form.client_secret = credentials.clientSecret;
  }

  let response: Response;
  try {
    response = await fetch(endpoint, {
      method: 'POST',
      headers,
      body: buildFormBody(form),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw isTimeoutError(error)
      ? new UpstreamExchangeError({
          message: `provider token endpoint did not answer within ${timeoutMs}ms`,
          statusCode: HTTP_GATEWAY_TIMEOUT,
          payload: {
            error: 'temporarily_unavailable',
            error_description: 'the provider did not answer in time',
          },
          cause: error,
        })
      : new UpstreamExchangeError({
          message: 'provider token endpoint could not be reached',
          statusCode: HTTP_BAD_GATEWAY,
          payload: {
            error: 'server_error',
            error_description: 'the provider could not be reached',
          },
          cause: error,
        });
  }

  const body = parseJson(await response.text());

  if (response.status >= HTTP_BAD_REQUEST) {
    throw new UpstreamExchangeError({
      message: `provider token endpoint answered ${response.status}`,
      statusCode: response.status,
      payload: isJsonObject(body)
        ? body
        : {
            error: 'server_error',
            error_description: `provider returned status ${response.status}`,
          },
    });
  }

  if (!isJsonObject(body)) {
    throw new UpstreamExchangeError({
      message: 'provider token endpoint answered without a json object',
      statusCode: HTTP_BAD_GATEWAY,
      payload: {
        error: 'server_error',
        error_description: 'the provider returned an unreadable token response',
      },
    });
  }

  return body;
}

// HELPER FUNCTIONS //

/**
 * checks whether a fetch failure was caused by the abort timeout
 * @param error caught value
 * @returns true for a TimeoutError
 */
function isTimeoutError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'TimeoutError'
  );
}

/**
 * decodes a form-encoded basic credential component (RFC 6749 section 2.3.1)
 * @param value encoded component
 * @returns decoded value, or the raw value when it is not valid encoding
 */
function decodeFormComponent(value: string): string {
  try {
    return decodeURIComponent(value.replace(/\+/g, ' '));
  } catch {
    return value;
  }
}

/**
 * @module oauth/proxy/proxy-crypto
 * @description Shared validation helpers for the OAuth proxy handlers:
 * error responses, client credential extraction, constant-time comparison
 * and PKCE verification.
 */

import { createHash, timingSafeEqual } from 'node:crypto';

import { isJsonObject } from '@credgate/core';

import { lastHeader } from '#request-context';

import { parseBasicAuthHeader } from './forwarder';

import type { FastifyReply, FastifyRequest } from 'fastify';

import type {
  CodeChallengeMethod,
  ProxyOAuthErrorResponseWire,
  ProxyTokenRequestWire,
} from './types';

// TYPES //

/**
 * Client credentials presented at the token endpoint.
 * Public clients present an identifier only.
 */
export interface ClientCredentials {
  clientId: string;
  clientSecret?: string;
}

// ERROR RESPONSES //

/**
 * sends an OAuth error response.
 * @param reply - Fastify reply object
 * @param statusCode - HTTP status code to send
 * @param error - OAuth error code (e.g., 'invalid_client', 'invalid_request')
 * @param errorDescription - Human-readable error description
 */
export function sendErrorResponse(
  reply: FastifyReply,
  statusCode: number,
  error: string,
  errorDescription: string,
): void {
  const body: ProxyOAuthErrorResponseWire = {
    error,
    error_description: errorDescription,
  };

  void reply.status(statusCode).send(body);
}

// REQUEST PARSING //

/**
 * picks the string parameters of a token request body
 * @param body form or json body
 * @returns token request with non-string values dropped
 */
export function parseTokenRequest(body: unknown): ProxyTokenRequestWire {
  if (!isJsonObject(body)) {
    return {};
  }

  const pick = (field: keyof ProxyTokenRequestWire): string | undefined => {
    const value = body[field];

    return typeof value === 'string' && value !== '' ? value : undefined;
  };

  return {
    grant_type: pick('grant_type'),
    code: pick('code'),
    redirect_uri: pick('redirect_uri'),
    code_verifier: pick('code_verifier'),
    refresh_token: pick('refresh_token'),
    scope: pick('scope'),
    client_id: pick('client_id'),
    client_secret: pick('client_secret'),
  };
}

/**
 * extracts client credentials from a request.
 * HTTP Basic authentication takes precedence over body parameters.
 * @param request - Fastify request
 * @param body - parsed token request
 * @returns Extracted client credentials or null if not found
 */
export function extractClientCredentials(
  request: FastifyRequest,
  body: ProxyTokenRequestWire,
): ClientCredentials | null {
  const basicAuth = parseBasicAuthHeader(
    lastHeader(request.headers, 'authorization'),
  );
  if (basicAuth) {
    return basicAuth;
  }

  if (!body.client_id) {
    return null;
  }

  return { clientId: body.client_id, clientSecret: body.client_secret };
}

// COMPARISON //

/**
 * compares two strings in constant time
 * both sides are hashed first so their lengths do not leak either
 * @param left first value
 * @param right second value
 * @returns true when both are equal
 */
export function safeEqual(left: string, right: string): boolean {
  const a = createHash('sha256').update(left).digest();
  const b = createHash('sha256').update(right).digest();

  return timingSafeEqual(a, b);
}

// PKCE VERIFICATION //

/**
 * checks whether a value names a supported PKCE method
 * @param value candidate method
 * @returns true for plain and S256
 */
export function isCodeChallengeMethod(
  value: string,
): value is CodeChallengeMethod {
  return value === 'plain' || value === 'S256';
}

/**
 * Verifies PKCE code_verifier against stored code_challenge.
 * Supports both 'plain' and 'S256' challenge methods per RFC 7636.
 * @param codeVerifier - Client-provided code verifier string
 * @param codeChallenge - Stored code challenge to verify against
 * @param method - Challenge method ('plain' or 'S256')
 * @returns True if verification passes, false otherwise
 */
export function verifyPKCE(
  codeVerifier: string,
  codeChallenge: string,
  method: CodeChallengeMethod,
): boolean {
  if (method === 'plain') {
    return safeEqual(codeVerifier, codeChallenge);
  }

  // S256: BASE64URL(SHA256(code_verifier)) === code_challenge
  const hash = createHash('sha256').update(codeVerifier).digest('base64url');

  return safeEqual(hash, codeChallenge);
}

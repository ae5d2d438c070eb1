import { TLSSocket } from 'node:tls';

import type { IncomingHttpHeaders } from 'node:http';

import type { ConnectionInfo } from '@credgate/session-security';
import type { FastifyRequest } from 'fastify';

/** header carrying the session token */
export const SESSION_TOKEN_HEADER = 'x-session-token';
/** header carrying a transport-level session identifier */
export const SESSION_ID_HEADER = 'x-session-id';

/**
 * extracts the last value from http headers when multiple values exist
 * @param headers incoming http headers object
 * @param header header name to extract
 * @returns last header value or undefined if not found
 */
export function lastHeader(
  headers: IncomingHttpHeaders,
  header: string,
): string | undefined {
  const targetHeader = header.toLowerCase();

  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === targetHeader) {
      if (Array.isArray(value)) {
        return value[value.length - 1];
      }

      return value;
    }
  }

  return undefined;
}

/**
 * extracts bearer token from authorization header
 * @param header authorization header value
 * @returns extracted token or undefined if invalid format
 */
export function extractBearerToken(
  header: string | undefined,
): string | undefined {
  if (!header?.match(/^bearer /i)) {
    return undefined;
  }

  return header.replace(/^bearer /i, '');
}

/**
 * extracts the session token, from its own header or an `Authorization: Session` header
 * @param headers incoming http headers object
 * @returns session token or undefined
 */
export function extractSessionToken(
  headers: IncomingHttpHeaders,
): string | undefined {
  const token = lastHeader(headers, SESSION_TOKEN_HEADER);
  if (token) {
    return token;
  }

  const authorization = lastHeader(headers, 'authorization');
  if (!authorization?.match(/^session /i)) {
    return undefined;
  }

  return authorization.replace(/^session /i, '') || undefined;
}

/**
 * collects the connection attributes a session fingerprint is computed from
 * @param request fastify request object
 * @returns peer, agent and tls parameters
 */
export function extractConnectionInfo(request: FastifyRequest): ConnectionInfo {
  const socket = request.raw.socket;
  const tls =
    socket instanceof TLSSocket
      ? {
          tlsVersion: socket.getProtocol() ?? undefined,
          cipherSuite: socket.getCipher().name,
        }
      : {};

  return {
    ip: request.ip,
    userAgent: lastHeader(request.headers, 'user-agent'),
    ...tls,
  };
}

/**
 * infers the base url from a fastify request, handling proxy headers
 * @param request fastify request object containing headers and connection info
 * @returns the inferred base url including protocol and host
 */
export function inferBaseUrlFromRequest(request: FastifyRequest): string {
  const protocol =
    lastHeader(request.headers, 'x-forwarded-proto') ?? request.protocol;
  const host = lastHeader(request.headers, 'x-forwarded-host') ?? request.host;

  return `${protocol}://${host}`;
}

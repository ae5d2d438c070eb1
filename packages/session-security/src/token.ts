import { createHmac, timingSafeEqual } from 'node:crypto';

/** principal recorded in tokens issued before anyone authenticated */
export const ANONYMOUS_PRINCIPAL = 'anonymous';

const SEGMENT_SEPARATOR = '.';

/** claims carried by a session token */
export interface SessionTokenClaims {
  /** session identifier */
  sid: string;
  /** normalised principal or `anonymous` */
  sub: string;
  /** issue time in epoch milliseconds */
  iat: number;
}

/** outcome of checking a token's structure and signature */
export type SessionTokenInspection =
  | { status: 'malformed' }
  | { status: 'invalid_signature'; claims: SessionTokenClaims }
  | { status: 'signed'; claims: SessionTokenClaims };

/**
 * signs session claims as `base64url(json).hex(hmac-sha256)`
 * the mac covers the encoded segment, so any change to the token text breaks it
 * @param claims claims to sign
 * @param secret process-wide signing secret
 * @returns opaque bearer token
 */
export function signSessionToken(
  claims: SessionTokenClaims,
  secret: Uint8Array,
): string {
  const encoded = Buffer.from(
    JSON.stringify({ sid: claims.sid, sub: claims.sub, iat: claims.iat }),
    'utf8',
  ).toString('base64url');

  return encoded + SEGMENT_SEPARATOR + computeSignature(encoded, secret);
}

/**
 * decodes a token and checks its signature without looking at expiry or session
 * @param token presented token
 * @param secret process-wide signing secret
 * @returns inspection result
 */
export function inspectSessionToken(
  token: string,
  secret: Uint8Array,
): SessionTokenInspection {
  const parts = token.split(SEGMENT_SEPARATOR);
  if (parts.length !== 2) {
    return { status: 'malformed' };
  }

  const [encoded, signature] = parts;
  const claims = decodeClaims(encoded);
  if (!claims) {
    return { status: 'malformed' };
  }

  const expected = Buffer.from(computeSignature(encoded, secret), 'utf8');
  const presented = Buffer.from(signature, 'utf8');
  const valid =
    expected.length === presented.length &&
    timingSafeEqual(expected, presented);

  return valid
    ? { status: 'signed', claims }
    : { status: 'invalid_signature', claims };
}

/**
 * reads the session id a token claims, without verifying anything
 * @param token presented token
 * @returns claimed session id or undefined when the token is malformed
 */
export function peekSessionId(token: string): string | undefined {
  const [encoded] = token.split(SEGMENT_SEPARATOR);

  return decodeClaims(encoded)?.sid;
}

/**
 * computes the hex mac of an encoded claims segment
 * @param encoded base64url claims
 * @param secret signing secret
 * @returns lower-case hex digest
 */
function computeSignature(encoded: string, secret: Uint8Array): string {
  return createHmac('sha256', secret).update(encoded, 'utf8').digest('hex');
}

/**
 * decodes and validates a claims segment
 * @param encoded base64url claims
 * @returns claims or null when the segment is not a claims object
 */
function decodeClaims(encoded: string): SessionTokenClaims | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(encoded, 'base64url').toString('utf8'));
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null) {
    return null;
  }

  const sid: unknown = Reflect.get(parsed, 'sid');
  const sub: unknown = Reflect.get(parsed, 'sub');
  const iat: unknown = Reflect.get(parsed, 'iat');

  if (
    typeof sid !== 'string' ||
    !sid ||
    typeof sub !== 'string' ||
    !sub ||
    typeof iat !== 'number' ||
    !Number.isFinite(iat)
  ) {
    return null;
  }

  return { sid, sub, iat };
}

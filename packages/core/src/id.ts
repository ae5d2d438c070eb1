import { randomBytes } from 'node:crypto';

const BASE62_CHARS =
  '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';
const BASE62_RADIX = 62n;
const SESSION_ID_BYTES = 16;

/**
 * encodes arbitrary bytes as a base62 string
 * @param bytes bytes to encode
 * @returns base62 representation without leading zero digits
 */
export function toBase62(bytes: Uint8Array): string {
  let num = BigInt('0x' + (Buffer.from(bytes).toString('hex') || '0'));
  let result = '';
  while (num > 0n) {
    result = BASE62_CHARS[Number(num % BASE62_RADIX)] + result;
    num = num / BASE62_RADIX;
  }

  return result || '0';
}

/**
 * generates a fresh, unguessable session identifier in base62 format
 * @returns session id
 */
export function generateSessionId(): string {
  return toBase62(randomBytes(SESSION_ID_BYTES));
}

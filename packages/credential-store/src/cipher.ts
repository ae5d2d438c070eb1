import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

const ALGORITHM = 'aes-256-gcm';
const IV_BYTES = 12;
const AUTH_TAG_BYTES = 16;

/** byte length of the symmetric key */
export const KEY_BYTES = 32;

/**
 * encrypts text with AES-256-GCM
 * @param plaintext text to encrypt
 * @param key 32-byte key
 * @returns `iv:authTag:ciphertext`, each part hex encoded
 */
export function encrypt(plaintext: string, key: Buffer): string {
  const iv = randomBytes(IV_BYTES);
  const cipher = createCipheriv(ALGORITHM, key, iv, {
    authTagLength: AUTH_TAG_BYTES,
  });

  const ciphertext = Buffer.concat([
    cipher.update(plaintext, 'utf8'),
    cipher.final(),
  ]);

  return [
    iv.toString('hex'),
    cipher.getAuthTag().toString('hex'),
    ciphertext.toString('hex'),
  ].join(':');
}

/**
 * decrypts a payload produced by encrypt
 * @param payload `iv:authTag:ciphertext` string
 * @param key 32-byte key
 * @returns decrypted text
 * @throws {Error} when the payload is malformed or fails authentication
 */
export function decrypt(payload: string, key: Buffer): string {
  const parts = payload.trim().split(':');
  if (parts.length !== 3) {
    throw new Error('encrypted payload must have three segments');
  }

  const [ivHex, tagHex, ciphertextHex] = parts;
  const iv = Buffer.from(ivHex, 'hex');
  const authTag = Buffer.from(tagHex, 'hex');

  if (iv.length !== IV_BYTES || authTag.length !== AUTH_TAG_BYTES) {
    throw new Error('encrypted payload has an invalid iv or auth tag');
  }

  const decipher = createDecipheriv(ALGORITHM, key, iv, {
    authTagLength: AUTH_TAG_BYTES,
  });
  decipher.setAuthTag(authTag);

  return Buffer.concat([
    decipher.update(Buffer.from(ciphertextHex, 'hex')),
    decipher.final(),
  ]).toString('utf8');
}

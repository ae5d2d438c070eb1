import { randomBytes } from 'node:crypto';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { KEY_BYTES } from '#cipher';
import { KEY_FILE_NAME } from '#file-names';

import type { Log } from '@credgate/core';

const DIRECTORY_MODE = 0o700;
const KEY_FILE_MODE = 0o600;

/**
 * decodes an externally supplied key
 * @param encoded base64 or base64url text
 * @returns 32-byte key
 * @throws {Error} when the text does not decode to 32 bytes
 */
export function decodeEncryptionKey(encoded: string): Buffer {
  // node's base64 decoder also accepts the url-safe alphabet
  const key = Buffer.from(encoded.trim(), 'base64');
  if (key.length !== KEY_BYTES) {
    throw new Error(`encryption key must decode to ${KEY_BYTES} bytes`);
  }

  return key;
}

/**
 * loads the key persisted in the credentials directory, creating it on first use
 * @param directory credentials directory
 * @param log optional logger
 * @returns 32-byte key
 */
export async function loadOrCreateKeyFile(
  directory: string,
  log?: Log,
): Promise<Buffer> {
  const path = join(directory, KEY_FILE_NAME);

  const existing = await readKeyFile(path);
  if (existing) {
    return existing;
  }

  await mkdir(directory, { recursive: true, mode: DIRECTORY_MODE });

  try {
    // exclusive create, so two processes racing here agree on one key
    await writeFile(path, randomBytes(KEY_BYTES).toString('base64'), {
      mode: KEY_FILE_MODE,
      flag: 'wx',
    });
    log?.('info', 'generated credential encryption key', { directory });
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EEXIST') {
      throw error;
    }
  }

  const created = await readKeyFile(path);
  if (!created) {
    throw new Error(`encryption key file ${path} could not be read back`);
  }

  return created;
}

/**
 * reads and decodes the key file
 * @param path key file path
 * @returns key or null when the file does not exist
 */
async function readKeyFile(path: string): Promise<Buffer | null> {
  try {
    return decodeEncryptionKey(await readFile(path, 'utf8'));
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }

    throw error;
  }
}

/**
 * narrows an unknown error to a node system error
 * @param error caught value
 * @returns true when the error carries an errno code
 */
export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

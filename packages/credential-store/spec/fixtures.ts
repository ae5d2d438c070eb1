import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { StoredCredential } from '#types';

/** credential used across the storage tests */
export const credential: StoredCredential = {
  token: 'at-test-1',
  refreshToken: 'rt-test-1',
  tokenUri: 'https://provider.test/token',
  clientId: 'real-client',
  clientSecret: 'test-secret',
  scopes: ['openid', 'email'],
  expiresAt: Date.parse('2030-01-01T00:00:00.000Z'),
};

/** a valid base64 key for tests */
export const testKey = Buffer.alloc(32, 7).toString('base64');

/**
 * creates a scratch directory and returns it with its cleanup
 * @returns directory path and disposer
 */
export async function createScratchDirectory(): Promise<{
  directory: string;
  dispose: () => Promise<void>;
}> {
  const directory = await mkdtemp(join(tmpdir(), 'credgate-store-'));

  return {
    directory,
    dispose: async () => rm(directory, { recursive: true, force: true }),
  };
}

import { readFile, readdir, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { STORAGE_MODES } from '#types';
import { CredentialStore } from '#store';

import { createScratchDirectory, credential, testKey } from './fixtures';

const OWNER_ONLY = 0o600;
const PERMISSION_BITS = 0o777;

describe('cl:CredentialStore', () => {
  let directory: string;
  let dispose: () => Promise<void>;

  beforeEach(async () => {
    ({ directory, dispose } = await createScratchDirectory());
  });

  afterEach(async () => {
    await dispose();
  });

  describe('mt:save', () => {
    it.each(STORAGE_MODES)('should round-trip a credential under %s', async (mode) => {
      const store = new CredentialStore({ mode, directory });

      await store.save('alice@example.com', credential);

      expect(await store.load('alice@example.com')).toEqual(credential);
    });

    it('should normalise the principal', async () => {
      const store = new CredentialStore({ mode: 'memory_only', directory });

      await store.save('  Alice@Example.com', credential);

      expect(await store.load('alice@example.com')).toEqual(credential);
    });

    it('should write an owner-only plaintext file named after the principal', async () => {
      const store = new CredentialStore({ mode: 'plaintext_file', directory });

      await store.save('alice@example.com', credential);

      const path = join(directory, 'alice%40example.com.credentials.json');
      const { mode } = await stat(path);
      expect(mode & PERMISSION_BITS).toBe(OWNER_ONLY);
      expect(JSON.parse(await readFile(path, 'utf8'))).toEqual({
        token: 'at-test-1',
        refresh_token: 'rt-test-1',
        token_uri: 'https://provider.test/token',
        client_id: 'real-client',
        client_secret: 'test-secret',
        scopes: ['openid', 'email'],
        expiry: '2030-01-01T00:00:00.000Z',
      });
    });

    it('should write an encrypted payload and generate an owner-only key', async () => {
      const store = new CredentialStore({ mode: 'encrypted_file', directory });

      await store.save('alice', credential);

      const payload = await readFile(
        join(directory, 'alice.credentials.enc'),
        'utf8',
      );
      const key = await stat(join(directory, '.encryption-key'));
      expect(payload).toMatch(/^[0-9a-f]{24}:[0-9a-f]{32}:[0-9a-f]+$/);
      expect(key.mode & PERMISSION_BITS).toBe(OWNER_ONLY);
    });

    it('should write through to memory and the backup under memory_with_backup', async () => {
      const store = new CredentialStore({
        mode: 'memory_with_backup',
        directory,
      });

      await store.save('alice', credential);

      expect(await store.summary()).toEqual({
        mode: 'memory_with_backup',
        principalsInMemory: ['alice'],
        principalsOnDisk: ['alice'],
      });
      expect(await readdir(directory)).toEqual(
        expect.arrayContaining(['alice.backup.enc', '.encryption-key']),
      );
    });

    it('should not persist anything under memory_only', async () => {
      const store = new CredentialStore({ mode: 'memory_only', directory });

      await store.save('alice', credential);

      expect(await readdir(directory)).toEqual([]);
    });
  });

  describe('mt:load', () => {
    it('should return null for an unknown principal', async () => {
      const store = new CredentialStore({ mode: 'plaintext_file', directory });

      expect(await store.load('nobody')).toBeNull();
    });

    it('should hand out copies that cannot alter the stored record', async () => {
      const store = new CredentialStore({ mode: 'memory_only', directory });
      await store.save('alice', credential);

      const loaded = await store.load('alice');
      loaded?.scopes.push('admin');

      expect((await store.load('alice'))?.scopes).toEqual(['openid', 'email']);
    });

    it('should recover from the backup after a restart and warm memory', async () => {
      await new CredentialStore({ mode: 'memory_with_backup', directory }).save(
        'alice',
        credential,
      );
      const restarted = new CredentialStore({
        mode: 'memory_with_backup',
        directory,
      });

      expect((await restarted.summary()).principalsInMemory).toEqual([]);
      expect(await restarted.load('alice')).toEqual(credential);
      expect((await restarted.summary()).principalsInMemory).toEqual(['alice']);
    });

    it('should lose memory_only credentials on restart', async () => {
      await new CredentialStore({ mode: 'memory_only', directory }).save(
        'alice',
        credential,
      );

      const restarted = new CredentialStore({ mode: 'memory_only', directory });

      expect(await restarted.load('alice')).toBeNull();
    });

    it('should read files written with the same supplied key', async () => {
      await new CredentialStore({
        mode: 'encrypted_file',
        directory,
        encryptionKey: testKey,
      }).save('alice', credential);

      const reader = new CredentialStore({
        mode: 'encrypted_file',
        directory,
        encryptionKey: testKey,
      });

      expect(await reader.load('alice')).toEqual(credential);
    });

    it('should report a key mismatch as absent and log it as an error', async () => {
      await new CredentialStore({
        mode: 'encrypted_file',
        directory,
        encryptionKey: testKey,
      }).save('alice', credential);
      const log = vi.fn();
      const reader = new CredentialStore({
        mode: 'encrypted_file',
        directory,
        encryptionKey: Buffer.alloc(32, 9).toString('base64'),
        log,
      });

      const result = await reader.load('alice');

      expect(result).toBeNull();
      expect(log).toHaveBeenCalledWith(
        'error',
        'stored credential could not be decrypted',
        expect.objectContaining({
          principal: 'alice',
          mode: 'encrypted_file',
          reason: 'cipher',
        }),
      );
    });

    it('should never fall back to plaintext when the encrypted file is unreadable', async () => {
      await writeFile(
        join(directory, 'alice.credentials.enc'),
        JSON.stringify({ token: 'at-plain' }),
      );
      const log = vi.fn();
      const store = new CredentialStore({
        mode: 'encrypted_file',
        directory,
        encryptionKey: testKey,
        log,
      });

      expect(await store.load('alice')).toBeNull();
      expect(log).toHaveBeenCalledWith(
        'error',
        'stored credential could not be decrypted',
        expect.objectContaining({ reason: 'cipher' }),
      );
    });
  });

  describe('mt:remove', () => {
    it('should delete every artefact of the active mode', async () => {
      const store = new CredentialStore({
        mode: 'memory_with_backup',
        directory,
      });
      await store.save('alice', credential);

      const removed = await store.remove('alice');

      expect(removed).toBe(true);
      expect(await store.summary()).toEqual({
        mode: 'memory_with_backup',
        principalsInMemory: [],
        principalsOnDisk: [],
      });
    });

    it('should report when nothing was stored', async () => {
      const store = new CredentialStore({ mode: 'plaintext_file', directory });

      expect(await store.remove('alice')).toBe(false);
    });
  });

  describe('mt:migrate', () => {
    it('should keep credentials readable after moving from plaintext to encrypted files and restarting', async () => {
      const original = new CredentialStore({ mode: 'plaintext_file', directory });
      await original.save('alice', credential);

      const report = await original.migrate('encrypted_file');
      const restarted = new CredentialStore({
        mode: 'encrypted_file',
        directory,
      });

      expect(report).toEqual({
        from: 'plaintext_file',
        to: 'encrypted_file',
        results: { alice: { status: 'migrated' } },
      });
      expect(original.mode).toBe('encrypted_file');
      expect(await restarted.load('alice')).toEqual(credential);
    });

    it('should be a no-op when repeated', async () => {
      const store = new CredentialStore({ mode: 'plaintext_file', directory });
      await store.save('alice', credential);
      await store.save('bob', credential);

      await store.migrate('memory_with_backup');
      const first = await store.summary();
      await store.migrate('memory_with_backup');
      const second = await store.summary();

      expect(second).toEqual(first);
      expect(second).toEqual({
        mode: 'memory_with_backup',
        principalsInMemory: ['alice', 'bob'],
        principalsOnDisk: ['alice', 'bob'],
      });
    });

    it('should delete source-only artefacts when asked to purge', async () => {
      const store = new CredentialStore({ mode: 'plaintext_file', directory });
      await store.save('alice', credential);

      await store.migrate('encrypted_file', { purgeSource: true });

      const entries = await readdir(directory);
      expect(entries.sort()).toEqual(['.encryption-key', 'alice.credentials.enc']);
    });

    it('should report unreadable records per principal and migrate the rest', async () => {
      const store = new CredentialStore({ mode: 'plaintext_file', directory });
      await store.save('alice', credential);
      await writeFile(join(directory, 'bob.credentials.json'), '{ broken');

      const report = await store.migrate('memory_only');

      expect(report.results).toEqual({
        alice: { status: 'migrated' },
        bob: {
          status: 'failed',
          message: 'stored credential for bob could not be read (format)',
        },
      });
      expect(store.mode).toBe('memory_only');
    });
  });

  describe('mt:summary', () => {
    it('should list principals without any credential values', async () => {
      const store = new CredentialStore({ mode: 'plaintext_file', directory });
      await store.save('bob', credential);
      await store.save('alice', credential);

      expect(await store.summary()).toEqual({
        mode: 'plaintext_file',
        principalsInMemory: [],
        principalsOnDisk: ['alice', 'bob'],
      });
    });
  });

  describe('constructor', () => {
    it('should reject a key that does not decode to 32 bytes', () => {
      expect(
        () =>
          new CredentialStore({
            mode: 'encrypted_file',
            directory,
            encryptionKey: 'dG9vLXNob3J0',
          }),
      ).toThrow(new Error('encryption key must decode to 32 bytes'));
    });
  });
});

import { jsonifyError, normalizePrincipal } from '@credgate/core';

import { EncryptedFileBackend } from '#backends/encrypted';
import { MemoryBackend } from '#backends/memory';
import { PlaintextFileBackend } from '#backends/plaintext';
import { StorageDecryptError } from '#errors';
import { FILE_SUFFIXES } from '#file-names';
import { decodeEncryptionKey, loadOrCreateKeyFile } from '#key';
import { AsyncMutex } from '#mutex';

import type { Log } from '@credgate/core';

import type { CredentialBackend } from '#backends/types';
import type {
  CredentialStoreOptions,
  MigrationOptions,
  MigrationOutcome,
  MigrationReport,
  StorageMode,
  StorageSummary,
  StoredCredential,
} from '#types';

/**
 * where a mode reads and writes: the preferred backend is consulted first,
 * the fallback only when the preferred one has nothing
 */
export interface BackendStrategy {
  preferred: CredentialBackend;
  fallback?: CredentialBackend;
}

/**
 * persists provider credentials per principal under one of four storage modes
 * all operations are serialised, so concurrent callers observe a consistent table
 */
export class CredentialStore {
  #mode: StorageMode;
  #log?: Log;
  #mutex = new AsyncMutex();
  #memory = new MemoryBackend();
  #plaintext: PlaintextFileBackend;
  #encrypted: EncryptedFileBackend;
  #backup: EncryptedFileBackend;
  #key?: Promise<Buffer>;

  /**
   * creates a credential store
   * @param options store options
   */
  constructor(options: CredentialStoreOptions) {
    const { directory, encryptionKey, log } = options;
    const now = options.now ?? Date.now;

    this.#mode = options.mode;
    this.#log = log;

    if (encryptionKey !== undefined) {
      // fail fast on a bad key instead of at the first encrypted write
      const key = decodeEncryptionKey(encryptionKey);
      this.#key = Promise.resolve(key);
    }

    const getKey = async (): Promise<Buffer> => {
      this.#key ??= loadOrCreateKeyFile(directory, log).catch(
        (error: unknown) => {
          // allow the next caller to retry, e.g. after a permission fix
          this.#key = undefined;
          throw error;
        },
      );

      return this.#key;
    };

    this.#plaintext = new PlaintextFileBackend(directory);
    this.#encrypted = new EncryptedFileBackend({
      kind: 'encrypted',
      directory,
      suffix: FILE_SUFFIXES.encrypted,
      storageMode: 'encrypted_file',
      getKey,
      now,
    });
    this.#backup = new EncryptedFileBackend({
      kind: 'backup',
      directory,
      suffix: FILE_SUFFIXES.backup,
      storageMode: 'memory_with_backup',
      getKey,
      now,
    });
  }

  /** active storage mode */
  public get mode(): StorageMode {
    return this.#mode;
  }

  /**
   * stores a credential under the active mode
   * @param principal principal the credential belongs to
   * @param credential credential to store
   */
  public async save(
    principal: string,
    credential: StoredCredential,
  ): Promise<void> {
    const id = normalizePrincipal(principal);

    await this.#mutex.runExclusive(async () => {
      await this.#write(this.#strategyFor(this.#mode), id, credential);
    });

    this.#log?.('debug', 'stored credential', { principal: id, mode: this.#mode });
  }

  /**
   * loads a credential under the active mode
   * unreadable records are reported as absent, and logged as errors
   * @param principal principal to look up
   * @returns a copy of the credential or null
   */
  public async load(principal: string): Promise<StoredCredential | null> {
    const id = normalizePrincipal(principal);

    return this.#mutex.runExclusive(async () => {
      try {
        return await this.#read(this.#strategyFor(this.#mode), id);
      } catch (error) {
        if (error instanceof StorageDecryptError) {
          this.#log?.('error', 'stored credential could not be decrypted', {
            principal: id,
            mode: this.#mode,
            reason: error.reason,
            error: jsonifyError(error.cause),
          });

          return null;
        }

        throw error;
      }
    });
  }

  /**
   * deletes a principal's credential from every backend of the active mode
   * @param principal principal to delete
   * @returns true if anything was deleted
   */
  public async remove(principal: string): Promise<boolean> {
    const id = normalizePrincipal(principal);

    return this.#mutex.runExclusive(async () => {
      let removed = false;
      for (const backend of this.#backendsOf(this.#strategyFor(this.#mode))) {
        removed = (await backend.delete(id)) || removed;
      }

      return removed;
    });
  }

  /**
   * copies every credential discoverable under the active mode to a target mode,
   * then switches to it
   * @param target mode to migrate to
   * @param options migration options
   * @returns outcome per principal
   */
  public async migrate(
    target: StorageMode,
    options: MigrationOptions = {},
  ): Promise<MigrationReport> {
    return this.#mutex.runExclusive(async () => {
      const from = this.#mode;
      const source = this.#strategyFor(from);
      const destination = this.#strategyFor(target);
      const destinationBackends = this.#backendsOf(destination);
      const sourceOnly = this.#backendsOf(source).filter(
        (backend) => !destinationBackends.includes(backend),
      );

      const results: Record<string, MigrationOutcome> = {};
      for (const principal of await this.#listStrategy(source)) {
        results[principal] = await this.#migrateOne(
          principal,
          source,
          destination,
          options.purgeSource ? sourceOnly : [],
        );
      }

      this.#mode = target;
      this.#log?.('info', 'migrated credential storage', {
        from,
        to: target,
        principals: Object.keys(results).length,
        failed: Object.values(results).filter(
          (outcome) => outcome.status === 'failed',
        ).length,
      });

      return { from, to: target, results };
    });
  }

  /**
   * summarises what is stored without revealing any credential values
   * @returns storage summary
   */
  public async summary(): Promise<StorageSummary> {
    return this.#mutex.runExclusive(async () => {
      const onDisk = new Set<string>();
      for (const backend of [this.#plaintext, this.#encrypted, this.#backup]) {
        for (const principal of await backend.list()) {
          onDisk.add(principal);
        }
      }

      return {
        mode: this.#mode,
        principalsInMemory: (await this.#memory.list()).sort(),
        principalsOnDisk: [...onDisk].sort(),
      };
    });
  }

  // HELPER METHODS //

  /**
   * maps a mode to its backends
   * @param mode storage mode
   * @returns preferred and fallback backend
   */
  #strategyFor(mode: StorageMode): BackendStrategy {
    switch (mode) {
      case 'plaintext_file':
        return { preferred: this.#plaintext };
      case 'encrypted_file':
        return { preferred: this.#encrypted };
      case 'memory_only':
        return { preferred: this.#memory };
      case 'memory_with_backup':
        return { preferred: this.#memory, fallback: this.#backup };
    }
  }

  #backendsOf(strategy: BackendStrategy): CredentialBackend[] {
    return strategy.fallback
      ? [strategy.preferred, strategy.fallback]
      : [strategy.preferred];
  }

  async #write(
    strategy: BackendStrategy,
    principal: string,
    credential: StoredCredential,
  ): Promise<void> {
    for (const backend of this.#backendsOf(strategy)) {
      await backend.write(principal, credential);
    }
  }

  async #read(
    strategy: BackendStrategy,
    principal: string,
  ): Promise<StoredCredential | null> {
    const preferred = await strategy.preferred.read(principal);
    if (preferred || !strategy.fallback) {
      return preferred;
    }

    const recovered = await strategy.fallback.read(principal);
    if (recovered) {
      // warm the preferred backend so later reads skip the fallback
      await strategy.preferred.write(principal, recovered);
      this.#log?.('debug', 'restored credential from fallback storage', {
        principal,
        from: strategy.fallback.kind,
      });
    }

    return recovered;
  }

  async #listStrategy(strategy: BackendStrategy): Promise<string[]> {
    const principals = new Set<string>();
    for (const backend of this.#backendsOf(strategy)) {
      for (const principal of await backend.list()) {
        principals.add(principal);
      }
    }

    return [...principals].sort();
  }

  async #migrateOne(
    principal: string,
    source: BackendStrategy,
    destination: BackendStrategy,
    purge: CredentialBackend[],
  ): Promise<MigrationOutcome> {
    try {
      const credential = await this.#read(source, principal);
      if (!credential) {
        return { status: 'missing' };
      }

      await this.#write(destination, principal, credential);
      for (const backend of purge) {
        await backend.delete(principal);
      }

      return { status: 'migrated' };
    } catch (error) {
      this.#log?.('error', 'failed to migrate stored credential', {
        principal,
        error: jsonifyError(error),
      });

      return {
        status: 'failed',
        message: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

import { fromCredentialWire, toCredentialWire } from '#codec';
import { decrypt, encrypt } from '#cipher';
import { StorageDecryptError } from '#errors';

import {
  deleteOptionalFile,
  getCredentialFilePath,
  listPrincipals,
  readOptionalFile,
  writeOwnerOnlyFile,
} from './files';

import type { Clock } from '@credgate/core';

import type { EncryptedCredentialWire } from '#codec';
import type { StorageMode, StoredCredential } from '#types';

import type { BackendKind, CredentialBackend } from './types';

/** options for an encrypted file backend */
export interface EncryptedFileBackendOptions {
  /** backend kind, `encrypted` for primary files and `backup` for crash-recovery copies */
  kind: Extract<BackendKind, 'encrypted' | 'backup'>;
  /** credentials directory */
  directory: string;
  /** file suffix for this kind of artefact */
  suffix: string;
  /** mode recorded inside each payload */
  storageMode: StorageMode;
  /** resolves the symmetric key, loading or generating it on first use */
  getKey: () => Promise<Buffer>;
  /** clock for the encryption timestamp */
  now: Clock;
}

/** one owner-only AES-256-GCM encrypted file per principal */
export class EncryptedFileBackend implements CredentialBackend {
  public readonly kind: BackendKind;
  public readonly persistent = true;
  #options: EncryptedFileBackendOptions;

  /**
   * creates an encrypted backend
   * @param options backend options
   */
  constructor(options: EncryptedFileBackendOptions) {
    this.kind = options.kind;
    this.#options = options;
  }

  public async read(principal: string): Promise<StoredCredential | null> {
    const content = await readOptionalFile(this.#path(principal));
    if (content === null) {
      return null;
    }

    const key = await this.#options.getKey();

    let parsed: unknown;
    try {
      parsed = JSON.parse(decrypt(content, key));
    } catch (error) {
      throw new StorageDecryptError(principal, 'cipher', { cause: error });
    }

    const credential = fromCredentialWire(parsed);
    if (!credential) {
      throw new StorageDecryptError(principal, 'format');
    }

    return credential;
  }

  public async write(
    principal: string,
    credential: StoredCredential,
  ): Promise<void> {
    const key = await this.#options.getKey();
    const payload: EncryptedCredentialWire = {
      ...toCredentialWire(credential),
      encrypted_at: new Date(this.#options.now()).toISOString(),
      storage_mode: this.#options.storageMode,
    };

    await writeOwnerOnlyFile(
      this.#path(principal),
      encrypt(JSON.stringify(payload), key),
    );
  }

  public async delete(principal: string): Promise<boolean> {
    return deleteOptionalFile(this.#path(principal));
  }

  public async list(): Promise<string[]> {
    return listPrincipals(this.#options.directory, this.#options.suffix);
  }

  #path(principal: string): string {
    return getCredentialFilePath(
      this.#options.directory,
      principal,
      this.#options.suffix,
    );
  }
}

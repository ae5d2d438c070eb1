import { fromCredentialWire, toCredentialWire } from '#codec';
import { StorageDecryptError } from '#errors';
import { FILE_SUFFIXES } from '#file-names';

import {
  deleteOptionalFile,
  getCredentialFilePath,
  listPrincipals,
  readOptionalFile,
  writeOwnerOnlyFile,
} from './files';

import type { StoredCredential } from '#types';

import type { BackendKind, CredentialBackend } from './types';

/** one owner-only json file per principal */
export class PlaintextFileBackend implements CredentialBackend {
  public readonly kind: BackendKind = 'plaintext';
  public readonly persistent = true;
  #directory: string;

  /**
   * creates a plaintext backend
   * @param directory credentials directory
   */
  constructor(directory: string) {
    this.#directory = directory;
  }

  public async read(principal: string): Promise<StoredCredential | null> {
    const content = await readOptionalFile(this.#path(principal));
    if (content === null) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new StorageDecryptError(principal, 'format', { cause: error });
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
    await writeOwnerOnlyFile(
      this.#path(principal),
      JSON.stringify(toCredentialWire(credential), null, 2),
    );
  }

  public async delete(principal: string): Promise<boolean> {
    return deleteOptionalFile(this.#path(principal));
  }

  public async list(): Promise<string[]> {
    return listPrincipals(this.#directory, FILE_SUFFIXES.plaintext);
  }

  #path(principal: string): string {
    return getCredentialFilePath(
      this.#directory,
      principal,
      FILE_SUFFIXES.plaintext,
    );
  }
}

import type { StoredCredential } from '#types';

import type { BackendKind, CredentialBackend } from './types';

/** process-local credential table, lost on restart */
export class MemoryBackend implements CredentialBackend {
  public readonly kind: BackendKind = 'memory';
  public readonly persistent = false;
  #credentials = new Map<string, StoredCredential>();

  public async read(principal: string): Promise<StoredCredential | null> {
    const credential = this.#credentials.get(principal);

    // hand out copies so callers never hold a reference into the table
    return credential ? structuredClone(credential) : null;
  }

  public async write(
    principal: string,
    credential: StoredCredential,
  ): Promise<void> {
    this.#credentials.set(principal, structuredClone(credential));
  }

  public async delete(principal: string): Promise<boolean> {
    return this.#credentials.delete(principal);
  }

  public async list(): Promise<string[]> {
    return [...this.#credentials.keys()];
  }
}

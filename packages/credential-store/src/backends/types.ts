import type { StoredCredential } from '#types';

/** kinds of place a credential can live */
export type BackendKind = 'memory' | 'plaintext' | 'encrypted' | 'backup';

/** one place a credential can be read from and written to */
export interface CredentialBackend {
  /** which kind of place this is */
  readonly kind: BackendKind;
  /** whether the backend survives a restart */
  readonly persistent: boolean;
  /**
   * reads the credential of a normalised principal
   * @throws {StorageDecryptError} when a record exists but cannot be read
   */
  read(principal: string): Promise<StoredCredential | null>;
  /** writes the credential of a normalised principal */
  write(principal: string, credential: StoredCredential): Promise<void>;
  /** deletes a record, returning whether one existed */
  delete(principal: string): Promise<boolean>;
  /** lists the principals with a record */
  list(): Promise<string[]>;
}

import type { Clock, Log } from '@credgate/core';

/** interchangeable persistence policies for stored credentials */
export type StorageMode =
  | 'plaintext_file'
  | 'encrypted_file'
  | 'memory_only'
  | 'memory_with_backup';

/** all storage modes in declaration order */
export const STORAGE_MODES: readonly StorageMode[] = [
  'plaintext_file',
  'encrypted_file',
  'memory_only',
  'memory_with_backup',
];

/**
 * checks whether a string names a storage mode
 * @param value candidate mode, e.g. from an environment variable
 * @returns true if the value is a storage mode
 */
export function isStorageMode(value: string): value is StorageMode {
  return STORAGE_MODES.some((mode) => mode === value);
}

/** long-lived provider credential held for one principal */
export interface StoredCredential {
  /** provider access token */
  token: string;
  /** provider refresh token, if one was issued */
  refreshToken?: string;
  /** token endpoint the credential was issued by */
  tokenUri: string;
  /** provider client identifier in effect when issued */
  clientId: string;
  /** provider client secret in effect when issued */
  clientSecret: string;
  /** granted scopes */
  scopes: string[];
  /** access token expiry in epoch milliseconds */
  expiresAt?: number;
}

/** options for the credential store */
export interface CredentialStoreOptions {
  /** active storage mode */
  mode: StorageMode;
  /** directory holding credential files and the generated encryption key */
  directory: string;
  /** externally supplied 32-byte key, base64 or base64url encoded */
  encryptionKey?: string;
  /** optional logger */
  log?: Log;
  /** clock used for encryption timestamps */
  now?: Clock;
}

/** outcome of migrating one principal */
export type MigrationOutcome =
  | { status: 'migrated' }
  | { status: 'missing' }
  | { status: 'failed'; message: string };

/** options for a storage migration */
export interface MigrationOptions {
  /** delete artefacts that only the source mode uses once they are copied */
  purgeSource?: boolean;
}

/** per-principal migration report */
export interface MigrationReport {
  /** mode before migration */
  from: StorageMode;
  /** mode after migration */
  to: StorageMode;
  /** outcome keyed by principal */
  results: Record<string, MigrationOutcome>;
}

/** read-only view of the store for operational tooling */
export interface StorageSummary {
  /** active mode */
  mode: StorageMode;
  /** principals with an in-memory copy */
  principalsInMemory: string[];
  /** principals with any credential file on disk */
  principalsOnDisk: string[];
}

export type { BackendKind, CredentialBackend } from '#backends/types';
export type { BackendStrategy } from '#store';
export type {
  CredentialStoreOptions,
  MigrationOptions,
  MigrationOutcome,
  MigrationReport,
  StorageMode,
  StorageSummary,
  StoredCredential,
} from '#types';

export { CredentialStore } from '#store';
export { StorageDecryptError } from '#errors';
export { STORAGE_MODES, isStorageMode } from '#types';
export { decodeEncryptionKey } from '#key';
export { principalToFileStem } from '#file-names';

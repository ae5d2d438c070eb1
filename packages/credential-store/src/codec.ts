import type { StorageMode, StoredCredential } from '#types';

/** on-disk shape of a credential */
export interface CredentialWire {
  token: string;
  refresh_token: string | null;
  token_uri: string;
  client_id: string;
  client_secret: string;
  scopes: string[];
  /** ISO-8601 expiry */
  expiry: string | null;
}

/** decrypted shape of an encrypted credential */
export interface EncryptedCredentialWire extends CredentialWire {
  /** ISO-8601 time the payload was written */
  encrypted_at: string;
  /** mode that wrote the payload */
  storage_mode: StorageMode;
}

/**
 * converts a credential to its on-disk shape
 * @param credential credential to serialise
 * @returns wire record
 */
export function toCredentialWire(credential: StoredCredential): CredentialWire {
  return {
    token: credential.token,
    refresh_token: credential.refreshToken ?? null,
    token_uri: credential.tokenUri,
    client_id: credential.clientId,
    client_secret: credential.clientSecret,
    scopes: [...credential.scopes],
    expiry:
      credential.expiresAt === undefined
        ? null
        : new Date(credential.expiresAt).toISOString(),
  };
}

/**
 * validates and converts a parsed wire record back to a credential
 * @param value value produced by JSON.parse
 * @returns the credential or null if the record is malformed
 */
export function fromCredentialWire(value: unknown): StoredCredential | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }

  const token = readString(value, 'token');
  const tokenUri = readString(value, 'token_uri');
  const clientId = readString(value, 'client_id');
  const clientSecret = readString(value, 'client_secret');
  const scopes = 'scopes' in value ? value.scopes : undefined;

  if (
    token === undefined ||
    tokenUri === undefined ||
    clientId === undefined ||
    clientSecret === undefined ||
    !Array.isArray(scopes) ||
    !scopes.every((scope): scope is string => typeof scope === 'string')
  ) {
    return null;
  }

  const refreshToken = readString(value, 'refresh_token');
  const expiry = readString(value, 'expiry');
  const expiresAt = expiry === undefined ? undefined : Date.parse(expiry);

  if (expiresAt !== undefined && Number.isNaN(expiresAt)) {
    return null;
  }

  return {
    token,
    ...(refreshToken !== undefined && { refreshToken }),
    tokenUri,
    clientId,
    clientSecret,
    scopes,
    ...(expiresAt !== undefined && { expiresAt }),
  };
}

/**
 * reads a string property from an unknown object
 * @param value object to read from
 * @param key property name
 * @returns the string or undefined when absent or not a string
 */
function readString(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key);

  return typeof field === 'string' ? field : undefined;
}

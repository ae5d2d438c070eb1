import { SecurityError } from '@credgate/core';

/** why a stored payload could not be turned back into a credential */
export type DecryptFailureReason = 'cipher' | 'format';

/**
 * raised when a stored credential exists but cannot be read back,
 * which points at a key mismatch or tampering
 */
export class StorageDecryptError extends SecurityError {
  public readonly principal: string;
  public readonly reason: DecryptFailureReason;

  /**
   * creates a new StorageDecryptError
   * @param principal principal whose record failed
   * @param reason whether the cipher or the decoded payload was rejected
   * @param options standard error options such as cause
   */
  constructor(
    principal: string,
    reason: DecryptFailureReason,
    options?: ErrorOptions,
  ) {
    super(
      'storage_decrypt_failed',
      `stored credential for ${principal} could not be read (${reason})`,
      options,
    );
    this.name = 'StorageDecryptError';
    this.principal = principal;
    this.reason = reason;
  }
}

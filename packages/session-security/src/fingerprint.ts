import { createHash } from 'node:crypto';

const UNKNOWN = 'unknown';

/** connection-level attributes a fingerprint is derived from */
export interface ConnectionInfo {
  /** peer address */
  ip?: string;
  /** declared client agent string */
  userAgent?: string;
  /** negotiated tls protocol, e.g. `TLSv1.3` */
  tlsVersion?: string;
  /** negotiated cipher suite */
  cipherSuite?: string;
}

/**
 * derives a content-addressed fingerprint from connection attributes
 * missing attributes hash as `unknown`, so plain http connections still fingerprint
 * @param info connection attributes
 * @returns hex sha-256 of the canonical attribute json
 */
export function computeConnectionFingerprint(info: ConnectionInfo): string {
  // keys in sorted order so the serialisation is canonical
  const canonical = JSON.stringify({
    cipher_suite: info.cipherSuite ?? UNKNOWN,
    ip: info.ip ?? UNKNOWN,
    tls_version: info.tlsVersion ?? UNKNOWN,
    user_agent: info.userAgent ?? UNKNOWN,
  });

  return createHash('sha256').update(canonical, 'utf8').digest('hex');
}

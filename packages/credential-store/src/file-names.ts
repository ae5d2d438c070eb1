import { normalizePrincipal } from '@credgate/core';

const SAFE_CHARACTER = /^[a-z0-9._-]$/;
const HEX_RADIX = 16;

/** file suffixes, one per kind of on-disk artefact */
export const FILE_SUFFIXES = {
  plaintext: '.credentials.json',
  encrypted: '.credentials.enc',
  backup: '.backup.enc',
} as const;

/** name of the generated key file inside the credentials directory */
export const KEY_FILE_NAME = '.encryption-key';

/**
 * derives a deterministic, reversible file stem from a principal
 * bytes outside `[a-z0-9._-]` are percent-escaped so no principal can name a path
 * @param principal principal identifier
 * @returns file stem without suffix
 */
export function principalToFileStem(principal: string): string {
  let stem = '';
  for (const byte of Buffer.from(normalizePrincipal(principal), 'utf8')) {
    const character = String.fromCharCode(byte);
    stem += SAFE_CHARACTER.test(character)
      ? character
      : '%' + byte.toString(HEX_RADIX).toUpperCase().padStart(2, '0');
  }

  return stem;
}

/**
 * recovers the principal from a file name
 * @param fileName directory entry
 * @param suffix suffix of the artefact kind being listed
 * @returns principal or undefined when the entry is not of that kind
 */
export function fileNameToPrincipal(
  fileName: string,
  suffix: string,
): string | undefined {
  if (!fileName.endsWith(suffix) || fileName.length === suffix.length) {
    return undefined;
  }

  try {
    return decodeURIComponent(fileName.slice(0, -suffix.length));
  } catch {
    return undefined;
  }
}

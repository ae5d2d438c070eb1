import { randomBytes } from 'node:crypto';
import {
  chmod,
  mkdir,
  readdir,
  readFile,
  rename,
  rm,
  writeFile,
} from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { fileNameToPrincipal, principalToFileStem } from '#file-names';
import { isErrnoException } from '#key';

const DIRECTORY_MODE = 0o700;
const FILE_MODE = 0o600;
const TEMP_SUFFIX_BYTES = 6;

/**
 * gets the path of a principal's artefact
 * @param directory credentials directory
 * @param principal normalised principal
 * @param suffix artefact suffix
 * @returns absolute or directory-relative file path
 */
export function getCredentialFilePath(
  directory: string,
  principal: string,
  suffix: string,
): string {
  return join(directory, principalToFileStem(principal) + suffix);
}

/**
 * writes a file readable only by its owner, replacing any previous version atomically
 * @param path target path
 * @param data file content
 */
export async function writeOwnerOnlyFile(
  path: string,
  data: string,
): Promise<void> {
  const directory = dirname(path);
  await mkdir(directory, { recursive: true, mode: DIRECTORY_MODE });

  const temporary = `${path}.${randomBytes(TEMP_SUFFIX_BYTES).toString('hex')}.tmp`;
  await writeFile(temporary, data, { encoding: 'utf8', mode: FILE_MODE });
  // mode on writeFile is only applied at creation and is subject to umask
  await chmod(temporary, FILE_MODE);
  await rename(temporary, path);
}

/**
 * reads a file that may not exist
 * @param path file path
 * @returns content or null when the file is missing
 */
export async function readOptionalFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }

    throw error;
  }
}

/**
 * deletes a file that may not exist
 * @param path file path
 * @returns true if a file was deleted
 */
export async function deleteOptionalFile(path: string): Promise<boolean> {
  try {
    await rm(path);

    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }

    throw error;
  }
}

/**
 * lists principals that have an artefact with the given suffix
 * @param directory credentials directory
 * @param suffix artefact suffix
 * @returns principals, empty when the directory does not exist yet
 */
export async function listPrincipals(
  directory: string,
  suffix: string,
): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }

    throw error;
  }

  const principals: string[] = [];
  for (const entry of entries) {
    const principal = fileNameToPrincipal(entry, suffix);
    if (principal !== undefined) {
      principals.push(principal);
    }
  }

  return principals;
}

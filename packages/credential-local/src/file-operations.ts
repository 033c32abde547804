import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { DIRECTORY_MODE, FILE_MODE } from '#constants';

import type { JsonValue } from '@repoctl/core';

/**
 * checks whether a file system error reports a missing file
 * @param error value thrown by a file system call
 * @returns true for ENOENT errors
 */
function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * loads and parses a json file
 * @param filePath absolute file path
 * @returns parsed document, or undefined when the file does not exist
 * @throws {Error} when the file cannot be read or holds invalid json
 */
export async function readJsonFile(
  filePath: string,
): Promise<JsonValue | undefined> {
  let data: string;

  try {
    data = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isFileNotFound(error)) {
      return undefined;
    }

    throw error;
  }

  try {
    return JSON.parse(data);
  } catch (error) {
    throw new Error(
      `failed to parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

/**
 * writes a json file through a temporary sibling and a rename
 *
 * readers see either the previous or the complete new document; a failed
 * write or rename removes the temporary file
 * @param filePath absolute file path
 * @param value document to serialize
 */
export async function writeJsonFile(
  filePath: string,
  value: unknown,
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true, mode: DIRECTORY_MODE });

  const temporaryPath = `${filePath}.${randomUUID()}.tmp`;

  try {
    await writeFile(temporaryPath, JSON.stringify(value, null, 2), {
      encoding: 'utf-8',
      mode: FILE_MODE,
    });
    await rename(temporaryPath, filePath);
  } catch (error) {
    await rm(temporaryPath, { force: true });

    throw error;
  }
}

/**
 * deletes a file, resolving when it does not exist
 * @param filePath absolute file path
 */
export async function removeFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

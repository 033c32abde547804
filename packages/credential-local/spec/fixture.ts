/** shared paths and documents for json file storage tests */

export const testStoreDirectory = '/tmp/repoctl-test';

export const testCredentialPath = `${testStoreDirectory}/token.json`;

export const testConfigPath = `${testStoreDirectory}/config.json`;

/** fixed id used for temporary file names */
export const testTemporaryId = '00000000-0000-4000-8000-000000000000';

/**
 * creates the error node reports for a missing file
 * @param path path that does not exist
 * @returns error carrying the ENOENT code
 */
export function fileNotFound(path: string): NodeJS.ErrnoException {
  return Object.assign(
    new Error(`ENOENT: no such file or directory, open '${path}'`),
    { code: 'ENOENT' },
  );
}

/**
 * serializes a document the way the stores write it
 * @param value document
 * @returns pretty printed json
 */
export function prettyJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

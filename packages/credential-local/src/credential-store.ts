import { join } from 'node:path';

import {
  CredentialNotFoundError,
  CredentialStore,
  decodeCredential,
  encodeCredential,
} from '@repoctl/core';

import { CREDENTIAL_FILE_NAME } from '#constants';
import { readJsonFile, removeFile, writeJsonFile } from '#file-operations';
import { resolveStoreDirectory } from '#types';

import type { Credential } from '@repoctl/core';

import type { LocalStoreOptions } from '#types';

/** json file-based credential storage */
export class LocalCredentialStore extends CredentialStore {
  #filePath: string;

  /**
   * creates new credential storage in the specified directory
   * @param options configuration for the storage
   */
  constructor(options?: LocalStoreOptions) {
    super();

    this.#filePath = join(resolveStoreDirectory(options), CREDENTIAL_FILE_NAME);
  }

  /** absolute path of the credential file */
  public get filePath(): string {
    return this.#filePath;
  }

  /**
   * reads and validates the credential file
   * @returns stored credential
   * @throws {CredentialNotFoundError} when the file does not exist
   * @throws {import('@repoctl/core').InvalidCredentialError} when the document is malformed
   */
  public async load(): Promise<Credential> {
    const document = await readJsonFile(this.#filePath);

    if (document === undefined) {
      throw new CredentialNotFoundError(
        `no stored credential found at ${this.#filePath}`,
      );
    }

    return decodeCredential(document);
  }

  /**
   * replaces the credential file
   * @param credential credential to persist
   */
  public async save(credential: Credential): Promise<void> {
    await writeJsonFile(this.#filePath, encodeCredential(credential));
  }

  /** deletes the credential file if present */
  public async clear(): Promise<void> {
    await removeFile(this.#filePath);
  }
}

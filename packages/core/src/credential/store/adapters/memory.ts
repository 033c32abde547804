import { CredentialNotFoundError } from '../../errors';
import { CredentialStore } from '../store';

import type { Credential } from '../../types';

/**
 * in-memory credential storage
 * keeps the credential for the lifetime of the process without persistence
 */
export class MemoryCredentialStore extends CredentialStore {
  #credential?: Credential;

  /**
   * creates memory storage, optionally seeded with a credential
   * @param credential initial credential
   */
  constructor(credential?: Credential) {
    super();

    this.#credential = credential;
  }

  public async load(): Promise<Credential> {
    if (!this.#credential) {
      throw new CredentialNotFoundError();
    }

    return { ...this.#credential };
  }

  public async save(credential: Credential): Promise<void> {
    this.#credential = { ...credential };
  }

  public async clear(): Promise<void> {
    this.#credential = undefined;
  }
}

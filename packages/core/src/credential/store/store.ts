import type { Credential } from '../types';

/** credential storage backend interface */
export abstract class CredentialStore {
  /**
   * retrieves the stored credential
   * @returns stored credential
   * @throws {import('../errors').CredentialNotFoundError} when nothing is stored
   */
  public abstract load(): Promise<Credential>;
  /** replaces the stored credential */
  public abstract save(credential: Credential): Promise<void>;
  /** removes the stored credential, resolving even when none exists */
  public abstract clear(): Promise<void>;
}

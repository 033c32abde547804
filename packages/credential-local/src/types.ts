import { homedir } from 'node:os';
import { join } from 'node:path';

import { APP_DIRECTORY_NAME } from '#constants';

/** configuration options for json file-based storage */
export interface LocalStoreOptions {
  /** directory holding the json files (defaults to ~/.config/repoctl) */
  directory?: string;
}

/** application settings persisted next to the credential */
export interface AppConfig {
  /** workspace used when a command names none */
  defaultWorkspace?: string;
  /** output format used when a command names none */
  defaultFormat: string;
  /** oauth consumer key registered for this application */
  oauthKey?: string;
  /** oauth consumer secret registered for this application */
  oauthSecret?: string;
}

/**
 * resolves the directory holding the json files
 * @param options storage options
 * @returns configured directory or the default under the home directory
 */
export function resolveStoreDirectory(options?: LocalStoreOptions): string {
  return options?.directory ?? join(homedir(), '.config', APP_DIRECTORY_NAME);
}

export { LocalConfigStore, toApplicationCredential } from '#config-store';
export {
  APP_DIRECTORY_NAME,
  CONFIG_FILE_NAME,
  CREDENTIAL_FILE_NAME,
  DEFAULT_OUTPUT_FORMAT,
} from '#constants';
export { LocalCredentialStore } from '#credential-store';
export { InvalidConfigurationError } from '#errors';
export { resolveStoreDirectory } from '#types';

export type { AppConfig, LocalStoreOptions } from '#types';

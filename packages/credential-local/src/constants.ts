/** directory name under the user's config directory */
export const APP_DIRECTORY_NAME = 'repoctl';

/** file holding the stored credential */
export const CREDENTIAL_FILE_NAME = 'token.json';

/** file holding the application configuration */
export const CONFIG_FILE_NAME = 'config.json';

/** permissions of the store directory, owner only */
export const DIRECTORY_MODE = 0o700;

/** permissions of stored files, owner read/write only */
export const FILE_MODE = 0o600;

/** output format used when the configuration names none */
export const DEFAULT_OUTPUT_FORMAT = 'table';

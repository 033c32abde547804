import { join } from 'node:path';

import { Ajv } from 'ajv';

import { CONFIG_FILE_NAME, DEFAULT_OUTPUT_FORMAT } from '#constants';
import { InvalidConfigurationError } from '#errors';
import { readJsonFile, writeJsonFile } from '#file-operations';
import { resolveStoreDirectory } from '#types';

import type { OAuthApplicationCredential } from '@repoctl/core';
import type { SchemaObject } from 'ajv';

import type { AppConfig, LocalStoreOptions } from '#types';

/* eslint-disable @typescript-eslint/naming-convention */
/** persisted configuration document */
interface StoredConfig {
  default_workspace?: string;
  default_format?: string;
  oauth_key?: string;
  oauth_secret?: string;
}
/* eslint-enable @typescript-eslint/naming-convention */

/** json schema of the persisted configuration document */
const storedConfigSchema = {
  type: 'object',
  properties: {
    default_workspace: { type: 'string' },
    default_format: { type: 'string' },
    oauth_key: { type: 'string' },
    oauth_secret: { type: 'string' },
  },
} as const satisfies SchemaObject;

const ajv = new Ajv({ strict: false });

const validateStoredConfig = ajv.compile<StoredConfig>(storedConfigSchema);

/** json file-based application configuration storage */
export class LocalConfigStore {
  #filePath: string;

  /**
   * creates new configuration storage in the specified directory
   * @param options configuration for the storage
   */
  constructor(options?: LocalStoreOptions) {
    this.#filePath = join(resolveStoreDirectory(options), CONFIG_FILE_NAME);
  }

  /** absolute path of the configuration file */
  public get filePath(): string {
    return this.#filePath;
  }

  /**
   * reads the configuration file
   * @returns stored configuration, or the defaults when no file exists
   * @throws {InvalidConfigurationError} when the document is malformed
   */
  public async load(): Promise<AppConfig> {
    const document = await readJsonFile(this.#filePath);

    if (document === undefined) {
      return { defaultFormat: DEFAULT_OUTPUT_FORMAT };
    }

    if (!validateStoredConfig(document)) {
      throw new InvalidConfigurationError(
        `invalid configuration in ${this.#filePath}: ${ajv.errorsText(validateStoredConfig.errors)}`,
      );
    }

    return {
      defaultWorkspace: document.default_workspace || undefined,
      defaultFormat: document.default_format || DEFAULT_OUTPUT_FORMAT,
      oauthKey: document.oauth_key || undefined,
      oauthSecret: document.oauth_secret || undefined,
    };
  }

  /**
   * replaces the configuration file
   * @param config configuration to persist
   */
  public async save(config: AppConfig): Promise<void> {
    const document: StoredConfig = {
      default_workspace: config.defaultWorkspace ?? '',
      default_format: config.defaultFormat,
      oauth_key: config.oauthKey ?? '',
      oauth_secret: config.oauthSecret ?? '',
    };

    await writeJsonFile(this.#filePath, document);
  }
}

/**
 * extracts the oauth application credential from the configuration
 * @param config loaded configuration
 * @returns client id and secret, or undefined unless both are configured
 */
export function toApplicationCredential(
  config: AppConfig,
): OAuthApplicationCredential | undefined {
  if (!config.oauthKey || !config.oauthSecret) {
    return undefined;
  }

  return { clientId: config.oauthKey, clientSecret: config.oauthSecret };
}

import { describe, expect, it, vi } from 'vitest';

import { LocalConfigStore, toApplicationCredential } from '#config-store';
import { InvalidConfigurationError } from '#errors';

import {
  fileNotFound,
  prettyJson,
  testConfigPath,
  testStoreDirectory,
  testTemporaryId,
} from './fixture';

const { mkdir, readFile, rename, rm, writeFile } = vi.hoisted(() => ({
  mkdir: vi.fn(async (_path: string, _options?: object) => undefined),
  readFile: vi.fn(
    async (_path: string, _encoding?: string): Promise<string> => '',
  ),
  rename: vi.fn(async (_from: string, _to: string) => undefined),
  rm: vi.fn(async (_path: string, _options?: object) => undefined),
  writeFile: vi.fn(
    async (_path: string, _data: string, _options?: object) => undefined,
  ),
}));

vi.mock('node:fs/promises', () => ({ mkdir, readFile, rename, rm, writeFile }));

vi.mock('node:crypto', () => ({
  randomUUID: () => '00000000-0000-4000-8000-000000000000',
}));

describe('cl:LocalConfigStore', () => {
  const createStore = (): LocalConfigStore =>
    new LocalConfigStore({ directory: testStoreDirectory });

  describe('gt:filePath', () => {
    it('should place config.json in the given directory', () => {
      expect(createStore().filePath).toBe(testConfigPath);
    });
  });

  describe('mt:load', () => {
    it('should return the defaults when no file exists', async () => {
      readFile.mockRejectedValueOnce(fileNotFound(testConfigPath));

      expect(await createStore().load()).toEqual({ defaultFormat: 'table' });
    });

    it('should map the stored document', async () => {
      readFile.mockResolvedValueOnce(
        prettyJson({
          default_workspace: 'team',
          default_format: 'json',
          oauth_key: 'test-key',
          oauth_secret: 'test-secret',
        }),
      );

      expect(await createStore().load()).toEqual({
        defaultWorkspace: 'team',
        defaultFormat: 'json',
        oauthKey: 'test-key',
        oauthSecret: 'test-secret',
      });
    });

    it('should treat empty values as unset', async () => {
      readFile.mockResolvedValueOnce(
        prettyJson({
          default_workspace: '',
          default_format: '',
          oauth_key: '',
          oauth_secret: '',
        }),
      );

      expect(await createStore().load()).toEqual({ defaultFormat: 'table' });
    });

    it('should reject a malformed document', async () => {
      readFile.mockResolvedValueOnce(prettyJson({ oauth_key: 42 }));

      await expect(createStore().load()).rejects.toThrow(
        new InvalidConfigurationError(
          'invalid configuration in /tmp/repoctl-test/config.json: data/oauth_key must be string',
        ),
      );
    });

    it('should raise a typed error for a malformed document', async () => {
      readFile.mockResolvedValueOnce(prettyJson(['table']));

      await expect(createStore().load()).rejects.toBeInstanceOf(
        InvalidConfigurationError,
      );
    });
  });

  describe('mt:save', () => {
    it('should write every key, leaving unset values empty', async () => {
      await createStore().save({ defaultFormat: 'table', oauthKey: 'test-key' });

      expect(writeFile).toHaveBeenCalledWith(
        `${testConfigPath}.${testTemporaryId}.tmp`,
        prettyJson({
          default_workspace: '',
          default_format: 'table',
          oauth_key: 'test-key',
          oauth_secret: '',
        }),
        { encoding: 'utf-8', mode: 0o600 },
      );
      expect(rename).toHaveBeenCalledWith(
        `${testConfigPath}.${testTemporaryId}.tmp`,
        testConfigPath,
      );
    });
  });
});

describe('fn:toApplicationCredential', () => {
  it('should return the key and secret as client id and secret', () => {
    expect(
      toApplicationCredential({
        defaultFormat: 'table',
        oauthKey: 'test-key',
        oauthSecret: 'test-secret',
      }),
    ).toEqual({ clientId: 'test-key', clientSecret: 'test-secret' });
  });

  it('should return undefined unless both are configured', () => {
    expect(
      toApplicationCredential({ defaultFormat: 'table', oauthKey: 'test-key' }),
    ).toBeUndefined();
    expect(
      toApplicationCredential({
        defaultFormat: 'table',
        oauthSecret: 'test-secret',
      }),
    ).toBeUndefined();
  });
});

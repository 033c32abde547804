import { describe, expect, it, vi } from 'vitest';

import {
  AuthConfigurationError,
  ExternalError,
  SessionExpiredError,
} from '#errors';
import { refreshCredential } from '#oauth';

import { APPLICATION } from '../mocks/fixtures';

import type {
  CredentialStore,
  OAuthApplicationCredential,
  RefreshableCredential,
} from '@repoctl/core';
import type { Mock } from 'vitest';

import type { TokenRefresher } from '#oauth';

const incompleteApplications: Array<
  [string, OAuthApplicationCredential | undefined]
> = [
  ['missing', undefined],
  ['without a secret', { clientId: 'test-client-id', clientSecret: '' }],
  ['without an id', { clientId: '', clientSecret: 'test-client-secret' }],
];

const expired: RefreshableCredential = {
  method: 'oauth',
  accessToken: 'A1',
  refreshToken: 'R1',
};

/**
 * creates a refresher stub
 * @param implementation refresh behaviour
 * @returns refresher and its mock
 */
function createRefresher(
  implementation: TokenRefresher['refresh'],
): { refresh: Mock<TokenRefresher['refresh']> } {
  return { refresh: vi.fn<TokenRefresher['refresh']>(implementation) };
}

/**
 * creates a store stub recording saved credentials
 * @returns store whose save resolves
 */
function createStore(): { save: Mock<CredentialStore['save']> } {
  return { save: vi.fn<CredentialStore['save']>(async () => undefined) };
}

describe('fn:refreshCredential', () => {
  it('should call the refresher with the application and refresh token', async () => {
    const refresher = createRefresher(async () => ({
      method: 'oauth',
      accessToken: 'A2',
      refreshToken: 'R2',
    }));

    await refreshCredential({
      credential: expired,
      application: APPLICATION,
      refresher,
      store: createStore(),
    });

    expect(refresher.refresh).toHaveBeenCalledWith(
      'test-client-id',
      'test-client-secret',
      'R1',
    );
  });

  it('should persist and return the renewed credential', async () => {
    const store = createStore();

    const renewed = await refreshCredential({
      credential: expired,
      application: APPLICATION,
      refresher: createRefresher(async () => ({
        method: 'oauth',
        accessToken: 'A2',
        refreshToken: 'R2',
        expiresIn: 7200,
      })),
      store,
    });

    expect(renewed).toEqual({
      method: 'oauth',
      accessToken: 'A2',
      refreshToken: 'R2',
      expiresIn: 7200,
    });
    expect(store.save).toHaveBeenCalledTimes(1);
    expect(store.save).toHaveBeenCalledWith(renewed);
  });

  it('should keep the previous refresh token when none is returned', async () => {
    const renewed = await refreshCredential({
      credential: expired,
      application: APPLICATION,
      refresher: createRefresher(async () => ({
        method: 'oauth',
        accessToken: 'A2',
      })),
      store: createStore(),
    });

    expect(renewed.refreshToken).toBe('R1');
  });

  it('should keep the previous refresh token when an empty one is returned', async () => {
    const renewed = await refreshCredential({
      credential: expired,
      application: APPLICATION,
      refresher: createRefresher(async () => ({
        method: 'oauth',
        accessToken: 'A2',
        refreshToken: '',
      })),
      store: createStore(),
    });

    expect(renewed.refreshToken).toBe('R1');
  });

  it.each(incompleteApplications)(
    'should fail with a configuration error when the application is %s',
    async (_, application) => {
      const refresher = createRefresher(async () => ({
        method: 'oauth',
        accessToken: 'A2',
      }));

      await expect(
        refreshCredential({
          credential: expired,
          application,
          refresher,
          store: createStore(),
        }),
      ).rejects.toThrow(
        new AuthConfigurationError(
          'OAuth application credentials not configured, cannot refresh the expired session',
        ),
      );
      expect(refresher.refresh).not.toHaveBeenCalled();
    },
  );

  it('should fail with a session expired error and save nothing when refresh is rejected', async () => {
    const rejection = new ExternalError(
      'token refresh failed (HTTP 400): {"error":"invalid_grant"}',
    );
    const store = createStore();

    const refreshing = refreshCredential({
      credential: expired,
      application: APPLICATION,
      refresher: createRefresher(async () => {
        throw rejection;
      }),
      store,
    });

    await expect(refreshing).rejects.toThrow(SessionExpiredError);
    await expect(refreshing).rejects.toThrow(
      'session expired, please re-authenticate: token refresh failed (HTTP 400): {"error":"invalid_grant"}',
    );
    await expect(refreshing).rejects.toHaveProperty('cause', rejection);
    expect(store.save).not.toHaveBeenCalled();
  });

  it('should fail when the renewed credential cannot be saved', async () => {
    const store = createStore();
    store.save.mockRejectedValueOnce(new Error('permission denied'));

    await expect(
      refreshCredential({
        credential: expired,
        application: APPLICATION,
        refresher: createRefresher(async () => ({
          method: 'oauth',
          accessToken: 'A2',
        })),
        store,
      }),
    ).rejects.toThrow(
      new ExternalError('failed to save refreshed credential: permission denied'),
    );
  });
});

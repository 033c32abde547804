/**
 * @file recovery of an expired oauth credential
 *
 * coordinates the refresh token grant, refresh token preservation and
 * persistence of the renewed credential, separate from the request executor
 * so that each step can be exercised without a transport
 */

import { AuthConfigurationError, ExternalError, SessionExpiredError } from '#errors';

import type {
  CredentialStore,
  OAuthApplicationCredential,
  OAuthCredential,
  RefreshableCredential,
} from '@repoctl/core';

import type { TokenRefresher } from './token-refresher';

/** collaborators and state needed to renew a credential */
export interface CredentialRefreshParams {
  /** expired credential carrying the refresh token */
  credential: RefreshableCredential;
  /** client id and secret of this application */
  application?: OAuthApplicationCredential;
  /** performs the token endpoint exchange */
  refresher: TokenRefresher;
  /** receives the renewed credential */
  store: Pick<CredentialStore, 'save'>;
}

/**
 * renews an expired oauth credential and persists it
 *
 * servers do not always rotate refresh tokens, so the previous refresh token
 * is kept when the response carries none; nothing is saved when the
 * exchange fails, leaving the stale credential on disk
 * @param params credential, application and collaborators
 * @returns renewed credential, already persisted
 * @throws {AuthConfigurationError} when no application credential is configured
 * @throws {SessionExpiredError} when the token endpoint rejects the refresh
 * @throws {ExternalError} when the renewed credential cannot be saved
 */
export async function refreshCredential(
  params: CredentialRefreshParams,
): Promise<OAuthCredential> {
  const { credential, application, refresher, store } = params;

  if (!application?.clientId || !application.clientSecret) {
    throw new AuthConfigurationError(
      'OAuth application credentials not configured, cannot refresh the expired session',
    );
  }

  let refreshed: OAuthCredential;

  try {
    refreshed = await refresher.refresh(
      application.clientId,
      application.clientSecret,
      credential.refreshToken,
    );
  } catch (error) {
    throw new SessionExpiredError(
      `session expired, please re-authenticate: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  const renewed: OAuthCredential = {
    ...refreshed,
    refreshToken: refreshed.refreshToken || credential.refreshToken,
  };

  try {
    await store.save(renewed);
  } catch (error) {
    throw new ExternalError(
      `failed to save refreshed credential: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  return renewed;
}

export {
  createTokenRefresher,
  refreshAccessToken,
  toOAuthCredential,
} from './token-refresher';
export { refreshCredential } from './credential-refresh';

export type { CredentialRefreshParams } from './credential-refresh';
export type { TokenRefresher, TokenRefresherOptions } from './token-refresher';
export type { OAuthTokenResponse } from './types';

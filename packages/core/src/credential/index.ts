export { decodeCredential, encodeCredential } from './codec';
export { CredentialNotFoundError, InvalidCredentialError } from './errors';
export { CredentialStore } from './store/store';
export { isRefreshable } from './types';

export type { StoredCredential } from './codec';
export type {
  AuthMethod,
  BasicCredential,
  Credential,
  OAuthApplicationCredential,
  OAuthCredential,
  RefreshableCredential,
} from './types';

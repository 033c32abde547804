export type { Log, LogLevel } from '#logging';
export type {
  JsonifibleObject,
  JsonifibleValue,
  JsonObject,
  JsonPrimitive,
  JsonValue,
} from '#json';
export type {
  AuthMethod,
  BasicCredential,
  Credential,
  OAuthApplicationCredential,
  OAuthCredential,
  RefreshableCredential,
  StoredCredential,
} from '#credential';

export { jsonifyError } from '#error';
export { filterLog, isLogLevel } from '#logging';
export {
  CredentialNotFoundError,
  CredentialStore,
  InvalidCredentialError,
  decodeCredential,
  encodeCredential,
  isRefreshable,
} from '#credential';

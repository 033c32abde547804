export { ApiClient, createApiClient } from '#client';
export {
  DEFAULT_LOG_LEVEL,
  LOG_LEVEL_ENV,
  REQUEST_TIMEOUT_ENV,
  resolveLogLevel,
  resolveRequestTimeout,
} from '#config';
export {
  DEFAULT_API_BASE_URL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_TOKEN_ENDPOINT,
} from '#constants/defaults';
export {
  ApiError,
  AuthConfigurationError,
  ExternalError,
  SessionExpiredError,
  TransportError,
} from '#errors';
export { RequestExecutor } from '#executor';
export {
  createTokenRefresher,
  refreshAccessToken,
  refreshCredential,
} from '#oauth';
export {
  decodeResponse,
  handleResponse,
  isNoContent,
  responseText,
} from '#response';

export type {
  ApiClientParams,
  CreateApiClientOptions,
  PaginatedResponse,
  PaginateOptions,
} from '#client';
export type { RequestExecutorParams } from '#executor';
export type {
  OAuthTokenResponse,
  TokenRefresher,
  TokenRefresherOptions,
} from '#oauth';
export type { HttpMethod, RequestBody } from '#request';
export type { ResponseEnvelope } from '#response';
export type { Fetch } from '#transport';

import { MS_PER_SECOND } from './time';

/** base url that relative api paths are appended to */
export const DEFAULT_API_BASE_URL = 'https://api.bitbucket.org/2.0';

/** oauth token endpoint used for the refresh token grant */
export const DEFAULT_TOKEN_ENDPOINT =
  'https://bitbucket.org/site/oauth2/access_token';

/** default overall time limit of a single http request in milliseconds */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30 * MS_PER_SECOND;

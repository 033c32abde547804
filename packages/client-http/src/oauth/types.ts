/**
 * OAuth 2.0 token response per RFC 6749 Section 5.1
 *
 * response from the token endpoint after a refresh token grant; the hosting
 * service reports granted scopes as `scopes`, other servers as `scope`
 */
/* eslint-disable @typescript-eslint/naming-convention */
export interface OAuthTokenResponse {
  /** OAuth 2.0 access token for accessing protected resources */
  access_token: string;

  /** type of token issued, typically 'bearer' per RFC 6750 */
  token_type?: string;

  /** lifetime in seconds of the access token */
  expires_in?: number;

  /** rotated refresh token, empty or absent when the server keeps the old one */
  refresh_token?: string;

  /** granted scopes as space-delimited string */
  scopes?: string;

  /** granted scopes as space-delimited string per RFC 6749 */
  scope?: string;
}
/* eslint-enable @typescript-eslint/naming-convention */

/** credential issued through the oauth authorization code flow */
export interface OAuthCredential {
  method: 'oauth';
  /** short-lived token presented as `Bearer` on every request */
  accessToken: string;
  /** longer-lived token exchanged for a new access token */
  refreshToken?: string;
  /** token type reported by the authorization server, typically `bearer` */
  tokenType?: string;
  /** access token lifetime in seconds at the time it was issued */
  expiresIn?: number;
  /** space-delimited scopes granted to the token */
  scopes?: string;
}

/** username and app password presented with http basic auth */
export interface BasicCredential {
  method: 'basic';
  username: string;
  secret: string;
}

/** credential used to authorize api requests */
export type Credential = OAuthCredential | BasicCredential;

/** authentication method tag of a credential */
export type AuthMethod = Credential['method'];

/** client id and secret identifying this application to the authorization server */
export interface OAuthApplicationCredential {
  clientId: string;
  clientSecret: string;
}

/** oauth credential known to carry a usable refresh token */
export type RefreshableCredential = OAuthCredential & { refreshToken: string };

/**
 * checks whether a 401 under this credential can be recovered by a refresh
 * @param credential active credential
 * @returns true for oauth credentials with a non-empty refresh token
 */
export function isRefreshable(
  credential: Credential,
): credential is RefreshableCredential {
  return credential.method === 'oauth' && !!credential.refreshToken;
}

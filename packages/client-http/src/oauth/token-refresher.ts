/**
 * @file refresh token grant against the oauth token endpoint
 *
 * exchanges a refresh token for a new access token following RFC 6749
 * Section 6, authenticating the application with http basic auth
 */

import { Ajv } from 'ajv';

import { encodeBasicAuthorization } from '#authorization';
import { DEFAULT_TOKEN_ENDPOINT } from '#constants/defaults';
import { CONTENT_TYPE_FORM, CONTENT_TYPE_JSON, HTTP_STATUS_OK } from '#constants/http';
import { ExternalError } from '#errors';

import type { OAuthCredential } from '@repoctl/core';
import type { SchemaObject } from 'ajv';

import type { Fetch } from '#transport';

import type { OAuthTokenResponse } from './types';

/** exchanges a refresh token for a new oauth credential */
export interface TokenRefresher {
  /**
   * performs the refresh token grant
   * @param clientId oauth client identifier of this application
   * @param clientSecret oauth client secret of this application
   * @param refreshToken refresh token of the expired credential
   * @returns credential carrying the new access token
   */
  refresh(
    clientId: string,
    clientSecret: string,
    refreshToken: string,
  ): Promise<OAuthCredential>;
}

/** options for the token endpoint exchange */
export interface TokenRefresherOptions {
  /** token endpoint url (defaults to the hosting service's endpoint) */
  tokenEndpoint?: string;
  /** custom fetch implementation (defaults to global fetch) */
  fetch?: Fetch;
  /** time limit in milliseconds for the exchange */
  timeout?: number;
}

/** json schema of a successful token endpoint response */
const tokenResponseSchema = {
  type: 'object',
  properties: {
    access_token: { type: 'string', minLength: 1 },
    token_type: { type: 'string' },
    expires_in: { type: 'number' },
    refresh_token: { type: 'string' },
    scopes: { type: 'string' },
    scope: { type: 'string' },
  },
  required: ['access_token'],
} as const satisfies SchemaObject;

const ajv = new Ajv({ strict: false });

const validateTokenResponse = ajv.compile<OAuthTokenResponse>(
  tokenResponseSchema,
);

/**
 * refreshes an access token using a refresh token
 *
 * sends `grant_type=refresh_token&refresh_token=...` form encoded, with the
 * application's client id and secret as http basic credentials
 * @param tokenEndpoint url of the token endpoint
 * @param clientId oauth client identifier
 * @param clientSecret oauth client secret
 * @param refreshToken refresh token from the stored credential
 * @param options transport options
 * @param options.fetch custom fetch implementation
 * @param options.timeout time limit in milliseconds
 * @returns token response from the authorization server
 * @throws {ExternalError} when the exchange fails or the response is invalid
 * @example
 * ```typescript
 * const tokens = await refreshAccessToken(
 *   'https://auth.example.com/oauth2/access_token',
 *   'client-id',
 *   'client-secret',
 *   'refresh-token-value',
 * );
 *
 * console.log(tokens.access_token); // New access token
 * ```
 */
export async function refreshAccessToken(
  tokenEndpoint: string,
  clientId: string,
  clientSecret: string,
  refreshToken: string,
  options?: { fetch?: Fetch; timeout?: number },
): Promise<OAuthTokenResponse> {
  const fetch = options?.fetch ?? globalThis.fetch;

  try {
    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    });

    const response = await fetch(tokenEndpoint, {
      method: 'POST',
      headers: {
        'Accept': CONTENT_TYPE_JSON,
        'Authorization': encodeBasicAuthorization(clientId, clientSecret),
        'Content-Type': CONTENT_TYPE_FORM,
      },
      body: body.toString(),
      ...(options?.timeout !== undefined && {
        signal: AbortSignal.timeout(options.timeout),
      }),
    });

    if (response.status !== HTTP_STATUS_OK) {
      const errorText = await response.text();
      throw new ExternalError(
        `token refresh failed (HTTP ${response.status}): ${errorText}`,
      );
    }

    const payload: unknown = JSON.parse(await response.text());

    if (!validateTokenResponse(payload)) {
      throw new ExternalError(
        `invalid token response: ${ajv.errorsText(validateTokenResponse.errors)}`,
      );
    }

    return payload;
  } catch (error) {
    if (error instanceof ExternalError) {
      throw error;
    }

    throw new ExternalError(
      `failed to refresh access token: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

/**
 * converts a token endpoint response to an oauth credential
 * @param response validated token response
 * @returns credential, without a refresh token when none was returned
 */
export function toOAuthCredential(
  response: OAuthTokenResponse,
): OAuthCredential {
  return {
    method: 'oauth',
    accessToken: response.access_token,
    refreshToken: response.refresh_token || undefined,
    tokenType: response.token_type,
    expiresIn: response.expires_in,
    scopes: response.scopes ?? response.scope,
  };
}

/**
 * creates a token refresher bound to a token endpoint
 * @param options endpoint and transport options
 * @returns token refresher
 */
export function createTokenRefresher(
  options?: TokenRefresherOptions,
): TokenRefresher {
  const tokenEndpoint = options?.tokenEndpoint ?? DEFAULT_TOKEN_ENDPOINT;

  return {
    refresh: async (clientId, clientSecret, refreshToken) =>
      toOAuthCredential(
        await refreshAccessToken(
          tokenEndpoint,
          clientId,
          clientSecret,
          refreshToken,
          { fetch: options?.fetch, timeout: options?.timeout },
        ),
      ),
  };
}

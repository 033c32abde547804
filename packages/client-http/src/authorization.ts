import type { Credential } from '@repoctl/core';

/**
 * encodes a user and password as an http basic authorization header value
 * @param username user part of the pair
 * @param password password part of the pair
 * @returns `Basic <base64(username:password)>`
 */
export function encodeBasicAuthorization(
  username: string,
  password: string,
): string {
  return `Basic ${Buffer.from(`${username}:${password}`, 'utf-8').toString('base64')}`;
}

/**
 * builds the authorization header value for a credential
 * @param credential active credential
 * @returns `Bearer` header for oauth credentials, `Basic` for app passwords
 */
export function buildAuthorizationHeader(credential: Credential): string {
  switch (credential.method) {
    case 'basic':
      return encodeBasicAuthorization(credential.username, credential.secret);
    case 'oauth':
      return `Bearer ${credential.accessToken}`;
  }
}

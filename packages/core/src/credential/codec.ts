/**
 * @file conversion between credentials and their persisted json document
 *
 * the document keeps the snake_case layout written by earlier releases:
 * app passwords are tagged `auth_method: "token"` with the secret held in
 * `access_token`, and documents without `auth_method` are oauth credentials
 */

import { Ajv } from 'ajv';

import { InvalidCredentialError } from './errors';

import type { SchemaObject } from 'ajv';

import type { Credential } from './types';

/* eslint-disable @typescript-eslint/naming-convention */
/** persisted credential document */
export interface StoredCredential {
  access_token: string;
  refresh_token?: string;
  token_type?: string;
  expires_in?: number;
  scopes?: string;
  /** `oauth` or `token` (app password), absent on legacy documents */
  auth_method?: 'oauth' | 'token';
  /** account name, only for app passwords */
  username?: string;
}
/* eslint-enable @typescript-eslint/naming-convention */

/** json schema of the persisted credential document */
const storedCredentialSchema = {
  type: 'object',
  properties: {
    access_token: { type: 'string' },
    refresh_token: { type: 'string' },
    token_type: { type: 'string' },
    expires_in: { type: 'number' },
    scopes: { type: 'string' },
    auth_method: { type: 'string', enum: ['oauth', 'token'] },
    username: { type: 'string' },
  },
  required: ['access_token'],
} as const satisfies SchemaObject;

const ajv = new Ajv({ strict: false });

const validateStoredCredential = ajv.compile<StoredCredential>(
  storedCredentialSchema,
);

/**
 * validates a parsed credential document and converts it to a credential
 * @param value parsed json document
 * @returns credential described by the document
 * @throws {InvalidCredentialError} when the document is malformed
 */
export function decodeCredential(value: unknown): Credential {
  if (!validateStoredCredential(value)) {
    throw new InvalidCredentialError(
      `invalid stored credential: ${ajv.errorsText(validateStoredCredential.errors)}`,
    );
  }

  if (value.auth_method === 'token') {
    if (!value.username) {
      throw new InvalidCredentialError(
        'invalid stored credential: app password credential without username',
      );
    }

    return {
      method: 'basic',
      username: value.username,
      secret: value.access_token,
    };
  }

  return {
    method: 'oauth',
    accessToken: value.access_token,
    refreshToken: value.refresh_token || undefined,
    tokenType: value.token_type || undefined,
    expiresIn: value.expires_in,
    scopes: value.scopes || undefined,
  };
}

/**
 * converts a credential to its persisted document
 * @param credential credential to persist
 * @returns document ready for json serialization
 */
export function encodeCredential(credential: Credential): StoredCredential {
  switch (credential.method) {
    case 'basic':
      return {
        access_token: credential.secret,
        auth_method: 'token',
        username: credential.username,
      };
    case 'oauth':
      return {
        access_token: credential.accessToken,
        refresh_token: credential.refreshToken,
        token_type: credential.tokenType,
        expires_in: credential.expiresIn,
        scopes: credential.scopes,
        auth_method: 'oauth',
      };
  }
}

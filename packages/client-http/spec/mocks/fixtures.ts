/** shared test fixtures and utilities for http client testing */

import { vi } from 'vitest';

import type { BasicCredential, OAuthCredential } from '@repoctl/core';
import type { Mock } from 'vitest';

import type { Fetch } from '#transport';

/** test constants for api and token endpoint calls */
export const TEST_CONSTANTS = {
  API_BASE_URL: 'https://api.example.com/2.0',
  TOKEN_ENDPOINT: 'https://auth.example.com/oauth2/access_token',
  CLIENT_ID: 'test-client-id',
  CLIENT_SECRET: 'test-client-secret',
} as const;

/** oauth credential whose access token the server will reject */
export const EXPIRED_OAUTH_CREDENTIAL: OAuthCredential = {
  method: 'oauth',
  accessToken: 'A1',
  refreshToken: 'R1',
  tokenType: 'bearer',
  expiresIn: 7200,
};

/** app password credential */
export const BASIC_CREDENTIAL: BasicCredential = {
  method: 'basic',
  username: 'bob',
  secret: 'pw',
};

/** oauth application credential used for refresh */
export const APPLICATION = {
  clientId: TEST_CONSTANTS.CLIENT_ID,
  clientSecret: TEST_CONSTANTS.CLIENT_SECRET,
};

/** http request as seen by the stubbed transport */
export interface RecordedRequest {
  url: string;
  method: string;
  /** headers with lower-cased names */
  headers: Record<string, string>;
  /** raw body bytes */
  bytes?: Uint8Array;
  /** body decoded as utf-8 */
  body?: string;
}

/** stubbed transport together with the requests it received */
export interface FetchStub {
  fetch: Mock<Fetch>;
  requests: RecordedRequest[];
}

/**
 * creates a fetch stub answering requests with the given replies in order
 *
 * an Error reply is thrown instead of returned, simulating a network failure
 * @param replies responses or errors, one per expected request
 * @returns stub and the list of recorded requests
 */
export function createFetchStub(...replies: Array<Response | Error>): FetchStub {
  const requests: RecordedRequest[] = [];

  const fetch = vi.fn<Fetch>(async (input, init) => {
    const request = recordRequest(input, init);
    requests.push(request);

    const reply = replies.shift();

    if (reply === undefined) {
      throw new Error(`unexpected request to ${request.url}`);
    }

    if (reply instanceof Error) {
      throw reply;
    }

    return reply;
  });

  return { fetch, requests };
}

/**
 * creates a json response
 * @param status http status code
 * @param data value serialized as the body
 * @returns response instance
 */
export function jsonResponse(status: number, data: unknown): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * creates a plain text response
 * @param status http status code
 * @param text body text
 * @returns response instance
 */
export function textResponse(status: number, text: string): Response {
  return new Response(text, { status });
}

/**
 * creates a response without a body
 * @param status http status code
 * @returns response instance
 */
export function emptyResponse(status: number): Response {
  return new Response(null, { status });
}

/**
 * captures url, method, headers and body of a stubbed fetch call
 * @param input fetch input
 * @param init fetch options
 * @returns recorded request
 */
function recordRequest(
  input: string | URL | Request,
  init?: RequestInit,
): RecordedRequest {
  const url =
    typeof input === 'string'
      ? input
      : input instanceof URL
        ? input.href
        : input.url;

  const headers: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    headers[key.toLowerCase()] = value;
  });

  const bytes =
    typeof init?.body === 'string'
      ? Buffer.from(init.body, 'utf-8')
      : init?.body instanceof Uint8Array
        ? init.body
        : undefined;

  return {
    url,
    method: init?.method ?? 'GET',
    headers,
    bytes,
    body: bytes && Buffer.from(bytes).toString('utf-8'),
  };
}

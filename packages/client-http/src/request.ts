/**
 * @file request descriptors with bodies buffered for replay
 *
 * a request may be sent twice (original attempt and one retry after a token
 * refresh), so its body is read into an owned byte buffer exactly once and
 * the same bytes are handed to the transport on every attempt
 */

import { ExternalError } from '#errors';

/** http verbs issued against the api */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** request body forms accepted before buffering */
export type RequestBody =
  | string
  | Uint8Array
  | URLSearchParams
  | AsyncIterable<Uint8Array | string>;

/** immutable description of one logical http call */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  /** absolute target url */
  readonly url: string;
  /** buffered body replayed verbatim on retry */
  readonly body?: Uint8Array;
  readonly contentType?: string;
}

/** matches urls that carry their own scheme and host */
const ABSOLUTE_URL_REGEX = /^https?:\/\//i;

/**
 * reads a request body fully into an owned byte buffer
 * @param body body in any accepted form
 * @returns buffered bytes, or undefined when there is no body
 * @throws {ExternalError} when a streamed body fails while being read
 */
export async function bufferRequestBody(
  body?: RequestBody,
): Promise<Uint8Array | undefined> {
  if (body === undefined) {
    return undefined;
  }

  if (typeof body === 'string') {
    return Buffer.from(body, 'utf-8');
  }

  if (body instanceof URLSearchParams) {
    return Buffer.from(body.toString(), 'utf-8');
  }

  if (body instanceof Uint8Array) {
    // copy so later mutation by the caller cannot alter a retry
    return Uint8Array.from(body);
  }

  const chunks: Buffer[] = [];

  try {
    for await (const chunk of body) {
      chunks.push(
        typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk),
      );
    }
  } catch (error) {
    throw new ExternalError(
      `failed to read request body: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  return Buffer.concat(chunks);
}

/**
 * resolves a path against the api base url
 *
 * absolute urls, such as pagination links returned by the api, pass through
 * untouched
 * @param baseUrl api base url without a trailing slash
 * @param pathOrUrl path beginning with `/`, or an absolute url
 * @returns absolute url
 */
export function resolveUrl(baseUrl: string, pathOrUrl: string): string {
  return ABSOLUTE_URL_REGEX.test(pathOrUrl) ? pathOrUrl : `${baseUrl}${pathOrUrl}`;
}

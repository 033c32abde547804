import {
  HTTP_STATUS_BAD_REQUEST,
  HTTP_STATUS_NO_CONTENT,
} from '#constants/http';
import { ApiError, ExternalError } from '#errors';

/** status and raw body of a completed http response */
export interface ResponseEnvelope {
  status: number;
  body: Uint8Array;
}

/**
 * decodes the raw body as utf-8 text
 * @param envelope completed response
 * @returns body text
 */
export function responseText(envelope: ResponseEnvelope): string {
  return Buffer.from(envelope.body).toString('utf-8');
}

/**
 * checks whether the response is an explicit no-content success
 * @param envelope completed response
 * @returns true for status 204
 */
export function isNoContent(envelope: ResponseEnvelope): boolean {
  return envelope.status === HTTP_STATUS_NO_CONTENT;
}

/**
 * returns the body of a successful response
 * @param envelope completed response
 * @returns raw body bytes
 * @throws {ApiError} when the status is 400 or above
 */
export function handleResponse(envelope: ResponseEnvelope): Uint8Array {
  if (envelope.status >= HTTP_STATUS_BAD_REQUEST) {
    throw new ApiError(envelope.status, responseText(envelope));
  }

  return envelope.body;
}

/**
 * classifies a response and decodes its json body
 *
 * a 204 yields undefined without looking at the body, whatever bytes it holds
 * @param envelope completed response
 * @returns decoded body, or undefined for no content
 * @throws {ApiError} when the status is 400 or above
 * @throws {ExternalError} when a successful body is not valid json
 */
export function decodeResponse<T>(envelope: ResponseEnvelope): T | undefined {
  if (isNoContent(envelope)) {
    return undefined;
  }

  const text = Buffer.from(handleResponse(envelope)).toString('utf-8');

  try {
    return JSON.parse(text) as T;
  } catch (error) {
    throw new ExternalError(
      `failed to decode response (HTTP ${envelope.status}): ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

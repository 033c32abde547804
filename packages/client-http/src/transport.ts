import { CONTENT_TYPE_JSON } from '#constants/http';
import { TransportError } from '#errors';

import type { RequestDescriptor } from '#request';
import type { ResponseEnvelope } from '#response';

/** http invocation function, compatible with the global fetch */
export type Fetch = typeof globalThis.fetch;

/** options for sending a single request attempt */
export interface SendOptions {
  /** transport used to issue the request */
  fetch: Fetch;
  /** overall time limit in milliseconds, covering the body download */
  timeout: number;
  /** value of the authorization header */
  authorization: string;
}

/**
 * issues one http attempt and reads the full response body
 *
 * any failure to obtain a response, including a timeout, is raised as a
 * transport error and never retried here
 * @param request request to send
 * @param options transport, timeout and authorization for this attempt
 * @returns status and body of the response
 * @throws {TransportError} when the request cannot be completed
 */
export async function send(
  request: RequestDescriptor,
  options: SendOptions,
): Promise<ResponseEnvelope> {
  try {
    const response = await options.fetch(request.url, {
      method: request.method,
      headers: {
        'Accept': CONTENT_TYPE_JSON,
        'Authorization': options.authorization,
        ...(request.contentType ? { 'Content-Type': request.contentType } : {}),
      },
      body: request.body,
      signal: AbortSignal.timeout(options.timeout),
    });

    return {
      status: response.status,
      body: new Uint8Array(await response.arrayBuffer()),
    };
  } catch (error) {
    throw new TransportError(describeFailure(request, options, error), {
      cause: error,
    });
  }
}

/**
 * describes why a request attempt failed
 * @param request request that failed
 * @param options options of the failed attempt
 * @param error value thrown by the transport
 * @returns human readable failure message
 */
function describeFailure(
  request: RequestDescriptor,
  options: SendOptions,
  error: unknown,
): string {
  const target = `${request.method} ${request.url}`;

  if (error instanceof Error && error.name === 'TimeoutError') {
    return `${target} timed out after ${options.timeout}ms`;
  }

  // fetch reports network failures as a generic error with the reason as cause
  const reason =
    error instanceof Error && error.cause instanceof Error
      ? `${error.message}: ${error.cause.message}`
      : error instanceof Error
        ? error.message
        : String(error);

  return `${target} failed: ${reason}`;
}

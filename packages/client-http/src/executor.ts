/**
 * @file authenticated request executor with one-shot token refresh
 *
 * issues one logical http call with the active credential attached and
 * recovers from an expired oauth access token exactly once:
 *
 * 1. buffer the request body so it can be replayed
 * 2. send with a `Bearer` (oauth) or `Basic` (app password) header
 * 3. on 401 under an oauth credential with a refresh token, renew and
 *    persist the credential, then reissue the identical request once
 * 4. return the final response as-is, whatever its status
 */

import { isRefreshable, jsonifyError } from '@repoctl/core';

import { buildAuthorizationHeader } from '#authorization';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '#constants/defaults';
import { HTTP_STATUS_UNAUTHORIZED } from '#constants/http';
import { createTokenRefresher, refreshCredential } from '#oauth';
import { bufferRequestBody } from '#request';
import { send } from '#transport';

import type {
  Credential,
  CredentialStore,
  Log,
  OAuthApplicationCredential,
  RefreshableCredential,
} from '@repoctl/core';

import type { TokenRefresher } from '#oauth';
import type { HttpMethod, RequestBody, RequestDescriptor } from '#request';
import type { ResponseEnvelope } from '#response';
import type { Fetch } from '#transport';

/** configuration parameters for the request executor */
export interface RequestExecutorParams {
  // state //
  /** credential owned by the executor, replaced after a successful refresh */
  credential: Credential;

  /** client id and secret required to refresh an oauth credential */
  application?: OAuthApplicationCredential;

  // collaborators //
  /** receives the renewed credential after a refresh */
  credentialStore: Pick<CredentialStore, 'save'>;

  /** token endpoint exchange (defaults to the hosting service's endpoint) */
  refresher?: TokenRefresher;

  /** custom fetch implementation for http requests (defaults to global fetch) */
  fetch?: Fetch;

  // options //
  /** overall time limit of each attempt in milliseconds */
  timeout?: number;

  /** optional logging function */
  log?: Log;
}

/**
 * executes authenticated api requests, refreshing an expired oauth token once
 * @example
 * ```typescript
 * const executor = new RequestExecutor({
 *   credential: await store.load(),
 *   credentialStore: store,
 *   application: { clientId: 'client-id', clientSecret: 'client-secret' },
 * });
 *
 * const response = await executor.execute('GET', 'https://api.example.com/2.0/user');
 * ```
 */
export class RequestExecutor {
  /** credential attached to every attempt */
  #credential: Credential;
  /** application credential used for refresh */
  #application?: OAuthApplicationCredential;
  /** storage receiving the renewed credential */
  #credentialStore: Pick<CredentialStore, 'save'>;
  /** token endpoint exchange */
  #refresher: TokenRefresher;
  /** transport */
  #fetch: Fetch;
  /** per-attempt time limit in milliseconds */
  #timeout: number;
  /** optional logging function */
  #log?: Log;

  /**
   * creates new request executor
   * @param params credential, collaborators and options
   */
  constructor(params: RequestExecutorParams) {
    this.#credential = params.credential;
    this.#application = params.application;
    this.#credentialStore = params.credentialStore;
    this.#fetch = params.fetch ?? globalThis.fetch;
    this.#timeout = params.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.#refresher =
      params.refresher ??
      createTokenRefresher({ fetch: this.#fetch, timeout: this.#timeout });
    this.#log = params.log;
  }

  /** credential currently attached to requests */
  public get credential(): Credential {
    return this.#credential;
  }

  /**
   * issues one logical http call
   *
   * at most two attempts reach the target: the original and, after a
   * successful refresh, one retry whose response is returned even if it is
   * another 401
   * @param method http verb
   * @param url absolute target url
   * @param body optional request body, buffered before the first attempt
   * @param contentType content type of the body
   * @returns final response with its status unclassified
   * @throws {import('#errors').TransportError} when an attempt cannot be completed
   * @throws {import('#errors').AuthConfigurationError} when a refresh is needed without an application credential
   * @throws {import('#errors').SessionExpiredError} when the refresh is rejected
   */
  public async execute(
    method: HttpMethod,
    url: string,
    body?: RequestBody,
    contentType?: string,
  ): Promise<ResponseEnvelope> {
    const request: RequestDescriptor = {
      method,
      url,
      body: await bufferRequestBody(body),
      contentType,
    };

    const credential = this.#credential;
    const response = await this.#send(request);

    // only an oauth credential with a refresh token can recover from a 401
    if (
      response.status !== HTTP_STATUS_UNAUTHORIZED ||
      !isRefreshable(credential)
    ) {
      return response;
    }

    await this.#refresh(credential, request);

    return this.#send(request);
  }

  /**
   * sends one attempt with the current credential
   * @param request request to send
   * @returns response of the attempt
   */
  async #send(request: RequestDescriptor): Promise<ResponseEnvelope> {
    return send(request, {
      fetch: this.#fetch,
      timeout: this.#timeout,
      authorization: buildAuthorizationHeader(this.#credential),
    });
  }

  /**
   * renews the expired credential and adopts it for the retry
   * @param credential expired credential
   * @param request request that received the 401
   */
  async #refresh(
    credential: RefreshableCredential,
    request: RequestDescriptor,
  ): Promise<void> {
    this.#log?.('debug', 'Received 401 response, attempting token refresh', {
      method: request.method,
      url: request.url,
    });

    try {
      this.#credential = await refreshCredential({
        credential,
        application: this.#application,
        refresher: this.#refresher,
        store: this.#credentialStore,
      });
    } catch (error) {
      this.#log?.('error', 'Token refresh failed', {
        error: jsonifyError(error),
      });

      throw error;
    }

    this.#log?.('info', 'Token refreshed, retrying request', {
      method: request.method,
      url: request.url,
    });
  }
}

/**
 * @file api client with verb helpers over the request executor
 *
 * resolves api paths against the base url, classifies responses and decodes
 * json bodies; pagination follows the `next` links of the api's paginated
 * envelope
 */

import { CredentialNotFoundError, filterLog } from '@repoctl/core';
import { Ajv } from 'ajv';

import { resolveLogLevel, resolveRequestTimeout } from '#config';
import { DEFAULT_API_BASE_URL } from '#constants/defaults';
import { CONTENT_TYPE_FORM, CONTENT_TYPE_JSON } from '#constants/http';
import { AuthConfigurationError, ExternalError } from '#errors';
import { RequestExecutor } from '#executor';
import { createTokenRefresher } from '#oauth';
import { resolveUrl } from '#request';
import { decodeResponse } from '#response';

import type {
  Credential,
  CredentialStore,
  JsonifibleValue,
  JsonValue,
  Log,
  OAuthApplicationCredential,
} from '@repoctl/core';
import type { SchemaObject } from 'ajv';

import type { RequestExecutorParams } from '#executor';
import type { HttpMethod, RequestBody } from '#request';
import type { Fetch } from '#transport';

/** standard paginated response envelope of the api */
export interface PaginatedResponse<T> {
  size?: number;
  page?: number;
  pagelen?: number;
  /** absolute url of the next page, absent on the last page */
  next?: string;
  /** absolute url of the previous page */
  previous?: string;
  values: T[];
}

/** json schema of the paginated envelope, item shapes are left to the caller */
const paginatedResponseSchema = {
  type: 'object',
  properties: {
    size: { type: 'number' },
    page: { type: 'number' },
    pagelen: { type: 'number' },
    next: { type: 'string' },
    previous: { type: 'string' },
    values: { type: 'array' },
  },
  required: ['values'],
} as const satisfies SchemaObject;

const ajv = new Ajv({ strict: false });

const validatePaginatedResponse = ajv.compile<PaginatedResponse<unknown>>(
  paginatedResponseSchema,
);

/**
 * checks whether a decoded body is a paginated envelope
 * @param value decoded response body
 * @returns true when the envelope carries a values array
 */
function isPaginatedResponse<T>(
  value: unknown,
): value is PaginatedResponse<T> {
  return validatePaginatedResponse(value);
}

/** options for collecting paginated results */
export interface PaginateOptions {
  /** maximum number of pages to fetch (defaults to all pages) */
  maxPages?: number;
}

/** configuration parameters for the api client */
export interface ApiClientParams extends RequestExecutorParams {
  /** base url that relative paths are appended to */
  baseUrl?: string;
}

/** api client issuing authenticated json requests */
export class ApiClient {
  #executor: RequestExecutor;
  #baseUrl: string;

  /**
   * creates new api client
   * @param params executor parameters and base url
   */
  constructor(params: ApiClientParams) {
    this.#executor = new RequestExecutor(params);
    this.#baseUrl = params.baseUrl ?? DEFAULT_API_BASE_URL;
  }

  /** credential currently attached to requests, renewed after a refresh */
  public get credential(): Credential {
    return this.#executor.credential;
  }

  /**
   * performs a GET against an api path
   * @param path path relative to the base url
   * @returns decoded json body, or undefined when the api answers 204
   */
  public async get<T = JsonValue>(path: string): Promise<T | undefined> {
    return this.request<T>('GET', resolveUrl(this.#baseUrl, path));
  }

  /**
   * performs a GET against an absolute url, such as a pagination link
   * @param url absolute url
   * @returns decoded json body, or undefined when the api answers 204
   */
  public async getRaw<T = JsonValue>(url: string): Promise<T | undefined> {
    return this.request<T>('GET', url);
  }

  /**
   * performs a POST with a json body
   * @param path path relative to the base url
   * @param body value serialized as json
   * @returns decoded json body, or undefined when the api answers 204
   */
  public async post<T = JsonValue>(
    path: string,
    body: JsonifibleValue,
  ): Promise<T | undefined> {
    return this.request<T>(
      'POST',
      resolveUrl(this.#baseUrl, path),
      JSON.stringify(body),
      CONTENT_TYPE_JSON,
    );
  }

  /**
   * performs a POST with a form-encoded body
   * @param path path relative to the base url
   * @param form form fields
   * @returns decoded json body, or undefined when the api answers 204
   */
  public async postForm<T = JsonValue>(
    path: string,
    form: URLSearchParams,
  ): Promise<T | undefined> {
    return this.request<T>(
      'POST',
      resolveUrl(this.#baseUrl, path),
      form,
      CONTENT_TYPE_FORM,
    );
  }

  /**
   * performs a PUT with a json body
   * @param path path relative to the base url
   * @param body value serialized as json
   * @returns decoded json body, or undefined when the api answers 204
   */
  public async put<T = JsonValue>(
    path: string,
    body: JsonifibleValue,
  ): Promise<T | undefined> {
    return this.request<T>(
      'PUT',
      resolveUrl(this.#baseUrl, path),
      JSON.stringify(body),
      CONTENT_TYPE_JSON,
    );
  }

  /**
   * performs a DELETE
   * @param path path relative to the base url
   * @returns decoded json body, or undefined when the api answers 204
   */
  public async delete<T = JsonValue>(path: string): Promise<T | undefined> {
    return this.request<T>('DELETE', resolveUrl(this.#baseUrl, path));
  }

  /**
   * collects the values of every page of a paginated listing
   * @param path path of the first page relative to the base url
   * @param options pagination limits
   * @returns values of all fetched pages in order
   * @throws {ExternalError} when a page is not a paginated envelope
   */
  public async paginate<T = JsonValue>(
    path: string,
    options?: PaginateOptions,
  ): Promise<T[]> {
    const maxPages = options?.maxPages ?? Number.POSITIVE_INFINITY;
    const values: T[] = [];

    let url: string | undefined = resolveUrl(this.#baseUrl, path);
    let pages = 0;

    while (url && pages < maxPages) {
      const page: unknown = await this.getRaw<unknown>(url);

      if (!isPaginatedResponse<T>(page)) {
        throw new ExternalError(
          `invalid paginated response from ${url}: ${ajv.errorsText(validatePaginatedResponse.errors)}`,
        );
      }

      values.push(...page.values);
      url = page.next;
      pages++;
    }

    return values;
  }

  /**
   * issues a request and decodes its response
   * @param method http verb
   * @param url absolute url
   * @param body optional request body
   * @param contentType content type of the body
   * @returns decoded json body, or undefined for 204
   * @throws {import('#errors').ApiError} when the final status is 400 or above
   */
  public async request<T = JsonValue>(
    method: HttpMethod,
    url: string,
    body?: RequestBody,
    contentType?: string,
  ): Promise<T | undefined> {
    const response = await this.#executor.execute(
      method,
      url,
      body,
      contentType,
    );

    return decodeResponse<T>(response);
  }
}

/** options for creating an api client from stored state */
export interface CreateApiClientOptions {
  /** storage the credential is loaded from and renewed into */
  credentialStore: CredentialStore;
  /** client id and secret from local configuration */
  application?: OAuthApplicationCredential;
  /** base url that relative paths are appended to */
  baseUrl?: string;
  /** token endpoint used for refresh */
  tokenEndpoint?: string;
  /** custom fetch implementation (defaults to global fetch) */
  fetch?: Fetch;
  /** per-attempt time limit in milliseconds, overriding the environment */
  timeout?: number;
  /** environment variables (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** optional logging function, filtered by the environment's log level */
  log?: Log;
}

/**
 * loads the stored credential once and creates an api client around it
 * @param options storage, configuration and transport options
 * @returns api client ready for use
 * @throws {AuthConfigurationError} when no credential is stored
 */
export async function createApiClient(
  options: CreateApiClientOptions,
): Promise<ApiClient> {
  const env = options.env ?? process.env;

  let credential: Credential;

  try {
    credential = await options.credentialStore.load();
  } catch (error) {
    if (error instanceof CredentialNotFoundError) {
      throw new AuthConfigurationError(
        "not authenticated, run 'repoctl auth login' first",
        { cause: error },
      );
    }

    throw error;
  }

  const fetch = options.fetch ?? globalThis.fetch;
  const timeout = options.timeout ?? resolveRequestTimeout(env);

  return new ApiClient({
    credential,
    application: options.application,
    credentialStore: options.credentialStore,
    refresher: createTokenRefresher({
      tokenEndpoint: options.tokenEndpoint,
      fetch,
      timeout,
    }),
    fetch,
    timeout,
    baseUrl: options.baseUrl,
    log: options.log && filterLog(options.log, resolveLogLevel(env)),
  });
}

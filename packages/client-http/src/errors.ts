/**
 * base error class for all failures of the http client
 *
 * every error raised by this package extends it, so callers can tell client
 * failures apart from programming errors with a single instanceof check
 */
export class ExternalError extends Error {
  /**
   * creates new external error
   * @param message error message describing the failure
   * @param options standard error options carrying the underlying cause
   */
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExternalError';
  }
}

/** network, dns or timeout failure while issuing a request */
export class TransportError extends ExternalError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/** refresh required but the client is not configured to perform it */
export class AuthConfigurationError extends ExternalError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AuthConfigurationError';
  }
}

/** token endpoint rejected the refresh, the user must authenticate again */
export class SessionExpiredError extends ExternalError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SessionExpiredError';
  }
}

/** final response carried an error status */
export class ApiError extends ExternalError {
  /** http status code of the response */
  public readonly status: number;
  /** raw response body, usually the server's diagnostic json */
  public readonly body: string;

  /**
   * creates new api error
   * @param status http status code of the response
   * @param body raw response body text
   */
  constructor(status: number, body: string) {
    super(`API error (HTTP ${status}): ${body}`);
    this.name = 'ApiError';
    this.status = status;
    this.body = body;
  }
}

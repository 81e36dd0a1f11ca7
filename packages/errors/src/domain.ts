/**
 * Domain-specific error classes, one per failure kind a transport can report
 */

import { ErrorKind, SteadfastError, type SteadfastErrorOptions } from './types.js';

export type TransientKind = ErrorKind.TIMEOUT | ErrorKind.CONNECTION_FAILURE;

/**
 * Network-level failures (timeouts, refused or reset connections, DNS issues)
 */
export class TransientNetworkError extends SteadfastError {
  constructor(message: string, kind: TransientKind, options: SteadfastErrorOptions = {}) {
    super(
      message,
      kind,
      kind === ErrorKind.TIMEOUT ? 'NETWORK_TIMEOUT' : 'NETWORK_CONNECTION_FAILED',
      options
    );
  }

  static timeout(message: string, options: SteadfastErrorOptions = {}): TransientNetworkError {
    return new TransientNetworkError(message, ErrorKind.TIMEOUT, options);
  }

  static connectionFailure(
    message: string,
    options: SteadfastErrorOptions = {}
  ): TransientNetworkError {
    return new TransientNetworkError(message, ErrorKind.CONNECTION_FAILURE, options);
  }
}

/**
 * Upstream answered with a 5xx-equivalent
 */
export class ServerError extends SteadfastError {
  constructor(
    message: string,
    public readonly status: number = 500,
    options: SteadfastErrorOptions = {}
  ) {
    super(message, ErrorKind.SERVER_ERROR, 'SERVER_ERROR', options);
  }
}

/**
 * Upstream asked the caller to slow down (429-equivalent)
 */
export class RateLimitedError extends SteadfastError {
  public readonly status = 429;

  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    options: SteadfastErrorOptions = {}
  ) {
    super(message, ErrorKind.RATE_LIMITED, 'RATE_LIMITED', options);
  }
}

/**
 * Upstream rejected the request itself (4xx other than 429)
 */
export class ClientError extends SteadfastError {
  constructor(
    message: string,
    public readonly status: number = 400,
    options: SteadfastErrorOptions = {}
  ) {
    super(message, ErrorKind.CLIENT_ERROR, 'CLIENT_ERROR', options);
  }
}

/**
 * Invalid input or configuration, detected before anything is attempted
 */
export class ValidationError extends SteadfastError {
  constructor(message: string, options: SteadfastErrorOptions = {}) {
    super(message, ErrorKind.VALIDATION, 'VALIDATION_ERROR', options);
  }
}

/**
 * Mapping of HTTP statuses and transport failures onto error kinds
 */

import {
  ClientError,
  ErrorKind,
  RateLimitedError,
  ServerError,
  SteadfastError,
  toError,
  TransientNetworkError,
  ValidationError,
} from '@steadfast/errors';
import { isAxiosError } from 'axios';

const TIMEOUT_CODES: ReadonlySet<string> = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
]);

const CONNECTION_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ERR_NETWORK',
]);

export function errorKindForStatus(status: number): ErrorKind {
  if (status === 429) return ErrorKind.RATE_LIMITED;
  if (status >= 500 && status <= 599) return ErrorKind.SERVER_ERROR;
  if (status >= 400 && status <= 499) return ErrorKind.CLIENT_ERROR;
  return ErrorKind.UNKNOWN;
}

export interface HttpErrorOptions {
  cause?: unknown;
  retryAfterMs?: number | undefined;
  data?: Record<string, unknown>;
}

/**
 * Build the error for a failed response
 *
 * @throws ValidationError when the status is not a 4xx or 5xx
 */
export function fromHttpStatus(
  status: number,
  message = `HTTP ${status}`,
  options: HttpErrorOptions = {}
): SteadfastError {
  const { cause, retryAfterMs, data } = options;
  const errorOptions = { cause, data: { ...data, status } };

  switch (errorKindForStatus(status)) {
    case ErrorKind.RATE_LIMITED:
      return new RateLimitedError(message, retryAfterMs, errorOptions);
    case ErrorKind.SERVER_ERROR:
      return new ServerError(message, status, errorOptions);
    case ErrorKind.CLIENT_ERROR:
      return new ClientError(message, status, errorOptions);
    default:
      throw new ValidationError(`Status ${status} is not an error status`, { data: { status } });
  }
}

/**
 * Throw the matching error for a 4xx or 5xx status; other statuses pass
 */
export function throwForStatus(status: number, message?: string): void {
  if (errorKindForStatus(status) !== ErrorKind.UNKNOWN) {
    throw fromHttpStatus(status, message);
  }
}

/**
 * Retry-After as milliseconds, from either delta-seconds or an HTTP date
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value === 'number') {
    return value >= 0 ? value * 1000 : undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const date = Date.parse(trimmed);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

function systemErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

function fromErrorCode(code: string, error: Error): SteadfastError | undefined {
  if (TIMEOUT_CODES.has(code)) {
    return TransientNetworkError.timeout(error.message, { cause: error, data: { code } });
  }
  if (CONNECTION_CODES.has(code)) {
    return TransientNetworkError.connectionFailure(error.message, { cause: error, data: { code } });
  }
  return undefined;
}

/**
 * Translate a transport failure (axios, Node system errors, fetch aborts)
 * into a classified error that keeps the original as its cause. Steadfast
 * errors pass through; anything unrecognized comes back unchanged.
 */
export function fromTransportError(error: unknown): Error {
  if (error instanceof SteadfastError) {
    return error;
  }

  if (
    isAxiosError(error) &&
    error.response &&
    errorKindForStatus(error.response.status) !== ErrorKind.UNKNOWN
  ) {
    const { status, headers } = error.response;
    return fromHttpStatus(status, error.message, {
      cause: error,
      retryAfterMs: parseRetryAfter(headers['retry-after']),
      data: { url: error.config?.url },
    });
  }

  const normalized = toError(error);
  const code = systemErrorCode(error);
  const mapped = code === undefined ? undefined : fromErrorCode(code, normalized);
  if (mapped) {
    return mapped;
  }

  if (normalized.name === 'TimeoutError' || normalized.name === 'AbortError') {
    return TransientNetworkError.timeout(normalized.message, { cause: normalized });
  }

  return normalized;
}

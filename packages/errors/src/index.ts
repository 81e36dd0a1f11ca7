/**
 * @steadfast/errors - Error taxonomy shared by the Steadfast packages
 *
 * Every failure that crosses a package boundary is tagged with an ErrorKind so
 * callers and the resilience layer can branch on a small, closed set of tags.
 */

export {
  ErrorKind,
  isErrorKind,
  SteadfastError,
  type ErrorContext,
  type SteadfastErrorOptions,
} from './types.js';

export {
  TransientNetworkError,
  ServerError,
  RateLimitedError,
  ClientError,
  ValidationError,
  type TransientKind,
} from './domain.js';

export {
  type Result,
  success,
  failure,
  safe,
  safeAsync,
  toError,
  errorKindOf,
  extractErrorInfo,
} from './utils.js';

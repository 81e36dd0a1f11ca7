/**
 * Retry and circuit breaker combined
 */

import type { CircuitBreaker } from './circuit-breaker.js';
import { RETRY_PRESETS } from './policy.js';
import { executeWithRetry } from './retry.js';
import type { Operation, RetryExecutionOptions, RetryPolicy } from './types.js';

export interface Protection {
  policy?: RetryPolicy;
  breaker: CircuitBreaker;
}

/**
 * Retry an operation with every attempt passing through the breaker. A
 * CircuitOpenError is not retryable under the default kinds, so an open
 * circuit ends the loop and surfaces as is.
 */
export function executeWithProtection<T>(
  operation: Operation<T>,
  { policy = RETRY_PRESETS.DEFAULT, breaker }: Protection,
  options: RetryExecutionOptions<T> = {}
): Promise<T> {
  const context = options.context ?? 'operation';
  return executeWithRetry(() => breaker.execute(operation, context), policy, {
    ...options,
    context,
  });
}

export const ResiliencePatterns = {
  executeWithProtection,

  /**
   * Wrap a function so every call is retried through the breaker
   */
  createProtectedWrapper<A extends unknown[], R>(
    fn: (...args: A) => R | Promise<R>,
    protection: Protection,
    options: RetryExecutionOptions<R> = {}
  ): (...args: A) => Promise<R> {
    return (...args: A): Promise<R> =>
      executeWithProtection(() => fn(...args), protection, options);
  },
};

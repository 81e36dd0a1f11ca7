/**
 * Retry executor: classified errors, exponential backoff, injectable sleep
 */

import { errorKindOf } from '@steadfast/errors';

import { calculateDelay } from './backoff.js';
import { isRetryable } from './classifier.js';
import { getDefaultLogger } from './logger.js';
import { assertExecutablePolicy, RETRY_PRESETS } from './policy.js';
import type {
  AttemptOutcome,
  Operation,
  RetryExecutionOptions,
  RetryPolicy,
  RetryResult,
  Sleeper,
} from './types.js';

export const defaultSleep: Sleeper = ms => new Promise(resolve => setTimeout(resolve, ms));

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

async function runAttempts<T>(
  operation: Operation<T>,
  policy: RetryPolicy,
  options: RetryExecutionOptions<T>
): Promise<RetryResult<T>> {
  assertExecutablePolicy(policy);

  const {
    context = 'operation',
    random = Math.random,
    sleep = defaultSleep,
    logger = getDefaultLogger(),
    onAttempt,
    onRetry,
  } = options;

  const startTime = Date.now();
  const attempts: AttemptOutcome<T>[] = [];
  const report = (outcome: AttemptOutcome<T>): void => {
    attempts.push(outcome);
    onAttempt?.(outcome);
  };

  for (let attempt = 1; ; attempt++) {
    logger.debug(`Attempting ${context}`, { attempt, maxAttempts: policy.maxAttempts });

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      const kind = errorKindOf(error);
      const retryable = isRetryable(error, policy);
      const failed = (delayMs: number): AttemptOutcome<T> => ({
        attempt,
        status: 'failed',
        error,
        kind,
        retryable,
        delayMs,
        elapsedMs: Date.now() - startTime,
      });

      if (!retryable || attempt >= policy.maxAttempts) {
        if (!retryable) {
          logger.error('Non-retryable error encountered', error, {
            context,
            kind,
            error: describe(error),
          });
        } else {
          logger.error('Max retry attempts exceeded', error, {
            context,
            attempts: attempt,
            error: describe(error),
          });
        }
        report(failed(0));
        return {
          success: false,
          error,
          totalAttempts: attempt,
          totalTimeMs: Date.now() - startTime,
          attempts,
        };
      }

      const delayMs = calculateDelay(attempt, policy, random);
      logger.warn('Retrying after error', {
        context,
        attempt,
        delay_seconds: Math.round(delayMs / 10) / 100,
        error: describe(error),
      });
      report(failed(delayMs));
      onRetry?.(error, attempt, delayMs);

      if (delayMs > 0) {
        await sleep(delayMs);
      }
      continue;
    }

    if (attempt > 1) {
      logger.info('Successfully completed after retry', { context, attempts: attempt });
    }
    report({
      attempt,
      status: 'succeeded',
      result,
      delayMs: 0,
      elapsedMs: Date.now() - startTime,
    });
    return {
      success: true,
      data: result,
      totalAttempts: attempt,
      totalTimeMs: Date.now() - startTime,
      attempts,
    };
  }
}

/**
 * Run an operation until it succeeds, fails with a non-retryable error, or
 * runs out of attempts. The operation's own error is rethrown unchanged.
 *
 * @throws ValidationError before the first attempt when `maxAttempts` is not a positive integer
 */
export async function executeWithRetry<T>(
  operation: Operation<T>,
  policy: RetryPolicy = RETRY_PRESETS.DEFAULT,
  options: RetryExecutionOptions<T> = {}
): Promise<T> {
  const result = await runAttempts(operation, policy, options);
  if (result.success) {
    return result.data;
  }
  throw result.error;
}

/**
 * Same loop as executeWithRetry, reporting the outcome instead of throwing it.
 * A malformed policy still throws.
 */
export function executeWithRetryResult<T>(
  operation: Operation<T>,
  policy: RetryPolicy = RETRY_PRESETS.DEFAULT,
  options: RetryExecutionOptions<T> = {}
): Promise<RetryResult<T>> {
  return runAttempts(operation, policy, options);
}

/**
 * Retry tuned for a chatty query endpoint (5 attempts, 2s to 30s, base 1.5)
 */
export function withProtocolRetry<T>(
  operation: Operation<T>,
  options: RetryExecutionOptions<T> = {}
): Promise<T> {
  return executeWithRetry(operation, RETRY_PRESETS.PROTOCOL_CALL, {
    ...options,
    context: options.context ?? 'GraphQL query',
  });
}

/**
 * Retry tuned for large transfers (3 attempts, 5s to 60s). Rate limiting is not retried.
 */
export function withDownloadRetry<T>(
  operation: Operation<T>,
  options: RetryExecutionOptions<T> = {}
): Promise<T> {
  return executeWithRetry(operation, RETRY_PRESETS.DOWNLOAD, {
    ...options,
    context: options.context ?? 'file download',
  });
}

export const RetryUtils = {
  /**
   * Wrap a function so every call goes through the retry executor
   */
  createRetryWrapper<A extends unknown[], R>(
    fn: (...args: A) => R | Promise<R>,
    policy: RetryPolicy = RETRY_PRESETS.DEFAULT,
    options: RetryExecutionOptions<R> = {}
  ): (...args: A) => Promise<R> {
    return (...args: A): Promise<R> => executeWithRetry(() => fn(...args), policy, options);
  },
};

import {
  ClientError,
  ErrorKind,
  RateLimitedError,
  ServerError,
  TransientNetworkError,
  ValidationError,
} from '@steadfast/errors';
import { LoggerFactory, LogLevel, type Logger, type MemoryTransport } from '@steadfast/logging';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  createRetryPolicy,
  executeWithRetry,
  executeWithRetryResult,
  RetryUtils,
  withDownloadRetry,
  withProtocolRetry,
  type AttemptOutcome,
} from '../index.js';

/** Operation that throws the given errors in order, then returns the value */
function failingThen<T>(errors: unknown[], value: T): () => Promise<T> {
  let call = 0;
  return async () => {
    const error = errors[call++];
    if (call <= errors.length) {
      throw error;
    }
    return value;
  };
}

describe('executeWithRetry', () => {
  let logger: Logger;
  let transport: MemoryTransport;
  let sleeps: number[];
  const sleep = async (ms: number): Promise<void> => {
    sleeps.push(ms);
  };

  const policy = createRetryPolicy({
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 60_000,
    exponentialBase: 2,
    jitter: false,
  });

  beforeEach(() => {
    ({ logger, transport } = LoggerFactory.createMemoryLogger('test'));
    sleeps = [];
  });

  it('should retry transient failures and return the eventual result', async () => {
    const operation = vi.fn(
      failingThen([new ServerError('unavailable', 503), TransientNetworkError.timeout('timed out')], 'ok')
    );

    await expect(executeWithRetry(operation, policy, { sleep, logger })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([1000, 2000]);
  });

  it('should rethrow a non-retryable error after a single call', async () => {
    const error = new ClientError('not found', 404);
    const operation = vi.fn(async () => {
      throw error;
    });

    await expect(executeWithRetry(operation, policy, { sleep, logger })).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
  });

  it('should rethrow the last error once attempts are exhausted', async () => {
    const errors = [new ServerError('first'), new ServerError('second'), new ServerError('third')];
    const operation = vi.fn(failingThen(errors, 'never'));

    await expect(executeWithRetry(operation, policy, { sleep, logger })).rejects.toBe(errors[2]);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([1000, 2000]);
  });

  it('should follow overridden retryable kinds', async () => {
    const custom = createRetryPolicy({
      maxAttempts: 3,
      initialDelayMs: 10,
      jitter: false,
      retryableKinds: [ErrorKind.CLIENT_ERROR],
    });

    const conflicting = vi.fn(failingThen([new ClientError('conflict', 409)], 'saved'));
    await expect(executeWithRetry(conflicting, custom, { sleep, logger })).resolves.toBe('saved');
    expect(conflicting).toHaveBeenCalledTimes(2);

    const serverError = new ServerError('unavailable', 503);
    const unavailable = vi.fn(failingThen([serverError], 'never'));
    await expect(executeWithRetry(unavailable, custom, { sleep, logger })).rejects.toBe(serverError);
    expect(unavailable).toHaveBeenCalledTimes(1);
  });

  it('should raise ValidationError without calling the operation when maxAttempts is 0', async () => {
    const operation = vi.fn(async () => 'ok');

    await expect(
      executeWithRetry(operation, createRetryPolicy({ maxAttempts: 0 }), { sleep, logger })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(operation).not.toHaveBeenCalled();
  });

  it('should not sleep when the delay is not positive', async () => {
    const immediate = createRetryPolicy({ maxAttempts: 3, initialDelayMs: 0, jitter: false });
    const sleeper = vi.fn(sleep);
    const operation = vi.fn(failingThen([new ServerError('a'), new ServerError('b')], 'ok'));

    await expect(executeWithRetry(operation, immediate, { sleep: sleeper, logger })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleeper).not.toHaveBeenCalled();
  });

  it('should accept synchronous operations', async () => {
    let calls = 0;
    const operation = (): number => {
      calls++;
      if (calls === 1) {
        throw TransientNetworkError.connectionFailure('reset');
      }
      return 42;
    };

    await expect(executeWithRetry(operation, policy, { sleep, logger })).resolves.toBe(42);
    expect(calls).toBe(2);
  });

  it('should log each attempt, the retry and the recovery', async () => {
    const operation = failingThen([new ServerError('unavailable')], 'ok');

    await executeWithRetry(operation, policy, { context: 'list models', sleep, logger });

    expect(transport.getMessages()).toEqual([
      'Attempting list models',
      'Retrying after error',
      'Attempting list models',
      'Successfully completed after retry',
    ]);
    expect(transport.getEntries(LogLevel.WARN)[0]?.data).toEqual({
      context: 'list models',
      attempt: 1,
      delay_seconds: 1,
      error: 'unavailable',
    });
  });

  it('should round the logged delay to hundredths of a second', async () => {
    const jittered = createRetryPolicy({ maxAttempts: 2, initialDelayMs: 1000, jitter: true });

    await executeWithRetry(failingThen([new ServerError('x')], 'ok'), jittered, {
      sleep,
      logger,
      random: () => 0.5,
    });

    expect(sleeps).toEqual([1125]);
    expect(transport.getEntries(LogLevel.WARN)[0]?.data?.delay_seconds).toBe(1.13);
  });

  it('should log non-retryable and exhausted failures as errors', async () => {
    await expect(
      executeWithRetry(failingThen([new ClientError('bad')], 'x'), policy, { sleep, logger })
    ).rejects.toThrow('bad');
    await expect(
      executeWithRetry(failingThen([1, 2, 3].map(n => new ServerError(`e${n}`)), 'x'), policy, {
        sleep,
        logger,
      })
    ).rejects.toThrow('e3');

    expect(transport.getMessages(LogLevel.ERROR)).toEqual([
      'Non-retryable error encountered',
      'Max retry attempts exceeded',
    ]);
  });

  it('should report every attempt through the hooks', async () => {
    const outcomes: AttemptOutcome<string>[] = [];
    const onRetry = vi.fn();
    const failure = new RateLimitedError('slow down');

    await executeWithRetry(failingThen([failure], 'done'), policy, {
      sleep,
      logger,
      onAttempt: outcome => outcomes.push(outcome),
      onRetry,
    });

    expect(outcomes).toHaveLength(2);
    expect(outcomes[0]).toMatchObject({
      attempt: 1,
      status: 'failed',
      error: failure,
      kind: ErrorKind.RATE_LIMITED,
      retryable: true,
      delayMs: 1000,
    });
    expect(outcomes[1]).toMatchObject({ attempt: 2, status: 'succeeded', result: 'done', delayMs: 0 });
    expect(onRetry).toHaveBeenCalledOnce();
    expect(onRetry).toHaveBeenCalledWith(failure, 1, 1000);
  });

  describe('with the default sleep', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should wait out the backoff on the timer', async () => {
      const operation = vi.fn(failingThen([new ServerError('unavailable')], 'ok'));
      const promise = executeWithRetry(operation, policy, { logger });

      await vi.advanceTimersByTimeAsync(999);
      expect(operation).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      await expect(promise).resolves.toBe('ok');
      expect(operation).toHaveBeenCalledTimes(2);
    });
  });
});

describe('executeWithRetryResult', () => {
  const policy = createRetryPolicy({ maxAttempts: 2, initialDelayMs: 0, jitter: false });
  const { logger } = LoggerFactory.createMemoryLogger('test');

  it('should report success with the attempts taken', async () => {
    const result = await executeWithRetryResult(failingThen([new ServerError('x')], 7), policy, { logger });

    expect(result.success).toBe(true);
    expect(result.totalAttempts).toBe(2);
    expect(result.attempts.map(a => a.status)).toEqual(['failed', 'succeeded']);
    if (result.success) {
      expect(result.data).toBe(7);
    }
  });

  it('should report failure without throwing', async () => {
    const error = new ClientError('forbidden', 403);
    const result = await executeWithRetryResult(failingThen([error], 7), policy, { logger });

    expect(result.success).toBe(false);
    expect(result.totalAttempts).toBe(1);
    if (!result.success) {
      expect(result.error).toBe(error);
    }
  });
});

describe('presets', () => {
  let sleeps: number[];
  const sleep = async (ms: number): Promise<void> => {
    sleeps.push(ms);
  };

  beforeEach(() => {
    sleeps = [];
  });

  it('should retry protocol calls with the gentler backoff', async () => {
    const { logger, transport } = LoggerFactory.createMemoryLogger('test');
    const operation = failingThen([new ServerError('a'), new ServerError('b')], 'data');

    await expect(withProtocolRetry(operation, { sleep, logger, random: () => 0 })).resolves.toBe('data');
    expect(sleeps).toEqual([2000, 3000]);
    expect(transport.getMessages(LogLevel.DEBUG)[0]).toBe('Attempting GraphQL query');
  });

  it('should not retry rate limiting on downloads', async () => {
    const { logger } = LoggerFactory.createMemoryLogger('test');
    const error = new RateLimitedError('slow down');
    const operation = vi.fn(failingThen([error], 'file'));

    await expect(withDownloadRetry(operation, { sleep, logger })).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should retry downloads on timeouts with the longer backoff', async () => {
    const { logger, transport } = LoggerFactory.createMemoryLogger('test');
    const operation = failingThen([TransientNetworkError.timeout('stalled')], 'file');

    await expect(withDownloadRetry(operation, { sleep, logger, random: () => 0 })).resolves.toBe('file');
    expect(sleeps).toEqual([5000]);
    expect(transport.getMessages(LogLevel.DEBUG)[0]).toBe('Attempting file download');
  });
});

describe('RetryUtils.createRetryWrapper', () => {
  it('should retry the wrapped function with its arguments', async () => {
    const { logger } = LoggerFactory.createMemoryLogger('test');
    let calls = 0;
    const add = async (a: number, b: number): Promise<number> => {
      calls++;
      if (calls === 1) {
        throw new ServerError('flaky');
      }
      return a + b;
    };

    const wrapped = RetryUtils.createRetryWrapper(
      add,
      createRetryPolicy({ initialDelayMs: 0, jitter: false }),
      { logger }
    );

    await expect(wrapped(2, 3)).resolves.toBe(5);
    expect(calls).toBe(2);
  });
});

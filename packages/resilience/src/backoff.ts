/**
 * Exponential backoff with multiplicative jitter
 */

import { ValidationError } from '@steadfast/errors';

import type { BackoffPolicy, RandomSource } from './types.js';

/** Upper bound of the jitter factor, exclusive: factor is in [1, 1 + JITTER_SPREAD) */
export const JITTER_SPREAD = 0.25;

/**
 * Delay in milliseconds to wait after the given failed attempt.
 *
 * `min(initialDelayMs * exponentialBase^(attempt - 1), maxDelayMs)`, scaled by
 * `1 + random() * 0.25` when jitter is on, so a jittered delay may exceed
 * `maxDelayMs` by up to 25%. Non-positive delays come back unchanged.
 */
export function calculateDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: RandomSource = Math.random
): number {
  if (!Number.isInteger(attempt) || attempt < 1) {
    throw new ValidationError(`attempt must be a positive integer, got ${attempt}`, {
      code: 'INVALID_ATTEMPT',
      data: { attempt },
    });
  }

  const delay = Math.min(
    policy.initialDelayMs * Math.pow(policy.exponentialBase, attempt - 1),
    policy.maxDelayMs
  );

  if (!policy.jitter) {
    return delay;
  }

  return delay * (1 + random() * JITTER_SPREAD);
}

/**
 * Binds a policy and random source together
 */
export class DelayCalculator {
  constructor(
    private readonly policy: BackoffPolicy,
    private readonly random: RandomSource = Math.random
  ) {}

  calculateDelay(attempt: number): number {
    return calculateDelay(attempt, this.policy, this.random);
  }

  /**
   * Delays after attempts 1..count, in order
   */
  delays(count: number): number[] {
    return Array.from({ length: Math.max(0, count) }, (_, index) => this.calculateDelay(index + 1));
  }
}

/**
 * Retry policy construction, validation and presets
 */

import { ErrorKind, ValidationError } from '@steadfast/errors';
import { z } from 'zod';

import { DEFAULT_RETRYABLE_KINDS, type RetryPolicy, type RetryPolicyInput } from './types.js';

// Non-positive delays are allowed and mean "do not wait"
const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().min(0).default(3),
  initialDelayMs: z.number().finite().default(1000),
  maxDelayMs: z.number().finite().default(60_000),
  exponentialBase: z.number().finite().positive().default(2),
  jitter: z.boolean().default(true),
  retryableKinds: z.array(z.nativeEnum(ErrorKind)).default([...DEFAULT_RETRYABLE_KINDS]),
});

/**
 * Read-only view over a set of kinds; there is no add, delete or clear to reach
 */
class ErrorKindSet implements ReadonlySet<ErrorKind> {
  private readonly kinds: Set<ErrorKind>;

  constructor(kinds: Iterable<ErrorKind>) {
    this.kinds = new Set(kinds);
    Object.freeze(this);
  }

  get size(): number {
    return this.kinds.size;
  }

  has(kind: ErrorKind): boolean {
    return this.kinds.has(kind);
  }

  forEach(
    callback: (value: ErrorKind, key: ErrorKind, set: ReadonlySet<ErrorKind>) => void,
    thisArg?: unknown
  ): void {
    this.kinds.forEach(kind => callback.call(thisArg, kind, kind, this));
  }

  entries(): IterableIterator<[ErrorKind, ErrorKind]> {
    return this.kinds.entries();
  }

  keys(): IterableIterator<ErrorKind> {
    return this.kinds.keys();
  }

  values(): IterableIterator<ErrorKind> {
    return this.kinds.values();
  }

  [Symbol.iterator](): IterableIterator<ErrorKind> {
    return this.kinds.values();
  }
}

/**
 * Build an immutable retry policy. Omitted fields take the defaults
 * (3 attempts, 1s initial delay, 60s cap, base 2, jitter on).
 *
 * @throws ValidationError when a field is malformed
 */
export function createRetryPolicy(input: RetryPolicyInput = {}): RetryPolicy {
  const result = RetryPolicySchema.safeParse({
    ...input,
    retryableKinds: input.retryableKinds ? [...input.retryableKinds] : undefined,
  });

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid retry policy: ${issues.join(', ')}`, {
      code: 'INVALID_RETRY_POLICY',
      data: { issues },
    });
  }

  return Object.freeze({
    ...result.data,
    retryableKinds: new ErrorKindSet(result.data.retryableKinds),
  });
}

/**
 * Derive a new policy from an existing one
 */
export function withPolicyOverrides(policy: RetryPolicy, overrides: RetryPolicyInput): RetryPolicy {
  return createRetryPolicy({
    maxAttempts: overrides.maxAttempts ?? policy.maxAttempts,
    initialDelayMs: overrides.initialDelayMs ?? policy.initialDelayMs,
    maxDelayMs: overrides.maxDelayMs ?? policy.maxDelayMs,
    exponentialBase: overrides.exponentialBase ?? policy.exponentialBase,
    jitter: overrides.jitter ?? policy.jitter,
    retryableKinds: overrides.retryableKinds ?? policy.retryableKinds,
  });
}

/**
 * A policy must allow at least one attempt before anything runs under it
 */
export function assertExecutablePolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new ValidationError(`maxAttempts must be a positive integer, got ${policy.maxAttempts}`, {
      code: 'INVALID_RETRY_POLICY',
      data: { maxAttempts: policy.maxAttempts },
    });
  }
}

export const RETRY_PRESETS = {
  DEFAULT: createRetryPolicy(),

  /** Chatty query endpoint: more attempts, gentler growth */
  PROTOCOL_CALL: createRetryPolicy({
    maxAttempts: 5,
    initialDelayMs: 2000,
    maxDelayMs: 30_000,
    exponentialBase: 1.5,
    jitter: true,
  }),

  /** Large payload transfers */
  DOWNLOAD: createRetryPolicy({
    maxAttempts: 3,
    initialDelayMs: 5000,
    maxDelayMs: 60_000,
    exponentialBase: 2,
    jitter: true,
    retryableKinds: [ErrorKind.TIMEOUT, ErrorKind.CONNECTION_FAILURE, ErrorKind.SERVER_ERROR],
  }),
} as const;

export type RetryPresetName = keyof typeof RETRY_PRESETS;

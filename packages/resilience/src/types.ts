/**
 * Resilience types shared by the retry executor and the circuit breaker
 */

import { ErrorKind, SteadfastError } from '@steadfast/errors';
import type { Logger } from '@steadfast/logging';

export type Operation<T> = () => T | Promise<T>;

/** Uniform sample in [0, 1) */
export type RandomSource = () => number;

export type Sleeper = (ms: number) => Promise<void>;

/** Milliseconds since the epoch */
export type Clock = () => number;

// Retry Types

export const DEFAULT_RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set([
  ErrorKind.SERVER_ERROR,
  ErrorKind.RATE_LIMITED,
  ErrorKind.TIMEOUT,
  ErrorKind.CONNECTION_FAILURE,
]);

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly exponentialBase: number;
  readonly jitter: boolean;
  readonly retryableKinds: ReadonlySet<ErrorKind>;
}

export type BackoffPolicy = Pick<
  RetryPolicy,
  'initialDelayMs' | 'maxDelayMs' | 'exponentialBase' | 'jitter'
>;

export interface RetryPolicyInput {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  exponentialBase?: number;
  jitter?: boolean;
  retryableKinds?: Iterable<ErrorKind>;
}

export type AttemptOutcome<T> =
  | {
      readonly attempt: number;
      readonly status: 'succeeded';
      readonly result: T;
      readonly delayMs: 0;
      readonly elapsedMs: number;
    }
  | {
      readonly attempt: number;
      readonly status: 'failed';
      readonly error: unknown;
      readonly kind: ErrorKind;
      readonly retryable: boolean;
      /** Backoff slept before the next attempt, 0 when there is none */
      readonly delayMs: number;
      readonly elapsedMs: number;
    };

export interface RetryExecutionOptions<T = unknown> {
  /** Human-readable label used in log messages */
  context?: string;
  random?: RandomSource;
  sleep?: Sleeper;
  logger?: Logger;
  onAttempt?: (outcome: AttemptOutcome<T>) => void;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export type RetryResult<T> = {
  readonly totalAttempts: number;
  readonly totalTimeMs: number;
  readonly attempts: readonly AttemptOutcome<T>[];
} & (
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: unknown }
);

// Circuit Breaker Types

export enum CircuitBreakerState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half_open',
}

export interface CircuitBreakerOptions {
  name?: string;
  failureThreshold?: number;
  recoveryTimeoutMs?: number;
  now?: Clock;
  logger?: Logger;
  onOpen?: (name: string, failureCount: number) => void;
  onHalfOpen?: (name: string) => void;
  onClose?: (name: string) => void;
  onReject?: (name: string) => void;
}

export interface CircuitBreakerSnapshot {
  readonly name: string;
  readonly state: CircuitBreakerState;
  readonly failureCount: number;
  readonly failureThreshold: number;
  readonly recoveryTimeoutMs: number;
  /** Epoch milliseconds of the last recorded failure, 0 when none */
  readonly lastFailureTime: number;
  readonly trialInFlight: boolean;
  readonly nextRecoveryAttemptAt?: Date | undefined;
}

export interface CircuitBreakerMetrics {
  readonly state: CircuitBreakerState;
  readonly totalRequests: number;
  readonly successfulRequests: number;
  readonly failedRequests: number;
  readonly rejectedRequests: number;
  readonly failureRate: number;
  readonly currentFailureCount: number;
  readonly lastOpenedAt?: Date | undefined;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG = {
  failureThreshold: 5,
  recoveryTimeoutMs: 60_000,
} as const;

// Error Classes

/**
 * Raised by a circuit breaker for a call it refused to attempt
 */
export class CircuitOpenError extends SteadfastError {
  constructor(
    public readonly breakerName: string,
    public readonly state: CircuitBreakerState,
    context: string,
    public readonly nextRecoveryAttemptAt?: Date
  ) {
    super(
      `Circuit breaker '${breakerName}' is ${state} for ${context}. Service unavailable.`,
      ErrorKind.CIRCUIT_OPEN,
      'CIRCUIT_OPEN',
      {
        context: { operation: context, component: breakerName },
        ...(nextRecoveryAttemptAt && {
          data: { nextRecoveryAttemptAt: nextRecoveryAttemptAt.toISOString() },
        }),
      }
    );
  }
}

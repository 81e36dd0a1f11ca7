/**
 * Circuit breaker for protecting an unhealthy downstream service
 */

import { ValidationError } from '@steadfast/errors';
import type { Logger } from '@steadfast/logging';

import { getDefaultLogger } from './logger.js';
import {
  CircuitBreakerState,
  CircuitOpenError,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  type CircuitBreakerMetrics,
  type CircuitBreakerOptions,
  type CircuitBreakerSnapshot,
  type Clock,
  type Operation,
} from './types.js';

interface CircuitBreakerInternalState {
  readonly state: CircuitBreakerState;
  readonly failureCount: number;
  readonly lastFailureTime: number;
  readonly trialInFlight: boolean;
  readonly totalRequests: number;
  readonly successfulRequests: number;
  readonly failedRequests: number;
  readonly rejectedRequests: number;
  readonly lastOpenedAt?: Date | undefined;
}

export class CircuitBreaker {
  readonly name: string;
  readonly failureThreshold: number;
  readonly recoveryTimeoutMs: number;

  private internalState: CircuitBreakerInternalState;
  private readonly now: Clock;
  private readonly logger: Logger;

  constructor(private readonly options: CircuitBreakerOptions = {}) {
    this.name = options.name ?? 'default';
    this.failureThreshold =
      options.failureThreshold ?? DEFAULT_CIRCUIT_BREAKER_CONFIG.failureThreshold;
    this.recoveryTimeoutMs =
      options.recoveryTimeoutMs ?? DEFAULT_CIRCUIT_BREAKER_CONFIG.recoveryTimeoutMs;
    this.validateConfig();

    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? getDefaultLogger()).child(`breaker:${this.name}`);
    this.internalState = this.createInitialState();
  }

  private createInitialState(): CircuitBreakerInternalState {
    return {
      state: CircuitBreakerState.CLOSED,
      failureCount: 0,
      lastFailureTime: 0,
      trialInFlight: false,
      totalRequests: 0,
      successfulRequests: 0,
      failedRequests: 0,
      rejectedRequests: 0,
    };
  }

  /**
   * True while calls are being refused. An open breaker whose recovery timeout
   * has elapsed moves to half-open here and reports false.
   */
  isOpen(): boolean {
    if (this.internalState.state !== CircuitBreakerState.OPEN) {
      return false;
    }

    if (this.now() - this.internalState.lastFailureTime >= this.recoveryTimeoutMs) {
      this.transitionToHalfOpen();
      return false;
    }

    return true;
  }

  getState(): CircuitBreakerState {
    return this.internalState.state;
  }

  status(): CircuitBreakerSnapshot {
    const { state, failureCount, lastFailureTime, trialInFlight } = this.internalState;
    return {
      name: this.name,
      state,
      failureCount,
      failureThreshold: this.failureThreshold,
      recoveryTimeoutMs: this.recoveryTimeoutMs,
      lastFailureTime,
      trialInFlight,
      nextRecoveryAttemptAt: this.nextRecoveryAttemptAt(),
    };
  }

  /**
   * Record a success observed outside execute(). In half-open it counts as the trial.
   */
  recordSuccess(): void {
    this.settle(true, true);
  }

  /**
   * Record a failure observed outside execute(). In half-open it counts as the trial.
   */
  recordFailure(): void {
    this.settle(false, true);
  }

  /**
   * Run the operation if the breaker admits it. Refused calls throw
   * CircuitOpenError without invoking the operation; the operation's own
   * error is recorded and rethrown unchanged.
   */
  async execute<T>(operation: Operation<T>, context = 'operation'): Promise<T> {
    const trial = this.admit(context);

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      this.internalState = {
        ...this.internalState,
        failedRequests: this.internalState.failedRequests + 1,
      };
      this.settle(false, trial);
      throw error;
    }

    this.internalState = {
      ...this.internalState,
      successfulRequests: this.internalState.successfulRequests + 1,
    };
    this.settle(true, trial);
    return result;
  }

  getMetrics(): CircuitBreakerMetrics {
    const { state, totalRequests, successfulRequests, failedRequests, rejectedRequests } =
      this.internalState;

    return {
      state,
      totalRequests,
      successfulRequests,
      failedRequests,
      rejectedRequests,
      failureRate: totalRequests > 0 ? failedRequests / totalRequests : 0,
      currentFailureCount: this.internalState.failureCount,
      lastOpenedAt: this.internalState.lastOpenedAt,
    };
  }

  reset(): void {
    this.internalState = this.createInitialState();
  }

  private validateConfig(): void {
    if (!Number.isInteger(this.failureThreshold) || this.failureThreshold <= 0) {
      throw new ValidationError(
        `failureThreshold must be a positive integer, got ${this.failureThreshold}`,
        { code: 'INVALID_CIRCUIT_BREAKER_CONFIG', data: { name: this.name } }
      );
    }
    if (!Number.isFinite(this.recoveryTimeoutMs) || this.recoveryTimeoutMs < 0) {
      throw new ValidationError(
        `recoveryTimeoutMs must be a non-negative number, got ${this.recoveryTimeoutMs}`,
        { code: 'INVALID_CIRCUIT_BREAKER_CONFIG', data: { name: this.name } }
      );
    }
  }

  /**
   * Admit or refuse a call. Returns whether the admitted call is the half-open trial.
   */
  private admit(context: string): boolean {
    this.internalState = {
      ...this.internalState,
      totalRequests: this.internalState.totalRequests + 1,
    };

    if (this.isOpen()) {
      this.reject(context);
    }

    if (this.internalState.state === CircuitBreakerState.HALF_OPEN) {
      if (this.internalState.trialInFlight) {
        this.reject(context);
      }
      this.internalState = { ...this.internalState, trialInFlight: true };
      return true;
    }

    return false;
  }

  private reject(context: string): never {
    this.internalState = {
      ...this.internalState,
      rejectedRequests: this.internalState.rejectedRequests + 1,
    };
    this.options.onReject?.(this.name);

    throw new CircuitOpenError(
      this.name,
      this.internalState.state,
      context,
      this.nextRecoveryAttemptAt()
    );
  }

  private settle(succeeded: boolean, trial: boolean): void {
    const { state } = this.internalState;
    const isTrial = trial && state === CircuitBreakerState.HALF_OPEN;

    if (succeeded) {
      if (isTrial) {
        this.transitionToClosed();
      } else if (state === CircuitBreakerState.CLOSED) {
        this.internalState = { ...this.internalState, failureCount: 0 };
      }
      // Late successes while open or beside a half-open trial change nothing
      return;
    }

    const failureCount = this.internalState.failureCount + 1;
    this.internalState = {
      ...this.internalState,
      failureCount,
      lastFailureTime: this.now(),
    };

    const thresholdReached =
      state === CircuitBreakerState.CLOSED && failureCount >= this.failureThreshold;
    if (isTrial || thresholdReached) {
      this.transitionToOpen();
    }
  }

  private nextRecoveryAttemptAt(): Date | undefined {
    return this.internalState.state === CircuitBreakerState.OPEN
      ? new Date(this.internalState.lastFailureTime + this.recoveryTimeoutMs)
      : undefined;
  }

  private transitionToOpen(): void {
    this.internalState = {
      ...this.internalState,
      state: CircuitBreakerState.OPEN,
      trialInFlight: false,
      lastOpenedAt: new Date(this.now()),
    };

    this.logger.warn('Circuit breaker opened', {
      name: this.name,
      failures: this.internalState.failureCount,
      threshold: this.failureThreshold,
    });
    this.options.onOpen?.(this.name, this.internalState.failureCount);
  }

  private transitionToHalfOpen(): void {
    this.internalState = {
      ...this.internalState,
      state: CircuitBreakerState.HALF_OPEN,
      trialInFlight: false,
    };

    this.logger.info('Circuit breaker transitioning to half-open', { name: this.name });
    this.options.onHalfOpen?.(this.name);
  }

  private transitionToClosed(): void {
    this.internalState = {
      ...this.internalState,
      state: CircuitBreakerState.CLOSED,
      failureCount: 0,
      trialInFlight: false,
    };

    this.logger.info('Circuit breaker closed after successful recovery', { name: this.name });
    this.options.onClose?.(this.name);
  }
}

/**
 * Run an operation through a breaker
 */
export function executeWithCircuitBreaker<T>(
  operation: Operation<T>,
  breaker: CircuitBreaker,
  context = 'operation'
): Promise<T> {
  return breaker.execute(operation, context);
}

/**
 * @steadfast/resilience - Classified retries with exponential backoff, plus circuit breakers
 */

export {
  CircuitBreakerState,
  CircuitOpenError,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  DEFAULT_RETRYABLE_KINDS,
  type AttemptOutcome,
  type BackoffPolicy,
  type CircuitBreakerMetrics,
  type CircuitBreakerOptions,
  type CircuitBreakerSnapshot,
  type Clock,
  type Operation,
  type RandomSource,
  type RetryExecutionOptions,
  type RetryPolicy,
  type RetryPolicyInput,
  type RetryResult,
  type Sleeper,
} from './types.js';

export { calculateDelay, DelayCalculator, JITTER_SPREAD } from './backoff.js';
export { isRetryable } from './classifier.js';
export {
  assertExecutablePolicy,
  createRetryPolicy,
  RETRY_PRESETS,
  withPolicyOverrides,
  type RetryPresetName,
} from './policy.js';
export {
  defaultSleep,
  executeWithRetry,
  executeWithRetryResult,
  RetryUtils,
  withDownloadRetry,
  withProtocolRetry,
} from './retry.js';
export { CircuitBreaker, executeWithCircuitBreaker } from './circuit-breaker.js';
export { CircuitBreakerRegistry, type RegistryBreakerOptions } from './registry.js';
export { executeWithProtection, ResiliencePatterns, type Protection } from './patterns.js';
export {
  errorKindForStatus,
  fromHttpStatus,
  fromTransportError,
  parseRetryAfter,
  throwForStatus,
  type HttpErrorOptions,
} from './http.js';
export {
  buildResilienceSettings,
  CircuitBreakerConfigSchema,
  loadResilienceConfig,
  ResilienceConfigSchema,
  RetryPolicyConfigSchema,
  toRetryPolicy,
  type BuildSettingsOptions,
  type CircuitBreakerConfig,
  type LoadResilienceConfigOptions,
  type ResilienceConfig,
  type ResilienceSettings,
  type RetryPolicyConfig,
} from './config.js';
export { createSeededRandom } from './random.js';
export { getDefaultLogger, setDefaultLogger } from './logger.js';

export { errorKindOf } from '@steadfast/errors';

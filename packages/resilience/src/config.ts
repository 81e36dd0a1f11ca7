/**
 * Retry policies and circuit breakers declared in a YAML file
 */

import {
  ConfigManager,
  ConfigUtils,
  LoggingConfigSchema,
  z,
  type ConfigOptions,
} from '@steadfast/configuration';
import { ErrorKind } from '@steadfast/errors';
import { type Logger, LoggerFactory } from '@steadfast/logging';

import { RETRY_PRESETS, withPolicyOverrides } from './policy.js';
import { CircuitBreakerRegistry } from './registry.js';
import { DEFAULT_CIRCUIT_BREAKER_CONFIG, type Clock, type RetryPolicy } from './types.js';

const RETRY_PRESET_NAMES = ['DEFAULT', 'PROTOCOL_CALL', 'DOWNLOAD'] as const;

export const RetryPolicyConfigSchema = z.object({
  /** Preset the remaining fields override */
  preset: z.enum(RETRY_PRESET_NAMES).default('DEFAULT'),
  max_attempts: z.number().int().min(0).optional(),
  initial_delay: ConfigUtils.durationTransformer().optional(),
  max_delay: ConfigUtils.durationTransformer().optional(),
  exponential_base: z.number().positive().optional(),
  jitter: z.boolean().optional(),
  retryable_kinds: z.array(z.nativeEnum(ErrorKind)).optional(),
});

export const CircuitBreakerConfigSchema = z.object({
  failure_threshold: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_CIRCUIT_BREAKER_CONFIG.failureThreshold),
  recovery_timeout: ConfigUtils.durationTransformer().default(
    DEFAULT_CIRCUIT_BREAKER_CONFIG.recoveryTimeoutMs
  ),
});

export const ResilienceConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  retry_policies: z.record(RetryPolicyConfigSchema).default({}),
  circuit_breakers: z.record(CircuitBreakerConfigSchema).default({}),
});

export type RetryPolicyConfig = z.infer<typeof RetryPolicyConfigSchema>;
export type CircuitBreakerConfig = z.infer<typeof CircuitBreakerConfigSchema>;
export type ResilienceConfig = z.infer<typeof ResilienceConfigSchema>;

export interface ResilienceSettings {
  readonly logger: Logger;
  readonly policies: Readonly<Record<string, RetryPolicy>>;
  readonly breakers: CircuitBreakerRegistry;
}

export interface BuildSettingsOptions {
  logger?: Logger;
  now?: Clock;
}

export function toRetryPolicy(config: RetryPolicyConfig): RetryPolicy {
  return withPolicyOverrides(RETRY_PRESETS[config.preset], {
    maxAttempts: config.max_attempts,
    initialDelayMs: config.initial_delay,
    maxDelayMs: config.max_delay,
    exponentialBase: config.exponential_base,
    jitter: config.jitter,
    retryableKinds: config.retryable_kinds,
  });
}

/**
 * Turn a validated document into policies and a populated breaker registry
 */
export function buildResilienceSettings(
  config: ResilienceConfig,
  options: BuildSettingsOptions = {}
): ResilienceSettings {
  const logger = options.logger ?? LoggerFactory.fromConfig('resilience', config.logging);

  const policies: Record<string, RetryPolicy> = {};
  for (const [name, policyConfig] of Object.entries(config.retry_policies)) {
    policies[name] = toRetryPolicy(policyConfig);
  }

  const breakers = new CircuitBreakerRegistry({
    logger,
    ...(options.now && { now: options.now }),
  });
  for (const [name, breakerConfig] of Object.entries(config.circuit_breakers)) {
    breakers.get(name, {
      failureThreshold: breakerConfig.failure_threshold,
      recoveryTimeoutMs: breakerConfig.recovery_timeout,
    });
  }

  return { logger, policies, breakers };
}

export type LoadResilienceConfigOptions = Pick<ConfigOptions, 'env' | 'logger'> & {
  now?: Clock;
};

/**
 * Load a resilience YAML file. `${VAR}` and `${VAR:-default}` placeholders are
 * substituted from the environment before validation.
 *
 * @throws ConfigValidationError when the document does not match the schema
 */
export async function loadResilienceConfig(
  configPath: string,
  options: LoadResilienceConfigOptions = {}
): Promise<ResilienceSettings> {
  const manager = new ConfigManager(configPath, ResilienceConfigSchema, {
    enableEnvSubstitution: true,
    ...(options.env && { env: options.env }),
    ...(options.logger && { logger: options.logger }),
  });

  const config = await manager.loadConfig();
  return buildResilienceSettings(config, {
    ...(options.logger && { logger: options.logger }),
    ...(options.now && { now: options.now }),
  });
}

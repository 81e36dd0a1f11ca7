import { promises as fs } from 'fs';

import type { Logger } from '@steadfast/logging';
import { load as yamlLoad } from 'js-yaml';
import { z } from 'zod';

import { ConfigUtils } from './utils.js';

/**
 * Options for configuration management
 */
export interface ConfigOptions {
  /** Logger instance for configuration operations */
  logger?: Logger;
  /** Whether to substitute ${VAR} placeholders from the environment */
  enableEnvSubstitution?: boolean;
  /** Environment used for substitution (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Default configuration to merge under the loaded document */
  defaults?: Record<string, unknown>;
}

/**
 * Schema accepted by the manager; input may differ from output when it transforms values
 */
export type ConfigSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Configuration validation error with detailed information
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: z.ZodError
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }

  /**
   * Get formatted error details
   */
  getFormattedErrors(): string[] {
    return this.errors.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
  }
}

/**
 * Generic configuration manager: YAML in, validated typed object out
 */
export class ConfigManager<T> {
  private readonly logger: Logger | undefined;

  constructor(
    private readonly configPath: string,
    private readonly schema: ConfigSchema<T>,
    private readonly options: ConfigOptions = {}
  ) {
    this.logger = options.logger;
  }

  /**
   * Load configuration from file
   */
  async loadConfig(): Promise<T> {
    try {
      const configContent = await fs.readFile(this.configPath, 'utf8');
      const config = this.validateAndTransform(yamlLoad(configContent) ?? {});

      this.logger?.info(`Configuration loaded from: ${this.configPath}`);

      return config;
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        this.logger?.error(`Configuration validation failed: ${error.message}`, error, {
          issues: error.getFormattedErrors(),
        });
      } else {
        this.logger?.error(`Failed to load configuration: ${this.configPath}`, error);
      }
      throw error;
    }
  }

  /**
   * Validate and transform an already parsed document
   */
  validateAndTransform(document: unknown): T {
    let processed = document;

    if (this.options.enableEnvSubstitution) {
      processed = ConfigUtils.processEnvVars(processed, this.options.env);
    }

    if (this.options.defaults && isRecord(processed)) {
      processed = ConfigUtils.mergeConfigs(this.options.defaults, processed);
    }

    const result = this.schema.safeParse(processed);
    if (!result.success) {
      throw new ConfigValidationError(
        `Configuration validation failed for ${this.configPath}`,
        result.error
      );
    }

    return result.data;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Re-export Zod for schema creation
export { z } from 'zod';

export { ConfigUtils, TIME, type TimeUnit, type DurationString } from './utils.js';
export * from './schemas.js';

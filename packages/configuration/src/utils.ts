/**
 * Configuration utilities for parsing, transformation, and standardization
 */

import { z } from 'zod';

/**
 * Time units and their millisecond multipliers
 */
const TIME_UNITS = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
} as const;

export type TimeUnit = keyof typeof TIME_UNITS;

const isTimeUnit = (value: string): value is TimeUnit => value in TIME_UNITS;

/**
 * Readable time constants for use in configuration defaults
 */
export const TIME = {
  MILLISECOND: TIME_UNITS.ms,
  SECOND: TIME_UNITS.s,
  MINUTE: TIME_UNITS.m,
  HOUR: TIME_UNITS.h,
  DAY: TIME_UNITS.d,
  WEEK: TIME_UNITS.w,
} as const;

export type DurationString = `${number}${TimeUnit}`;

const DURATION_PATTERN = /^(?:\d+(?:\.\d+)?\s*(?:ms|s|m|h|d|w)\s*)+$/;

/**
 * Configuration parsing and transformation utilities
 */
export class ConfigUtils {
  /**
   * Parse duration string to milliseconds
   * @param duration Duration string like "500ms", "1m30s", "2.5s"; bare numbers are milliseconds
   */
  static parseDuration(duration: string | number): number {
    if (typeof duration === 'number') {
      return duration;
    }

    const durationStr = duration.trim().toLowerCase();

    if (/^\d+(?:\.\d+)?$/.test(durationStr)) {
      return Math.floor(parseFloat(durationStr));
    }

    if (!DURATION_PATTERN.test(durationStr)) {
      throw new Error(
        `Invalid duration format: ${duration}. Expected format like "500ms", "1m30s", "30s"`
      );
    }

    let totalMs = 0;
    for (const [, valueStr, unit] of durationStr.matchAll(/(\d+(?:\.\d+)?)\s*([a-z]+)/g)) {
      if (!valueStr || !unit || !isTimeUnit(unit)) {
        throw new Error(`Invalid duration segment in: ${duration}`);
      }
      totalMs += parseFloat(valueStr) * TIME_UNITS[unit];
    }

    return Math.floor(totalMs);
  }

  /**
   * Substitute ${VAR} and ${VAR:-default} placeholders in every string of a parsed document
   */
  static processEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
    if (typeof value === 'string') {
      return ConfigUtils.substituteEnvVars(value, env);
    }

    if (Array.isArray(value)) {
      return value.map(item => ConfigUtils.processEnvVars(item, env));
    }

    if (value && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = ConfigUtils.processEnvVars(entry, env);
      }
      return result;
    }

    return value;
  }

  /**
   * Substitute environment variables in a string
   */
  static substituteEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
    return str.replace(/\$\{([^}]+)\}/g, (_match, varExpr: string) => {
      const [varName = '', defaultValue] = varExpr.split(':-');
      const envValue = env[varName.trim()];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue.trim();
      }

      throw new Error(`Required environment variable not set: ${varName}`);
    });
  }

  /**
   * Merge configuration objects with deep merging
   */
  static mergeConfigs(
    target: Record<string, unknown>,
    ...sources: Record<string, unknown>[]
  ): Record<string, unknown> {
    const result: Record<string, unknown> = { ...target };

    for (const source of sources) {
      for (const [key, value] of Object.entries(source)) {
        if (value === undefined) {
          continue;
        }

        const existing = result[key];
        if (isPlainObject(value) && isPlainObject(existing)) {
          result[key] = ConfigUtils.mergeConfigs(existing, value);
        } else {
          // Direct assignment for primitives, arrays, and null values
          result[key] = value;
        }
      }
    }

    return result;
  }

  /**
   * Create a Zod transformer for duration values
   * @returns Zod transformer that parses duration strings to milliseconds
   */
  static durationTransformer() {
    return z.union([z.string(), z.number()]).transform((value, ctx) => {
      try {
        return ConfigUtils.parseDuration(value);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: error instanceof Error ? error.message : String(error),
        });
        return z.NEVER;
      }
    });
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Error handling utilities and helper functions
 */

import { ErrorKind, SteadfastError } from './types.js';

/**
 * Result type for operations that can fail
 */
export type Result<T, E = Error> =
  | { success: true; data: T; error?: never }
  | { success: false; data?: never; error: E };

/**
 * Create a successful result
 */
export function success<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Create a failed result
 */
export function failure<E = Error>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Normalize any thrown value to an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wrap an async operation to return a Result instead of throwing
 */
export async function safeAsync<T>(operation: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    const data = await operation();
    return success(data);
  } catch (error) {
    return failure(toError(error));
  }
}

/**
 * Wrap a sync operation to return a Result instead of throwing
 */
export function safe<T>(operation: () => T): Result<T, Error> {
  try {
    const data = operation();
    return success(data);
  } catch (error) {
    return failure(toError(error));
  }
}

/**
 * Kind of a thrown value. Values that did not come from a Steadfast error class are UNKNOWN.
 */
export function errorKindOf(error: unknown): ErrorKind {
  if (error instanceof SteadfastError) {
    return error.kind;
  }
  return ErrorKind.UNKNOWN;
}

/**
 * Extract error information for logging
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (error instanceof SteadfastError) {
    return error.toLogFormat();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    error: String(error),
  };
}

/**
 * Error kinds and the base error class shared by all Steadfast packages
 */

/**
 * Closed set of failure kinds.
 *
 * Transport adapters translate whatever the underlying client throws into one of
 * these tags so retry and circuit-breaking decisions never depend on a concrete
 * exception hierarchy.
 */
export enum ErrorKind {
  /** The remote side did not answer in time */
  TIMEOUT = 'timeout',
  /** Connection refused, reset or not resolvable */
  CONNECTION_FAILURE = 'connection_failure',
  /** Upstream 5xx-equivalent */
  SERVER_ERROR = 'server_error',
  /** Upstream 429-equivalent */
  RATE_LIMITED = 'rate_limited',
  /** Any other upstream 4xx-equivalent */
  CLIENT_ERROR = 'client_error',
  /** Local argument or configuration problem */
  VALIDATION = 'validation',
  /** Call rejected by an open circuit breaker without being attempted */
  CIRCUIT_OPEN = 'circuit_open',
  /** Anything that carries no kind of its own */
  UNKNOWN = 'unknown',
}

const ERROR_KIND_VALUES: ReadonlySet<string> = new Set(Object.values(ErrorKind));

export const isErrorKind = (value: string): value is ErrorKind => ERROR_KIND_VALUES.has(value);

/**
 * Where an error happened
 */
export interface ErrorContext {
  /** Operation name, e.g. "list models" */
  operation?: string | undefined;
  /** Component or module that raised the error */
  component?: string | undefined;
  /** Additional metadata for debugging */
  metadata?: Record<string, unknown> | undefined;
  timestamp: Date;
}

export interface SteadfastErrorOptions {
  code?: string;
  cause?: unknown;
  data?: Record<string, unknown>;
  context?: Partial<ErrorContext>;
}

/**
 * Base error class carrying a kind, a code and the context it was raised in
 */
export abstract class SteadfastError extends Error {
  public readonly code: string;
  public readonly kind: ErrorKind;
  public readonly context: ErrorContext;
  public readonly data: Record<string, unknown> | undefined;
  public override readonly cause: unknown;

  constructor(message: string, kind: ErrorKind, code: string, options: SteadfastErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.kind = kind;
    this.code = options.code ?? code;
    this.cause = options.cause;
    this.data = options.data;
    this.context = {
      timestamp: new Date(),
      ...options.context,
    };

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get formatted error information for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      kind: this.kind,
      operation: this.context.operation,
      component: this.context.component,
      timestamp: this.context.timestamp,
      ...(this.data && { data: this.data }),
      ...(this.cause !== undefined && { cause: describeCause(this.cause) }),
    };
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

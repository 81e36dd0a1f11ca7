/**
 * Logging types
 */

/** Level names accepted in configuration, most verbose first */
const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;
export type LogLevelString = (typeof LOG_LEVELS)[number];

/** Ordered by severity; an entry is written when its level is at or above the logger's */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogFormat = 'json' | 'text';

/** Structured fields attached to an entry */
export type LogData = Readonly<Record<string, unknown>>;

export interface LogEntry {
  readonly timestamp: Date;
  readonly level: LogLevel;
  /** Emitting component, `parent:child` for child loggers */
  readonly component: string;
  readonly message: string;
  readonly data?: LogData;
  readonly error?: Error;
}

/** Destination for entries that passed the level check */
export interface LogTransport {
  readonly name: string;
  log(entry: LogEntry): Promise<void>;
}

export interface LoggerConfig {
  readonly component: string;
  readonly level: LogLevel | LogLevelString;
  /** Defaults to a single console transport */
  readonly transports?: readonly LogTransport[];
}

export interface ConsoleTransportConfig {
  readonly format?: LogFormat;
  readonly colors?: boolean;
}

export function isLogLevel(value: string): value is LogLevelString {
  return LOG_LEVELS.some(level => level === value);
}

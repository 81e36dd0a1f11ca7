import { ConsoleTransport } from './transports/console-transport.js';
import {
  type LogData,
  type LogEntry,
  LogLevel,
  type LogTransport,
  type LoggerConfig,
} from './types.js';

const LEVELS_BY_NAME: ReadonlyMap<string, LogLevel> = new Map([
  ['DEBUG', LogLevel.DEBUG],
  ['INFO', LogLevel.INFO],
  ['WARN', LogLevel.WARN],
  ['ERROR', LogLevel.ERROR],
]);

/**
 * Structured logger. Entries below the threshold are dropped before any
 * transport sees them; transport failures are reported on stderr and never
 * reach the caller.
 */
export class Logger {
  private readonly threshold: LogLevel;
  private readonly component: string;
  private readonly transports: readonly LogTransport[];

  constructor(config: LoggerConfig) {
    this.component = config.component;
    this.threshold = typeof config.level === 'string' ? parseLogLevel(config.level) : config.level;
    this.transports = config.transports ?? [new ConsoleTransport()];
  }

  /**
   * Logger for a sub-component (`parent:child`) writing to the same transports
   */
  child(component: string): Logger {
    return new Logger({
      level: this.threshold,
      component: `${this.component}:${component}`,
      transports: [...this.transports],
    });
  }

  debug(message: string, data?: LogData): void {
    this.emit(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: LogData): void {
    this.emit(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.emit(LogLevel.WARN, message, data);
  }

  /** Non-Error values passed as `error` are not attached */
  error(message: string, error?: unknown, data?: LogData): void {
    this.emit(LogLevel.ERROR, message, data, error instanceof Error ? error : undefined);
  }

  getLevel(): LogLevel {
    return this.threshold;
  }

  getComponent(): string {
    return this.component;
  }

  private emit(level: LogLevel, message: string, data?: LogData, error?: Error): void {
    if (level < this.threshold) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      component: this.component,
      message,
      ...(data && { data }),
      ...(error && { error }),
    };

    for (const transport of this.transports) {
      transport.log(entry).catch((failure: unknown) => {
        // eslint-disable-next-line no-console
        console.error(`Log transport '${transport.name}' failed:`, failure);
      });
    }
  }
}

/**
 * Level from its name, case-insensitive; WARNING is read as WARN
 */
export function parseLogLevel(name: string): LogLevel {
  const normalized = name.toUpperCase();
  const level = normalized === 'WARNING' ? LogLevel.WARN : LEVELS_BY_NAME.get(normalized);
  if (level === undefined) {
    throw new Error(`Invalid log level: ${name}`);
  }
  return level;
}

import { Logger, parseLogLevel } from './logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { MemoryTransport } from './transports/memory-transport.js';
import { LogLevel, type LogFormat } from './types.js';

const normalizeLogLevel = (level: LogLevel | string): LogLevel =>
  typeof level === 'string' ? parseLogLevel(level) : level;

/**
 * Factory for creating loggers with common configurations
 */
export class LoggerFactory {
  /**
   * Create a logger with console transport only
   */
  static createConsoleLogger(
    component: string,
    level: LogLevel | string = LogLevel.INFO,
    format: LogFormat = 'text'
  ): Logger {
    return new Logger({
      component,
      level: normalizeLogLevel(level),
      transports: [new ConsoleTransport({ format, colors: format === 'text' })],
    });
  }

  /**
   * Create a logger that records entries in memory; returns the transport for inspection
   */
  static createMemoryLogger(
    component: string,
    level: LogLevel | string = LogLevel.DEBUG
  ): { logger: Logger; transport: MemoryTransport } {
    const transport = new MemoryTransport();
    return {
      logger: new Logger({ component, level: normalizeLogLevel(level), transports: [transport] }),
      transport,
    };
  }

  /**
   * Create a logger from the snake_case logging section of a configuration file
   */
  static fromConfig(
    component: string,
    config: { level: string; format?: LogFormat | undefined }
  ): Logger {
    return LoggerFactory.createConsoleLogger(component, config.level, config.format ?? 'text');
  }
}

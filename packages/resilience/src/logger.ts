import { isLogLevel, type Logger, LoggerFactory } from '@steadfast/logging';

let defaultLogger: Logger | undefined;

/**
 * Logger used when a caller does not inject one. Level comes from
 * STEADFAST_LOG_LEVEL, WARN otherwise.
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    const level = process.env.STEADFAST_LOG_LEVEL?.toUpperCase() ?? 'WARN';
    defaultLogger = LoggerFactory.createConsoleLogger(
      'resilience',
      isLogLevel(level) ? level : 'WARN'
    );
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: Logger): void {
  defaultLogger = logger;
}

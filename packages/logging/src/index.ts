/**
 * @steadfast/logging - Structured logging with pluggable transports
 */

export { Logger, parseLogLevel } from './logger.js';
export { LoggerFactory } from './factory.js';
export { ConsoleTransport } from './transports/console-transport.js';
export { MemoryTransport } from './transports/memory-transport.js';
export { formatJson, formatText } from './format.js';
export {
  LogLevel,
  isLogLevel,
  type LogLevelString,
  type LogFormat,
  type LogData,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ConsoleTransportConfig,
} from './types.js';

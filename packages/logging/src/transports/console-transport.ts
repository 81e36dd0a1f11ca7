import { formatJson, formatText } from '../format.js';
import { type ConsoleTransportConfig, type LogEntry, LogLevel, type LogTransport } from '../types.js';

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m', // Green
  [LogLevel.WARN]: '\x1b[33m', // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
};

const RESET = '\x1b[0m';

/**
 * Console transport for logging to stdout/stderr
 */
export class ConsoleTransport implements LogTransport {
  public readonly name = 'console';
  private config: Required<ConsoleTransportConfig>;

  constructor(config: ConsoleTransportConfig = {}) {
    this.config = {
      format: 'text',
      colors: true,
      ...config,
    };
  }

  async log(entry: LogEntry): Promise<void> {
    const output =
      this.config.format === 'json'
        ? formatJson(entry)
        : formatText(entry, this.colorizeLevel(entry.level));

    switch (entry.level) {
      case LogLevel.DEBUG:
        // eslint-disable-next-line no-console
        console.debug(output);
        break;
      case LogLevel.INFO:
        // eslint-disable-next-line no-console
        console.info(output);
        break;
      case LogLevel.WARN:
        // eslint-disable-next-line no-console
        console.warn(output);
        break;
      case LogLevel.ERROR:
        // eslint-disable-next-line no-console
        console.error(output);
        break;
      default:
        // eslint-disable-next-line no-console
        console.log(output);
    }
  }

  private colorizeLevel(level: LogLevel): string {
    if (!this.config.colors) {
      return LogLevel[level];
    }
    return `${LEVEL_COLORS[level]}${LogLevel[level]}${RESET}`;
  }
}

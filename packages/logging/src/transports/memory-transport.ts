import { formatText } from '../format.js';
import { type LogEntry, LogLevel, type LogTransport } from '../types.js';

/**
 * Keeps entries in memory, for inspection in tests and diagnostics
 */
export class MemoryTransport implements LogTransport {
  public readonly name: string;
  private entries: LogEntry[] = [];

  constructor(name = 'memory') {
    this.name = name;
  }

  async log(entry: LogEntry): Promise<void> {
    this.entries.push(entry);
  }

  getEntries(level?: LogLevel): readonly LogEntry[] {
    return level === undefined ? [...this.entries] : this.entries.filter(e => e.level === level);
  }

  getMessages(level?: LogLevel): string[] {
    return this.getEntries(level).map(e => e.message);
  }

  /** Text lines without the timestamp prefix */
  getLines(): string[] {
    return this.entries.map(e => formatText(e).slice(e.timestamp.toISOString().length + 1));
  }
}

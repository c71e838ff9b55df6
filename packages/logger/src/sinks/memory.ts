import type { LogEntry, LogLevel, Sink } from '../logger.js';

/**
 * Keeps every entry in memory. Useful as a telemetry tap in tests or for
 * surfacing recent dispatch errors to a health endpoint.
 */
export class MemorySink implements Sink {
  private readonly captured: LogEntry[] = [];

  get entries(): readonly LogEntry[] {
    return this.captured;
  }

  write(entry: LogEntry): void {
    this.captured.push(entry);
  }

  flush(): void {
    // entries are stored synchronously
  }

  atLevel(level: LogLevel): LogEntry[] {
    return this.captured.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.captured.length = 0;
  }
}

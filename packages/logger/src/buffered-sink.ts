import { LOG_LEVELS, type LogEntry, type LogLevel, type Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Oldest entries are dropped once this many are waiting. Default 1000 */
  maxBuffer?: number;
  /** Entries at or above this level drain the buffer synchronously. Default 'error' */
  drainAt?: LogLevel;
}

/**
 * Base class for sinks that buffer log entries and write them on the next
 * turn of the event loop, so hot dispatch loops never block on output.
 *
 * Subclasses implement `writeEntry(entry)` for actual output.
 */
export abstract class BufferedSink implements Sink {
  private buffer: LogEntry[] = [];
  private scheduled: NodeJS.Immediate | undefined;
  private dropped = 0;
  private readonly maxBuffer: number;
  private readonly drainAt: number;

  constructor(options?: BufferedSinkOptions) {
    this.maxBuffer = options?.maxBuffer ?? 1000;
    this.drainAt = LOG_LEVELS.indexOf(options?.drainAt ?? 'error');
  }

  protected abstract writeEntry(entry: LogEntry): void;

  get pending(): number {
    return this.buffer.length;
  }

  write(entry: LogEntry): void {
    if (this.buffer.length >= this.maxBuffer) {
      this.dropped++;
      this.buffer.shift();
    }
    this.buffer.push(entry);

    if (LOG_LEVELS.indexOf(entry.level) >= this.drainAt) {
      this.drain();
      return;
    }

    this.scheduled ??= setImmediate(() => this.drain());
  }

  /** Drain buffer synchronously. Call before process exit. */
  flush(): void {
    this.drain();
  }

  private drain(): void {
    if (this.scheduled) {
      clearImmediate(this.scheduled);
      this.scheduled = undefined;
    }

    const entries = this.buffer;
    const dropped = this.dropped;
    this.buffer = [];
    this.dropped = 0;

    if (dropped > 0) {
      this.writeEntry({
        level: 'warn',
        category: 'logger',
        timestamp: new Date(),
        msg: `Dropped ${String(dropped)} log entries (buffer overflow)`,
      });
    }

    for (const entry of entries) {
      this.writeEntry(entry);
    }
  }
}

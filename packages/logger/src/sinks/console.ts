import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean;
}

const levelColors: Record<LogLevel, string> = {
  trace: '\x1b[90m', // gray
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m', // green
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};

const RESET = '\x1b[0m';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Render one entry as a single line:
 * `[HH:MM:SS] LEVEL [category] message {key=value, ...}`
 */
export function formatEntry(entry: LogEntry, color = false): string {
  const { timestamp } = entry;
  const time = `[${pad(timestamp.getHours())}:${pad(timestamp.getMinutes())}:${pad(timestamp.getSeconds())}]`;
  const label = entry.level.toUpperCase().padEnd(5);
  const level = color ? `${levelColors[entry.level]}${label}${RESET}` : label;
  const context = entry.context
    ? ` {${Object.entries(entry.context)
        .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
        .join(', ')}}`
    : '';

  return `${time} ${level} [${entry.category}] ${entry.msg}${context}`;
}

/**
 * Human-readable sink for development. Errors and warnings go to
 * console.error/console.warn, everything else to console.log.
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
  }

  protected writeEntry(entry: LogEntry): void {
    const line = formatEntry(entry, this.color);

    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

import pino from 'pino';

import type { LogEntry, Sink } from '../logger.js';

export interface PinoSinkOptions {
  /** Existing pino logger to forward to; takes precedence over the options below */
  logger?: pino.Logger | undefined;
  /** Value of the `service` field on every line */
  service?: string | undefined;
  /** Where JSON lines go. Defaults to stdout */
  destination?: pino.DestinationStream | undefined;
}

/**
 * Structured JSON output for production. Level filtering happens in the
 * category logger, so the pino instance is created at `trace` and writes
 * whatever reaches it.
 */
export class PinoSink implements Sink {
  private readonly pino: pino.Logger;

  constructor(options?: PinoSinkOptions) {
    this.pino = options?.logger ?? PinoSink.createLogger(options?.service ?? 'rulegate', options?.destination);
  }

  private static createLogger(service: string, destination: pino.DestinationStream | undefined): pino.Logger {
    const config: pino.LoggerOptions = {
      base: { service },
      level: 'trace',
      timestamp: pino.stdTimeFunctions.isoTime,
    };
    return destination ? pino(config, destination) : pino(config);
  }

  write(entry: LogEntry): void {
    this.pino[entry.level]({ category: entry.category, ...entry.context }, entry.msg);
  }

  flush(): void {
    this.pino.flush();
  }
}

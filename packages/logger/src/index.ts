export {
  initLogger,
  getLogger,
  flushLoggers,
  LOG_LEVELS,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { initLoggerFromEnv, loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
export { BufferedSink, type BufferedSinkOptions } from './buffered-sink.js';
export { ConsoleSink, formatEntry, type ConsoleSinkOptions } from './sinks/console.js';
export { MemorySink } from './sinks/memory.js';
export { PinoSink, type PinoSinkOptions } from './sinks/pino.js';

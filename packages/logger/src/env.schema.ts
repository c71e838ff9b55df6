import { z } from 'zod';

import { ConsoleSink } from './sinks/console.js';
import { PinoSink } from './sinks/pino.js';
import { initLogger, type Sink } from './logger.js';

export const loggerEnvSchema = z.object({
  LOGGER_COLOR: z
    .string()
    .default('false')
    .transform((val: string) => val === 'true'),
  LOGGER_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error']))
    .default('info'),
  LOGGER_SERVICE_NAME: z.string().trim().min(1).default('rulegate'),
  LOGGER_SINK: z.enum(['console', 'pino', 'none']).default('console'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}

/**
 * Initialize the global logger from LOGGER_* environment variables
 */
export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const config = validateLoggerEnv(env);

  const sinks: Sink[] = [];
  if (config.LOGGER_SINK === 'console') {
    sinks.push(new ConsoleSink({ color: config.LOGGER_COLOR }));
  } else if (config.LOGGER_SINK === 'pino') {
    sinks.push(new PinoSink({ service: config.LOGGER_SERVICE_NAME }));
  }

  initLogger({ level: config.LOGGER_LOG_LEVEL, sinks });
  return config;
}

// Logger utility - one winston logger shared by the pool, workers and gateway
// LOG_FORMAT picks json (default) or simple output; LOG_SILENT=true mutes it in tests.

import winston from 'winston';
import { getEnv } from './env.js';

export interface LoggerOptions {
  level: string;
  format: 'json' | 'simple';
  silent: boolean;
}

export function loggerOptionsFromEnv(): LoggerOptions {
  return {
    level: getEnv('LOG_LEVEL', 'info'),
    format: getEnv('LOG_FORMAT', 'json') === 'simple' ? 'simple' : 'json',
    silent: getEnv('LOG_SILENT', 'false') === 'true',
  };
}

export function createLogger(options: LoggerOptions): winston.Logger {
  return winston.createLogger({
    level: options.level,
    silent: options.silent,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      options.format === 'json'
        ? winston.format.json()
        : winston.format.combine(winston.format.colorize(), winston.format.simple())
    ),
    defaultMeta: { service: 'lightinfer' },
    transports: [new winston.transports.Console()],
  });
}

export const logger = createLogger(loggerOptionsFromEnv());

// Core package exports

export * from './types/index.js';
export * from './errors.js';
export * from './job-factory.js';
export * from './utils/async-queue.js';
export * from './utils/payload.js';
export * from './utils/env.js';
export { logger, createLogger, loggerOptionsFromEnv, type LoggerOptions } from './utils/logger.js';

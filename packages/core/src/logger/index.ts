export { createChildLogger, createLogger, loggerOptions } from './logger.js';
export type { CreateLoggerOptions, LogContext } from './logger.js';

import { pino } from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';

/**
 * Structured log context fields attached through child loggers.
 *
 * module is set by the library; errorKind and errorCode describe the error
 * being built; correlationId is left to the calling service.
 */
export interface LogContext {
  module?: string;
  errorKind?: string;
  errorCode?: string;
  correlationId?: string;
}

const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
  // Rename Pino's default `msg` key to `message`
  messageKey: 'message',
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
};

export interface CreateLoggerOptions {
  level?: string;
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const resolved: LoggerOptions = { ...loggerOptions, level: options.level ?? LOG_LEVEL };
  return options.destination ? pino(resolved, options.destination) : pino(resolved);
}

/**
 * Create a child logger with structured context fields.
 *
 * ```ts
 * const log = createChildLogger(logger, { module: 'orders', correlationId: 'req-42' });
 * log.debug('Order rejected');
 * ```
 */
export function createChildLogger(parent: Logger, context: LogContext): Logger {
  return parent.child(context);
}

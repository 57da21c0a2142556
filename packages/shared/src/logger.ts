/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include the correlation ID and the unit of work
 * (source path, page number) from the AsyncLocalStorage context.
 */

import { getCorrelationId, getContext } from './context';
import { describeError } from './errors';

export interface LogContext {
  [key: string]: unknown;
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLevelName(value: string): value is keyof typeof LEVEL_ORDER {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function threshold(): number {
  const configured = process.env.LOG_LEVEL;
  if (configured && isLevelName(configured)) {
    return LEVEL_ORDER[configured];
  }
  return process.env.NODE_ENV === 'production' ? LEVEL_ORDER.info : LEVEL_ORDER.debug;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= threshold();
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    sourcePath: reqContext?.sourcePath,
    pageNumber: reqContext?.pageNumber,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (enabled('info')) console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('warn')) console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (!enabled('error')) return;
    const errorContext = {
      ...context,
      error:
        error instanceof Error
          ? {
              message: error.message,
              stack: error.stack,
              name: error.name,
            }
          : describeError(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (enabled('debug')) console.debug(formatLog('DEBUG', message, context));
  },
};

/**
 * Structured Logging with Correlation IDs
 *
 * Every line is a JSON object carrying the correlation ID, batch and
 * document label of the current AsyncLocalStorage context.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const reqContext = getContext();

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    correlationId: getCorrelationId(),
    batchId: reqContext?.batchId,
    documentLabel: reqContext?.documentLabel,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export function describeError(error: unknown): { message: string; name?: string; stack?: string } | string {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack, name: error.name };
  }
  return String(error);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    console.error(formatLog('ERROR', message, { ...context, error: describeError(error) }));
  },

  debug: (message: string, context?: LogContext) => {
    if (process.env.LOG_LEVEL === 'debug') {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};

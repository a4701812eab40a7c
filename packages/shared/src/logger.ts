/**
 * Structured Logging
 *
 * One JSON line per entry. Correlation, document and extraction IDs are
 * taken from the AsyncLocalStorage context when present.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

function thresholdFromEnv(): number {
  const raw = (process.env.LOG_LEVEL || '').toUpperCase();
  if (raw === 'DEBUG' || raw === 'INFO' || raw === 'WARN' || raw === 'ERROR') {
    return LEVEL_ORDER[raw];
  }
  return process.env.NODE_ENV === 'production' ? LEVEL_ORDER.INFO : LEVEL_ORDER.DEBUG;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= thresholdFromEnv();
}

function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const reqContext = getContext();

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    correlationId: getCorrelationId(),
    documentId: reqContext?.documentId,
    extractionId: reqContext?.extractionId,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (enabled('INFO')) console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('WARN')) console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: unknown, context?: LogContext) => {
    if (!enabled('ERROR')) return;
    const errorContext = {
      ...context,
      error:
        error instanceof Error
          ? {
              message: error.message,
              stack: error.stack,
              name: error.name,
            }
          : String(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (enabled('DEBUG')) console.debug(formatLog('DEBUG', message, context));
  },
};

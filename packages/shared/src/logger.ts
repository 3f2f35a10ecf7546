/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include the run id from AsyncLocalStorage context.
 * One JSON object per line.
 */

import { getCorrelationId, getContext } from './context';
import { RatekeeperError } from './errors';

export interface LogContext {
  [key: string]: unknown;
}

interface SerializedError {
  name: string;
  message: string;
  code?: string;
  context?: Record<string, unknown>;
  stack?: string;
  cause?: SerializedError | string;
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const runContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    documentPath: runContext?.documentPath,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

/**
 * Serialize an error and its `cause` chain
 */
export function serializeError(error: unknown, depth = 0): SerializedError | string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const serialized: SerializedError = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };

  if (error instanceof RatekeeperError) {
    serialized.code = error.code;
    serialized.context = error.context;
  }

  // Bounded so a self-referencing cause cannot recurse forever
  if (error.cause !== undefined && depth < 5) {
    serialized.cause = serializeError(error.cause, depth + 1);
  }

  return serialized;
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    const errorContext = {
      ...context,
      error: serializeError(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (process.env.LOG_LEVEL === 'debug' || process.env.NODE_ENV !== 'production') {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};

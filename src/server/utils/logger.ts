import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for request context (request ID, user ID, etc.)
 */
export const requestContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current request context
 */
export function getRequestContext(): Record<string, unknown> {
  return requestContext.getStore() || {};
}

function resolveLogLevel(nodeEnv: string): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  if (nodeEnv === 'test') {
    return 'silent';
  }
  return nodeEnv === 'production' ? 'info' : 'debug';
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';

  return pino({
    level: resolveLogLevel(nodeEnv),
    base: {
      env: nodeEnv,
      service: 'docqa-api',
    },
    redact: {
      paths: ['apiKey', '*.apiKey', 'authorization', '*.authorization', 'token', '*.token'],
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && process.env.LOG_PRETTY !== 'false' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context.
 * Request context (request id, user id) is merged in at call time, so
 * services should call this per operation rather than caching the child.
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  const context = { ...getRequestContext(), ...additionalContext };
  return logger.child(context);
}

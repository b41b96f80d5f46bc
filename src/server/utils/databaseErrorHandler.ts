import { MongoError, MongoServerError, MongoNetworkError } from 'mongodb';
import { logger } from './logger.js';
import { DatabaseError } from '../types/errors.js';

/**
 * Error type classification
 */
export type DatabaseErrorType =
  | 'validation'
  | 'connection'
  | 'query'
  | 'unknown';

export interface DatabaseErrorClassification {
  type: DatabaseErrorType;
  message: string;
  code?: number;
  isTransient: boolean;
}

/**
 * Classify MongoDB error type
 */
export function classifyDatabaseError(error: unknown): DatabaseErrorClassification {
  if (!(error instanceof Error)) {
    return {
      type: 'unknown',
      message: 'An unknown error occurred',
      isTransient: false,
    };
  }

  if (error instanceof MongoNetworkError) {
    return {
      type: 'connection',
      message: 'Database connection error occurred',
      isTransient: true,
    };
  }

  if (error instanceof MongoServerError) {
    const code = typeof error.code === 'number' ? error.code : undefined;
    // Validation errors (e.g., bad regex, bad operator)
    if (code === 2 || error.message.includes('validation')) {
      return { type: 'validation', message: 'Invalid query provided', code, isTransient: false };
    }
    return { type: 'query', message: 'Database query error occurred', code, isTransient: false };
  }

  if (error instanceof MongoError) {
    const transientCodes = [6, 7, 89, 91, 11600, 11602];
    const code = typeof error.code === 'number' ? error.code : undefined;
    return {
      type: 'connection',
      message: 'Database operation failed',
      code,
      isTransient: code !== undefined && transientCodes.includes(code),
    };
  }

  const errorMessage = error.message.toLowerCase();
  if (
    errorMessage.includes('connection') ||
    errorMessage.includes('network') ||
    errorMessage.includes('timeout') ||
    errorMessage.includes('econnrefused') ||
    errorMessage.includes('enotfound')
  ) {
    return {
      type: 'connection',
      message: 'Database connection error occurred',
      isTransient: true,
    };
  }

  return {
    type: 'unknown',
    message: 'An unexpected error occurred',
    isTransient: false,
  };
}

/**
 * Sanitize error message for logging
 * Removes connection strings and credentials.
 */
export function sanitizeErrorMessage(error: unknown, context?: string): string {
  if (!(error instanceof Error)) {
    return 'An unknown error occurred';
  }

  let message = error.message;

  // Remove connection strings
  message = message.replace(/mongodb(\+srv)?:\/\/[^\s]+/gi, 'mongodb://***');

  // Remove credentials
  message = message.replace(/:\/\/[^:]+:[^@]+@/g, '://***:***@');

  if (context) {
    return `${context}: ${message}`;
  }

  return message;
}

/**
 * Default slow query threshold in milliseconds
 * Queries exceeding this threshold will be logged as slow queries
 */
const DEFAULT_SLOW_QUERY_THRESHOLD_MS = parseInt(
  process.env.SLOW_QUERY_THRESHOLD_MS || '1000',
  10
);

/**
 * Wrap a database read with error classification and slow-query logging.
 *
 * Failures are not retried: a failed read surfaces once, as a DatabaseError,
 * and the caller decides how to degrade.
 *
 * @param operation - The database operation to execute
 * @param context - Context information for logging (e.g., 'UserDocument.findById')
 */
export async function handleDatabaseOperation<T>(
  operation: () => Promise<T>,
  context?: string,
  options?: { slowQueryThresholdMs?: number }
): Promise<T> {
  const slowQueryThresholdMs = options?.slowQueryThresholdMs ?? DEFAULT_SLOW_QUERY_THRESHOLD_MS;
  const startTime = Date.now();

  try {
    const result = await operation();
    const duration = Date.now() - startTime;

    if (duration > slowQueryThresholdMs) {
      logger.warn(
        { duration, context, threshold: slowQueryThresholdMs },
        `Slow database query detected: ${duration}ms - ${context || 'operation'}`
      );
    }

    return result;
  } catch (error) {
    const classification = classifyDatabaseError(error);
    const sanitizedMessage = sanitizeErrorMessage(error, context);

    logger.error(
      { error: sanitizedMessage, classification, context },
      'Database operation failed'
    );

    throw new DatabaseError(classification.message, {
      operation: context,
      type: classification.type,
      transient: classification.isTransient,
      ...(classification.code !== undefined && { code: classification.code }),
    });
  }
}

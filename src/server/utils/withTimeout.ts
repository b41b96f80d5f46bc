/**
 * Timeout utility for wrapping async operations
 *
 * Used for health pings and other calls that must not hang a request.
 */

/**
 * Wrap a promise with a timeout
 *
 * @param promise - The promise to wrap
 * @param timeoutMs - Timeout in milliseconds
 * @param operationName - Optional name for error messages
 * @returns The promise result or throws timeout error
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operationName?: string
): Promise<T> {
  const operation = operationName || 'Operation';
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new Error(`${operation} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Default timeout values for common operations (in milliseconds)
 */
export const DEFAULT_TIMEOUTS = {
  /** Health check ping - 5 seconds */
  HEALTH_CHECK: 5000,
  /** Database query timeout - 30 seconds */
  DB_QUERY: 30000,
} as const;

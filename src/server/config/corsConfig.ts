/**
 * CORS Configuration
 */
import type { CorsOptions } from 'cors';
import { logger } from '../utils/logger.js';
import type { Env } from './env.js';

const DEFAULT_ORIGINS = ['http://localhost:3000', 'http://localhost:5173', 'http://127.0.0.1:5173'];

/**
 * Check if an origin is allowed.
 * Requests without an Origin header (server-to-server, curl) are allowed.
 */
export function isOriginAllowed(origin: string | undefined, allowedOrigins: string[]): boolean {
  if (!origin) {
    return true;
  }
  return allowedOrigins.includes(origin);
}

export function parseAllowedOrigins(raw: string | undefined): string[] {
  if (!raw || !raw.trim()) {
    return DEFAULT_ORIGINS;
  }
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

export function getCorsOptions(env: Pick<Env, 'ALLOWED_ORIGINS' | 'NODE_ENV'>): CorsOptions {
  const allowedOrigins = parseAllowedOrigins(env.ALLOWED_ORIGINS);
  logger.info({ allowedOrigins, fromEnv: !!env.ALLOWED_ORIGINS }, 'CORS: Configured allowed origins');

  return {
    origin: (origin, callback) => {
      if (isOriginAllowed(origin, allowedOrigins)) {
        callback(null, true);
        return;
      }
      if (env.NODE_ENV === 'development') {
        logger.warn({ origin, allowedOrigins }, 'CORS: Origin not allowed');
      }
      callback(new Error('Not allowed by CORS'));
    },
    credentials: true,
    optionsSuccessStatus: 200,
    methods: ['GET', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  };
}

/**
 * Centralized HTTP Client Configuration
 *
 * Provides shared HTTP/HTTPS agents with connection pooling and a factory
 * function for creating configured axios instances, so every provider
 * adapter talks to its upstream with the same pooling and timeout rules.
 */

import axios from 'axios';
import type { AxiosInstance, CreateAxiosDefaults, InternalAxiosRequestConfig } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

// HTTP timeout constants for different scenarios
export const HTTP_TIMEOUTS = {
  SHORT: 5000,      // 5 seconds - quick API calls
  STANDARD: 30000,  // 30 seconds - standard operations
  LONG: 120000,     // 2 minutes - LLM generation with large contexts
} as const;

const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
  timeout: 60000,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
  timeout: 60000,
});

export { httpAgent, httpsAgent };

// Request start times, keyed by the request config axios hands back on completion
const requestStartTimes = new WeakMap<InternalAxiosRequestConfig, number>();

function describeTarget(config: InternalAxiosRequestConfig | undefined): { url?: string; method?: string } {
  return { url: config?.url, method: config?.method };
}

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * @param config - Optional axios configuration to merge with defaults
 */
export function createHttpClient(config?: CreateAxiosDefaults): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    ...config,
  });

  client.interceptors.request.use((requestConfig) => {
    if (!requestConfig.timeout) {
      requestConfig.timeout = HTTP_TIMEOUTS.STANDARD;
      logger.debug(
        describeTarget(requestConfig),
        'HTTP request without explicit timeout, using default STANDARD timeout (30s)'
      );
    }
    requestStartTimes.set(requestConfig, Date.now());
    return requestConfig;
  });

  client.interceptors.response.use(
    (response) => {
      const startedAt = requestStartTimes.get(response.config);
      if (startedAt !== undefined) {
        const elapsed = Date.now() - startedAt;
        const timeout = response.config.timeout || HTTP_TIMEOUTS.STANDARD;
        if (elapsed > timeout * 0.8) {
          logger.warn(
            { ...describeTarget(response.config), elapsed, timeout },
            'HTTP request completed close to its timeout'
          );
        }
      }
      return response;
    },
    (error: unknown) => {
      if (axios.isAxiosError(error)) {
        logger.debug(
          {
            ...describeTarget(error.config),
            status: error.response?.status,
            code: error.code,
          },
          'HTTP request failed'
        );
      }
      return Promise.reject(error);
    }
  );

  return client;
}

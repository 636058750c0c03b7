/**
 * Centralized HTTP Client Configuration
 *
 * Shared HTTP/HTTPS agents with connection pooling and a factory for
 * configured axios instances.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig, type InternalAxiosRequestConfig } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

// HTTP timeout constants for different scenarios
export const HTTP_TIMEOUTS = {
  SHORT: 5000,      // 5 seconds - quick API calls
  STANDARD: 30000,  // 30 seconds - standard operations
  LONG: 120000,     // 2 minutes - long-running operations
} as const;

// Shared across all HTTP clients to maximize connection reuse
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

// Request start times, keyed by the request config axios hands back on the response
const startTimes = new WeakMap<InternalAxiosRequestConfig, number>();

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * @param config - Optional axios configuration to merge with defaults
 */
export function createHttpClient(config?: AxiosRequestConfig): AxiosInstance {
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
        { url: requestConfig.url, method: requestConfig.method },
        'HTTP request without explicit timeout, using default STANDARD timeout (30s)'
      );
    }
    startTimes.set(requestConfig, Date.now());
    return requestConfig;
  });

  client.interceptors.response.use(
    (response) => {
      const startTime = startTimes.get(response.config);
      if (startTime !== undefined) {
        logger.debug(
          { url: response.config.url, method: response.config.method, status: response.status, duration: Date.now() - startTime },
          'HTTP request completed'
        );
      }
      return response;
    },
    (error: unknown) => {
      if (axios.isAxiosError(error)) {
        logger.debug(
          { url: error.config?.url, method: error.config?.method, status: error.response?.status, code: error.code },
          'HTTP request failed'
        );
      }
      return Promise.reject(error);
    }
  );

  return client;
}

/**
 * HTTP Client Configuration
 *
 * Factory for axios instances with a default timeout and debug logging of
 * each request's outcome and duration.
 */

import axios, { isAxiosError } from 'axios';
import type { AxiosInstance, AxiosRequestConfig, InternalAxiosRequestConfig } from 'axios';
import { logger } from '../utils/logger.js';

export const HTTP_TIMEOUTS = {
  STANDARD: 30000,  // 30 seconds
} as const;

/**
 * Create a configured axios instance
 *
 * @param config - Optional axios configuration to merge with defaults
 */
export function createHttpClient(config?: AxiosRequestConfig): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    ...config,
  });

  const startTimes = new WeakMap<InternalAxiosRequestConfig, number>();

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
      logger.debug(
        {
          url: response.config.url,
          status: response.status,
          duration: startTime === undefined ? undefined : Date.now() - startTime,
        },
        'HTTP request completed'
      );
      return response;
    },
    (error: unknown) => {
      if (isAxiosError(error)) {
        const startTime = error.config ? startTimes.get(error.config) : undefined;
        logger.debug(
          {
            url: error.config?.url,
            status: error.response?.status,
            code: error.code,
            duration: startTime === undefined ? undefined : Date.now() - startTime,
          },
          'HTTP request failed'
        );
      }
      return Promise.reject(error);
    }
  );

  return client;
}

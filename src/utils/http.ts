import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosError } from 'axios';
import http from 'http';
import https from 'https';
import { createLogger } from '../core/Logger';
import type { ConnectionPoolConfig, HttpClientConfig } from '../types/http.types';

const logger = createLogger('HTTP');

/**
 * Keep-alive agents shared by every request of one transport
 */
export interface ConnectionPool {
  httpAgent: http.Agent;
  httpsAgent: https.Agent;
}

/**
 * Create the keep-alive agents backing an HTTP client
 */
export function createConnectionPool(config: ConnectionPoolConfig = {}): ConnectionPool {
  return {
    httpAgent: new http.Agent({ keepAlive: true }),
    httpsAgent: new https.Agent({
      keepAlive: true,
      rejectUnauthorized: !config.insecureSkipVerify,
      ...config.tls,
    }),
  };
}

/**
 * Close idle sockets of a pool
 */
export function releaseConnectionPool(pool: ConnectionPool): void {
  pool.httpAgent.destroy();
  pool.httpsAgent.destroy();
}

/**
 * Create an HTTP client with logging. Requests are never retried.
 */
export function createHttpClient(config: HttpClientConfig, pool?: ConnectionPool): AxiosInstance {
  const axiosConfig: AxiosRequestConfig = {
    baseURL: config.baseURL,
    timeout: config.timeout ?? 0,
    headers: config.headers ?? {},
  };

  if (config.auth) {
    axiosConfig.auth = config.auth;
  }

  if (config.proxy) {
    axiosConfig.proxy = config.proxy;
  }

  if (pool) {
    axiosConfig.httpAgent = pool.httpAgent;
    axiosConfig.httpsAgent = pool.httpsAgent;
  }

  const client = axios.create(axiosConfig);

  // Add logging interceptor
  addLoggingInterceptor(client);

  return client;
}

/**
 * Add request/response logging interceptor
 */
function addLoggingInterceptor(client: AxiosInstance): void {
  // Request logging
  client.interceptors.request.use(
    (config) => {
      logger.debug(`${config.method?.toUpperCase()} ${config.baseURL}${config.url}`);
      return config;
    },
    (error) => {
      logger.error(`Request error: ${formatHttpError(error)}`);
      return Promise.reject(error);
    }
  );

  // Response logging
  client.interceptors.response.use(
    (response) => {
      logger.debug(
        `${response.config.method?.toUpperCase()} ${response.config.url} - ${response.status}`
      );
      return response;
    },
    (error: AxiosError) => {
      if (error.response) {
        logger.debug(
          `${error.config?.method?.toUpperCase()} ${error.config?.url} - ${error.response.status}`
        );
      } else if (error.request) {
        logger.debug(`${error.config?.method?.toUpperCase()} ${error.config?.url} - No response`);
      }
      return Promise.reject(error);
    }
  );
}

/**
 * Format an Axios error for logging
 */
export function formatHttpError(error: unknown): string {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error.message : 'Unknown error';
  }

  if (error.response) {
    // Server responded with error status
    const status = error.response.status;
    const statusText = error.response.statusText;
    const url = error.config?.url || 'unknown';
    return `HTTP ${status} ${statusText} for ${url}`;
  } else if (error.request) {
    // Request made but no response received
    const url = error.config?.url || 'unknown';
    if (error.code === 'ECONNREFUSED') {
      return `Connection refused to ${url}`;
    } else if (error.code === 'ETIMEDOUT' || error.code === 'ECONNABORTED') {
      return `Request timed out for ${url}`;
    } else if (error.code === 'ENOTFOUND') {
      return `Host not found for ${url}`;
    }
    return `No response received from ${url}: ${error.code || error.message}`;
  }

  // Error setting up request
  return error.message;
}

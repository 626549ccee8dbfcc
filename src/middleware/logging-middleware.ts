import type { AxiosInstance, AxiosError, InternalAxiosRequestConfig, AxiosResponse } from 'axios';
import { logger } from '../logging/index.js';

const startTimes = new WeakMap<InternalAxiosRequestConfig, number>();

function elapsed(config: InternalAxiosRequestConfig | undefined): number {
  const start = config ? startTimes.get(config) : undefined;
  return start === undefined ? 0 : Date.now() - start;
}

export function setupLoggingMiddleware(axiosInstance: AxiosInstance): void {
  axiosInstance.interceptors.request.use(
    (config: InternalAxiosRequestConfig) => {
      startTimes.set(config, Date.now());

      if (logger.isRequestLoggingEnabled()) {
        logger.debug('HTTP Request', {
          method: config.method?.toUpperCase(),
          url: config.url,
          params: config.params instanceof URLSearchParams ? config.params.toString() : config.params,
        }, 'http-client');
      }

      return config;
    },
    (error: AxiosError) => {
      logger.error('HTTP Request Error', {
        message: error.message,
        code: error.code,
      }, 'http-client');
      return Promise.reject(error);
    }
  );

  axiosInstance.interceptors.response.use(
    (response: AxiosResponse) => {
      if (logger.isRequestLoggingEnabled()) {
        logger.debug('HTTP Response', {
          method: response.config.method?.toUpperCase(),
          url: response.config.url,
          status: response.status,
          duration_ms: elapsed(response.config),
        }, 'http-client');
      }

      return response;
    },
    (error: AxiosError) => {
      // 4xx is the caller's problem: warning level
      const status = error.response?.status;
      const entry = {
        method: error.config?.method?.toUpperCase(),
        url: error.config?.url,
        status,
        duration_ms: elapsed(error.config),
        message: error.message,
      };
      if (status !== undefined && status < 500) {
        logger.warning('HTTP Response Error', entry, 'http-client');
      } else {
        logger.error('HTTP Response Error', entry, 'http-client');
      }

      return Promise.reject(error);
    }
  );
}

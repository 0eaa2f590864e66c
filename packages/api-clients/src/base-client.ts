/**
 * Base API Client
 * ===============
 * axios-backed client base: typed error mapping, per-call debug logging and
 * opt-in retries.
 */

import axios, {
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';
import { createLogger, DEFAULT_TIMEOUT_MS, retryWithBackoff } from '@addrset/utils';
import { toAddressSetError } from './failure-classification.js';

const logger = createLogger('api-clients');

/**
 * Retry configuration. Retries only happen when this is supplied.
 */
export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
}

export interface BaseApiClientConfig {
  baseURL: string;
  timeout?: number;
  headers?: Record<string, string>;
  retry?: RetryConfig;
  apiName?: string;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
}

export class BaseApiClient {
  protected readonly axiosInstance: AxiosInstance;
  protected readonly retryConfig?: RetryConfig;
  protected readonly apiName: string;
  protected readonly timeoutMs: number;
  private readonly startTimes = new WeakMap<InternalAxiosRequestConfig, number>();

  constructor(config: BaseApiClientConfig) {
    this.apiName = config.apiName || 'API';
    this.retryConfig = config.retry;
    this.timeoutMs = config.timeout ?? DEFAULT_TIMEOUT_MS;

    this.axiosInstance =
      config.axiosInstance ??
      axios.create({
        baseURL: config.baseURL,
        timeout: this.timeoutMs,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          ...config.headers,
        },
      });

    this.axiosInstance.interceptors.request.use((requestConfig) => {
      this.startTimes.set(requestConfig, Date.now());
      return requestConfig;
    });

    this.axiosInstance.interceptors.response.use(
      (response) => {
        this.logApiCall(response.config, response.status, null);
        return response;
      },
      (error: unknown) => {
        if (!axios.isAxiosError(error)) {
          return Promise.reject(error);
        }
        const mapped = toAddressSetError(error, { apiName: this.apiName, timeoutMs: this.timeoutMs });
        this.logApiCall(error.config, error.response?.status, mapped);
        return Promise.reject(mapped);
      }
    );
  }

  /**
   * Make a request, retrying with backoff when a retry config is set
   */
  protected async request<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
    const send = () => this.axiosInstance.request<T>(config);

    if (!this.retryConfig) {
      return send();
    }

    return retryWithBackoff(send, this.retryConfig.maxRetries, this.retryConfig.initialDelayMs, {
      apiName: this.apiName,
      method: config.method,
      url: config.url,
    });
  }

  async get<T = unknown>(url: string, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.request<T>({ ...config, method: 'GET', url });
    return response.data;
  }

  async patch<T = unknown>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.request<T>({ ...config, method: 'PATCH', url, data });
    return response.data;
  }

  /**
   * Get axios instance for advanced usage
   */
  getAxiosInstance(): AxiosInstance {
    return this.axiosInstance;
  }

  private logApiCall(
    config: InternalAxiosRequestConfig | undefined,
    statusCode: number | undefined,
    error: Error | null
  ): void {
    if (!config) return;

    const startTime = this.startTimes.get(config);
    const latencyMs = startTime !== undefined ? Date.now() - startTime : undefined;
    const context = {
      apiName: this.apiName,
      method: config.method?.toUpperCase() || 'GET',
      endpoint: config.url || 'unknown',
      statusCode,
      latencyMs,
    };

    if (error) {
      logger.debug('API call failed', { ...context, error: error.message });
    } else {
      logger.debug('API call completed', context);
    }
  }
}

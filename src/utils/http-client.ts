/**
 * HTTP Client for the Rubix SDK
 *
 * Handles all HTTP communication with the node: keep-alive agents, retry of
 * read requests and conversion of transport failures into typed errors.
 */

import http from 'http';
import https from 'https';
import axios, { AxiosError, AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import axiosRetry from 'axios-retry';
import {
  RubixError,
  AuthenticationError,
  AuthorizationError,
  ConflictError,
  InternalServerError,
  NodeUnreachableError,
  NotFoundError,
  RateLimitError,
  ServiceUnavailableError,
  TimeoutError,
  ValidationError,
} from '../errors';
import { Logger, silentLogger } from './logger';

/**
 * HTTP client configuration
 */
export interface HTTPClientConfig {
  baseUrl: string;
  apiKey?: string;
  /** Timeout in milliseconds */
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
  logger?: Logger;
}

const RETRYABLE_STATUS = new Set([429, 502, 503, 504]);
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * HTTP client for making node requests
 *
 * Only GET requests are replayed: registration, initiation and signature
 * responses change node state and must reach it at most once.
 */
export class HTTPClient {
  private client: AxiosInstance;
  private apiKey?: string;
  private timeout: number;
  private readonly baseUrl: string;
  private logger: Logger;

  constructor(config: HTTPClientConfig) {
    this.apiKey = config.apiKey;
    this.timeout = config.timeout ?? 30000;
    this.baseUrl = config.baseUrl;
    this.logger = config.logger ?? silentLogger;

    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: this.timeout,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'rubix-sdk-ts/0.1',
      },
      httpAgent: new http.Agent({ keepAlive: true, keepAliveMsecs: 30000, maxSockets: 50 }),
      httpsAgent: new https.Agent({ keepAlive: true, keepAliveMsecs: 30000, maxSockets: 50 }),
    });

    this.setupRetryStrategy(config.maxRetries ?? 3, config.retryDelay ?? 500);
    this.setupInterceptors();
  }

  /**
   * Setup retry strategy with linear backoff
   */
  private setupRetryStrategy(maxRetries: number, retryDelay: number): void {
    axiosRetry(this.client, {
      retries: maxRetries,
      retryDelay: (retryCount) => retryCount * retryDelay,
      retryCondition: (error: AxiosError) => {
        if (error.config?.method?.toLowerCase() !== 'get') {
          return false;
        }
        if (axiosRetry.isNetworkError(error)) {
          return true;
        }
        return error.response !== undefined && RETRYABLE_STATUS.has(error.response.status);
      },
      onRetry: (retryCount, _error, requestConfig) => {
        this.logger.warn(
          `Retrying request to ${requestConfig.url} (attempt ${retryCount}/${maxRetries})`
        );
      },
    });
  }

  /**
   * Setup request and response interceptors
   */
  private setupInterceptors(): void {
    this.client.interceptors.request.use((config) => {
      if (this.apiKey) {
        config.headers['X-API-Key'] = this.apiKey;
      }
      return config;
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => Promise.reject(this.handleError(error))
    );
  }

  /**
   * Convert axios failures into typed SDK errors
   */
  private handleError(error: AxiosError): RubixError {
    const url = `${this.baseUrl}${error.config?.url ?? ''}`;

    if (!error.response) {
      if ((error.code && TIMEOUT_CODES.has(error.code)) || error.message.includes('timeout')) {
        return new TimeoutError(`Request to ${url} timed out after ${this.timeout / 1000}s`);
      }
      return new NodeUnreachableError(`Failed to connect to Rubix node at ${this.baseUrl}`, {
        cause: error.message,
      });
    }

    const response = error.response;
    const errorMessage = extractMessage(response.data) ?? `HTTP ${response.status} from ${url}`;

    switch (response.status) {
      case 400:
        return new ValidationError(errorMessage);
      case 401:
        return new AuthenticationError(errorMessage);
      case 403:
        return new AuthorizationError(errorMessage);
      case 404:
        return new NotFoundError(errorMessage);
      case 409:
        return new ConflictError(errorMessage);
      case 429: {
        const retryAfter = response.headers['retry-after'];
        return new RateLimitError(
          errorMessage,
          typeof retryAfter === 'string' ? parseInt(retryAfter, 10) : undefined
        );
      }
      case 503:
        return new ServiceUnavailableError(errorMessage);
      default:
        if (response.status >= 500) {
          return new InternalServerError(errorMessage, response.status);
        }
        return new RubixError(errorMessage, 'HTTP_ERROR', response.status);
    }
  }

  /**
   * Make a GET request
   */
  async get<T = unknown>(
    endpoint: string,
    params?: Record<string, unknown>,
    config?: AxiosRequestConfig
  ): Promise<T> {
    const response: AxiosResponse<T> = await this.client.get(endpoint, {
      params,
      ...config,
    });
    return response.data;
  }

  /**
   * Make a POST request with a JSON body
   */
  async post<T = unknown>(
    endpoint: string,
    data?: Record<string, unknown>,
    config?: AxiosRequestConfig
  ): Promise<T> {
    const response: AxiosResponse<T> = await this.client.post(endpoint, data, config);
    return response.data;
  }

  /**
   * Make a multipart/form-data POST request
   */
  async postForm<T = unknown>(endpoint: string, form: FormData, config?: AxiosRequestConfig): Promise<T> {
    const response: AxiosResponse<T> = await this.client.post(endpoint, form, {
      ...config,
      headers: { 'Content-Type': 'multipart/form-data' },
    });
    return response.data;
  }

  /**
   * Close the HTTP client
   */
  close(): void {
    this.client.interceptors.request.clear();
    this.client.interceptors.response.clear();
  }
}

function extractMessage(data: unknown): string | undefined {
  if (!data || typeof data !== 'object') {
    return undefined;
  }
  if ('message' in data && typeof data.message === 'string' && data.message) {
    return data.message;
  }
  if ('error' in data && typeof data.error === 'string' && data.error) {
    return data.error;
  }
  return undefined;
}

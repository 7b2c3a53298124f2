/**
 * HTTP Client Tests
 */

import axios, { AxiosError, AxiosHeaders, RawAxiosResponseHeaders } from 'axios';
import axiosRetry from 'axios-retry';
import { HTTPClient } from '../src/utils/http-client';
import {
  RubixError,
  AuthenticationError,
  ConflictError,
  InternalServerError,
  NodeUnreachableError,
  NotFoundError,
  RateLimitError,
  ServiceUnavailableError,
  TimeoutError,
  ValidationError,
} from '../src/errors';
import { Logger } from '../src/utils/logger';

const mockInstance = {
  get: jest.fn(),
  post: jest.fn(),
  interceptors: {
    request: { use: jest.fn(), clear: jest.fn() },
    response: { use: jest.fn(), clear: jest.fn() },
  },
};

jest.mock('axios', () => {
  const actual = jest.requireActual('axios');
  return {
    __esModule: true,
    ...actual,
    default: { create: jest.fn(() => mockInstance) },
  };
});

jest.mock('axios-retry', () => {
  const actual = jest.requireActual('axios-retry');
  return {
    __esModule: true,
    default: Object.assign(jest.fn(), { isNetworkError: actual.default.isNetworkError }),
  };
});

const BASE_URL = 'http://localhost:20000';

interface ErrorOptions {
  method?: string;
  url?: string;
  status?: number;
  code?: string;
  data?: unknown;
  headers?: RawAxiosResponseHeaders;
  message?: string;
}

function axiosError(options: ErrorOptions): AxiosError {
  const config = {
    method: options.method ?? 'get',
    url: options.url ?? '/api/test',
    headers: new AxiosHeaders(),
  };
  const response =
    options.status === undefined
      ? undefined
      : {
          data: options.data ?? {},
          status: options.status,
          statusText: '',
          headers: options.headers ?? {},
          config,
        };
  return new AxiosError(options.message ?? 'Request failed', options.code, config, undefined, response);
}

describe('HTTPClient', () => {
  let logger: jest.Mocked<Logger>;
  let client: HTTPClient;

  const lastCall = (mock: jest.Mock) => mock.mock.calls[mock.mock.calls.length - 1];
  const onRejected = (error: AxiosError): Promise<unknown> =>
    lastCall(mockInstance.interceptors.response.use)[1](error);
  const retryConfig = () => jest.mocked(axiosRetry).mock.calls[0][1];

  beforeEach(() => {
    jest.clearAllMocks();
    logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
    client = new HTTPClient({
      baseUrl: BASE_URL,
      apiKey: 'test-key',
      timeout: 1000,
      maxRetries: 2,
      retryDelay: 100,
      logger,
    });
  });

  describe('constructor', () => {
    it('should create an axios instance for the node', () => {
      const config = jest.mocked(axios.create).mock.calls[0][0];

      expect(config?.baseURL).toBe(BASE_URL);
      expect(config?.timeout).toBe(1000);
    });

    it('should attach the API key', () => {
      const onRequest = lastCall(mockInstance.interceptors.request.use)[0];
      const config = onRequest({ headers: {} });

      expect(config.headers['X-API-Key']).toBe('test-key');
    });

    it('should omit the API key when not configured', () => {
      new HTTPClient({ baseUrl: BASE_URL });
      const onRequest = lastCall(mockInstance.interceptors.request.use)[0];
      const config = onRequest({ headers: {} });

      expect(config.headers['X-API-Key']).toBeUndefined();
    });
  });

  describe('retry policy', () => {
    it('should configure retries with linear backoff', () => {
      const config = retryConfig();

      expect(config?.retries).toBe(2);
      expect(config?.retryDelay?.(1, axiosError({}))).toBe(100);
      expect(config?.retryDelay?.(3, axiosError({}))).toBe(300);
    });

    it('should retry GET requests on gateway errors', async () => {
      const condition = retryConfig()?.retryCondition;

      expect(await condition?.(axiosError({ status: 503 }))).toBe(true);
      expect(await condition?.(axiosError({ status: 502 }))).toBe(true);
      expect(await condition?.(axiosError({ status: 429 }))).toBe(true);
    });

    it('should retry GET requests on network errors', async () => {
      const condition = retryConfig()?.retryCondition;

      expect(await condition?.(axiosError({ code: 'ECONNREFUSED' }))).toBe(true);
    });

    it('should not retry other statuses', async () => {
      const condition = retryConfig()?.retryCondition;

      expect(await condition?.(axiosError({ status: 500 }))).toBe(false);
      expect(await condition?.(axiosError({ status: 404 }))).toBe(false);
    });

    it('should never retry POST requests', async () => {
      const condition = retryConfig()?.retryCondition;

      expect(await condition?.(axiosError({ method: 'post', status: 503 }))).toBe(false);
      expect(await condition?.(axiosError({ method: 'post', code: 'ECONNREFUSED' }))).toBe(false);
    });

    it('should log each retry', () => {
      const error = axiosError({ status: 503 });
      retryConfig()?.onRetry?.(1, error, { url: '/api/get-account-info' });

      expect(logger.warn).toHaveBeenCalledWith('Retrying request to /api/get-account-info (attempt 1/2)');
    });
  });

  describe('error mapping', () => {
    it('should map timeouts to TimeoutError', async () => {
      await expect(
        onRejected(axiosError({ code: 'ECONNABORTED', message: 'timeout of 1000ms exceeded' }))
      ).rejects.toThrow(new TimeoutError(`Request to ${BASE_URL}/api/test timed out after 1s`));
    });

    it('should map refused connections to NodeUnreachableError', async () => {
      await expect(onRejected(axiosError({ code: 'ECONNREFUSED' }))).rejects.toThrow(
        new NodeUnreachableError(`Failed to connect to Rubix node at ${BASE_URL}`)
      );
    });

    it('should use the node message when present', async () => {
      await expect(
        onRejected(axiosError({ status: 404, data: { message: 'DID not found' } }))
      ).rejects.toThrow(new NotFoundError('DID not found'));
    });

    it('should fall back to a status message', async () => {
      await expect(onRejected(axiosError({ status: 400, data: '' }))).rejects.toThrow(
        new ValidationError(`HTTP 400 from ${BASE_URL}/api/test`)
      );
    });

    it('should map auth and conflict statuses', async () => {
      await expect(onRejected(axiosError({ status: 401 }))).rejects.toBeInstanceOf(AuthenticationError);
      await expect(onRejected(axiosError({ status: 409 }))).rejects.toBeInstanceOf(ConflictError);
    });

    it('should read retry-after on 429', async () => {
      const rejection = onRejected(axiosError({ status: 429, headers: { 'retry-after': '7' } }));

      await expect(rejection).rejects.toBeInstanceOf(RateLimitError);
      await expect(rejection).rejects.toHaveProperty('retryAfter', 7);
    });

    it('should map 503 and other server errors', async () => {
      await expect(onRejected(axiosError({ status: 503 }))).rejects.toBeInstanceOf(
        ServiceUnavailableError
      );
      await expect(onRejected(axiosError({ status: 502 }))).rejects.toHaveProperty('status', 502);
      await expect(onRejected(axiosError({ status: 500 }))).rejects.toBeInstanceOf(InternalServerError);
    });

    it('should keep unknown statuses as RubixError', async () => {
      const rejection = onRejected(axiosError({ status: 418, data: { error: 'teapot' } }));

      await expect(rejection).rejects.toBeInstanceOf(RubixError);
      await expect(rejection).rejects.toHaveProperty('code', 'HTTP_ERROR');
      await expect(rejection).rejects.toHaveProperty('message', 'teapot');
    });
  });

  describe('requests', () => {
    it('should GET with query parameters', async () => {
      mockInstance.get.mockResolvedValue({ data: { status: true } });

      const result = await client.get('/api/get-account-info', { did: 'abc' });

      expect(result).toEqual({ status: true });
      expect(mockInstance.get).toHaveBeenCalledWith('/api/get-account-info', { params: { did: 'abc' } });
    });

    it('should POST JSON bodies', async () => {
      mockInstance.post.mockResolvedValue({ data: { status: true } });

      await client.post('/api/register-did', { did: 'abc' });

      expect(mockInstance.post).toHaveBeenCalledWith('/api/register-did', { did: 'abc' }, undefined);
    });

    it('should POST forms as multipart', async () => {
      mockInstance.post.mockResolvedValue({ data: { status: true, result: 'Qm' } });
      const form = new FormData();
      form.append('did', 'abc');

      const result = await client.postForm('/api/create-nft', form);

      expect(result).toEqual({ status: true, result: 'Qm' });
      expect(mockInstance.post).toHaveBeenCalledWith('/api/create-nft', form, {
        headers: { 'Content-Type': 'multipart/form-data' },
      });
    });

    it('should clear interceptors on close', () => {
      client.close();

      expect(mockInstance.interceptors.request.clear).toHaveBeenCalled();
      expect(mockInstance.interceptors.response.clear).toHaveBeenCalled();
    });
  });
});

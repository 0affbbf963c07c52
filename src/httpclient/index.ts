import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { HttpClientOptions, HttpMethod, HttpResponse, RequestOptions } from './types';
import { RemoteCallError, errorMessage } from '../errors';
import { logger, LogContext } from '../logger';

const isTimeout = (code: string | undefined): boolean => code === 'ECONNABORTED' || code === 'ETIMEDOUT';

// HttpClient for external calls (explicit timeouts, logging, optional retries)
export class HttpClient {
  private client: AxiosInstance;
  private options: HttpClientOptions;

  constructor(options: HttpClientOptions) {
    this.options = {
      timeout: 5000,
      retryCount: 0,
      ...options,
    };

    this.client = axios.create({
      baseURL: this.options.baseUrl,
      timeout: this.options.timeout,
      headers: this.options.headers || {},
    });
  }

  async request<T>(
    method: HttpMethod,
    ctx: LogContext | undefined,
    path: string,
    options: RequestOptions = {}
  ): Promise<HttpResponse<T>> {
    const startTime = Date.now();
    const url = path.startsWith('/') ? path : `/${path}`;
    const operation = options.operation ?? `${method} ${url}`;

    logger.debug(ctx, `Outbound ${method} request`, { service: this.options.service, operation, url });

    const retryCount = options.retryCount ?? this.options.retryCount ?? 0;
    let lastError: RemoteCallError | undefined;

    for (let attempt = 0; attempt <= retryCount; attempt++) {
      try {
        const requestConfig: AxiosRequestConfig = {
          method,
          url,
          headers: options.headers,
          timeout: options.timeout ?? this.options.timeout,
          data: options.body,
        };

        const response = await this.client.request<T>(requestConfig);

        logger.info(ctx, `Outbound ${method} response`, {
          service: this.options.service,
          operation,
          status: response.status,
          latencyMs: Date.now() - startTime,
        });

        return { status: response.status, data: response.data };
      } catch (error: unknown) {
        const status = axios.isAxiosError(error) ? error.response?.status ?? null : null;
        const timedOut = axios.isAxiosError(error) && isTimeout(error.code);
        lastError = new RemoteCallError(this.options.service, operation, errorMessage(error), {
          status,
          timedOut,
          cause: error,
        });

        logger.error(ctx, `Outbound ${method} failed`, {
          service: this.options.service,
          operation,
          attempt: attempt + 1,
          status,
          timedOut,
          latencyMs: Date.now() - startTime,
          error: errorMessage(error),
        });

        // Never retry 4xx; those answers are final
        if (status !== null && status >= 400 && status < 500) {
          throw lastError;
        }
        if (attempt === retryCount) {
          break;
        }
        await new Promise((resolve) => setTimeout(resolve, 100 * Math.pow(2, attempt)));
      }
    }

    throw lastError ?? new RemoteCallError(this.options.service, operation, 'request was not attempted');
  }

  async get<T>(ctx: LogContext | undefined, path: string, options: RequestOptions = {}): Promise<HttpResponse<T>> {
    return this.request<T>('GET', ctx, path, options);
  }

  async post<T>(ctx: LogContext | undefined, path: string, body?: unknown, options: RequestOptions = {}): Promise<HttpResponse<T>> {
    return this.request<T>('POST', ctx, path, { ...options, body });
  }

  async delete<T>(ctx: LogContext | undefined, path: string, options: RequestOptions = {}): Promise<HttpResponse<T>> {
    return this.request<T>('DELETE', ctx, path, options);
  }
}

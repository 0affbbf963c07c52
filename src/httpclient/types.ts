import type { RemoteService } from '../errors';

export interface HttpClientOptions {
  baseUrl: string;
  service: RemoteService;  // tags RemoteCallError / logs
  timeout?: number;  // ms for requests
  retryCount?: number;  // retries on 5xx / network / timeout only
  headers?: Record<string, string>;  // common headers
}

export interface RequestOptions {
  timeout?: number;
  headers?: Record<string, string>;
  body?: unknown;  // for POST/PUT etc.
  retryCount?: number;
  operation?: string;  // label for logs and errors, defaults to "METHOD path"
}

export interface HttpResponse<T> {
  status: number;
  data: T;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Shared types for the http module
 */

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequestOptions {
  /** Appended to the URL's query string */
  params?: Record<string, string | number>;
  headers?: Record<string, string>;
  /** Raw request body */
  body?: string;
  /** Serialized as the body with `Content-Type: application/json` */
  json?: unknown;
  /** Overrides the client's per-request timeout */
  timeoutMs?: number;
  /** Platform label recorded in error details */
  platform?: string;
  /** Throw APIError for status >= 400 (default true) */
  throwOnHttpError?: boolean;
  /** Once aborted, no new dispatch or retry is started */
  signal?: AbortSignal;
}

export interface HttpResponse {
  url: string;
  statusCode: number;
  /** Header names are lower-cased */
  headers: Record<string, string>;
  body: string;
}

/**
 * What extractors and the service client depend on. The rate-limited client
 * implements it; tests substitute fakes.
 */
export interface HttpRequester {
  request(method: HttpMethod, url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
  post(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export interface HttpClientOptions {
  /** Concurrent in-flight requests across all domains (default 100) */
  maxConnections?: number;
  /** Idle time after which the pooled session is replaced, ms (default 30000) */
  keepaliveExpiryMs?: number;
  /** Per-request timeout, ms (default 30000) */
  timeoutMs?: number;
  /** Total attempts for transient failures (default 3) */
  maxRetries?: number;
  /** Backoff base in seconds (default 1) */
  backoffFactor?: number;
  /** Backoff cap, ms (default 10000) */
  maxBackoffMs?: number;
  /** Requests per second keyed by host */
  rateLimits?: Record<string, number>;
  /** Requests per second for hosts without an entry (default 2) */
  defaultRateLimit?: number;
  /** httpcloak TLS preset */
  preset?: string;
}

/**
 * Rate-limited HTTP client over a shared httpcloak session.
 *
 * Every request waits for its domain's throttle, then for a connection slot,
 * then dispatches. Connect failures and timeouts are retried with exponential
 * backoff; HTTP error statuses are surfaced as APIError and left to the caller.
 * A slot is held until httpcloak settles the call, even after a timeout.
 */
import httpcloak from 'httpcloak';
import { logger } from '../logger.js';
import {
  APIError,
  ImageExtractorError,
  NetworkError,
  RateLimitExceededError,
  TimeoutError,
} from '../errors.js';
import { DomainThrottle } from './throttle.js';
import { Semaphore } from './semaphore.js';
import { withRetry, type RetryPolicy } from './retry.js';
import type {
  HttpClientOptions,
  HttpMethod,
  HttpRequester,
  HttpRequestOptions,
  HttpResponse,
} from './types.js';

/** Configuration constants */
const DEFAULT_MAX_CONNECTIONS = 100;
const DEFAULT_KEEPALIVE_EXPIRY_MS = 30_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BACKOFF_FACTOR = 1;
const MIN_BACKOFF_MS = 1000;
const DEFAULT_MAX_BACKOFF_MS = 10_000;
const DEFAULT_RATE_LIMIT = 2;
const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB

/** Default TLS preset */
const DEFAULT_PRESET = httpcloak.Preset.CHROME_143;

/** Query parameters whose values never reach the logs */
const SECRET_PARAMS = ['api_key', 'token', 'access_token', 'client_id', 'client_secret'];

/**
 * Mask credential-bearing query parameters for safe logging.
 */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    for (const name of SECRET_PARAMS) {
      if (parsed.searchParams.has(name)) parsed.searchParams.set(name, '***');
    }
    return parsed.toString();
  } catch {
    return '<invalid-url>';
  }
}

/** Throttle key for a URL: its lower-cased host, or "default" when unparsable. */
export function domainOf(url: string): string {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return 'default';
  }
}

export function buildUrl(url: string, params?: Record<string, string | number>): string {
  if (!params || Object.keys(params).length === 0) return url;
  const parsed = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    parsed.searchParams.set(key, String(value));
  }
  return parsed.toString();
}

/** Retry-After as whole seconds; HTTP-date values are ignored. */
function parseRetryAfter(value: string | undefined): number | undefined {
  if (!value || !/^\d+$/.test(value.trim())) return undefined;
  return parseInt(value.trim(), 10);
}

function normalizeHeaders(headers: Record<string, unknown> | undefined): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers ?? {})) {
    normalized[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return normalized;
}

function readBody(response: httpcloak.Response): string {
  // NOTE: httpcloak sometimes returns text as function, sometimes as property
  const textValue = response.text as string | (() => string) | undefined;
  return (typeof textValue === 'function' ? textValue() : textValue) ?? '';
}

function statusError(response: HttpResponse, url: string, platform: string): APIError {
  const { statusCode } = response;
  if (statusCode === 429) {
    return new RateLimitExceededError(url, platform, parseRetryAfter(response.headers['retry-after']));
  }
  const label = statusCode < 500 ? 'Client error' : 'Server error';
  return new APIError(
    url,
    platform,
    { message: `${label} ${statusCode}: ${response.body.slice(0, 200)}` },
    statusCode
  );
}

/** Dispatch a request using the appropriate HTTP method. */
function dispatchRequest(
  session: httpcloak.Session,
  method: HttpMethod,
  url: string,
  headers: Record<string, string>,
  body: string | undefined
): Promise<httpcloak.Response> {
  const opts = {
    headers,
    ...(method === 'POST' && body !== undefined ? { body } : {}),
  } as httpcloak.RequestOptions;

  return method === 'POST' ? session.post(url, opts) : session.get(url, opts);
}

/**
 * Stop before dispatch once the caller has given up. The abort reason is
 * rethrown when it is already a taxonomy error.
 */
function throwIfAborted(signal: AbortSignal | undefined, url: string): void {
  if (!signal?.aborted) return;
  const reason: unknown = signal.reason;
  if (reason instanceof ImageExtractorError) throw reason;
  throw new NetworkError(url, 'Request aborted');
}

/** Create a timeout promise that rejects with TimeoutError. */
function createRequestTimeout(
  url: string,
  timeoutMs: number,
  retryCount: number
): { promise: Promise<never>; cancel: () => void } {
  let timeoutId: NodeJS.Timeout;
  const promise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new TimeoutError(url, timeoutMs / 1000, retryCount)),
      timeoutMs
    );
  });
  return { promise, cancel: () => clearTimeout(timeoutId) };
}

export class RateLimitedHttpClient implements HttpRequester {
  readonly maxConnections: number;
  readonly keepaliveExpiryMs: number;
  readonly timeoutMs: number;
  readonly retryPolicy: RetryPolicy;
  readonly defaultRateLimit: number;
  private readonly rateLimits: ReadonlyMap<string, number>;
  private readonly preset: string;
  private readonly slots: Semaphore;
  private readonly throttles = new Map<string, DomainThrottle>();

  private session: httpcloak.Session | undefined;
  private sessionLastUsed = 0;
  private inFlightRequests = 0;

  constructor(options: HttpClientOptions = {}) {
    this.maxConnections = options.maxConnections ?? DEFAULT_MAX_CONNECTIONS;
    this.keepaliveExpiryMs = options.keepaliveExpiryMs ?? DEFAULT_KEEPALIVE_EXPIRY_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.defaultRateLimit = options.defaultRateLimit ?? DEFAULT_RATE_LIMIT;
    this.preset = options.preset ?? DEFAULT_PRESET;
    this.retryPolicy = {
      maxAttempts: options.maxRetries ?? DEFAULT_MAX_RETRIES,
      backoffFactor: options.backoffFactor ?? DEFAULT_BACKOFF_FACTOR,
      minDelayMs: MIN_BACKOFF_MS,
      maxDelayMs: options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS,
    };
    this.rateLimits = new Map(
      Object.entries(options.rateLimits ?? {}).map(([domain, rps]) => [domain.toLowerCase(), rps])
    );
    this.slots = new Semaphore(this.maxConnections);
  }

  /** Domains that currently hold throttle state. */
  get throttledDomains(): string[] {
    return [...this.throttles.keys()];
  }

  get hasSession(): boolean {
    return this.session !== undefined;
  }

  rateLimitFor(domain: string): number {
    return this.rateLimits.get(domain) ?? this.defaultRateLimit;
  }

  /**
   * Get or create the throttle for a domain. The check and the insert run
   * synchronously, so concurrent first use still creates exactly one.
   */
  getThrottle(domain: string): DomainThrottle {
    let throttle = this.throttles.get(domain);
    if (!throttle) {
      throttle = new DomainThrottle(domain, this.rateLimitFor(domain));
      this.throttles.set(domain, throttle);
    }
    return throttle;
  }

  /**
   * Get or create the shared session. The session constructor is synchronous,
   * so no other request can observe the slot empty between check and assign.
   * An idle session past its keep-alive expiry is closed and replaced.
   */
  private getSession(): httpcloak.Session {
    if (
      this.session &&
      this.inFlightRequests === 0 &&
      Date.now() - this.sessionLastUsed > this.keepaliveExpiryMs
    ) {
      logger.debug({ idleMs: Date.now() - this.sessionLastUsed }, 'Recycling idle httpcloak session');
      this.closeSession(this.session);
      this.session = undefined;
    }

    if (!this.session) {
      logger.debug({ preset: this.preset }, 'Creating httpcloak session');
      // Constructor failures leave the slot empty so the next request retries creation.
      this.session = new httpcloak.Session({
        preset: this.preset,
        timeout: Math.ceil(this.timeoutMs / 1000),
      });
      this.sessionLastUsed = Date.now();
    }

    return this.session;
  }

  private closeSession(session: httpcloak.Session): void {
    try {
      session.close();
    } catch (error) {
      logger.warn({ error: String(error) }, 'Error closing httpcloak session');
    }
  }

  async request(
    method: HttpMethod,
    url: string,
    options: HttpRequestOptions = {}
  ): Promise<HttpResponse> {
    const target = buildUrl(url, options.params);
    const domain = domainOf(target);

    return withRetry(
      (attempt) => this.attempt(method, target, domain, options, attempt - 1),
      this.retryPolicy,
      (error, attempt, delayMs) => {
        logger.warn(
          { url: redactUrl(target), attempt, delayMs, error: error.message },
          'Transient request failure, backing off'
        );
      },
      options.signal
    );
  }

  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    return this.request('GET', url, options);
  }

  post(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    return this.request('POST', url, options);
  }

  private async attempt(
    method: HttpMethod,
    url: string,
    domain: string,
    options: HttpRequestOptions,
    retryCount: number
  ): Promise<HttpResponse> {
    const safeUrl = redactUrl(url);
    throwIfAborted(options.signal, safeUrl);
    await this.getThrottle(domain).acquire();
    throwIfAborted(options.signal, safeUrl);
    const release = await this.slots.acquire();

    let timeout: { promise: Promise<never>; cancel: () => void } | undefined;
    let dispatch: Promise<httpcloak.Response> | undefined;
    let timedOut = false;
    try {
      throwIfAborted(options.signal, safeUrl);

      const headers: Record<string, string> = { Accept: 'application/json', ...options.headers };
      let body = options.body;
      if (options.json !== undefined) {
        body = JSON.stringify(options.json);
        headers['Content-Type'] = 'application/json';
      }

      logger.debug({ url: safeUrl, method, retryCount }, 'Making httpcloak request');

      const timeoutMs = options.timeoutMs ?? this.timeoutMs;
      let raw: httpcloak.Response;
      try {
        dispatch = dispatchRequest(this.getSession(), method, url, headers, body);
        this.inFlightRequests++;
        timeout = createRequestTimeout(safeUrl, timeoutMs, retryCount);
        raw = await Promise.race([dispatch, timeout.promise]);
      } catch (error) {
        if (error instanceof TimeoutError) {
          timedOut = true;
          throw error;
        }
        logger.warn({ url: safeUrl, error: String(error) }, 'httpcloak request failed');
        throw new NetworkError(safeUrl, `Connection failed: ${String(error)}`, retryCount);
      }

      let response: HttpResponse;
      try {
        response = {
          url,
          statusCode: raw.statusCode,
          headers: normalizeHeaders(raw.headers),
          body: readBody(raw),
        };
      } catch (error) {
        logger.error({ url: safeUrl, error: String(error) }, 'Failed to read httpcloak response');
        throw new ImageExtractorError(
          'internal_error',
          `Failed to read response from ${safeUrl}: ${String(error)}`,
          { url: safeUrl, reason: String(error) }
        );
      }

      const platform = options.platform ?? 'unknown';
      if (response.body.length > MAX_RESPONSE_SIZE) {
        logger.warn(
          { url: safeUrl, size: response.body.length, limit: MAX_RESPONSE_SIZE },
          'Response exceeds size limit'
        );
        throw new APIError(
          safeUrl,
          platform,
          { message: 'Response exceeds size limit' },
          response.statusCode
        );
      }

      logger.debug(
        { url: safeUrl, statusCode: response.statusCode, bodyLength: response.body.length },
        'httpcloak request complete'
      );

      if (response.statusCode >= 400 && options.throwOnHttpError !== false) {
        throw statusError(response, safeUrl, platform);
      }

      return response;
    } finally {
      timeout?.cancel();
      const started = dispatch !== undefined;
      const settle = (): void => {
        if (started) this.inFlightRequests--;
        this.sessionLastUsed = Date.now();
        release();
      };
      // A timed-out call still occupies its connection until httpcloak gives up on it.
      if (dispatch && timedOut) void dispatch.then(settle, settle);
      else settle();
    }
  }

  /**
   * Close the pooled session and drop throttle state. Safe to call repeatedly;
   * the client recreates both lazily if used again.
   */
  async close(): Promise<void> {
    const session = this.session;
    this.session = undefined;
    this.throttles.clear();
    if (session) this.closeSession(session);
  }
}

/**
 * image-extract - Direct image URLs from photo hosting platforms, through their
 * REST APIs, with per-domain rate limiting and retrying transport.
 *
 * @module image-extract
 */
export { loadConfig, toHttpClientOptions, isPlatformConfigured } from './config.js';
export { createRuntime } from './runtime.js';
export { createApp, startServer, stopServer } from './server.js';
export { ImageExtractorClient } from './client.js';
export { RateLimitedHttpClient, redactUrl } from './http/http-client.js';
export { DomainThrottle } from './http/throttle.js';
export { Semaphore } from './http/semaphore.js';
export { withRetry, backoffDelay, DEFAULT_RETRY_POLICY } from './http/retry.js';
export { ExtractorRegistry } from './extract/registry.js';
export { ImageExtractionService } from './extract/extraction-service.js';
export { FlickrExtractor, parseFlickrUrl, decodeBase58 } from './extractors/flickr/index.js';
export {
  validateUrl,
  sanitizeUrl,
  validateExtractionOptions,
  validateApiKey,
  validateRateLimit,
  getPlatformFromUrl,
} from './validation.js';
export {
  ImageExtractorError,
  ConfigurationError,
  PlatformNotConfiguredError,
  InvalidURLError,
  UnsupportedPlatformError,
  ValidationError,
  NetworkError,
  TimeoutError,
  ExtractionError,
  APIError,
  RateLimitExceededError,
  httpStatusFor,
  toErrorResponse,
  userFriendlyMessage,
  errorFromPayload,
} from './errors.js';
export type { AppConfig, Platform } from './config.js';
export type { Runtime } from './runtime.js';
export type { HealthStatus, ImageExtractorClientOptions } from './client.js';
export type {
  HttpClientOptions,
  HttpMethod,
  HttpRequester,
  HttpRequestOptions,
  HttpResponse,
} from './http/types.js';
export type {
  Extractor,
  ExtractionOptions,
  ExtractionRequest,
  ExtractionResult,
  ImageRecord,
  OutputFormat,
  SizePreference,
} from './extract/types.js';
export type { ErrorKind, ErrorResponseBody } from './errors.js';

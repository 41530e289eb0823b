/**
 * Error taxonomy shared by the HTTP client, extractors, service and server.
 *
 * Every error carries a machine-readable `kind`, a structured `details` map
 * and a human-readable message. `httpStatusFor` and `toErrorResponse` turn
 * them into the wire format used by the HTTP endpoint.
 */

export type ErrorKind =
  | 'configuration_error'
  | 'platform_not_configured'
  | 'invalid_url'
  | 'unsupported_platform'
  | 'validation_error'
  | 'network_error'
  | 'timeout'
  | 'api_error'
  | 'rate_limit_exceeded'
  | 'extraction_error'
  | 'internal_error';

const ERROR_KINDS: readonly ErrorKind[] = [
  'configuration_error',
  'platform_not_configured',
  'invalid_url',
  'unsupported_platform',
  'validation_error',
  'network_error',
  'timeout',
  'api_error',
  'rate_limit_exceeded',
  'extraction_error',
  'internal_error',
];

export type ErrorDetails = Record<string, unknown>;

export class ImageExtractorError extends Error {
  readonly kind: ErrorKind;
  readonly details: ErrorDetails;

  constructor(kind: ErrorKind, message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = 'ImageExtractorError';
    this.kind = kind;
    this.details = details;
  }

  toJSON(): { kind: ErrorKind; message: string; details: ErrorDetails } {
    return { kind: this.kind, message: this.message, details: this.details };
  }
}

export class ConfigurationError extends ImageExtractorError {
  constructor(message: string, details: ErrorDetails = {}, kind: ErrorKind = 'configuration_error') {
    super(kind, message, details);
    this.name = 'ConfigurationError';
  }
}

/** Missing or placeholder credential for a platform. */
export class PlatformNotConfiguredError extends ConfigurationError {
  constructor(platform: string, missingConfig: string, reason?: string) {
    super(
      `Platform '${platform}' is not configured: ${reason ?? `missing ${missingConfig}`}`,
      { platform, missing_config: missingConfig, ...(reason ? { reason } : {}) },
      'platform_not_configured'
    );
    this.name = 'PlatformNotConfiguredError';
  }
}

export class InvalidURLError extends ImageExtractorError {
  constructor(url: string, reason = 'Invalid URL format') {
    super('invalid_url', `Invalid URL: ${reason}`, { url, reason });
    this.name = 'InvalidURLError';
  }
}

export class UnsupportedPlatformError extends ImageExtractorError {
  constructor(url: string, supportedPlatforms: string[] = [], detectedPlatform?: string) {
    let message = 'Unsupported platform for URL';
    if (detectedPlatform) message += ` (recognized as '${detectedPlatform}', which is not enabled)`;
    if (supportedPlatforms.length > 0) {
      message += `. Supported platforms: ${supportedPlatforms.join(', ')}`;
    }
    super('unsupported_platform', message, {
      url,
      supported_platforms: supportedPlatforms,
      ...(detectedPlatform ? { platform: detectedPlatform } : {}),
    });
    this.name = 'UnsupportedPlatformError';
  }
}

export class ValidationError extends ImageExtractorError {
  readonly field: string;

  constructor(field: string, value: unknown, reason: string) {
    super('validation_error', `Validation failed for field '${field}': ${reason}`, {
      field,
      value,
      reason,
    });
    this.name = 'ValidationError';
    this.field = field;
  }
}

/** Transport-level failure (connection refused, reset, DNS). Retried by the HTTP client. */
export class NetworkError extends ImageExtractorError {
  constructor(url: string, reason: string, retryCount = 0, kind: ErrorKind = 'network_error') {
    super(kind, `Network error accessing ${url}: ${reason}`, {
      url,
      reason,
      retry_count: retryCount,
    });
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends NetworkError {
  readonly timeoutSeconds: number;

  constructor(url: string, timeoutSeconds: number, retryCount = 0) {
    super(url, `Request timed out after ${timeoutSeconds} seconds`, retryCount, 'timeout');
    this.name = 'TimeoutError';
    this.timeoutSeconds = timeoutSeconds;
    this.details.timeout_seconds = timeoutSeconds;
  }
}

export class ExtractionError extends ImageExtractorError {
  constructor(url: string, platform: string, reason: string, kind: ErrorKind = 'extraction_error') {
    super(kind, `Failed to extract images from ${platform}: ${reason}`, { url, platform, reason });
    this.name = 'ExtractionError';
  }
}

export interface ApiErrorPayload {
  message?: string;
  code?: number | string;
  [key: string]: unknown;
}

/** Upstream platform reported a failure (`stat: "fail"`) or answered with an HTTP error status. */
export class APIError extends ExtractionError {
  readonly statusCode?: number;
  readonly apiResponse: ApiErrorPayload;

  constructor(
    url: string,
    platform: string,
    apiResponse: ApiErrorPayload,
    statusCode?: number,
    kind: ErrorKind = 'api_error'
  ) {
    super(url, platform, `API error: ${apiResponse.message ?? 'Unknown error'}`, kind);
    this.name = 'APIError';
    this.statusCode = statusCode;
    this.apiResponse = apiResponse;
    this.details.api_response = apiResponse;
    this.details.status_code = statusCode;
  }
}

export class RateLimitExceededError extends APIError {
  readonly retryAfter?: number;

  constructor(url: string, platform: string, retryAfter?: number) {
    const apiResponse: ApiErrorPayload = { message: 'Rate limit exceeded' };
    if (retryAfter !== undefined) apiResponse.retry_after = retryAfter;
    super(url, platform, apiResponse, 429, 'rate_limit_exceeded');
    this.name = 'RateLimitExceededError';
    this.retryAfter = retryAfter;
    this.details.retry_after = retryAfter;
  }
}

// --- Wire format ---

export interface ErrorResponseBody {
  error: ErrorKind;
  message: string;
  details: ErrorDetails;
  hint: string;
}

/** Normalize anything thrown into the taxonomy. */
export function toImageExtractorError(error: unknown): ImageExtractorError {
  if (error instanceof ImageExtractorError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ImageExtractorError('internal_error', `Unexpected error: ${message}`, {
    reason: message,
  });
}

export function httpStatusFor(error: unknown): number {
  if (!(error instanceof ImageExtractorError)) return 500;

  switch (error.kind) {
    case 'configuration_error':
    case 'platform_not_configured':
      return 503;
    case 'unsupported_platform':
      return 400;
    case 'invalid_url':
    case 'validation_error':
      return 422;
    case 'rate_limit_exceeded':
      return 429;
    case 'timeout':
      return 504;
    case 'network_error':
    case 'api_error':
      return 502;
    default:
      return 500;
  }
}

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function detailString(error: ImageExtractorError, key: string, fallback: string): string {
  const value = error.details[key];
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

/** Short, user-facing explanation of what went wrong and what to do about it. */
export function userFriendlyMessage(error: unknown): string {
  if (error instanceof PlatformNotConfiguredError) {
    const platform = detailString(error, 'platform', 'unknown');
    const missing = detailString(error, 'missing_config', 'configuration');
    return `${titleCase(platform)} is not configured. Please set ${missing} in your environment variables.`;
  }
  if (error instanceof UnsupportedPlatformError) {
    const supported = error.details.supported_platforms;
    if (Array.isArray(supported) && supported.length > 0) {
      return `Unsupported platform. Supported platforms: ${supported.join(', ')}`;
    }
    return 'Unsupported platform. Please check the URL format.';
  }
  if (error instanceof InvalidURLError) {
    return `Invalid URL: ${detailString(error, 'reason', 'Please check the URL format')}`;
  }
  if (error instanceof RateLimitExceededError) {
    return error.retryAfter !== undefined
      ? `Rate limit exceeded. Please try again in ${error.retryAfter} seconds.`
      : 'Rate limit exceeded. Please try again later.';
  }
  if (error instanceof TimeoutError) {
    return `Request timed out after ${error.timeoutSeconds} seconds. Please try again.`;
  }
  if (error instanceof NetworkError) {
    return `Network error: ${detailString(error, 'reason', 'Please check your internet connection')}`;
  }
  if (error instanceof APIError) {
    const platform = detailString(error, 'platform', 'API');
    return `${titleCase(platform)} API error: ${error.apiResponse.message ?? 'Service temporarily unavailable'}`;
  }
  if (error instanceof ValidationError) {
    return `Invalid ${error.field}: ${detailString(error, 'reason', 'invalid value')}`;
  }
  if (error instanceof ConfigurationError) {
    return `Configuration error: ${error.message}`;
  }
  if (error instanceof ImageExtractorError) {
    return error.message;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `An unexpected error occurred: ${message}`;
}

export function toErrorResponse(error: unknown): { status: number; body: ErrorResponseBody } {
  const normalized = toImageExtractorError(error);
  return {
    status: httpStatusFor(normalized),
    body: {
      error: normalized.kind,
      message: normalized.message,
      details: normalized.details,
      hint: userFriendlyMessage(error),
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrorKind(value: unknown): value is ErrorKind {
  return typeof value === 'string' && (ERROR_KINDS as readonly string[]).includes(value);
}

function stringDetail(details: ErrorDetails, key: string, fallback = ''): string {
  const value = details[key];
  return typeof value === 'string' ? value : fallback;
}

function numberDetail(details: ErrorDetails, key: string): number | undefined {
  const value = details[key];
  return typeof value === 'number' ? value : undefined;
}

/** Subclass instance for a wire `kind`, built from the server's details. */
function errorForKind(kind: ErrorKind, message: string, details: ErrorDetails): ImageExtractorError {
  const url = stringDetail(details, 'url');
  const platform = stringDetail(details, 'platform', 'unknown');
  const reason = stringDetail(details, 'reason', message);

  switch (kind) {
    case 'configuration_error':
      return new ConfigurationError(message, { ...details });
    case 'platform_not_configured':
      return new PlatformNotConfiguredError(
        platform,
        stringDetail(details, 'missing_config', 'configuration'),
        stringDetail(details, 'reason') || undefined
      );
    case 'invalid_url':
      return new InvalidURLError(url, reason);
    case 'unsupported_platform': {
      const supported = details.supported_platforms;
      return new UnsupportedPlatformError(
        url,
        Array.isArray(supported) ? supported.filter((name): name is string => typeof name === 'string') : [],
        stringDetail(details, 'platform') || undefined
      );
    }
    case 'validation_error':
      return new ValidationError(stringDetail(details, 'field', 'unknown'), details.value, reason);
    case 'network_error':
      return new NetworkError(url, reason, numberDetail(details, 'retry_count'));
    case 'timeout':
      return new TimeoutError(
        url,
        numberDetail(details, 'timeout_seconds') ?? 0,
        numberDetail(details, 'retry_count')
      );
    case 'extraction_error':
      return new ExtractionError(url, platform, reason);
    case 'api_error': {
      const apiResponse = isRecord(details.api_response) ? details.api_response : { message };
      return new APIError(url, platform, apiResponse, numberDetail(details, 'status_code'));
    }
    case 'rate_limit_exceeded':
      return new RateLimitExceededError(url, platform, numberDetail(details, 'retry_after'));
    case 'internal_error':
      return new ImageExtractorError(kind, message, { ...details });
  }
}

/**
 * Rebuild an error from an error response body produced by `toErrorResponse`.
 * Known kinds come back as their subclass, carrying the server's message and
 * details plus the response status; unknown shapes become `internal_error`.
 */
export function errorFromPayload(payload: unknown, statusCode: number): ImageExtractorError {
  if (!isRecord(payload)) {
    return new ImageExtractorError('internal_error', `Service responded with HTTP ${statusCode}`, {
      status_code: statusCode,
    });
  }

  const kind = isErrorKind(payload.error) ? payload.error : 'internal_error';
  const message =
    typeof payload.message === 'string' ? payload.message : `Service responded with HTTP ${statusCode}`;
  const details: ErrorDetails = isRecord(payload.details) ? { ...payload.details } : {};

  const error = errorForKind(kind, message, details);
  error.message = message;
  // Replace constructor-derived details with the server's.
  for (const key of Object.keys(error.details)) delete error.details[key];
  Object.assign(error.details, details, { status_code: statusCode });
  return error;
}

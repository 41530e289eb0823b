/**
 * Input validation: URLs, extraction options, API keys and rate limits.
 *
 * Everything external passes through here before any network call is made.
 * Failures are thrown as InvalidURLError / ValidationError with a specific
 * reason; nothing returns `false` silently.
 */
import { z } from 'zod';
import { InvalidURLError, ValidationError } from './errors.js';
import type { ExtractionOptions } from './extract/types.js';

export const SIZE_PREFERENCES = ['thumbnail', 'small', 'medium', 'large', 'original'] as const;
export const OUTPUT_FORMATS = ['json', 'detailed'] as const;

export const MAX_TIMEOUT_SECONDS = 300;
export const MAX_IMAGES_LIMIT = 1000;

const DEFAULT_SCHEMES = ['http', 'https'];

// Conservative host grammar: dot-separated labels of letters, digits and inner hyphens.
const DOMAIN_PATTERN =
  /^[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;

const SCHEME_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):/;

/**
 * Validate an absolute URL. Returns true or throws InvalidURLError naming the reason.
 */
export function validateUrl(url: unknown, allowSchemes: string[] = DEFAULT_SCHEMES): true {
  if (typeof url !== 'string' || url.length === 0) {
    throw new InvalidURLError(String(url ?? ''), 'URL cannot be empty or non-string');
  }

  const trimmed = url.trim();
  if (!trimmed) {
    throw new InvalidURLError(url, 'URL cannot be empty after trimming whitespace');
  }

  const schemeMatch = SCHEME_PATTERN.exec(trimmed);
  if (!schemeMatch) {
    throw new InvalidURLError(url, 'URL must include a scheme (http:// or https://)');
  }

  const scheme = schemeMatch[1].toLowerCase();
  if (!allowSchemes.includes(scheme)) {
    throw new InvalidURLError(url, `URL scheme must be one of: ${allowSchemes.join(', ')}`);
  }

  const rest = trimmed.slice(schemeMatch[0].length);
  const authority = rest.startsWith('//') ? rest.slice(2).split(/[/?#]/, 1)[0] : '';
  if (!authority) {
    throw new InvalidURLError(url, 'URL must include a domain name');
  }

  // An optional numeric port is allowed; credentials and IPv6 literals are not.
  const host = authority.replace(/:\d{1,5}$/, '');
  if (!DOMAIN_PATTERN.test(host)) {
    throw new InvalidURLError(url, 'Invalid domain name format');
  }

  try {
    new URL(trimmed);
  } catch (error) {
    throw new InvalidURLError(url, `Failed to parse URL: ${String(error)}`);
  }

  return true;
}

/**
 * Strip control characters, trim, then validate. Idempotent.
 */
export function sanitizeUrl(url: unknown): string {
  if (typeof url !== 'string' || !url) {
    throw new InvalidURLError(String(url ?? ''), 'Cannot sanitize empty URL');
  }

  let stripped = '';
  for (const char of url) {
    if (char.charCodeAt(0) >= 32) stripped += char;
  }
  // Trim after stripping: a control character may sit in front of whitespace.
  const cleaned = stripped.trim();

  validateUrl(cleaned);
  return cleaned;
}

// --- Extraction options ---

const ExtractionOptionsSchema = z
  .object({
    size: z
      .enum(SIZE_PREFERENCES, {
        errorMap: () => ({ message: `Size must be one of: ${SIZE_PREFERENCES.join(', ')}` }),
      })
      .optional(),
    format: z
      .enum(OUTPUT_FORMATS, {
        errorMap: () => ({ message: `Format must be one of: ${OUTPUT_FORMATS.join(', ')}` }),
      })
      .optional(),
    timeout: z
      .number({ invalid_type_error: 'Timeout must be a positive number' })
      .positive('Timeout must be a positive number')
      .max(MAX_TIMEOUT_SECONDS, `Timeout cannot exceed ${MAX_TIMEOUT_SECONDS} seconds`)
      .optional(),
    max_images: z
      .number({ invalid_type_error: 'max_images must be a positive integer' })
      .int('max_images must be a positive integer')
      .positive('max_images must be a positive integer')
      .max(MAX_IMAGES_LIMIT, `max_images cannot exceed ${MAX_IMAGES_LIMIT}`)
      .optional(),
  })
  .strip();

/**
 * Whitelist extraction options. Unknown keys are dropped; a recognized key with
 * a bad value raises ValidationError for that field.
 */
export function validateExtractionOptions(options: unknown): ExtractionOptions {
  if (options === undefined || options === null) return {};

  if (typeof options !== 'object' || Array.isArray(options)) {
    throw new ValidationError('options', options, 'Options must be an object');
  }

  const result = ExtractionOptionsSchema.safeParse(options);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = String(issue.path[0] ?? 'options');
    const value: unknown = Reflect.get(options, field);
    throw new ValidationError(field, value, issue.message);
  }

  return result.data;
}

// --- API keys ---

const PLACEHOLDER_PATTERNS = [
  /^your_.*_key/i,
  /^replace_.*/i,
  /^insert_.*/i,
  /^add_.*_here/i,
  /^example_.*/i,
  /^test.*key/i,
  /^dummy.*/i,
  /^placeholder/i,
];

function redactKey(key: string): string {
  return key.length <= 4 ? '***' : `${key.slice(0, 4)}***`;
}

/**
 * Reject empty, short, or placeholder-looking keys so an unconfigured
 * deployment fails at startup instead of against the upstream API.
 */
export function validateApiKey(apiKey: unknown, platform: string, minLength = 10): true {
  if (typeof apiKey !== 'string' || !apiKey) {
    throw new ValidationError('api_key', '', `${platform} API key cannot be empty`);
  }

  const key = apiKey.trim();
  if (!key) {
    throw new ValidationError('api_key', '', `${platform} API key cannot be empty after trimming`);
  }

  if (key.length < minLength) {
    throw new ValidationError(
      'api_key',
      redactKey(key),
      `${platform} API key must be at least ${minLength} characters`
    );
  }

  if (PLACEHOLDER_PATTERNS.some((pattern) => pattern.test(key))) {
    throw new ValidationError(
      'api_key',
      redactKey(key),
      `${platform} API key appears to be a placeholder value`
    );
  }

  return true;
}

export const MAX_RATE_LIMIT = 100;

export function validateRateLimit(rate: unknown, platform: string): true {
  if (typeof rate !== 'number' || Number.isNaN(rate)) {
    throw new ValidationError('rate_limit', rate, `${platform} rate limit must be a number`);
  }
  if (rate <= 0) {
    throw new ValidationError('rate_limit', rate, `${platform} rate limit must be positive`);
  }
  if (rate > MAX_RATE_LIMIT) {
    throw new ValidationError(
      'rate_limit',
      rate,
      `${platform} rate limit seems too high (>${MAX_RATE_LIMIT} req/s)`
    );
  }
  return true;
}

const PLATFORM_DOMAINS: Record<string, string> = {
  'flickr.com': 'flickr',
  'flic.kr': 'flickr',
  'imgur.com': 'imgur',
  'instagram.com': 'instagram',
  'facebook.com': 'facebook',
  'pinterest.com': 'pinterest',
};

/** Known platform for a URL's host, ignoring a leading `www.`. */
export function getPlatformFromUrl(url: string): string | undefined {
  try {
    let host = new URL(url).hostname.toLowerCase();
    if (host.startsWith('www.')) host = host.slice(4);
    return PLATFORM_DOMAINS[host];
  } catch {
    return undefined;
  }
}

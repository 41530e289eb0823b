/**
 * Application configuration, read once from the environment and validated
 * with zod. The returned object is frozen; tests build their own with
 * `loadConfig({...})` instead of mutating a shared instance.
 */
import { z } from 'zod';
import { ConfigurationError, ValidationError } from './errors.js';
import { MAX_RATE_LIMIT, MAX_TIMEOUT_SECONDS, validateApiKey } from './validation.js';
import type { HttpClientOptions } from './http/types.js';

export const PLATFORMS = ['flickr', 'imgur', 'instagram'] as const;
export type Platform = (typeof PLATFORMS)[number];

export interface AppConfig {
  http: {
    maxConnections: number;
    /** Seconds */
    keepaliveExpiry: number;
    /** Seconds */
    timeout: number;
    maxRetries: number;
    /** Seconds */
    backoffFactor: number;
    /** Seconds */
    maxBackoff: number;
  };
  rateLimits: {
    default: number;
    /** Requests per second keyed by API host */
    domains: Record<string, number>;
  };
  extractors: {
    batchSize: number;
    /** Caller-level extraction timeout, seconds */
    timeout: number;
  };
  apiKeys: Partial<Record<Platform, string>>;
  server: {
    port: number;
  };
}

/** API host each platform's rate limit applies to. */
export const PLATFORM_API_HOSTS: Record<Platform, string> = {
  flickr: 'api.flickr.com',
  imgur: 'api.imgur.com',
  instagram: 'graph.instagram.com',
};

const API_KEY_VARIABLES: Record<Platform, string> = {
  flickr: 'FLICKR_API_KEY',
  imgur: 'IMGUR_CLIENT_ID',
  instagram: 'INSTAGRAM_ACCESS_TOKEN',
};

// --- Env schema ---

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function envNumber(schema: z.ZodNumber, fallback: number) {
  return z.preprocess(blankToUndefined, schema.default(fallback));
}

const positiveInt = () => z.coerce.number().int('must be an integer').positive('must be positive');
const positive = () => z.coerce.number().positive('must be positive');
const rate = () =>
  z.coerce
    .number()
    .positive('must be positive')
    .max(MAX_RATE_LIMIT, `must not exceed ${MAX_RATE_LIMIT} req/s`);

const optionalSecret = z.preprocess(
  blankToUndefined,
  z
    .string()
    .transform((value) => value.trim())
    .optional()
);

const EnvSchema = z.object({
  FLICKR_API_KEY: optionalSecret,
  IMGUR_CLIENT_ID: optionalSecret,
  INSTAGRAM_ACCESS_TOKEN: optionalSecret,
  HTTP_MAX_CONNECTIONS: envNumber(positiveInt(), 100),
  HTTP_KEEPALIVE_EXPIRY: envNumber(positive(), 30),
  HTTP_TIMEOUT: envNumber(positive(), 30),
  HTTP_MAX_RETRIES: envNumber(positiveInt().max(10, 'must not exceed 10'), 3),
  HTTP_BACKOFF_FACTOR: envNumber(positive(), 1),
  HTTP_MAX_BACKOFF: envNumber(positive(), 10),
  RATE_LIMIT_DEFAULT: envNumber(rate(), 2),
  RATE_LIMIT_FLICKR: envNumber(rate(), 0.5),
  RATE_LIMIT_IMGUR: envNumber(rate(), 1),
  RATE_LIMIT_INSTAGRAM: envNumber(rate(), 0.5),
  EXTRACTOR_BATCH_SIZE: envNumber(positiveInt(), 5),
  EXTRACTION_TIMEOUT: envNumber(
    positive().max(MAX_TIMEOUT_SECONDS, `must not exceed ${MAX_TIMEOUT_SECONDS} seconds`),
    30
  ),
  PORT: envNumber(
    z.coerce.number().int('must be an integer').min(0, 'must be >= 0').max(65535, 'must be <= 65535'),
    3000
  ),
});

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Build the configuration from an environment map (default `process.env`).
 * Throws ConfigurationError listing every invalid variable; a present but
 * placeholder-looking API key is rejected too.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new ConfigurationError(`Configuration validation failed: ${problems.join('; ')}`, {
      issues: problems,
    });
  }
  const vars = result.data;

  const apiKeys: Partial<Record<Platform, string>> = {};
  const keyValues: Record<Platform, string | undefined> = {
    flickr: vars.FLICKR_API_KEY,
    imgur: vars.IMGUR_CLIENT_ID,
    instagram: vars.INSTAGRAM_ACCESS_TOKEN,
  };
  for (const platform of PLATFORMS) {
    const key = keyValues[platform];
    if (key === undefined) continue;
    try {
      validateApiKey(key, platform);
    } catch (error) {
      const reason = error instanceof ValidationError ? error.details.reason : String(error);
      throw new ConfigurationError(
        `Configuration validation failed: ${API_KEY_VARIABLES[platform]} ${String(reason)}`,
        { variable: API_KEY_VARIABLES[platform], platform }
      );
    }
    apiKeys[platform] = key;
  }

  return deepFreeze<AppConfig>({
    http: {
      maxConnections: vars.HTTP_MAX_CONNECTIONS,
      keepaliveExpiry: vars.HTTP_KEEPALIVE_EXPIRY,
      timeout: vars.HTTP_TIMEOUT,
      maxRetries: vars.HTTP_MAX_RETRIES,
      backoffFactor: vars.HTTP_BACKOFF_FACTOR,
      maxBackoff: vars.HTTP_MAX_BACKOFF,
    },
    rateLimits: {
      default: vars.RATE_LIMIT_DEFAULT,
      domains: {
        [PLATFORM_API_HOSTS.flickr]: vars.RATE_LIMIT_FLICKR,
        [PLATFORM_API_HOSTS.imgur]: vars.RATE_LIMIT_IMGUR,
        [PLATFORM_API_HOSTS.instagram]: vars.RATE_LIMIT_INSTAGRAM,
      },
    },
    extractors: {
      batchSize: vars.EXTRACTOR_BATCH_SIZE,
      timeout: vars.EXTRACTION_TIMEOUT,
    },
    apiKeys,
    server: {
      port: vars.PORT,
    },
  });
}

export function isPlatformConfigured(config: AppConfig, platform: Platform): boolean {
  return config.apiKeys[platform] !== undefined;
}

/** HTTP client options in the client's units (milliseconds). */
export function toHttpClientOptions(config: AppConfig): HttpClientOptions {
  return {
    maxConnections: config.http.maxConnections,
    keepaliveExpiryMs: config.http.keepaliveExpiry * 1000,
    timeoutMs: config.http.timeout * 1000,
    maxRetries: config.http.maxRetries,
    backoffFactor: config.http.backoffFactor,
    maxBackoffMs: config.http.maxBackoff * 1000,
    rateLimits: { ...config.rateLimits.domains },
    defaultRateLimit: config.rateLimits.default,
  };
}

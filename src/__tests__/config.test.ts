import { describe, it, expect } from 'vitest';
import {
  isPlatformConfigured,
  loadConfig,
  PLATFORM_API_HOSTS,
  toHttpClientOptions,
} from '../config.js';
import { ConfigurationError } from '../errors.js';

const API_KEY = 'a1b2c3d4e5f6a7b8';

describe('config', () => {
  describe('loadConfig', () => {
    it('applies defaults for an empty environment', () => {
      const config = loadConfig({});

      expect(config).toEqual({
        http: {
          maxConnections: 100,
          keepaliveExpiry: 30,
          timeout: 30,
          maxRetries: 3,
          backoffFactor: 1,
          maxBackoff: 10,
        },
        rateLimits: {
          default: 2,
          domains: {
            'api.flickr.com': 0.5,
            'api.imgur.com': 1,
            'graph.instagram.com': 0.5,
          },
        },
        extractors: { batchSize: 5, timeout: 30 },
        apiKeys: {},
        server: { port: 3000 },
      });
    });

    it('reads numeric overrides from strings', () => {
      const config = loadConfig({
        HTTP_MAX_CONNECTIONS: '20',
        HTTP_TIMEOUT: '12.5',
        HTTP_MAX_RETRIES: '5',
        RATE_LIMIT_FLICKR: '3',
        EXTRACTOR_BATCH_SIZE: '2',
        PORT: '8080',
      });

      expect(config.http.maxConnections).toBe(20);
      expect(config.http.timeout).toBe(12.5);
      expect(config.http.maxRetries).toBe(5);
      expect(config.rateLimits.domains['api.flickr.com']).toBe(3);
      expect(config.extractors.batchSize).toBe(2);
      expect(config.server.port).toBe(8080);
    });

    it('treats blank values as unset', () => {
      const config = loadConfig({ HTTP_TIMEOUT: '  ', FLICKR_API_KEY: '' });

      expect(config.http.timeout).toBe(30);
      expect(config.apiKeys).toEqual({});
    });

    it('trims and keeps a valid API key', () => {
      const config = loadConfig({ FLICKR_API_KEY: `  ${API_KEY} ` });

      expect(config.apiKeys.flickr).toBe(API_KEY);
      expect(isPlatformConfigured(config, 'flickr')).toBe(true);
      expect(isPlatformConfigured(config, 'imgur')).toBe(false);
    });

    it('rejects out-of-range numbers with the variable name', () => {
      expect(() => loadConfig({ HTTP_MAX_CONNECTIONS: '-5' })).toThrow(
        'Configuration validation failed: HTTP_MAX_CONNECTIONS must be positive'
      );
    });

    it('lists every invalid variable', () => {
      const error = (() => {
        try {
          loadConfig({ HTTP_MAX_RETRIES: '11', PORT: '70000' });
        } catch (e) {
          return e;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        kind: 'configuration_error',
        details: {
          issues: ['HTTP_MAX_RETRIES must not exceed 10', 'PORT must be <= 65535'],
        },
      });
    });

    it('rejects non-numeric values', () => {
      expect(() => loadConfig({ HTTP_TIMEOUT: 'soon' })).toThrow(/HTTP_TIMEOUT/);
    });

    it('rejects a placeholder API key', () => {
      expect(() => loadConfig({ FLICKR_API_KEY: 'your_flickr_key' })).toThrow(
        'Configuration validation failed: FLICKR_API_KEY flickr API key appears to be a placeholder value'
      );
    });

    it('rejects a short API key', () => {
      expect(() => loadConfig({ IMGUR_CLIENT_ID: 'abc' })).toThrow(
        'Configuration validation failed: IMGUR_CLIENT_ID imgur API key must be at least 10 characters'
      );
    });

    it('returns a deeply frozen object', () => {
      const config = loadConfig({});

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.http)).toBe(true);
      expect(Object.isFrozen(config.rateLimits.domains)).toBe(true);
    });
  });

  describe('toHttpClientOptions', () => {
    it('converts seconds to milliseconds', () => {
      const options = toHttpClientOptions(
        loadConfig({ HTTP_KEEPALIVE_EXPIRY: '5', HTTP_MAX_BACKOFF: '4', RATE_LIMIT_DEFAULT: '7' })
      );

      expect(options).toEqual({
        maxConnections: 100,
        keepaliveExpiryMs: 5000,
        timeoutMs: 30_000,
        maxRetries: 3,
        backoffFactor: 1,
        maxBackoffMs: 4000,
        rateLimits: {
          [PLATFORM_API_HOSTS.flickr]: 0.5,
          [PLATFORM_API_HOSTS.imgur]: 1,
          [PLATFORM_API_HOSTS.instagram]: 0.5,
        },
        defaultRateLimit: 7,
      });
    });

    it('returns rate limits the client may keep', () => {
      const options = toHttpClientOptions(loadConfig({}));
      expect(Object.isFrozen(options.rateLimits)).toBe(false);
    });
  });
});

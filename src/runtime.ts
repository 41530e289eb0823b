/**
 * Process-wide wiring: one shared HTTP client injected into every extractor.
 */
import type { AppConfig } from './config.js';
import { toHttpClientOptions } from './config.js';
import { RateLimitedHttpClient } from './http/http-client.js';
import { ExtractorRegistry } from './extract/registry.js';
import { ImageExtractionService } from './extract/extraction-service.js';
import { FlickrExtractor } from './extractors/flickr/index.js';
import type { HttpRequester } from './http/types.js';

export interface Runtime {
  config: AppConfig;
  http: HttpRequester;
  registry: ExtractorRegistry;
  service: ImageExtractionService;
  /** Release pooled connections. Idempotent. */
  close(): Promise<void>;
}

export interface RuntimeOverrides {
  /** Replaces the rate-limited client (tests) */
  http?: HttpRequester;
}

export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  let client: RateLimitedHttpClient | undefined;
  let http: HttpRequester;
  if (overrides.http) {
    http = overrides.http;
  } else {
    client = new RateLimitedHttpClient(toHttpClientOptions(config));
    http = client;
  }

  const registry = new ExtractorRegistry([
    new FlickrExtractor({
      http,
      apiKey: config.apiKeys.flickr,
      batchSize: config.extractors.batchSize,
    }),
  ]);

  const service = new ImageExtractionService(registry, {
    timeoutMs: config.extractors.timeout * 1000,
  });

  return {
    config,
    http,
    registry,
    service,
    close: async () => {
      await client?.close();
    },
  };
}

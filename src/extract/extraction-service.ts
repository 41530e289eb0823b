/**
 * Extraction entry point shared by the HTTP endpoint, the CLI and library
 * callers: validate, dispatch, bound by a timeout, normalize errors.
 */
import { logger } from '../logger.js';
import {
  ExtractionError,
  ImageExtractorError,
  TimeoutError,
  UnsupportedPlatformError,
} from '../errors.js';
import { getPlatformFromUrl, sanitizeUrl, validateExtractionOptions } from '../validation.js';
import { withTimeout } from '../http/timing.js';
import type { ExtractorRegistry } from './registry.js';
import type { ExtractionResult } from './types.js';

const DEFAULT_EXTRACTION_TIMEOUT_MS = 30_000;

export interface ExtractionServiceOptions {
  /** Caller-level bound when the request sets no `timeout` option */
  timeoutMs?: number;
}

export class ImageExtractionService {
  private readonly registry: ExtractorRegistry;
  private readonly timeoutMs: number;

  constructor(registry: ExtractorRegistry, options: ExtractionServiceOptions = {}) {
    this.registry = registry;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EXTRACTION_TIMEOUT_MS;
  }

  getSupportedPlatforms(): string[] {
    return this.registry.getSupportedPlatforms();
  }

  /**
   * Validation runs before any network call. On timeout the in-flight
   * extractor work is abandoned, no new upstream call is started, and
   * TimeoutError is raised.
   */
  async extract(rawUrl: unknown, rawOptions?: unknown): Promise<ExtractionResult> {
    const url = sanitizeUrl(rawUrl);
    const options = validateExtractionOptions(rawOptions);

    const extractor = this.registry.getExtractor(url);
    if (!extractor) {
      throw new UnsupportedPlatformError(
        url,
        this.registry.getSupportedPlatforms(),
        getPlatformFromUrl(url)
      );
    }

    const timeoutMs = options.timeout !== undefined ? options.timeout * 1000 : this.timeoutMs;
    const startTime = Date.now();
    logger.info({ url, platform: extractor.platformName, options }, 'Starting extraction');

    // Aborting stops the extractor from starting further upstream calls.
    const controller = new AbortController();
    try {
      const result = await withTimeout(
        extractor.extract(url, options, { signal: controller.signal }),
        timeoutMs,
        () => {
          const error = new TimeoutError(url, timeoutMs / 1000);
          controller.abort(error);
          return error;
        }
      );
      logger.info(
        {
          url,
          platform: result.platform,
          type: result.type,
          images: result.images.length,
          durationMs: Date.now() - startTime,
        },
        'Extraction complete'
      );
      return result;
    } catch (error) {
      const wrapped =
        error instanceof ImageExtractorError
          ? error
          : new ExtractionError(
              url,
              extractor.platformName,
              `Unexpected error during extraction: ${error instanceof Error ? error.message : String(error)}`
            );
      logger.warn(
        { url, platform: extractor.platformName, kind: wrapped.kind, error: wrapped.message },
        'Extraction failed'
      );
      throw wrapped;
    }
  }
}

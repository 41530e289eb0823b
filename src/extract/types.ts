/**
 * Shared types for the extraction core: the uniform result document and the
 * capability interface every platform extractor implements.
 */
import type { OUTPUT_FORMATS, SIZE_PREFERENCES } from '../validation.js';

export type SizePreference = (typeof SIZE_PREFERENCES)[number];
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Validated request options (wire names). */
export interface ExtractionOptions {
  size?: SizePreference;
  format?: OutputFormat;
  /** Caller-level timeout in seconds */
  timeout?: number;
  max_images?: number;
}

export interface ExtractionRequest {
  url: string;
  options?: Record<string, unknown>;
}

export interface ImageRecord {
  url: string;
  title?: string;
  description?: string;
  width?: number;
  height?: number;
  size_label?: string;
}

export type ExtractionType = 'single' | 'album';

export interface ExtractionResult {
  platform: string;
  type: ExtractionType;
  /** Non-empty on success, in upstream order. */
  images: ImageRecord[];
  metadata: Record<string, unknown>;
}

/** Per-call context the service hands to an extractor. */
export interface ExtractionContext {
  /** Aborted when the caller-level timeout fires */
  signal?: AbortSignal;
}

/**
 * A platform-specific extraction strategy. Any object with these members can
 * be registered; there is no base class.
 */
export interface Extractor {
  readonly platformName: string;
  /** Case-insensitive patterns, search-matched against the URL. */
  readonly urlPatterns: readonly RegExp[];
  matches(url: string): boolean;
  extract(
    url: string,
    options: ExtractionOptions,
    context?: ExtractionContext
  ): Promise<ExtractionResult>;
}

/**
 * Ordered extractor registry with first-match URL dispatch.
 */
import { ConfigurationError } from '../errors.js';
import type { Extractor } from './types.js';

export class ExtractorRegistry {
  private readonly extractors: readonly Extractor[];

  /**
   * Duplicate platform names are rejected. The set is fixed for the
   * registry's lifetime.
   */
  constructor(extractors: readonly Extractor[]) {
    const seen = new Set<string>();
    for (const extractor of extractors) {
      if (seen.has(extractor.platformName)) {
        throw new ConfigurationError(
          `Duplicate extractor registered for platform '${extractor.platformName}'`,
          { platform: extractor.platformName }
        );
      }
      seen.add(extractor.platformName);
    }
    this.extractors = [...extractors];
  }

  get size(): number {
    return this.extractors.length;
  }

  /**
   * First extractor, in registration order, whose patterns match the URL.
   * When patterns overlap the earlier registration wins.
   */
  getExtractor(url: string): Extractor | undefined {
    return this.extractors.find((extractor) => extractor.matches(url));
  }

  getSupportedPlatforms(): string[] {
    return this.extractors.map((extractor) => extractor.platformName);
  }
}

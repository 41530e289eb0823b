/**
 * Utility functions for the extract module
 */

/**
 * Compile pattern sources as case-insensitive, non-global regexes
 * (a global regex keeps `lastIndex` between `test` calls).
 */
export function compilePatterns(sources: readonly string[]): RegExp[] {
  return sources.map((source) => new RegExp(source, 'i'));
}

/** Substring (search) match against any pattern. */
export function matchesAnyPattern(patterns: readonly RegExp[], url: string): boolean {
  return patterns.some((pattern) => pattern.test(url));
}

export interface SizedVariant {
  width: number;
  height: number;
}

/**
 * Largest variant by pixel area in one pass. Ties keep the earlier entry.
 */
export function selectLargest<T extends SizedVariant>(variants: readonly T[]): T | undefined {
  let best: T | undefined;
  let bestArea = -1;
  for (const variant of variants) {
    const area = variant.width * variant.height;
    if (area > bestArea) {
      best = variant;
      bestArea = area;
    }
  }
  return best;
}

/**
 * Run `fn` over `items` in sequential batches; items inside a batch run
 * concurrently. Results keep the input order. An aborted `signal` stops
 * before the next batch and rethrows its reason.
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  batchSize: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const size = Math.max(1, Math.floor(batchSize));
  const results: R[] = [];

  for (let start = 0; start < items.length; start += size) {
    signal?.throwIfAborted();
    const batch = items.slice(start, start + size);
    const settled = await Promise.all(batch.map((item, offset) => fn(item, start + offset)));
    results.push(...settled);
  }

  return results;
}

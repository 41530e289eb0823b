import { describe, it, expect } from 'vitest';
import {
  compilePatterns,
  mapInBatches,
  matchesAnyPattern,
  selectLargest,
} from '../extract/utils.js';

describe('extract/utils', () => {
  describe('compilePatterns / matchesAnyPattern', () => {
    it('matches case-insensitively anywhere in the URL', () => {
      const patterns = compilePatterns(['flickr\\.com/photos/']);

      expect(matchesAnyPattern(patterns, 'https://www.FLICKR.com/Photos/alice/1')).toBe(true);
      expect(matchesAnyPattern(patterns, 'https://imgur.com/a/1')).toBe(false);
    });

    it('gives the same answer on repeated calls', () => {
      const patterns = compilePatterns(['example']);
      const url = 'https://example.com/';

      expect([1, 2, 3].map(() => matchesAnyPattern(patterns, url))).toEqual([true, true, true]);
    });

    it('matches nothing with no patterns', () => {
      expect(matchesAnyPattern([], 'https://example.com/')).toBe(false);
    });
  });

  describe('selectLargest', () => {
    it('picks the variant with the largest pixel area', () => {
      const variants = [
        { label: 'wide', width: 1000, height: 100 },
        { label: 'square', width: 500, height: 500 },
        { label: 'small', width: 100, height: 100 },
      ];

      expect(selectLargest(variants)?.label).toBe('square');
    });

    it('keeps the earlier variant on ties', () => {
      const variants = [
        { label: 'first', width: 200, height: 100 },
        { label: 'second', width: 100, height: 200 },
      ];

      expect(selectLargest(variants)?.label).toBe('first');
    });

    it('returns undefined for an empty list', () => {
      expect(selectLargest([])).toBeUndefined();
    });

    it('accepts zero-sized variants', () => {
      expect(selectLargest([{ width: 0, height: 0 }])).toEqual({ width: 0, height: 0 });
    });
  });

  describe('mapInBatches', () => {
    it('preserves input order', async () => {
      const result = await mapInBatches([30, 10, 20], 2, async (value, index) => {
        await new Promise((resolve) => setTimeout(resolve, value));
        return `${index}:${value}`;
      });

      expect(result).toEqual(['0:30', '1:10', '2:20']);
    });

    it('runs at most batchSize items at once and batches sequentially', async () => {
      let active = 0;
      let peak = 0;
      const started: number[] = [];

      await mapInBatches([1, 2, 3, 4, 5], 2, async (value) => {
        started.push(value);
        active++;
        peak = Math.max(peak, active);
        await Promise.resolve();
        active--;
      });

      expect(peak).toBe(2);
      expect(started).toEqual([1, 2, 3, 4, 5]);
    });

    it('treats a batch size below one as one', async () => {
      let active = 0;
      let peak = 0;

      await mapInBatches(['a', 'b', 'c'], 0, async () => {
        active++;
        peak = Math.max(peak, active);
        await Promise.resolve();
        active--;
      });

      expect(peak).toBe(1);
    });

    it('starts no further batch once the signal is aborted', async () => {
      const controller = new AbortController();
      const reason = new Error('timed out');
      const started: number[] = [];

      const pending = mapInBatches(
        [1, 2, 3, 4, 5],
        2,
        async (value) => {
          started.push(value);
          if (value === 2) controller.abort(reason);
          return value;
        },
        controller.signal
      );

      await expect(pending).rejects.toBe(reason);
      expect(started).toEqual([1, 2]);
    });

    it('returns an empty array for no items', async () => {
      expect(await mapInBatches([], 5, async () => 1)).toEqual([]);
    });

    it('rejects when an item rejects', async () => {
      await expect(
        mapInBatches([1, 2], 2, async (value) => {
          if (value === 2) throw new Error('bad item');
          return value;
        })
      ).rejects.toThrow('bad item');
    });
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('dotenv/config', () => ({}));

vi.mock('../config.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../config.js')>();
  return { ...actual, loadConfig: vi.fn(() => actual.loadConfig({})) };
});

vi.mock('../runtime.js', () => ({
  createRuntime: vi.fn(),
}));

import { parseArgs, main } from '../cli.js';
import { loadConfig } from '../config.js';
import { createRuntime, type Runtime } from '../runtime.js';
import { APIError, ConfigurationError } from '../errors.js';
import { ExtractorRegistry } from '../extract/registry.js';
import { ImageExtractionService } from '../extract/extraction-service.js';
import { FakeHttp, fakeExtractor, makeJsonResponse } from './test-helpers.js';
import type { Extractor, ExtractionResult } from '../extract/types.js';

const PHOTO_URL = 'https://photos.example.com/p/1';

const ALBUM_RESULT: ExtractionResult = {
  platform: 'fake',
  type: 'album',
  images: [
    { url: 'https://cdn.example.com/1.jpg', width: 640, height: 480, size_label: 'Medium 640' },
    { url: 'https://cdn.example.com/2.jpg' },
  ],
  metadata: { title: 'Holiday' },
};

describe('cli', () => {
  describe('parseArgs', () => {
    it('parses URL from positional arg', () => {
      expect(parseArgs([PHOTO_URL])).toEqual({
        kind: 'ok',
        opts: {
          command: 'extract',
          url: PHOTO_URL,
          json: false,
          size: undefined,
          format: undefined,
          maxImages: undefined,
          timeout: undefined,
        },
        warnings: [],
      });
    });

    it('parses every extraction option', () => {
      const result = parseArgs([
        PHOTO_URL,
        '--json',
        '--size',
        'large',
        '--format',
        'detailed',
        '--max-images',
        '3',
        '--timeout',
        '2.5',
      ]);

      expect(result).toEqual({
        kind: 'ok',
        opts: {
          command: 'extract',
          url: PHOTO_URL,
          json: true,
          size: 'large',
          format: 'detailed',
          maxImages: 3,
          timeout: 2.5,
        },
        warnings: [],
      });
    });

    it('returns help for --help and -h', () => {
      expect(parseArgs(['--help'])).toEqual({ kind: 'help' });
      expect(parseArgs(['-h'])).toEqual({ kind: 'help' });
    });

    it('returns version for -v', () => {
      expect(parseArgs(['-v'])).toEqual({ kind: 'version' });
    });

    it('returns error for no args', () => {
      expect(parseArgs([])).toEqual({ kind: 'error', message: 'Missing required <url> argument' });
    });

    it('returns error when a flag is missing its value', () => {
      expect(parseArgs([PHOTO_URL, '--size'])).toEqual({
        kind: 'error',
        message: '--size requires a value',
      });
    });

    it('rejects a non-positive --max-images', () => {
      expect(parseArgs([PHOTO_URL, '--max-images', '0'])).toEqual({
        kind: 'error',
        message: '--max-images must be a positive integer',
      });
      expect(parseArgs([PHOTO_URL, '--max-images', '1.5'])).toEqual({
        kind: 'error',
        message: '--max-images must be a positive integer',
      });
    });

    it('rejects a non-numeric --timeout', () => {
      expect(parseArgs([PHOTO_URL, '--timeout', 'soon'])).toEqual({
        kind: 'error',
        message: '--timeout must be a positive number (seconds)',
      });
    });

    it('collects warnings for unknown flags', () => {
      const result = parseArgs([PHOTO_URL, '--unknown-flag']);
      expect(result.kind).toBe('ok');
      if (result.kind === 'ok') expect(result.warnings).toEqual(['Unknown option: --unknown-flag']);
    });

    it('parses the platforms command', () => {
      expect(parseArgs(['platforms', '--json'])).toEqual({
        kind: 'ok',
        opts: { command: 'platforms', json: true },
        warnings: [],
      });
    });

    it('parses the serve command with a port', () => {
      expect(parseArgs(['serve', '--port', '8080'])).toEqual({
        kind: 'ok',
        opts: { command: 'serve', port: 8080 },
        warnings: [],
      });
      expect(parseArgs(['serve', '--port', '70000'])).toEqual({
        kind: 'error',
        message: '--port must be an integer between 0 and 65535',
      });
    });
  });

  describe('main', () => {
    let extractor: Extractor;
    let runtime: Runtime;
    let logSpy: ReturnType<typeof vi.spyOn>;
    let errorSpy: ReturnType<typeof vi.spyOn>;

    function stdout(): string[] {
      return logSpy.mock.calls.map((call) => String(call[0]));
    }

    function stderr(): string[] {
      return errorSpy.mock.calls.map((call) => String(call[0]));
    }

    beforeEach(() => {
      extractor = fakeExtractor('fake', ['photos\\.example\\.com/p/']);
      const registry = new ExtractorRegistry([extractor]);
      runtime = {
        config: loadConfig(),
        http: new FakeHttp(() => makeJsonResponse({})),
        registry,
        service: new ImageExtractionService(registry),
        close: vi.fn().mockResolvedValue(undefined),
      };
      vi.mocked(createRuntime).mockReturnValue(runtime);
      logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      vi.restoreAllMocks();
      vi.mocked(createRuntime).mockReset();
    });

    it('prints the version', async () => {
      expect(await main(['--version'])).toBe(0);
      expect(stdout()).toEqual(['image-extract 0.1.0']);
    });

    it('prints usage for --help without building a runtime', async () => {
      expect(await main(['--help'])).toBe(0);
      expect(stdout()[0]).toMatch(/^Usage: image-extract <url> \[options\]/);
      expect(createRuntime).not.toHaveBeenCalled();
    });

    it('fails with usage when the URL is missing', async () => {
      expect(await main([])).toBe(1);
      expect(stderr()).toEqual(['Error: Missing required <url> argument']);
      expect(stdout()[0]).toMatch(/^Usage:/);
    });

    it('fails before any work when configuration is invalid', async () => {
      vi.mocked(loadConfig).mockImplementationOnce(() => {
        throw new ConfigurationError('Configuration validation failed: PORT must be <= 65535');
      });

      expect(await main([PHOTO_URL])).toBe(1);
      expect(stderr()).toEqual(['Error: Configuration validation failed: PORT must be <= 65535']);
      expect(createRuntime).not.toHaveBeenCalled();
    });

    it('lists platforms', async () => {
      expect(await main(['platforms'])).toBe(0);
      expect(stdout()).toEqual(['fake']);
      expect(runtime.close).toHaveBeenCalledOnce();
    });

    it('lists platforms as JSON', async () => {
      expect(await main(['platforms', '--json'])).toBe(0);
      expect(stdout()).toEqual(['{"platforms":["fake"]}']);
    });

    it('prints a human-readable summary', async () => {
      vi.mocked(extractor.extract).mockResolvedValue(ALBUM_RESULT);

      expect(await main([PHOTO_URL])).toBe(0);
      expect(stdout()).toEqual([
        'Platform: fake (album)',
        'Title: Holiday',
        'Images: 2',
        '---',
        'https://cdn.example.com/1.jpg 640x480 Medium 640',
        'https://cdn.example.com/2.jpg',
      ]);
      expect(runtime.close).toHaveBeenCalledOnce();
    });

    it('prints the full result with --json', async () => {
      vi.mocked(extractor.extract).mockResolvedValue(ALBUM_RESULT);

      expect(await main([PHOTO_URL, '--json'])).toBe(0);
      expect(stdout()).toEqual([JSON.stringify(ALBUM_RESULT, null, 2)]);
    });

    it('passes CLI options through as request options', async () => {
      vi.mocked(extractor.extract).mockResolvedValue(ALBUM_RESULT);

      await main([PHOTO_URL, '--size', 'large', '--max-images', '2', '--timeout', '5']);

      expect(extractor.extract).toHaveBeenCalledWith(
        PHOTO_URL,
        { size: 'large', max_images: 2, timeout: 5 },
        { signal: expect.any(AbortSignal) }
      );
    });

    it('prints the error and hint and exits 1 on failure', async () => {
      vi.mocked(extractor.extract).mockRejectedValue(
        new APIError('https://api.example.com/', 'fake', { message: 'quota' }, 200)
      );

      expect(await main([PHOTO_URL])).toBe(1);
      expect(stderr()).toEqual([
        'Error: Failed to extract images from fake: API error: quota',
        'Hint: Fake API error: quota',
      ]);
      expect(runtime.close).toHaveBeenCalledOnce();
    });

    it('prints the error body as JSON with --json', async () => {
      vi.mocked(extractor.extract).mockRejectedValue(
        new APIError('https://api.example.com/', 'fake', { message: 'quota' }, 200)
      );

      expect(await main([PHOTO_URL, '--json'])).toBe(1);
      const body: unknown = JSON.parse(stdout()[0]);
      expect(body).toMatchObject({ error: 'api_error', hint: 'Fake API error: quota' });
    });

    it('reports invalid CLI values through validation', async () => {
      expect(await main([PHOTO_URL, '--size', 'huge'])).toBe(1);
      expect(stderr()[0]).toBe(
        "Error: Validation failed for field 'size': Size must be one of: thumbnail, small, medium, large, original"
      );
      expect(extractor.extract).not.toHaveBeenCalled();
    });

    it('warns about unknown flags', async () => {
      await main(['platforms', '--bogus']);
      expect(stderr()).toEqual(['Warning: Unknown option: --bogus']);
    });
  });
});

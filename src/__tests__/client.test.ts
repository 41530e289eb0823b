import { describe, it, expect } from 'vitest';
import { ImageExtractorClient } from '../client.js';
import { ImageExtractorError } from '../errors.js';
import { FakeHttp, makeJsonResponse } from './test-helpers.js';
import type { HttpResponse } from '../http/types.js';

const BASE_URL = 'http://extract.internal:3000';

const RESULT = {
  platform: 'flickr',
  type: 'single',
  images: [{ url: 'https://live.staticflickr.com/65535/555_medium.jpg', width: 800, height: 600 }],
  metadata: { photo_id: '555' },
};

function respondWith(response: HttpResponse): FakeHttp {
  return new FakeHttp(() => response);
}

async function caught(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

describe('ImageExtractorClient', () => {
  it('posts the URL and options to /extract', async () => {
    const http = respondWith(makeJsonResponse(RESULT, 200, `${BASE_URL}/extract`));
    const client = new ImageExtractorClient(`${BASE_URL}/`, { http, timeoutMs: 5000 });

    const result = await client.extractImages('https://flickr.com/photos/alice/555', {
      size: 'medium',
    });

    expect(result).toEqual(RESULT);
    expect(http.calls).toEqual([
      {
        method: 'POST',
        url: `${BASE_URL}/extract`,
        options: {
          json: { url: 'https://flickr.com/photos/alice/555', options: { size: 'medium' } },
          timeoutMs: 5000,
          platform: 'image-extract-service',
          throwOnHttpError: false,
        },
      },
    ]);
  });

  it('rebuilds the server error from an error response', async () => {
    const http = respondWith(
      makeJsonResponse(
        {
          error: 'unsupported_platform',
          message: 'Unsupported platform for URL. Supported platforms: flickr',
          details: { url: 'https://imgur.com/a/x', supported_platforms: ['flickr'] },
          hint: 'Unsupported platform. Supported platforms: flickr',
        },
        400
      )
    );
    const client = new ImageExtractorClient(BASE_URL, { http });

    const error = await caught(client.extractImages('https://imgur.com/a/x'));

    expect(error).toBeInstanceOf(ImageExtractorError);
    expect(error).toMatchObject({
      kind: 'unsupported_platform',
      message: 'Unsupported platform for URL. Supported platforms: flickr',
      details: {
        url: 'https://imgur.com/a/x',
        supported_platforms: ['flickr'],
        status_code: 400,
      },
    });
  });

  it('reports non-JSON error bodies as internal errors', async () => {
    const http = respondWith({
      url: `${BASE_URL}/extract`,
      statusCode: 502,
      headers: { 'content-type': 'text/html' },
      body: '<html>Bad Gateway</html>',
    });
    const client = new ImageExtractorClient(BASE_URL, { http });

    const error = await caught(client.extractImages('https://flickr.com/photos/alice/555'));

    expect(error).toMatchObject({
      kind: 'internal_error',
      message: 'Service responded with HTTP 502',
      details: { status_code: 502 },
    });
  });

  it('rejects a success body of the wrong shape', async () => {
    const http = respondWith(makeJsonResponse({ images: 'none' }, 200, `${BASE_URL}/extract`));
    const client = new ImageExtractorClient(BASE_URL, { http });

    const error = await caught(client.extractImages('https://flickr.com/photos/alice/555'));

    expect(error).toMatchObject({
      kind: 'internal_error',
      message: 'Unexpected response from image extraction service',
      details: { url: `${BASE_URL}/extract`, status_code: 200 },
    });
  });

  it('lists supported platforms', async () => {
    const http = respondWith(makeJsonResponse({ platforms: ['flickr'] }));
    const client = new ImageExtractorClient(BASE_URL, { http });

    expect(await client.getSupportedPlatforms()).toEqual(['flickr']);
    expect(http.calls[0]).toMatchObject({ method: 'GET', url: `${BASE_URL}/platforms` });
  });

  it('returns the health document', async () => {
    const health = { status: 'healthy', timestamp: '2026-01-01T00:00:00.000Z', platforms: ['flickr'] };
    const http = respondWith(makeJsonResponse(health));
    const client = new ImageExtractorClient(BASE_URL, { http });

    expect(await client.health()).toEqual(health);
    expect(http.calls[0].url).toBe(`${BASE_URL}/health`);
  });

  it('defaults to localhost:3000', () => {
    const client = new ImageExtractorClient(undefined, { http: respondWith(makeJsonResponse({})) });
    expect(client.baseUrl).toBe('http://localhost:3000');
  });
});

/**
 * Thin Flickr REST client: request building, envelope checks and zod
 * validation of the payloads the extractor reads.
 */
import { z } from 'zod';
import { APIError, ExtractionError } from '../../errors.js';
import type { HttpRequester } from '../../http/types.js';

export const FLICKR_REST_ENDPOINT = 'https://api.flickr.com/services/rest/';
export const FLICKR_PLATFORM = 'flickr';

// --- Response schemas ---

const numeric = z.union([z.number(), z.string().regex(/^\d+$/)]).transform(Number);
const content = z.object({ _content: z.string() });

const EnvelopeSchema = z.object({
  stat: z.string(),
  code: z.union([z.number(), z.string()]).optional(),
  message: z.string().optional(),
});

export const PhotoSizeSchema = z.object({
  label: z.string(),
  width: numeric,
  height: numeric,
  source: z.string(),
});

const PhotoSizesResponseSchema = z.object({
  sizes: z.object({ size: z.array(PhotoSizeSchema) }),
});

export const PhotoInfoSchema = z.object({
  id: z.string(),
  title: content,
  description: content.optional(),
  owner: z.object({
    nsid: z.string().optional(),
    username: z.string(),
    realname: z.string().optional(),
  }),
  dates: z
    .object({
      posted: z.string().optional(),
      taken: z.string().optional(),
    })
    .optional(),
  views: numeric.optional(),
  urls: z
    .object({
      url: z.array(z.object({ type: z.string(), _content: z.string() })),
    })
    .optional(),
});

const PhotoInfoResponseSchema = z.object({ photo: PhotoInfoSchema });

export const PhotosetInfoSchema = z.object({
  id: z.string(),
  owner: z.string(),
  username: z.string().optional(),
  title: content,
  description: content.optional(),
});

const PhotosetInfoResponseSchema = z.object({ photoset: PhotosetInfoSchema });

export const PhotosetMemberSchema = z.object({
  id: z.string(),
  title: z.string().default(''),
});

const PhotosetPhotosResponseSchema = z.object({
  photoset: z.object({ photo: z.array(PhotosetMemberSchema) }),
});

export type PhotoSize = z.infer<typeof PhotoSizeSchema>;
export type PhotoInfo = z.infer<typeof PhotoInfoSchema>;
export type PhotosetInfo = z.infer<typeof PhotosetInfoSchema>;
export type PhotosetMember = z.infer<typeof PhotosetMemberSchema>;

/** Endpoint plus method and ids, without the key. Used in error details. */
export function describeCall(method: string, params: Record<string, string>): string {
  const search = new URLSearchParams({ method, ...params });
  return `${FLICKR_REST_ENDPOINT}?${search.toString()}`;
}

export class FlickrApi {
  private readonly http: HttpRequester;
  private readonly apiKey: string;
  private readonly signal: AbortSignal | undefined;

  constructor(http: HttpRequester, apiKey: string, signal?: AbortSignal) {
    this.http = http;
    this.apiKey = apiKey;
    this.signal = signal;
  }

  /**
   * Call a REST method and return its payload once the envelope reports
   * `stat: "ok"` and the payload matches `schema`.
   */
  async call<T extends z.ZodTypeAny>(
    method: string,
    params: Record<string, string>,
    schema: T
  ): Promise<z.output<T>> {
    const callUrl = describeCall(method, params);
    const response = await this.http.get(FLICKR_REST_ENDPOINT, {
      params: {
        method,
        api_key: this.apiKey,
        format: 'json',
        nojsoncallback: 1,
        ...params,
      },
      platform: FLICKR_PLATFORM,
      signal: this.signal,
    });

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch {
      throw new ExtractionError(callUrl, FLICKR_PLATFORM, `Invalid JSON response from ${method}`);
    }

    const envelope = EnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new ExtractionError(callUrl, FLICKR_PLATFORM, `Missing response status from ${method}`);
    }
    if (envelope.data.stat !== 'ok') {
      throw new APIError(
        callUrl,
        FLICKR_PLATFORM,
        {
          message: envelope.data.message ?? 'Unknown API error',
          ...(envelope.data.code !== undefined ? { code: envelope.data.code } : {}),
        },
        response.statusCode
      );
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ExtractionError(
        callUrl,
        FLICKR_PLATFORM,
        `Unexpected response from ${method}: ${issue.path.join('.') || '(root)'} ${issue.message}`
      );
    }
    return parsed.data;
  }

  async getPhotoInfo(photoId: string): Promise<PhotoInfo> {
    const data = await this.call(
      'flickr.photos.getInfo',
      { photo_id: photoId },
      PhotoInfoResponseSchema
    );
    return data.photo;
  }

  async getPhotoSizes(photoId: string): Promise<PhotoSize[]> {
    const data = await this.call(
      'flickr.photos.getSizes',
      { photo_id: photoId },
      PhotoSizesResponseSchema
    );
    return data.sizes.size;
  }

  async getPhotosetInfo(photosetId: string): Promise<PhotosetInfo> {
    const data = await this.call(
      'flickr.photosets.getInfo',
      { photoset_id: photosetId },
      PhotosetInfoResponseSchema
    );
    return data.photoset;
  }

  async getPhotosetPhotos(photosetId: string): Promise<PhotosetMember[]> {
    const data = await this.call(
      'flickr.photosets.getPhotos',
      { photoset_id: photosetId },
      PhotosetPhotosResponseSchema
    );
    return data.photoset.photo;
  }
}

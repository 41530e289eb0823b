/**
 * Flickr extractor: single photos (every size variant) and albums (the
 * largest variant of each member).
 */
import { logger } from '../../logger.js';
import { ExtractionError, ImageExtractorError, PlatformNotConfiguredError } from '../../errors.js';
import { mapInBatches, matchesAnyPattern, selectLargest } from '../../extract/utils.js';
import type {
  ExtractionContext,
  ExtractionOptions,
  ExtractionResult,
  Extractor,
  ImageRecord,
  SizePreference,
} from '../../extract/types.js';
import type { HttpRequester } from '../../http/types.js';
import { FlickrApi, FLICKR_PLATFORM, type PhotoInfo, type PhotoSize } from './api.js';
import { FLICKR_URL_PATTERNS, parseFlickrUrl } from './urls.js';

export { FLICKR_URL_PATTERNS, parseFlickrUrl, decodeBase58 } from './urls.js';
export { FlickrApi, FLICKR_REST_ENDPOINT } from './api.js';

const DEFAULT_BATCH_SIZE = 5;

/** Flickr size labels grouped by the size preference they satisfy. */
const SIZE_CLASS_LABELS: Record<SizePreference, readonly string[]> = {
  thumbnail: ['Square', 'Large Square', 'Thumbnail'],
  small: ['Small', 'Small 320', 'Small 400'],
  medium: ['Medium', 'Medium 640', 'Medium 800'],
  large: ['Large', 'Large 1600', 'Large 2048'],
  original: ['Original'],
};

/**
 * Keep only variants of the requested size class. When none exist, or no
 * size was requested, every variant is kept.
 */
export function filterBySize(sizes: readonly PhotoSize[], size?: SizePreference): PhotoSize[] {
  if (!size) return [...sizes];
  const labels = SIZE_CLASS_LABELS[size];
  const matching = sizes.filter((variant) => labels.includes(variant.label));
  return matching.length > 0 ? matching : [...sizes];
}

function toIsoTimestamp(unixSeconds: string | undefined): string | undefined {
  if (!unixSeconds || !/^\d+$/.test(unixSeconds)) return undefined;
  return new Date(Number(unixSeconds) * 1000).toISOString();
}

function photoPageUrl(info: PhotoInfo): string {
  const page = info.urls?.url.find((entry) => entry.type === 'photopage');
  if (page) return page._content;
  return `https://www.flickr.com/photos/${info.owner.nsid ?? info.owner.username}/${info.id}/`;
}

export interface FlickrExtractorOptions {
  http: HttpRequester;
  /** Unset means the platform is registered but not configured. */
  apiKey?: string;
  /** Album members fetched concurrently per batch (default 5) */
  batchSize?: number;
}

export class FlickrExtractor implements Extractor {
  readonly platformName = FLICKR_PLATFORM;
  readonly urlPatterns = FLICKR_URL_PATTERNS;
  private readonly http: HttpRequester;
  private readonly apiKey: string | undefined;
  private readonly batchSize: number;

  constructor(options: FlickrExtractorOptions) {
    this.http = options.http;
    this.apiKey = options.apiKey;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  matches(url: string): boolean {
    return matchesAnyPattern(this.urlPatterns, url);
  }

  async extract(
    url: string,
    options: ExtractionOptions = {},
    context: ExtractionContext = {}
  ): Promise<ExtractionResult> {
    if (!this.apiKey) {
      throw new PlatformNotConfiguredError(FLICKR_PLATFORM, 'FLICKR_API_KEY');
    }

    const target = parseFlickrUrl(url);
    const api = new FlickrApi(this.http, this.apiKey, context.signal);

    try {
      return target.type === 'album'
        ? await this.extractAlbum(api, url, target.id, options, context.signal)
        : await this.extractPhoto(api, url, target.id, options);
    } catch (error) {
      if (error instanceof ImageExtractorError) throw error;
      throw new ExtractionError(
        url,
        FLICKR_PLATFORM,
        `Unexpected error during extraction: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private async extractPhoto(
    api: FlickrApi,
    url: string,
    photoId: string,
    options: ExtractionOptions
  ): Promise<ExtractionResult> {
    const info = await api.getPhotoInfo(photoId);
    const sizes = await api.getPhotoSizes(photoId);

    let variants = filterBySize(sizes, options.size);
    if (options.max_images !== undefined) variants = variants.slice(0, options.max_images);

    if (variants.length === 0) {
      throw new ExtractionError(url, FLICKR_PLATFORM, `No image sizes available for photo ${photoId}`);
    }

    const description = info.description?._content;
    const images: ImageRecord[] = variants.map((variant) => ({
      url: variant.source,
      title: info.title._content,
      ...(description !== undefined ? { description } : {}),
      width: variant.width,
      height: variant.height,
      size_label: variant.label,
    }));

    const metadata: Record<string, unknown> = {
      photo_id: photoId,
      owner: info.owner.username,
      date_taken: info.dates?.taken ?? null,
    };
    if (options.format === 'detailed') {
      metadata.owner_name = info.owner.realname || info.owner.username;
      metadata.date_posted = toIsoTimestamp(info.dates?.posted) ?? null;
      metadata.views = info.views ?? null;
      metadata.page_url = photoPageUrl(info);
    }

    logger.debug({ photoId, variants: images.length }, 'Resolved Flickr photo');
    return { platform: FLICKR_PLATFORM, type: 'single', images, metadata };
  }

  private async extractAlbum(
    api: FlickrApi,
    url: string,
    photosetId: string,
    options: ExtractionOptions,
    signal: AbortSignal | undefined
  ): Promise<ExtractionResult> {
    const info = await api.getPhotosetInfo(photosetId);
    const listed = await api.getPhotosetPhotos(photosetId);

    const members =
      options.max_images !== undefined ? listed.slice(0, options.max_images) : listed;

    const resolved = await mapInBatches(
      members,
      this.batchSize,
      async (member): Promise<ImageRecord | undefined> => {
        try {
          const sizes = await api.getPhotoSizes(member.id);
          const largest = selectLargest(filterBySize(sizes, options.size));
          if (!largest) {
            logger.warn({ photosetId, photoId: member.id }, 'Album member has no sizes, skipping');
            return undefined;
          }
          return {
            url: largest.source,
            title: member.title,
            width: largest.width,
            height: largest.height,
            size_label: largest.label,
          };
        } catch (error) {
          logger.warn(
            { photosetId, photoId: member.id, error: String(error) },
            'Failed to fetch sizes for album member, skipping'
          );
          return undefined;
        }
      },
      signal
    );

    const images = resolved.filter((image): image is ImageRecord => image !== undefined);
    if (images.length === 0) {
      throw new ExtractionError(
        url,
        FLICKR_PLATFORM,
        members.length === 0
          ? `Album ${photosetId} contains no photos`
          : `No images could be resolved for album ${photosetId}`
      );
    }

    const metadata: Record<string, unknown> = {
      photoset_id: photosetId,
      title: info.title._content,
      description: info.description?._content ?? '',
      owner: info.username ?? info.owner,
      photo_count: images.length,
    };
    if (options.format === 'detailed') {
      metadata.listed_count = listed.length;
      metadata.failed_count = members.length - images.length;
    }

    logger.debug(
      { photosetId, listed: listed.length, resolved: images.length },
      'Resolved Flickr album'
    );
    return { platform: FLICKR_PLATFORM, type: 'album', images, metadata };
  }
}

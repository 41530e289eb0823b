/**
 * Client for a running image extraction service.
 */
import { z } from 'zod';
import { errorFromPayload, ImageExtractorError } from './errors.js';
import { RateLimitedHttpClient } from './http/http-client.js';
import type { HttpRequester, HttpResponse } from './http/types.js';
import type { ExtractionRequest, ExtractionResult } from './extract/types.js';

const DEFAULT_BASE_URL = 'http://localhost:3000';
const DEFAULT_TIMEOUT_MS = 30_000;
const CLIENT_LABEL = 'image-extract-service';

const ImageRecordSchema = z.object({
  url: z.string(),
  title: z.string().optional(),
  description: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  size_label: z.string().optional(),
});

const ExtractionResultSchema = z.object({
  platform: z.string(),
  type: z.enum(['single', 'album']),
  images: z.array(ImageRecordSchema),
  metadata: z.record(z.unknown()),
});

const PlatformsSchema = z.object({ platforms: z.array(z.string()) });

const HealthSchema = z.object({
  status: z.string(),
  timestamp: z.string().optional(),
  platforms: z.array(z.string()).optional(),
});

export type HealthStatus = z.infer<typeof HealthSchema>;

export interface ImageExtractorClientOptions {
  /** Transport; defaults to a private rate-limited client */
  http?: HttpRequester;
  timeoutMs?: number;
}

export class ImageExtractorClient {
  readonly baseUrl: string;
  private readonly http: HttpRequester;
  private readonly ownedClient: RateLimitedHttpClient | undefined;
  private readonly timeoutMs: number;

  constructor(baseUrl: string = DEFAULT_BASE_URL, options: ImageExtractorClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (options.http) {
      this.http = options.http;
    } else {
      this.ownedClient = new RateLimitedHttpClient({ timeoutMs: this.timeoutMs });
      this.http = this.ownedClient;
    }
  }

  async extractImages(url: string, options: Record<string, unknown> = {}): Promise<ExtractionResult> {
    const response = await this.http.post(`${this.baseUrl}/extract`, {
      json: { url, options } satisfies ExtractionRequest,
      timeoutMs: this.timeoutMs,
      platform: CLIENT_LABEL,
      throwOnHttpError: false,
    });
    return this.parse(response, ExtractionResultSchema);
  }

  async getSupportedPlatforms(): Promise<string[]> {
    const response = await this.http.get(`${this.baseUrl}/platforms`, {
      timeoutMs: this.timeoutMs,
      platform: CLIENT_LABEL,
      throwOnHttpError: false,
    });
    const body = this.parse(response, PlatformsSchema);
    return body.platforms;
  }

  async health(): Promise<HealthStatus> {
    const response = await this.http.get(`${this.baseUrl}/health`, {
      timeoutMs: this.timeoutMs,
      platform: CLIENT_LABEL,
      throwOnHttpError: false,
    });
    return this.parse(response, HealthSchema);
  }

  async close(): Promise<void> {
    await this.ownedClient?.close();
  }

  /**
   * Error statuses become the server's error kind; 2xx bodies are checked
   * against `schema`.
   */
  private parse<T extends z.ZodTypeAny>(response: HttpResponse, schema: T): z.output<T> {
    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch {
      payload = undefined;
    }

    if (response.statusCode >= 400) {
      throw errorFromPayload(payload, response.statusCode);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ImageExtractorError('internal_error', 'Unexpected response from image extraction service', {
        url: response.url,
        status_code: response.statusCode,
      });
    }
    return parsed.data;
  }
}

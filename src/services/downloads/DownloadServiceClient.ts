/**
 * Download Service Client
 *
 * HTTP client for the companion peer-to-peer download service. Only
 * its REST surface is used: start a search, read its responses, queue
 * a transfer, list transfers.
 */

import axios, { AxiosInstance, isAxiosError } from 'axios';
import { z } from 'zod';
import { DownloadServiceConfig } from '../../config/types.js';
import {
  ErrorCode,
  ProviderError,
  ProviderServerError,
  ProviderUnavailableError,
} from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { sleep } from '../../utils/sleep.js';

const PROVIDER_NAME = 'download-service';

/** Results returned per search, best bitrate first */
const MAX_SEARCH_RESULTS = 50;

const searchCreatedSchema = z.object({ id: z.string().min(1) });

const searchFileSchema = z.object({
  filename: z.string(),
  size: z.number().optional(),
  bitRate: z.number().nullable().optional(),
  bitDepth: z.number().nullable().optional(),
  length: z.number().nullable().optional(),
});

const searchDetailsSchema = z.object({
  responses: z
    .array(
      z.object({
        username: z.string().optional(),
        files: z.array(searchFileSchema).optional(),
      })
    )
    .optional(),
});

export interface SearchQuery {
  artist: string;
  album: string;
  track?: string | undefined;
  fileType?: string | undefined;
}

export interface SearchHit {
  username: string;
  filename: string;
  size: number;
  bitrate: number | null;
  length: number | null;
  bitDepth: number | null;
}

export interface SearchResult {
  searchId: string;
  query: string;
  totalResults: number;
  results: SearchHit[];
}

export function createDownloadServiceHttp(config: DownloadServiceConfig): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    headers: {
      'Content-Type': 'application/json',
      ...(config.apiKey && { 'X-API-Key': config.apiKey }),
    },
  });
}

export class DownloadServiceClient {
  private readonly client: AxiosInstance;

  constructor(
    private readonly config: DownloadServiceConfig,
    client?: AxiosInstance
  ) {
    this.client = client ?? createDownloadServiceHttp(config);
  }

  async search(query: SearchQuery): Promise<SearchResult> {
    const searchText = [query.artist, query.album, query.track]
      .filter((part): part is string => Boolean(part))
      .join(' ');
    const fileType = (query.fileType ?? 'flac').toLowerCase();

    logger.info('[DownloadServiceClient] Starting search', {
      service: 'DownloadServiceClient',
      operation: 'search',
      searchText,
      fileType,
    });

    const created = this.parseBody(
      searchCreatedSchema,
      await this.request('post', '/api/v0/searches', { searchText, filterResponses: true }),
      'search creation'
    );

    await sleep(this.config.searchWaitMs);

    const details = this.parseBody(
      searchDetailsSchema,
      await this.request('get', `/api/v0/searches/${encodeURIComponent(created.id)}`),
      'search results'
    );

    const hits: SearchHit[] = [];
    for (const response of details.responses ?? []) {
      for (const file of response.files ?? []) {
        if (fileType && !file.filename.toLowerCase().endsWith(`.${fileType}`)) {
          continue;
        }
        hits.push({
          username: response.username ?? 'Unknown',
          filename: file.filename,
          size: file.size ?? 0,
          bitrate: file.bitRate ?? null,
          length: file.length ?? null,
          bitDepth: file.bitDepth ?? null,
        });
      }
    }

    hits.sort((a, b) => (b.bitrate ?? 0) - (a.bitrate ?? 0));

    return {
      searchId: created.id,
      query: searchText,
      totalResults: hits.length,
      results: hits.slice(0, MAX_SEARCH_RESULTS),
    };
  }

  async queueDownload(username: string, filename: string): Promise<void> {
    await this.request('post', '/api/v0/transfers/downloads', { username, files: [filename] });
    logger.info('[DownloadServiceClient] Download queued', {
      service: 'DownloadServiceClient',
      operation: 'queueDownload',
      username,
      filename,
    });
  }

  listDownloads(): Promise<unknown> {
    return this.request('get', '/api/v0/transfers/downloads');
  }

  private parseBody<T>(schema: z.ZodType<T>, data: unknown, what: string): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(
        `Unexpected ${what} response from download service`,
        PROVIDER_NAME,
        ErrorCode.PROVIDER_SERVER_ERROR,
        502,
        false,
        { service: 'DownloadServiceClient', operation: 'parseBody', metadata: { issues: parsed.error.issues.length } }
      );
    }
    return parsed.data;
  }

  /**
   * Response body of a 2xx answer; anything else becomes a ProviderError
   */
  private async request(method: 'get' | 'post', url: string, body?: unknown): Promise<unknown> {
    try {
      const response = await this.client.request<unknown>({ method, url, data: body });
      return response.data;
    } catch (error) {
      const context = {
        service: 'DownloadServiceClient',
        operation: 'request',
        metadata: { method, url },
      };

      if (isAxiosError(error) && error.response) {
        throw new ProviderServerError(
          PROVIDER_NAME,
          error.response.status,
          `Download service answered ${error.response.status} for ${method.toUpperCase()} ${url}`,
          context,
          error
        );
      }

      throw new ProviderUnavailableError(
        PROVIDER_NAME,
        `Download service unreachable: ${getErrorMessage(error)}`,
        context,
        toError(error)
      );
    }
  }
}

/**
 * DownloadServiceClient tests against an in-process axios adapter
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import {
  DownloadServiceClient,
  createDownloadServiceHttp,
} from '../../src/services/downloads/DownloadServiceClient.js';
import { ProviderError, ProviderServerError, ProviderUnavailableError } from '../../src/errors/index.js';

interface RecordedRequest {
  method: string;
  url: string;
  body: unknown;
  apiKey: unknown;
}

type Route = (config: InternalAxiosRequestConfig) => unknown;

const CONFIG = { baseUrl: 'http://downloads.test', apiKey: 'test-secret', searchWaitMs: 0, timeoutMs: 1000 };

function createClient(routes: Record<string, Route>, requests: RecordedRequest[]): DownloadServiceClient {
  const http = createDownloadServiceHttp(CONFIG);
  http.defaults.adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const method = (config.method ?? 'get').toUpperCase();
    const url = config.url ?? '';
    requests.push({
      method,
      url,
      body: typeof config.data === 'string' ? JSON.parse(config.data) : undefined,
      apiKey: config.headers.get('X-API-Key'),
    });
    const route = routes[`${method} ${url}`];
    if (!route) {
      const response: AxiosResponse = { data: {}, status: 404, statusText: 'Not Found', headers: {}, config };
      throw new AxiosError('Request failed with status code 404', 'ERR_BAD_REQUEST', config, undefined, response);
    }
    return { data: route(config), status: 200, statusText: 'OK', headers: {}, config };
  };
  return new DownloadServiceClient(CONFIG, http);
}

describe('DownloadServiceClient', () => {
  let requests: RecordedRequest[];

  beforeEach(() => {
    requests = [];
  });

  it('searches, filters by file type and sorts by bitrate', async () => {
    const client = createClient(
      {
        'POST /api/v0/searches': () => ({ id: 'search-1' }),
        'GET /api/v0/searches/search-1': () => ({
          responses: [
            {
              username: 'peer-a',
              files: [
                { filename: 'Artist/Album/01.flac', size: 300, bitRate: 900 },
                { filename: 'Artist/Album/01.mp3', size: 100, bitRate: 320 },
              ],
            },
            {
              files: [{ filename: 'Album/01.FLAC', size: 400, bitRate: 1411, bitDepth: 16, length: 200 }],
            },
          ],
        }),
      },
      requests
    );

    const result = await client.search({ artist: 'Artist', album: 'Album' });

    expect(result).toEqual({
      searchId: 'search-1',
      query: 'Artist Album',
      totalResults: 2,
      results: [
        { username: 'Unknown', filename: 'Album/01.FLAC', size: 400, bitrate: 1411, length: 200, bitDepth: 16 },
        { username: 'peer-a', filename: 'Artist/Album/01.flac', size: 300, bitrate: 900, length: null, bitDepth: null },
      ],
    });
    expect(requests[0]).toEqual({
      method: 'POST',
      url: '/api/v0/searches',
      body: { searchText: 'Artist Album', filterResponses: true },
      apiKey: 'test-secret',
    });
  });

  it('includes the track in the search text', async () => {
    const client = createClient(
      {
        'POST /api/v0/searches': () => ({ id: 's2' }),
        'GET /api/v0/searches/s2': () => ({}),
      },
      requests
    );

    const result = await client.search({ artist: 'A', album: 'B', track: 'C', fileType: 'MP3' });

    expect(result.query).toBe('A B C');
    expect(result.results).toEqual([]);
  });

  it('queues a transfer for one file', async () => {
    const client = createClient({ 'POST /api/v0/transfers/downloads': () => ({}) }, requests);

    await client.queueDownload('peer-a', 'Artist/Album/01.flac');

    expect(requests[0]?.body).toEqual({ username: 'peer-a', files: ['Artist/Album/01.flac'] });
  });

  it('returns the transfer listing untouched', async () => {
    const listing = [{ username: 'peer-a', directories: [] }];
    const client = createClient({ 'GET /api/v0/transfers/downloads': () => listing }, requests);

    expect(await client.listDownloads()).toEqual(listing);
  });

  it('maps an error status to ProviderServerError', async () => {
    const client = createClient({}, requests);

    const error = await client.listDownloads().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProviderServerError);
    expect(error).toMatchObject({
      httpStatusCode: 404,
      statusCode: 502,
      message: 'Download service answered 404 for GET /api/v0/transfers/downloads',
    });
  });

  it('maps a network failure to ProviderUnavailableError', async () => {
    const client = createClient(
      {
        'GET /api/v0/transfers/downloads': () => {
          throw new Error('connect ECONNREFUSED');
        },
      },
      requests
    );

    await expect(client.listDownloads()).rejects.toThrow(ProviderUnavailableError);
    await expect(client.listDownloads()).rejects.toThrow('Download service unreachable: connect ECONNREFUSED');
  });

  it('rejects a malformed search response', async () => {
    const client = createClient({ 'POST /api/v0/searches': () => ({ searchId: 'wrong-field' }) }, requests);

    await expect(client.search({ artist: 'A', album: 'B' })).rejects.toThrow(ProviderError);
  });
});

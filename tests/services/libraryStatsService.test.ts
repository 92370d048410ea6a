/**
 * Library statistics and the album catalog
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs-extra';
import { LibraryStatsService, mostCommon, parseSummary } from '../../src/services/stats/LibraryStatsService.js';
import { AlbumCatalogService } from '../../src/services/catalog/AlbumCatalogService.js';
import { TaggerClient } from '../../src/services/tagger/TaggerClient.js';
import { createTestConfig } from '../utils/testConfig.js';
import { FakeCommandRunner } from '../utils/fakeCommandRunner.js';

const SUMMARY = [
  'Tracks: 1204',
  'Total time: 3.4 days',
  'Approximate total size: 41.2 GiB',
  'Artists: 210',
  'Albums: 98',
  'Album artists: 75',
].join('\n');

describe('parseSummary', () => {
  it('reads the labelled counts', () => {
    expect(parseSummary(SUMMARY)).toEqual({
      tracks: 1204,
      albums: 98,
      albumArtists: 75,
      totalTime: '3.4 days',
      totalSize: '41.2 GiB',
    });
  });

  it('keeps defaults for missing or malformed lines', () => {
    expect(parseSummary('Tracks: many\nnoise without separator\n')).toEqual({
      tracks: 0,
      albums: 0,
      albumArtists: 0,
      totalTime: 'unknown',
      totalSize: 'unknown',
    });
  });
});

describe('mostCommon', () => {
  it('orders by frequency and keeps first-seen order on ties', () => {
    const result = mostCommon(['FLAC', 'MP3', 'AAC', 'MP3', 'FLAC', 'OGG'], 3);

    expect(Object.entries(result)).toEqual([
      ['FLAC', 2],
      ['MP3', 2],
      ['AAC', 1],
    ]);
  });
});

describe('LibraryStatsService', () => {
  let tmpDir: string;
  let runner: FakeCommandRunner;
  let catalog: AlbumCatalogService;
  let service: LibraryStatsService;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'libstats-'));
    const config = createTestConfig(tmpDir);
    runner = new FakeCommandRunner();
    catalog = new AlbumCatalogService(runner, config);
    service = new LibraryStatsService(new TaggerClient(runner, config.tagger), catalog);
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  it('combines every query into one summary', async () => {
    runner.respond = (_command, args) => {
      const query = args.slice(2).join(' ');
      switch (query) {
        case 'stats':
          return { output: SUMMARY };
        case 'list -f $format':
          return { output: 'FLAC\nMP3\nFLAC\n' };
        case 'missing':
          return { output: 'Artist - Album - 03\nArtist - Album - 04\n' };
        case 'list -a -f $genre|$year':
          return { output: 'Rock|1999\nJazz|0\nRock|2001\n|1999\n' };
        case 'list -a -f $label':
          return { output: 'Blue Note\nunknown\nBlue Note\nWarp\n' };
        default:
          return { exitCode: 1 };
      }
    };

    const stats = await service.compute();

    expect(stats).toMatchObject({
      tracks: 1204,
      albums: 98,
      albumArtists: 75,
      formats: { FLAC: 2, MP3: 1 },
      missingTracks: 2,
      topGenres: { Rock: 2, Jazz: 1 },
      years: { '1999': 2, '2001': 1 },
      labels: { 'Blue Note': 2, Warp: 1 },
    });
    expect(runner.calls).toHaveLength(5);
    expect(runner.calls.every(call => call.args[0] === '-c' && call.args[1] === '/config/test.yaml')).toBe(true);
  });

  it('leaves a failed section empty and marks missing as unknown', async () => {
    runner.respond = (_command, args) =>
      args.includes('stats') ? { output: SUMMARY } : { exitCode: 1, output: 'locked' };

    const stats = await service.compute();

    expect(stats.tracks).toBe(1204);
    expect(stats.formats).toEqual({});
    expect(stats.topGenres).toEqual({});
    expect(stats.missingTracks).toBe(-1);
  });

  it('falls back to catalog counts when the summary is empty', async () => {
    runner.respond = () => ({ exitCode: 1, timedOut: true });
    await fs.outputJson(path.join(tmpDir, 'data', 'albums.json'), [
      { albumartist: 'A', album: 'One' },
      { albumartist: 'A', album: 'Two' },
      { albumartist: 'B', album: 'Three' },
    ]);

    const stats = await service.compute();

    expect(stats.albums).toBe(3);
    expect(stats.albumArtists).toBe(2);
    expect(stats.tracks).toBe(0);
  });
});

describe('AlbumCatalogService', () => {
  let tmpDir: string;
  let runner: FakeCommandRunner;
  let catalog: AlbumCatalogService;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'catalog-'));
    runner = new FakeCommandRunner();
    catalog = new AlbumCatalogService(runner, createTestConfig(tmpDir));
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  it('lists entries up to the limit and skips non-objects', async () => {
    await fs.outputJson(path.join(tmpDir, 'data', 'recent_albums.json'), [{ album: 'New' }, 'junk', { album: 'Older' }, { album: 'Oldest' }]);

    expect(await catalog.listRecent(2)).toEqual([{ album: 'New' }, { album: 'Older' }]);
  });

  it('returns nothing for a missing or non-array file', async () => {
    expect(await catalog.listAlbums(10)).toEqual([]);

    await fs.outputJson(path.join(tmpDir, 'data', 'albums.json'), { album: 'not a list' });
    expect(await catalog.listAlbums(10)).toEqual([]);
  });

  it('runs the configured regeneration command with the library timeout', async () => {
    await catalog.regenerate();

    expect(runner.calls).toEqual([
      { command: 'regen-albums', args: ['--all'], options: { timeoutMs: 1800000 } },
    ]);
  });
});

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import request from 'supertest';
import * as path from 'path';
import * as fs from 'fs-extra';
import { InMemoryLease } from '../../src/services/lease/InMemoryLease.js';
import { CommandResult } from '../../src/services/process/CommandRunner.js';
import { createTestApp, TestApp, waitUntil } from '../utils/testApp.js';

describe('Library API Endpoints', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await createTestApp();
  });

  afterEach(async () => {
    await t.cleanup();
  });

  describe('POST /api/library/refresh', () => {
    it('regenerates the catalog synchronously', async () => {
      t.runner.respond = () => ({ output: '  wrote 12 albums\n' });

      const response = await request(t.app.express).post('/api/library/refresh').expect(200);

      expect(response.body).toEqual({ status: 'completed', durationMs: 1, output: 'wrote 12 albums' });
      expect(t.runner.calls[0]?.command).toBe('regen-albums');
    });

    it('surfaces a failed regeneration with its output', async () => {
      t.runner.respond = () => ({ exitCode: 1, output: 'missing key: album' });

      const response = await request(t.app.express).post('/api/library/refresh').expect(500);

      expect(response.body.error.message).toBe('Regeneration failed (exit 1): missing key: album');
    });
  });

  describe('POST /api/library/import', () => {
    it('starts an import of the whole inbox', async () => {
      const response = await request(t.app.express).post('/api/library/import').expect(202);

      expect(response.body).toEqual({ status: 'started', target: t.config.paths.inboxRoot });
      await waitUntil(() => !t.app.pipeline.context.importLease.isHeld());
      expect(t.runner.callsWith('import')).toHaveLength(1);
    });

    it('conflicts while another import holds the lease', async () => {
      const other = new InMemoryLease(t.config.lease.key);
      await other.tryAcquire(0);

      try {
        const response = await request(t.app.express).post('/api/library/import').expect(409);
        expect(response.body.error.message).toBe('An import is already running');
      } finally {
        await other.release();
      }
      expect(t.runner.calls).toHaveLength(0);
    });

    it('keeps the lease through shutdown until the import finishes', async () => {
      const { importLease, eventLog } = t.app.pipeline.context;
      let finishImport: () => void = () => undefined;
      t.runner.respond = () =>
        new Promise<Partial<CommandResult>>(resolve => {
          finishImport = () => resolve({ output: 'imported' });
        });

      await request(t.app.express).post('/api/library/import').expect(202);
      let stopped = false;
      const stopping = t.app.stop().then(() => {
        stopped = true;
      });
      await waitUntil(() => t.runner.calls.length === 1);

      expect(stopped).toBe(false);
      expect(importLease.isHeld()).toBe(true);

      finishImport();
      await stopping;

      expect(importLease.isHeld()).toBe(false);
      expect(eventLog.tail().map(entry => entry.message)).toContain('Import completed: inbox');
    });
  });

  describe('library stats and catalog', () => {
    beforeEach(async () => {
      await fs.outputJson(t.config.paths.albumsFile, [
        { albumartist: 'A', album: 'One' },
        { albumartist: 'B', album: 'Two' },
      ]);
      await fs.outputJson(t.config.paths.recentAlbumsFile, [{ albumartist: 'B', album: 'Two' }]);
    });

    it('serves cached stats until invalidated', async () => {
      const first = await request(t.app.express).get('/api/stats').expect(200);
      const second = await request(t.app.express).get('/api/stats').expect(200);

      expect(first.body).toMatchObject({ albums: 2, albumArtists: 2, tracks: 0 });
      expect(second.body.cache).toMatchObject({ name: 'library-stats', cached: true });
      expect(t.runner.callsWith('stats')).toHaveLength(1);

      await request(t.app.express).post('/api/stats/invalidate').expect(200, { status: 'invalidated' });
      await request(t.app.express).get('/api/stats').expect(200);
      expect(t.runner.callsWith('stats')).toHaveLength(2);
    });

    it('recomputes on force_refresh', async () => {
      await request(t.app.express).get('/api/stats').expect(200);
      await request(t.app.express).get('/api/stats?force_refresh=true').expect(200);

      expect(t.runner.callsWith('stats')).toHaveLength(2);
    });

    it('rejects an unknown force_refresh value', async () => {
      await request(t.app.express).get('/api/stats?force_refresh=maybe').expect(400);
    });

    it('lists albums up to the limit', async () => {
      await request(t.app.express).get('/api/albums?limit=1').expect(200, [{ albumartist: 'A', album: 'One' }]);
      await request(t.app.express).get('/api/albums/recent').expect(200, [{ albumartist: 'B', album: 'Two' }]);
    });
  });

  describe('inbox endpoints', () => {
    beforeEach(async () => {
      const album = path.join(t.config.paths.inboxRoot, 'Artist', 'Album');
      await fs.outputFile(path.join(album, '02.mp3'), 'abcd');
      await fs.outputFile(path.join(album, '01.flac'), 'abcdef');
      await fs.outputFile(path.join(album, 'cover.jpg'), 'xy');
      await fs.ensureDir(path.join(t.config.paths.inboxRoot, '_UNPACK_Other'));
    });

    it('summarises the inbox', async () => {
      const response = await request(t.app.express).get('/api/inbox/stats').expect(200);

      expect(response.body).toMatchObject({ tracks: 2, totalBytes: 12, totalSize: '12 B', artists: 1, albums: 1 });
      expect(response.body.cache.cached).toBe(true);
      await request(t.app.express).post('/api/inbox/stats/invalidate').expect(200, { status: 'invalidated' });
      expect(t.app.pipeline.context.inboxStatsCache.info().cached).toBe(false);
    });

    it('lists artists and albums with track counts', async () => {
      await request(t.app.express).get('/api/inbox/tree').expect(200, { Artist: [{ name: 'Album', tracks: 2 }] });
    });

    it('lists the tracks of one folder', async () => {
      const response = await request(t.app.express).get('/api/inbox/folder?artist=Artist&album=Album').expect(200);

      expect(response.body).toEqual({
        artist: 'Artist',
        album: 'Album',
        trackCount: 2,
        tracks: [
          { filename: '01.flac', size: 6, duration: 180, path: path.join('Artist', 'Album', '01.flac') },
          { filename: '02.mp3', size: 4, duration: 180, path: path.join('Artist', 'Album', '02.mp3') },
        ],
      });
    });

    it('refuses folders outside the inbox', async () => {
      await request(t.app.express).get('/api/inbox/folder?artist=..&album=etc').expect(400);
    });

    it('answers 404 for a missing folder', async () => {
      await request(t.app.express).get('/api/inbox/folder?artist=Artist&album=Gone').expect(404);
    });
  });

  describe('POST /api/cover', () => {
    it('resolves a cover from a local image', async () => {
      const albumDir = path.join(t.config.paths.libraryRoot, 'Artist', 'Album');
      await fs.outputFile(path.join(albumDir, 'Cover.PNG'), 'art');

      const response = await request(t.app.express).post('/api/cover').send({ albumDir: 'Artist/Album' }).expect(200);

      expect(response.body).toEqual({ albumDir, coverPath: path.join(albumDir, 'cover.jpg'), source: 'local' });
      expect(t.app.pipeline.context.channels.library.queue.size()).toBe(1);
    });

    it('refuses directories outside the library', async () => {
      await request(t.app.express).post('/api/cover').send({ albumDir: '../inbox' }).expect(400);
    });

    it('answers 404 for a missing album', async () => {
      const response = await request(t.app.express).post('/api/cover').send({ albumDir: 'Artist/Gone' }).expect(404);

      expect(response.body.error.message).toBe('Album directory not found: Artist/Gone');
    });

    it('answers 422 when no source has art', async () => {
      await fs.ensureDir(path.join(t.config.paths.libraryRoot, 'Artist', 'Bare'));

      const response = await request(t.app.express).post('/api/cover').send({ albumDir: 'Artist/Bare' }).expect(422);

      expect(response.body.error.message).toBe('No cover art found for Bare');
    });
  });

  describe('playlist endpoints', () => {
    it('builds, pushes and lists a playlist', async () => {
      const uri = path.join(t.config.paths.libraryRoot, 'Artist', 'Album', '01.flac');

      const built = await request(t.app.express)
        .post('/api/playlist/build')
        .send({ name: 'Mix', tracks: [{ uri, title: 'One' }] })
        .expect(201);

      expect(built.body).toMatchObject({ name: 'Mix', tracks: 1, pushed: true });
      expect(t.runner.callsWith('add')[0]?.args.at(-1)).toBe('NAS/MUSIC/Artist/Album/01.flac');

      const listed = await request(t.app.express).get('/api/playlist/list').expect(200);
      expect(listed.body).toEqual([{ name: 'Mix', tracks: 1, path: path.join(t.config.paths.playlistDir, 'Mix.json') }]);
    });

    it('rejects names with path separators', async () => {
      await request(t.app.express)
        .post('/api/playlist/build')
        .send({ name: '../escape', tracks: [{ uri: 'a.flac' }] })
        .expect(400);
    });
  });

  describe('download endpoints', () => {
    it('searches the companion service', async () => {
      t.downloadRoutes['POST /api/v0/searches'] = () => ({ id: 'abc' });
      t.downloadRoutes['GET /api/v0/searches/abc'] = () => ({
        responses: [{ username: 'peer', files: [{ filename: 'A/B/01.flac', size: 10, bitRate: 900 }] }],
      });

      const response = await request(t.app.express).get('/api/downloads/search?artist=A&album=B').expect(200);

      expect(response.body).toEqual({
        searchId: 'abc',
        query: 'A B',
        totalResults: 1,
        results: [{ username: 'peer', filename: 'A/B/01.flac', size: 10, bitrate: 900, length: null, bitDepth: null }],
      });
    });

    it('requires artist and album', async () => {
      await request(t.app.express).get('/api/downloads/search?artist=A').expect(400);
    });

    it('queues and lists transfers', async () => {
      t.downloadRoutes['POST /api/v0/transfers/downloads'] = () => ({});
      t.downloadRoutes['GET /api/v0/transfers/downloads'] = () => [{ username: 'peer' }];

      await request(t.app.express)
        .post('/api/downloads')
        .send({ username: 'peer', filename: 'A/B/01.flac' })
        .expect(202, { status: 'queued', username: 'peer', filename: 'A/B/01.flac' });
      await request(t.app.express).get('/api/downloads').expect(200, [{ username: 'peer' }]);
    });

    it('answers 503 when the service is unreachable', async () => {
      const response = await request(t.app.express).get('/api/downloads').expect(503);

      expect(response.body.error.message).toBe('Download service unreachable: connect ECONNREFUSED');
    });
  });
});

/**
 * PlaylistService tests: file output, device push and listing
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs-extra';
import { PlaylistService, toPlaybackUri } from '../../src/services/playlist/PlaylistService.js';
import { EventLog } from '../../src/services/eventLog/EventLog.js';
import { FakeCommandRunner } from '../utils/fakeCommandRunner.js';

const PLAYBACK = { command: 'mpc', host: '10.0.0.5', port: 6600, uriPrefix: 'NAS/MUSIC/' };

describe('toPlaybackUri', () => {
  it('strips the library root and adds the prefix', () => {
    expect(toPlaybackUri('/music/library/A/B/01.flac', '/music/library', 'NAS/MUSIC/')).toBe('NAS/MUSIC/A/B/01.flac');
  });

  it('passes prefixed URIs through', () => {
    expect(toPlaybackUri('NAS/MUSIC/A/01.flac', '/music/library/', 'NAS/MUSIC/')).toBe('NAS/MUSIC/A/01.flac');
  });

  it('treats paths outside the root as relative', () => {
    expect(toPlaybackUri('/elsewhere/01.flac', '/music/library', 'NAS/MUSIC/')).toBe('NAS/MUSIC/elsewhere/01.flac');
  });
});

describe('PlaylistService', () => {
  let tmpDir: string;
  let playlistDir: string;
  let runner: FakeCommandRunner;
  let eventLog: EventLog;
  let service: PlaylistService;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'playlist-'));
    playlistDir = path.join(tmpDir, 'playlist');
    runner = new FakeCommandRunner();
    eventLog = new EventLog(10);
    service = new PlaylistService(runner, PLAYBACK, playlistDir, '/music/library', eventLog);
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  it('writes numbered tracks and pushes them to the device', async () => {
    const result = await service.build('Evening', [
      { uri: '/music/library/A/B/01.flac', title: 'One' },
      { uri: '/music/library/A/B/02.flac', title: 'Two' },
    ]);

    expect(result).toEqual({
      name: 'Evening',
      path: path.join(playlistDir, 'Evening.json'),
      tracks: 2,
      pushed: true,
      pushMessage: 'Playlist created on 10.0.0.5:6600 (2 tracks)',
    });
    expect(await fs.readJson(result.path)).toEqual([
      { uri: 'NAS/MUSIC/A/B/01.flac', title: 'One', service: 'mpd', type: 'track', tracknumber: 1 },
      { uri: 'NAS/MUSIC/A/B/02.flac', title: 'Two', service: 'mpd', type: 'track', tracknumber: 2 },
    ]);
    expect(runner.calls.map(call => call.args.slice(4))).toEqual([
      ['clear'],
      ['add', 'NAS/MUSIC/A/B/01.flac'],
      ['add', 'NAS/MUSIC/A/B/02.flac'],
      ['save', 'Evening'],
    ]);
    expect(runner.calls[0]?.args.slice(0, 4)).toEqual(['-h', '10.0.0.5', '-p', '6600']);
    expect(eventLog.tail().map(entry => entry.message)).toEqual([
      'Pushed playlist to playback device: Evening (2 tracks)',
    ]);
  });

  it('skips tracks the device rejects', async () => {
    runner.respond = (_command, args) => (args.includes('NAS/MUSIC/A/B/02.flac') ? { exitCode: 1, output: 'No such song' } : {});

    const result = await service.build('Partial', [
      { uri: '/music/library/A/B/01.flac' },
      { uri: '/music/library/A/B/02.flac' },
    ]);

    expect(result.pushed).toBe(true);
    expect(result.pushMessage).toBe('Playlist created on 10.0.0.5:6600 (1 tracks)');
    expect(runner.callsWith('save')).toHaveLength(1);
  });

  it('keeps the file and reports the error when the device is unreachable', async () => {
    runner.respond = () => ({ exitCode: 1, output: 'Connection refused' });

    const result = await service.build('Offline', [{ uri: '/music/library/A/01.flac' }]);

    expect(result.pushed).toBe(false);
    expect(result.pushMessage).toBe('Playlist push failed: clear failed: Connection refused');
    expect(await fs.pathExists(result.path)).toBe(true);
    expect(eventLog.tail()[0]).toMatchObject({
      level: 'warning',
      message: 'Playlist push error: clear failed: Connection refused',
    });
  });

  it('fails the push when no track could be added', async () => {
    runner.respond = (_command, args) => (args.includes('add') ? { exitCode: 1 } : {});

    const result = await service.build('Nothing', [{ uri: '/music/library/A/01.flac' }]);

    expect(result.pushMessage).toBe('Playlist push failed: No tracks were added to the playback queue');
    expect(runner.callsWith('save')).toHaveLength(0);
  });

  it('lists saved playlists by name with their track counts', async () => {
    await fs.outputJson(path.join(playlistDir, 'b.json'), [{}, {}]);
    await fs.outputJson(path.join(playlistDir, 'a.json'), [{}]);
    await fs.outputFile(path.join(playlistDir, 'broken.json'), '{not json');
    await fs.outputFile(path.join(playlistDir, 'notes.txt'), 'ignored');

    expect(await service.list()).toEqual([
      { name: 'a', tracks: 1, path: path.join(playlistDir, 'a.json') },
      { name: 'b', tracks: 2, path: path.join(playlistDir, 'b.json') },
    ]);
  });

  it('lists nothing before the directory exists', async () => {
    expect(await service.list()).toEqual([]);
  });
});

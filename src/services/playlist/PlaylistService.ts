/**
 * Playlist Service
 *
 * Saves playlists as JSON for the playback device and pushes them
 * through its control client (clear the queue, add each track, save
 * under the playlist name). A failed push is reported in the result;
 * the saved file stays.
 */

import * as path from 'path';
import * as fs from 'fs-extra';
import { PlaybackConfig } from '../../config/types.js';
import { PLAYBACK_COMMAND_TIMEOUT_MS } from '../../config/constants.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { EventLog } from '../eventLog/EventLog.js';
import { CommandRunner, outputExcerpt } from '../process/CommandRunner.js';

export interface PlaylistTrackInput {
  uri?: string | undefined;
  [field: string]: unknown;
}

export interface PlaylistTrack extends PlaylistTrackInput {
  service: 'mpd';
  type: 'track';
  tracknumber: number;
}

export interface PlaylistBuildResult {
  name: string;
  path: string;
  tracks: number;
  pushed: boolean;
  pushMessage: string;
}

export interface PlaylistSummary {
  name: string;
  tracks: number;
  path: string;
}

/**
 * Library path → device URI: `/music/library/A/B/01.flac` with prefix
 * `NAS/MUSIC/` becomes `NAS/MUSIC/A/B/01.flac`. URIs already carrying
 * the prefix pass through.
 */
export function toPlaybackUri(libraryPath: string, libraryRoot: string, prefix: string): string {
  if (libraryPath.startsWith(prefix)) {
    return libraryPath;
  }
  const rootWithSlash = libraryRoot.endsWith('/') ? libraryRoot : `${libraryRoot}/`;
  const relative = libraryPath.startsWith(rootWithSlash)
    ? libraryPath.slice(rootWithSlash.length)
    : libraryPath.replace(/^\/+/, '');
  return `${prefix}${relative}`;
}

export class PlaylistService {
  constructor(
    private readonly runner: CommandRunner,
    private readonly playback: PlaybackConfig,
    private readonly playlistDir: string,
    private readonly libraryRoot: string,
    private readonly eventLog: EventLog
  ) {}

  async build(name: string, input: readonly PlaylistTrackInput[]): Promise<PlaylistBuildResult> {
    const tracks = input.map((track, index): PlaylistTrack => ({
      ...track,
      service: 'mpd',
      type: 'track',
      tracknumber: index + 1,
      ...(typeof track.uri === 'string' && {
        uri: toPlaybackUri(track.uri, this.libraryRoot, this.playback.uriPrefix),
      }),
    }));

    const playlistPath = path.join(this.playlistDir, `${name}.json`);
    await fs.outputJson(playlistPath, tracks, { spaces: 2 });

    let pushed = false;
    let pushMessage: string;
    try {
      const added = await this.push(name, tracks);
      pushed = true;
      pushMessage = `Playlist created on ${this.playback.host}:${this.playback.port} (${added} tracks)`;
      this.eventLog.append('success', `Pushed playlist to playback device: ${name} (${added} tracks)`);
    } catch (error) {
      pushMessage = `Playlist push failed: ${getErrorMessage(error)}`;
      this.eventLog.append('warning', `Playlist push error: ${getErrorMessage(error).slice(0, 200)}`);
    }

    return { name, path: playlistPath, tracks: tracks.length, pushed, pushMessage };
  }

  async list(): Promise<PlaylistSummary[]> {
    if (!(await fs.pathExists(this.playlistDir))) {
      return [];
    }

    const names = (await fs.readdir(this.playlistDir)).filter(file => file.endsWith('.json')).sort();
    const playlists: PlaylistSummary[] = [];
    for (const file of names) {
      const filePath = path.join(this.playlistDir, file);
      try {
        const data: unknown = await fs.readJson(filePath);
        playlists.push({
          name: path.basename(file, '.json'),
          tracks: Array.isArray(data) ? data.length : 0,
          path: filePath,
        });
      } catch (error) {
        logger.warn('[PlaylistService] Skipping unreadable playlist', {
          service: 'PlaylistService',
          file: filePath,
          error: getErrorMessage(error),
        });
      }
    }
    return playlists;
  }

  /**
   * Returns the number of tracks added; throws when nothing could be pushed
   */
  private async push(name: string, tracks: readonly PlaylistTrack[]): Promise<number> {
    await this.control(['clear'], 'clear');

    let added = 0;
    for (const track of tracks) {
      if (!track.uri) {
        continue;
      }
      try {
        await this.control(['add', track.uri], 'add');
        added++;
      } catch (error) {
        logger.warn('[PlaylistService] Track could not be added', {
          service: 'PlaylistService',
          uri: track.uri,
          error: getErrorMessage(error),
        });
      }
    }

    if (added === 0) {
      throw new Error('No tracks were added to the playback queue');
    }

    await this.control(['save', name], 'save');
    return added;
  }

  private async control(args: string[], step: string): Promise<void> {
    const result = await this.runner.run(
      this.playback.command,
      ['-h', this.playback.host, '-p', String(this.playback.port), ...args],
      { timeoutMs: PLAYBACK_COMMAND_TIMEOUT_MS }
    );
    if (result.exitCode !== 0 || result.timedOut) {
      throw new Error(`${step} failed: ${outputExcerpt(result.output, 200)}`);
    }
  }
}

/**
 * Inbox Statistics and Browsing
 *
 * Everything here reads the filesystem only; nothing is imported or
 * modified.
 */

import * as path from 'path';
import * as fs from 'fs-extra';
import { ESTIMATED_MINUTES_PER_TRACK } from '../../config/constants.js';
import { ResourceNotFoundError, ValidationError } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';
import { formatBytes, formatDuration } from '../../utils/formatting.js';
import { isAudioFile, isHiddenName, segmentsBelow } from '../watchers/pathFilter.js';

export interface InboxStats {
  tracks: number;
  totalBytes: number;
  totalSize: string;
  /** Estimated from the track count */
  totalTime: string;
  artists: number;
  albums: number;
  computedAt: string;
}

export interface InboxAlbumSummary {
  name: string;
  tracks: number;
}

export interface InboxTrack {
  filename: string;
  size: number;
  /** seconds, 0 when unknown */
  duration: number;
  /** relative to the inbox root */
  path: string;
}

export interface InboxFolder {
  artist: string;
  album: string;
  tracks: InboxTrack[];
  trackCount: number;
}

const STAGING_MARKER = '_UNPACK_';

export class InboxStatsService {
  constructor(
    private readonly inboxRoot: string,
    private readonly readDuration: (filePath: string) => Promise<number>
  ) {}

  async compute(): Promise<InboxStats> {
    const stats: InboxStats = {
      tracks: 0,
      totalBytes: 0,
      totalSize: formatBytes(0),
      totalTime: formatDuration(0),
      artists: 0,
      albums: 0,
      computedAt: new Date().toISOString(),
    };

    if (!(await fs.pathExists(this.inboxRoot))) {
      logger.warn('[InboxStatsService] Inbox path does not exist', {
        service: 'InboxStatsService',
        inboxRoot: this.inboxRoot,
      });
      return stats;
    }

    await this.walk(this.inboxRoot, async (filePath, size) => {
      stats.totalBytes += size;
      if (isAudioFile(filePath)) {
        stats.tracks++;
      }
    });

    for (const artistDir of await this.artistDirectories()) {
      stats.artists++;
      stats.albums += (await this.subdirectories(artistDir)).length;
    }

    stats.totalSize = formatBytes(stats.totalBytes);
    stats.totalTime = formatDuration(stats.tracks * ESTIMATED_MINUTES_PER_TRACK * 60);
    return stats;
  }

  /**
   * Artist → albums with their direct audio track counts
   */
  async tree(): Promise<Record<string, InboxAlbumSummary[]>> {
    const tree: Record<string, InboxAlbumSummary[]> = {};
    if (!(await fs.pathExists(this.inboxRoot))) {
      return tree;
    }

    for (const artistDir of await this.artistDirectories()) {
      const albums: InboxAlbumSummary[] = [];
      for (const albumDir of await this.subdirectories(artistDir)) {
        const entries = await fs.readdir(albumDir, { withFileTypes: true });
        albums.push({
          name: path.basename(albumDir),
          tracks: entries.filter(entry => entry.isFile() && isAudioFile(entry.name)).length,
        });
      }
      tree[path.basename(artistDir)] = albums;
    }
    return tree;
  }

  /**
   * Audio tracks of one inbox album folder
   */
  async folder(artist: string, album: string): Promise<InboxFolder> {
    const folderPath = path.join(this.inboxRoot, artist, album);
    const segments = segmentsBelow(this.inboxRoot, folderPath);
    if (!segments || segments.length !== 2) {
      throw new ValidationError('artist and album must name a folder inside the inbox', {
        service: 'InboxStatsService',
        operation: 'folder',
      });
    }

    const stat = await fs.stat(folderPath).catch(() => null);
    if (!stat?.isDirectory()) {
      throw new ResourceNotFoundError('Inbox folder', `${artist}/${album}`);
    }

    const entries = await fs.readdir(folderPath, { withFileTypes: true });
    const names = entries
      .filter(entry => entry.isFile() && isAudioFile(entry.name))
      .map(entry => entry.name)
      .sort();

    const tracks: InboxTrack[] = [];
    for (const name of names) {
      const filePath = path.join(folderPath, name);
      const { size } = await fs.stat(filePath);
      tracks.push({
        filename: name,
        size,
        duration: await this.readDuration(filePath),
        path: path.relative(this.inboxRoot, filePath),
      });
    }

    return { artist, album, tracks, trackCount: tracks.length };
  }

  private async artistDirectories(): Promise<string[]> {
    const dirs = await this.subdirectories(this.inboxRoot);
    return dirs.filter(dir => !path.basename(dir).includes(STAGING_MARKER));
  }

  /**
   * Non-hidden child directories, sorted by name
   */
  private async subdirectories(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter(entry => entry.isDirectory() && !isHiddenName(entry.name))
      .map(entry => entry.name)
      .sort()
      .map(name => path.join(dir, name));
  }

  private async walk(dir: string, visit: (filePath: string, size: number) => Promise<void>): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walk(entryPath, visit);
      } else if (entry.isFile()) {
        const { size } = await fs.stat(entryPath);
        await visit(entryPath, size);
      }
    }
  }
}

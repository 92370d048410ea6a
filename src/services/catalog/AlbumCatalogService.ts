/**
 * Album Catalog
 *
 * Read access to the catalog JSON files produced by the regeneration
 * command, and the command itself. The files' field layout belongs to
 * the regeneration script; entries are passed through untouched.
 */

import * as fs from 'fs-extra';
import { AppConfig } from '../../config/types.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { CommandResult, CommandRunner } from '../process/CommandRunner.js';

export type CatalogEntry = Record<string, unknown>;

function isCatalogEntry(value: unknown): value is CatalogEntry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class AlbumCatalogService {
  constructor(
    private readonly runner: CommandRunner,
    private readonly config: Pick<AppConfig, 'paths' | 'catalog' | 'queues'>
  ) {}

  /**
   * Rebuild the catalog files
   */
  regenerate(timeoutMs: number = this.config.queues.library.actionTimeoutMs): Promise<CommandResult> {
    const [command = '', ...args] = this.config.catalog.regenerateCommand;
    return this.runner.run(command, args, { timeoutMs });
  }

  /**
   * Up to `limit` albums; empty when the file is missing or unreadable
   */
  listAlbums(limit: number): Promise<CatalogEntry[]> {
    return this.readEntries(this.config.paths.albumsFile, limit);
  }

  listRecent(limit: number): Promise<CatalogEntry[]> {
    return this.readEntries(this.config.paths.recentAlbumsFile, limit);
  }

  /**
   * Album and album-artist counts straight from the catalog file
   */
  async countAlbums(): Promise<{ albums: number; albumArtists: number }> {
    const entries = await this.readEntries(this.config.paths.albumsFile);
    const artists = new Set(entries.map(entry => String(entry.albumartist ?? '')));
    return { albums: entries.length, albumArtists: entries.length === 0 ? 0 : artists.size };
  }

  private async readEntries(file: string, limit?: number): Promise<CatalogEntry[]> {
    let parsed: unknown;
    try {
      parsed = await fs.readJson(file);
    } catch (error) {
      logger.debug('[AlbumCatalogService] Catalog file unavailable', {
        service: 'AlbumCatalogService',
        file,
        error: getErrorMessage(error),
      });
      return [];
    }

    if (!Array.isArray(parsed)) {
      logger.warn('[AlbumCatalogService] Catalog file is not an array', {
        service: 'AlbumCatalogService',
        file,
      });
      return [];
    }

    const entries = parsed.filter(isCatalogEntry);
    return limit === undefined ? entries : entries.slice(0, Math.max(0, limit));
  }
}

/**
 * Library Statistics
 *
 * Aggregates several tagger queries into one summary. Each query is
 * independent: a failed or timed-out query leaves its section empty
 * instead of failing the whole summary.
 */

import { STATS_TIMEOUTS } from '../../config/constants.js';
import { logger } from '../../middleware/logging.js';
import { TaggerClient } from '../tagger/TaggerClient.js';
import { AlbumCatalogService } from '../catalog/AlbumCatalogService.js';
import { CommandResult, outputExcerpt } from '../process/CommandRunner.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

export interface LibraryStats {
  tracks: number;
  albums: number;
  albumArtists: number;
  totalTime: string;
  totalSize: string;
  formats: Record<string, number>;
  /** -1 when the query failed */
  missingTracks: number;
  topGenres: Record<string, number>;
  years: Record<string, number>;
  labels: Record<string, number>;
  computedAt: string;
}

/**
 * The `count` most frequent values, most frequent first; ties keep
 * first-seen order
 */
export function mostCommon(values: readonly string[], count: number): Record<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  const result: Record<string, number> = {};
  for (const [value, n] of [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, count)) {
    result[value] = n;
  }
  return result;
}

function nonEmptyLines(output: string): string[] {
  return output
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Parse the tagger's `stats` summary ("Tracks: 12", "Total time: ...")
 */
export function parseSummary(output: string): Pick<LibraryStats, 'tracks' | 'albums' | 'albumArtists' | 'totalTime' | 'totalSize'> {
  const summary = { tracks: 0, albums: 0, albumArtists: 0, totalTime: 'unknown', totalSize: 'unknown' };

  for (const line of nonEmptyLines(output)) {
    const separator = line.indexOf(':');
    if (separator < 0) {
      continue;
    }
    const label = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    const asCount = Number.parseInt(value, 10);

    switch (label) {
      case 'Tracks':
        summary.tracks = Number.isNaN(asCount) ? 0 : asCount;
        break;
      case 'Albums':
        summary.albums = Number.isNaN(asCount) ? 0 : asCount;
        break;
      case 'Album artists':
        summary.albumArtists = Number.isNaN(asCount) ? 0 : asCount;
        break;
      case 'Total time':
        summary.totalTime = value;
        break;
      case 'Approximate total size':
        summary.totalSize = value;
        break;
    }
  }
  return summary;
}

export class LibraryStatsService {
  constructor(
    private readonly tagger: TaggerClient,
    private readonly catalog: AlbumCatalogService
  ) {}

  async compute(): Promise<LibraryStats> {
    const startTime = Date.now();
    logger.info('[LibraryStatsService] Computing library stats', {
      service: 'LibraryStatsService',
      operation: 'compute',
    });

    const [summary, formats, missing, genreYear, labels] = await Promise.all([
      this.query(['stats'], STATS_TIMEOUTS.SUMMARY),
      this.query(['list', '-f', '$format'], STATS_TIMEOUTS.LISTING),
      this.query(['missing'], STATS_TIMEOUTS.MISSING),
      this.query(['list', '-a', '-f', '$genre|$year'], STATS_TIMEOUTS.LISTING),
      this.query(['list', '-a', '-f', '$label'], STATS_TIMEOUTS.LISTING),
    ]);

    const stats: LibraryStats = {
      ...parseSummary(summary ?? ''),
      formats: mostCommon(nonEmptyLines(formats ?? ''), 10),
      missingTracks: missing === null ? -1 : nonEmptyLines(missing).length,
      topGenres: {},
      years: {},
      labels: mostCommon(
        nonEmptyLines(labels ?? '').filter(label => label.toLowerCase() !== 'unknown'),
        15
      ),
      computedAt: new Date().toISOString(),
    };

    if (genreYear !== null) {
      const genres: string[] = [];
      const years: string[] = [];
      for (const line of nonEmptyLines(genreYear)) {
        const separator = line.indexOf('|');
        if (separator < 0) {
          continue;
        }
        const genre = line.slice(0, separator).trim();
        const year = line.slice(separator + 1).trim();
        if (genre) genres.push(genre);
        if (year && year !== '0') years.push(year);
      }
      stats.topGenres = mostCommon(genres, 5);
      stats.years = mostCommon(years, 5);
    }

    if (stats.tracks === 0 && stats.albums === 0) {
      const counts = await this.catalog.countAlbums();
      stats.albums = counts.albums;
      stats.albumArtists = counts.albumArtists;
    }

    logger.info('[LibraryStatsService] Library stats computed', {
      service: 'LibraryStatsService',
      operation: 'compute',
      durationMs: Date.now() - startTime,
      tracks: stats.tracks,
      albums: stats.albums,
    });
    return stats;
  }

  /**
   * Output of a successful query, null on failure
   */
  private async query(args: string[], timeoutMs: number): Promise<string | null> {
    let result: CommandResult;
    try {
      result = await this.tagger.run(args, timeoutMs);
    } catch (error) {
      logger.warn('[LibraryStatsService] Tagger could not be started', {
        service: 'LibraryStatsService',
        args,
        error: getErrorMessage(error),
      });
      return null;
    }
    if (result.exitCode === 0 && !result.timedOut) {
      return result.output;
    }
    logger.warn('[LibraryStatsService] Tagger query failed', {
      service: 'LibraryStatsService',
      args,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
      output: outputExcerpt(result.output, 200),
    });
    return null;
  }
}

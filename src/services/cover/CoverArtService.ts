/**
 * Cover Art Service
 *
 * Resolves `cover.jpg` for an album directory through a fallback chain,
 * stopping at the first stage that yields an image:
 *   1. a conventionally named image already in the directory
 *   2. artwork embedded in one of the first few audio files
 *   3. the release id known to the tagger, looked up in the art archive
 *
 * The file is written to a temporary name in the same directory and
 * renamed into place, so readers never see a partial image. Once `signal`
 * aborts, no further stage starts and nothing is written.
 */

import * as path from 'path';
import * as fs from 'fs-extra';
import { AxiosInstance, isAxiosError } from 'axios';
import { COVER } from '../../config/constants.js';
import { FileSystemError, ErrorCode } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { isAudioFile } from '../watchers/pathFilter.js';
import { EmbeddedPicture } from '../media/audioTags.js';
import { TaggerClient } from '../tagger/TaggerClient.js';

export type CoverSource = 'existing' | 'local' | 'embedded' | 'archive';

export interface CoverResult {
  albumDir: string;
  coverPath: string;
  /** null when every stage came up empty */
  source: CoverSource | null;
}

export interface CoverArtDependencies {
  tagger: TaggerClient;
  http: AxiosInstance;
  readEmbeddedPicture: (filePath: string) => Promise<EmbeddedPicture | null>;
  /** Timeout for the tagger lookup in stage 3 */
  lookupTimeoutMs: number;
}

export class CoverArtService {
  constructor(private readonly deps: CoverArtDependencies) {}

  async resolve(albumDir: string, signal?: AbortSignal): Promise<CoverResult> {
    const coverPath = path.join(albumDir, COVER.FILENAME);

    if (await fs.pathExists(coverPath)) {
      return { albumDir, coverPath, source: 'existing' };
    }

    const stages: Array<[CoverSource, () => Promise<Buffer | null>]> = [
      ['local', () => this.findLocalImage(albumDir)],
      ['embedded', () => this.findEmbeddedArt(albumDir)],
      ['archive', () => this.fetchFromArchive(albumDir, signal)],
    ];

    for (const [source, stage] of stages) {
      signal?.throwIfAborted();
      const data = await stage();
      if (data && data.length > 0) {
        signal?.throwIfAborted();
        await writeFileAtomic(coverPath, data);
        logger.info('[CoverArtService] Cover written', {
          service: 'CoverArtService',
          operation: 'resolve',
          albumDir,
          source,
          bytes: data.length,
        });
        return { albumDir, coverPath, source };
      }
    }

    logger.info('[CoverArtService] No cover art found', {
      service: 'CoverArtService',
      operation: 'resolve',
      albumDir,
    });
    return { albumDir, coverPath, source: null };
  }

  /**
   * Stage 1: base names in priority order, each with every extension.
   * Names are matched case-insensitively.
   */
  async findLocalImage(albumDir: string): Promise<Buffer | null> {
    const entries = await fs.readdir(albumDir, { withFileTypes: true });
    const files = new Map<string, string>();
    for (const entry of entries) {
      if (entry.isFile()) {
        files.set(entry.name.toLowerCase(), entry.name);
      }
    }

    for (const base of COVER.BASE_NAMES) {
      for (const ext of COVER.EXTENSIONS) {
        const candidate = `${base}${ext}`;
        const actual = files.get(candidate);
        if (actual === undefined || candidate === COVER.FILENAME) {
          continue;
        }
        try {
          return await fs.readFile(path.join(albumDir, actual));
        } catch (error) {
          logger.warn('[CoverArtService] Unreadable local image', {
            service: 'CoverArtService',
            file: actual,
            error: getErrorMessage(error),
          });
        }
      }
    }
    return null;
  }

  /**
   * Stage 2: first audio files in name order
   */
  async findEmbeddedArt(albumDir: string): Promise<Buffer | null> {
    const entries = await fs.readdir(albumDir, { withFileTypes: true });
    const audioFiles = entries
      .filter(entry => entry.isFile() && isAudioFile(entry.name))
      .map(entry => entry.name)
      .sort()
      .slice(0, COVER.EMBEDDED_PROBE_LIMIT);

    for (const name of audioFiles) {
      const picture = await this.deps.readEmbeddedPicture(path.join(albumDir, name));
      if (picture) {
        return picture.data;
      }
    }
    return null;
  }

  /**
   * Stage 3: release id from the tagger, front image from the archive
   */
  async fetchFromArchive(albumDir: string, signal?: AbortSignal): Promise<Buffer | null> {
    const identity = await this.deps.tagger.identifyAlbum(albumDir, this.deps.lookupTimeoutMs);
    if (!identity?.releaseId) {
      return null;
    }

    // Sized rendition first, then the original
    for (const suffix of ['front-500', 'front']) {
      const url = `${COVER.ARCHIVE_BASE_URL}/${encodeURIComponent(identity.releaseId)}/${suffix}`;
      signal?.throwIfAborted();
      try {
        const response = await this.deps.http.get<ArrayBuffer>(url, {
          responseType: 'arraybuffer',
          timeout: COVER.ARCHIVE_TIMEOUT_MS,
          headers: { 'User-Agent': COVER.USER_AGENT },
          ...(signal && { signal }),
        });
        const data = Buffer.from(response.data);
        if (data.length > 0) {
          return data;
        }
      } catch (error) {
        logger.debug('[CoverArtService] Archive lookup failed', {
          service: 'CoverArtService',
          releaseId: identity.releaseId,
          url,
          status: isAxiosError(error) ? error.response?.status : undefined,
          error: getErrorMessage(error),
        });
      }
    }
    return null;
  }
}

/**
 * Write to a hidden temporary file beside `target`, then rename over it
 */
export async function writeFileAtomic(target: string, data: Buffer): Promise<void> {
  const tempPath = path.join(
    path.dirname(target),
    `.cover_tmp_${process.pid}_${Date.now()}${path.extname(target)}`
  );
  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, target);
  } catch (error) {
    await fs.remove(tempPath);
    throw new FileSystemError(
      `Failed to write ${target}: ${getErrorMessage(error)}`,
      ErrorCode.FS_WRITE_FAILED,
      target,
      false,
      { service: 'CoverArtService', operation: 'writeFileAtomic' },
      toError(error)
    );
  }
}

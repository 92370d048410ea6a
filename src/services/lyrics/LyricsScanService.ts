import * as path from 'path';
import * as fs from 'fs-extra';
import { LYRICS_PRIORITY } from '../../config/constants.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { EventLog } from '../eventLog/EventLog.js';
import { WorkChannel } from '../jobQueue/WorkChannel.js';
import { isAudioFile, isHiddenName } from '../watchers/pathFilter.js';

export interface LyricsScanResult {
  scanned: number;
  queued: number;
}

/**
 * Library-wide sweep that queues every track still lacking lyrics at
 * scan priority. Tracks already pending are skipped by the dedup guard.
 */
export class LyricsScanService {
  private running = false;

  constructor(
    private readonly libraryRoot: string,
    private readonly channel: WorkChannel,
    private readonly eventLog: EventLog,
    private readonly hasLyrics: (filePath: string) => Promise<boolean>
  ) {}

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Returns null when a scan is already in progress
   */
  async scan(): Promise<LyricsScanResult | null> {
    if (this.running) {
      return null;
    }

    this.running = true;
    const result: LyricsScanResult = { scanned: 0, queued: 0 };
    this.eventLog.append('info', 'Starting library-wide lyrics scan');

    try {
      await this.visit(this.libraryRoot, result);
      this.eventLog.append('success', `Lyrics scan complete: ${result.queued} tracks queued`);
      return result;
    } catch (error) {
      logger.error('[LyricsScanService] Scan failed', {
        service: 'LyricsScanService',
        operation: 'scan',
        error: getErrorMessage(error),
      });
      this.eventLog.append('error', `Lyrics scan failed: ${getErrorMessage(error).slice(0, 100)}`);
      throw error;
    } finally {
      this.running = false;
    }
  }

  private async visit(dir: string, result: LyricsScanResult): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      if (isHiddenName(entry.name)) {
        continue;
      }
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.visit(entryPath, result);
        continue;
      }
      if (!entry.isFile() || !isAudioFile(entry.name)) {
        continue;
      }

      result.scanned++;
      if (await this.hasLyrics(entryPath)) {
        continue;
      }
      if (this.channel.submit(entryPath, { priority: LYRICS_PRIORITY.SCAN })) {
        result.queued++;
      }
    }
  }
}

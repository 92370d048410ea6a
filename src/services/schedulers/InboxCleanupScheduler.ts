import * as path from 'path';
import * as fs from 'fs-extra';
import * as cron from 'node-cron';
import { CleanupConfig } from '../../config/types.js';
import { ConfigurationError } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { EventLog } from '../eventLog/EventLog.js';
import { isAudioFile, isHiddenName } from '../watchers/pathFilter.js';

export interface CleanupSummary {
  removedTrees: string[];
  removedEmptyDirs: string[];
}

/**
 * Inbox Cleanup Scheduler
 *
 * Periodically removes leftovers from the inbox:
 * - top-level directories holding no audio at all are removed with
 *   everything in them
 * - inside directories that do hold audio, empty subdirectories go
 *
 * Hidden directories and unpack staging directories are left alone.
 */
export class InboxCleanupScheduler {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;

  constructor(
    private readonly inboxRoot: string,
    private readonly config: CleanupConfig,
    private readonly eventLog: EventLog
  ) {}

  start(): void {
    if (!this.config.enabled) {
      logger.info('InboxCleanupScheduler disabled');
      return;
    }
    if (this.task) {
      logger.warn('InboxCleanupScheduler already running');
      return;
    }
    if (!cron.validate(this.config.schedule)) {
      throw new ConfigurationError(
        'INBOX_CLEANUP_SCHEDULE',
        `Invalid cron expression: ${this.config.schedule}`
      );
    }

    this.task = cron.schedule(this.config.schedule, () => {
      this.runCleanup().catch(error => {
        logger.error('InboxCleanupScheduler run failed', {
          error: getErrorMessage(error),
        });
      });
    });

    logger.info('InboxCleanupScheduler started', { schedule: this.config.schedule });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('InboxCleanupScheduler stopped');
    }
  }

  /**
   * One cleanup pass. Returns null when a pass is already running.
   */
  async runCleanup(): Promise<CleanupSummary | null> {
    if (this.isRunning) {
      logger.debug('InboxCleanupScheduler pass already in progress, skipping');
      return null;
    }

    this.isRunning = true;
    const summary: CleanupSummary = { removedTrees: [], removedEmptyDirs: [] };

    try {
      if (!(await fs.pathExists(this.inboxRoot))) {
        return summary;
      }

      const entries = await fs.readdir(this.inboxRoot, { withFileTypes: true });
      for (const entry of entries) {
        if (!entry.isDirectory() || isHiddenName(entry.name) || entry.name.toLowerCase().includes('unpack')) {
          continue;
        }

        const dir = path.join(this.inboxRoot, entry.name);
        if (await containsAudio(dir)) {
          await this.removeEmptyDirs(dir, summary);
          continue;
        }

        try {
          await fs.remove(dir);
          summary.removedTrees.push(dir);
          this.eventLog.append('warning', `Removed inbox directory with no audio: ${entry.name}`);
        } catch (error) {
          logger.error('InboxCleanupScheduler failed to remove directory', {
            dir,
            error: getErrorMessage(error),
          });
        }
      }

      return summary;
    } finally {
      this.isRunning = false;
    }
  }

  /**
   * Depth-first; a directory emptied by removing its children goes too
   */
  private async removeEmptyDirs(dir: string, summary: CleanupSummary): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory()) {
        await this.removeEmptyDirs(path.join(dir, entry.name), summary);
      }
    }

    if ((await fs.readdir(dir)).length === 0) {
      await fs.rmdir(dir);
      summary.removedEmptyDirs.push(dir);
      this.eventLog.append('info', `Removed empty inbox directory: ${path.basename(dir)}`);
    }
  }
}

async function containsAudio(dir: string): Promise<boolean> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.isFile() && isAudioFile(entry.name)) {
      return true;
    }
    if (entry.isDirectory() && (await containsAudio(path.join(dir, entry.name)))) {
      return true;
    }
  }
  return false;
}

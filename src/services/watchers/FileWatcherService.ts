/**
 * File Watcher Service
 *
 * Turns filesystem notifications under the inbox and library roots into
 * submissions on the work channels. A root that does not exist at
 * startup disables its watcher and the workers it feeds; everything
 * else keeps running.
 */

import * as path from 'path';
import * as fs from 'fs-extra';
import { FSWatcher, watch } from 'chokidar';
import { OrchestratorContext } from '../orchestrator/OrchestratorContext.js';
import { WorkerPool } from '../orchestrator/WorkerPool.js';
import { QueueName } from '../jobQueue/types.js';
import { COVER, LIBRARY_TARGET, LYRICS_PRIORITY } from '../../config/constants.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { isAcceptedPath, isAudioFile, topLevelEntry } from './pathFilter.js';

export type WatchRoot = 'inbox' | 'library';

export type WatcherState = 'stopped' | 'watching' | 'disabled';

/** Queues fed by each root */
const FED_QUEUES: Record<WatchRoot, QueueName[]> = {
  inbox: ['inbox'],
  library: ['library', 'cover', 'lyrics'],
};

export class FileWatcherService {
  private readonly watchers = new Map<WatchRoot, FSWatcher>();
  private readonly states: Record<WatchRoot, WatcherState> = {
    inbox: 'stopped',
    library: 'stopped',
  };

  constructor(
    private readonly context: OrchestratorContext,
    private readonly workerPool: WorkerPool
  ) {}

  /**
   * Check both roots, disabling the workers of any that is missing.
   * Must run before the worker pool starts.
   */
  async checkRoots(): Promise<void> {
    for (const root of ['inbox', 'library'] as const) {
      const rootPath = this.rootPath(root);
      if (await fs.pathExists(rootPath)) {
        continue;
      }
      this.states[root] = 'disabled';
      logger.warn(`[FileWatcherService] ${root} root does not exist`, {
        service: 'FileWatcherService',
        operation: 'checkRoots',
        root: rootPath,
      });
      for (const queue of FED_QUEUES[root]) {
        this.workerPool.disable(queue, `${rootPath} does not exist`);
      }
    }
  }

  start(): void {
    for (const root of ['inbox', 'library'] as const) {
      if (this.states[root] !== 'stopped') {
        continue;
      }
      const rootPath = this.rootPath(root);
      const watcher = watch(rootPath, {
        ignoreInitial: true,
        persistent: true,
        ignored: (candidate: string) => candidate !== rootPath && path.basename(candidate).startsWith('.'),
      });

      watcher.on('add', filePath => this.handle(root, filePath));
      watcher.on('addDir', dirPath => this.handle(root, dirPath));
      watcher.on('error', error => {
        logger.error(`[FileWatcherService] ${root} watcher error`, {
          service: 'FileWatcherService',
          root: rootPath,
          error: getErrorMessage(error),
        });
      });

      this.watchers.set(root, watcher);
      this.states[root] = 'watching';
      this.context.eventLog.append('info', `Watching ${root}: ${rootPath}`);
    }
  }

  async stop(): Promise<void> {
    await Promise.all([...this.watchers.values()].map(watcher => watcher.close()));
    this.watchers.clear();
    for (const root of ['inbox', 'library'] as const) {
      if (this.states[root] === 'watching') {
        this.states[root] = 'stopped';
      }
    }
  }

  status(): Record<WatchRoot, WatcherState> {
    return { ...this.states };
  }

  /**
   * Route one notification. Public so tests can feed events without a
   * real watcher.
   */
  handle(root: WatchRoot, filePath: string): void {
    if (root === 'inbox') {
      this.handleInbox(filePath);
    } else {
      this.handleLibrary(filePath);
    }
  }

  private handleInbox(filePath: string): void {
    const rootPath = this.rootPath('inbox');
    if (!isAcceptedPath(rootPath, filePath, this.context.config.watch.inboxIgnore)) {
      return;
    }
    const target = topLevelEntry(rootPath, filePath);
    if (!target) {
      return;
    }
    if (this.context.channels.inbox.submit(target)) {
      logger.debug('[FileWatcherService] Queued inbox import', {
        service: 'FileWatcherService',
        target,
      });
    }
  }

  private handleLibrary(filePath: string): void {
    const rootPath = this.rootPath('library');
    if (!isAcceptedPath(rootPath, filePath, this.context.config.watch.libraryIgnore)) {
      return;
    }

    const { channels, config } = this.context;
    channels.library.submit(LIBRARY_TARGET);

    if (!isAudioFile(filePath)) {
      return;
    }

    const albumDir = path.dirname(filePath);
    if (!fs.existsSync(path.join(albumDir, COVER.FILENAME))) {
      channels.cover.submit(albumDir);
    }

    if (config.lyrics.autoQueue) {
      channels.lyrics.submit(filePath, { priority: LYRICS_PRIORITY.NEW_TRACK });
    }
  }

  private rootPath(root: WatchRoot): string {
    return path.resolve(
      root === 'inbox' ? this.context.config.paths.inboxRoot : this.context.config.paths.libraryRoot
    );
  }
}

import * as path from 'path';
import * as fs from 'fs-extra';
import { OrchestratorContext } from '../orchestrator/OrchestratorContext.js';
import { WorkerPool } from '../orchestrator/WorkerPool.js';
import { WorkItem } from '../jobQueue/types.js';
import { TaggerClient } from '../tagger/TaggerClient.js';
import { AlbumCatalogService } from '../catalog/AlbumCatalogService.js';
import { CoverArtService, CoverResult } from '../cover/CoverArtService.js';
import { CommandResult, outputExcerpt } from '../process/CommandRunner.js';
import { COVER, LIBRARY_TARGET } from '../../config/constants.js';
import { ConflictError, ProcessError, TimeoutError } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { withTimeout } from '../../utils/sleep.js';

export type ImportTrigger = 'automatic' | 'manual';

/**
 * LibraryJobHandlers
 *
 * Actions behind the inbox, library and cover queues, plus the
 * user-initiated variants the API exposes:
 * - import: serialized system-wide by the import lease, never timed out
 * - catalog regeneration: invalidates library stats
 * - cover resolution: chains a regeneration so the catalog picks it up
 */
export class LibraryJobHandlers {
  private manualImport: Promise<void> | null = null;

  constructor(
    private readonly context: OrchestratorContext,
    private readonly tagger: TaggerClient,
    private readonly catalog: AlbumCatalogService,
    private readonly covers: CoverArtService
  ) {}

  registerHandlers(pool: WorkerPool): void {
    pool.register('inbox', this.handleImport.bind(this));
    pool.register('library', this.handleRegenerate.bind(this));
    pool.register('cover', this.handleCover.bind(this));
  }

  /**
   * inbox queue. A held lease means another import is running; the item
   * is dropped and the next filesystem event will trigger again.
   */
  async handleImport(item: WorkItem): Promise<void> {
    const { importLease, eventLog } = this.context;

    if (!(await importLease.tryAcquire(0))) {
      eventLog.append('warning', `Import already in progress, skipped ${path.basename(item.target)}`);
      logger.warn('[LibraryJobHandlers] Import skipped, lease held', {
        service: 'LibraryJobHandlers',
        handler: 'handleImport',
        target: item.target,
      });
      return;
    }

    await this.runImport(item.target, 'automatic');
  }

  /**
   * Manual import of the whole inbox. Answers at once: throws
   * ConflictError when an import is running, otherwise the import
   * continues in the background.
   */
  async startManualImport(): Promise<{ target: string }> {
    const { importLease, eventLog, config } = this.context;
    const target = config.paths.inboxRoot;

    if (!(await importLease.tryAcquire(0))) {
      eventLog.append('warning', 'Import already running, manual import skipped');
      throw new ConflictError('import', 'An import is already running');
    }

    this.manualImport = this.runImport(target, 'manual')
      .catch(error => {
        logger.error('[LibraryJobHandlers] Manual import failed', {
          service: 'LibraryJobHandlers',
          operation: 'startManualImport',
          target,
          error: getErrorMessage(error),
        });
        eventLog.append('error', `Manual import failed: ${getErrorMessage(error).slice(0, 200)}`);
      })
      .finally(() => {
        this.manualImport = null;
      });

    return { target };
  }

  /**
   * Resolves once no manual import is running. Never rejects.
   */
  async waitForManualImport(): Promise<void> {
    await this.manualImport;
  }

  /**
   * library queue
   */
  async handleRegenerate(): Promise<void> {
    await this.regenerate();
  }

  /**
   * Regenerate the catalog now. Throws ProcessError with the captured
   * output on failure.
   */
  async regenerate(): Promise<CommandResult> {
    const { eventLog, libraryStatsCache } = this.context;

    eventLog.append('info', 'Starting library regeneration');
    const result = await this.catalog.regenerate();
    this.assertSucceeded(result, 'Regeneration');

    libraryStatsCache.invalidate();
    eventLog.append('success', 'Library regeneration completed');
    return result;
  }

  /**
   * cover queue. Directories that vanished or already have a cover are
   * skipped quietly.
   */
  async handleCover(item: WorkItem): Promise<void> {
    const albumDir = item.target;
    if (!(await fs.pathExists(albumDir)) || (await fs.pathExists(path.join(albumDir, COVER.FILENAME)))) {
      return;
    }

    this.context.eventLog.append('info', `Fetching cover art: ${path.basename(albumDir)}`);
    await this.resolveCover(albumDir);
  }

  /**
   * Resolve within the cover timeout and record the outcome. On timeout
   * the chain is aborted so a late result is never written.
   * A new cover queues a catalog regeneration.
   */
  async resolveCover(albumDir: string): Promise<CoverResult> {
    const { eventLog, channels, config } = this.context;
    const timeoutMs = config.queues.cover.actionTimeoutMs;
    const controller = new AbortController();

    const result = await withTimeout(this.covers.resolve(albumDir, controller.signal), timeoutMs, () => {
      controller.abort();
      return new TimeoutError(timeoutMs, 'Cover fetch', undefined, { service: 'LibraryJobHandlers' });
    });

    const name = path.basename(albumDir);
    if (result.source === null) {
      eventLog.append('warning', `Cover fetch failed: ${name}`);
    } else if (result.source !== 'existing') {
      eventLog.append('success', `Cover art fetched (${result.source}): ${name}`);
      channels.library.submit(LIBRARY_TARGET);
    }
    return result;
  }

  /**
   * Runs with the lease already held and always releases it
   */
  private async runImport(target: string, trigger: ImportTrigger): Promise<void> {
    const { importLease, eventLog, inboxStatsCache, channels } = this.context;

    try {
      eventLog.append('info', `Starting ${trigger} import: ${path.basename(target)}`);
      const result = await this.tagger.importDirectory(target);
      this.assertSucceeded(result, 'Import');

      eventLog.append('success', `Import completed: ${path.basename(target)}`);
      inboxStatsCache.invalidate();
      channels.library.submit(LIBRARY_TARGET);
    } finally {
      await importLease.release();
    }
  }

  private assertSucceeded(result: CommandResult, action: string): void {
    if (result.exitCode === 0 && !result.timedOut) {
      return;
    }
    const reason = result.timedOut ? 'timed out' : `exit ${result.exitCode ?? 'signal'}`;
    throw new ProcessError(
      action,
      result.exitCode ?? -1,
      `${action} failed (${reason}): ${outputExcerpt(result.output, 200) || 'no output'}`,
      { service: 'LibraryJobHandlers', durationMs: result.durationMs }
    );
  }
}

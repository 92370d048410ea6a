import * as path from 'path';
import { Request, Response, NextFunction } from 'express';
import { OrchestratorContext } from '../services/orchestrator/OrchestratorContext.js';
import { WorkerPool } from '../services/orchestrator/WorkerPool.js';
import { FileWatcherService } from '../services/watchers/FileWatcherService.js';
import { segmentsBelow } from '../services/watchers/pathFilter.js';
import { QUEUE_NAMES, QueueName } from '../services/jobQueue/types.js';
import { WorkerStatus } from '../services/orchestrator/QueueWorker.js';
import { LIBRARY_TARGET, LYRICS_PRIORITY } from '../config/constants.js';
import { ValidationError } from '../errors/index.js';
import { queueParamSchema, triggerQueueSchema, watcherStatusQuerySchema } from '../validation/pipelineSchemas.js';
import { logger } from '../middleware/logging.js';

type QueueStatus = WorkerStatus | { state: 'stopped'; queueDepth: number; pending: number };

/**
 * Watcher Controller
 *
 * Orchestrator status and manual triggers:
 * - GET  /api/watcher/status
 * - POST /api/watcher/:queue/trigger
 */
export class WatcherController {
  constructor(
    private readonly context: OrchestratorContext,
    private readonly workerPool: WorkerPool,
    private readonly watchers: FileWatcherService
  ) {}

  /**
   * GET /api/watcher/status?since_id=&limit=
   */
  getStatus = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const query = watcherStatusQuerySchema.parse(req.query);
      const workers = this.workerPool.status();

      const queues: Partial<Record<QueueName, QueueStatus>> = {};
      for (const name of QUEUE_NAMES) {
        const channel = this.context.channels[name];
        queues[name] = workers[name] ?? {
          state: 'stopped',
          queueDepth: channel.queue.size(),
          pending: channel.pendingCount(),
        };
      }

      res.json({
        queues,
        watchers: this.watchers.status(),
        importRunning: this.context.importLease.isHeld(),
        lyrics: {
          rateLimiter: this.context.lyricsLimiter.getStats(),
          exhaustedCount: this.context.lyricsLedger.exhaustedTargets().length,
        },
        events: this.context.eventLog.tail(query.since_id, query.limit),
        latestEventId: this.context.eventLog.latestId(),
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/watcher/:queue/trigger
   * Body: { target?, priority? }. 202 with `queued: false` when an item
   * for the target is already pending.
   */
  trigger = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const { queue } = queueParamSchema.parse(req.params);
      const body = triggerQueueSchema.parse(req.body ?? {});

      this.workerPool.assertAvailable(queue);

      const target = body.target === undefined ? this.defaultTarget(queue) : this.resolveTarget(queue, body.target);
      const priority = body.priority ?? (queue === 'lyrics' ? LYRICS_PRIORITY.NEW_TRACK : undefined);
      const queued = this.context.channels[queue].submit(target, {
        ...(priority !== undefined && { priority }),
      });

      logger.info('[WatcherController] Manual trigger', {
        service: 'WatcherController',
        operation: 'trigger',
        queue,
        target,
        queued,
      });
      this.context.eventLog.append('info', `Manual ${queue} trigger: ${target}${queued ? '' : ' (already pending)'}`);

      res.status(202).json({ queue, target, queued });
    } catch (error) {
      next(error);
    }
  };

  /**
   * Explicit targets must lie inside the root that feeds the queue; the
   * inbox queue also takes the inbox root itself.
   */
  private resolveTarget(queue: QueueName, requested: string): string {
    if (queue === 'library') {
      if (requested !== LIBRARY_TARGET) {
        throw this.invalidTarget(`The library queue only accepts the target "${LIBRARY_TARGET}"`);
      }
      return LIBRARY_TARGET;
    }

    const { inboxRoot, libraryRoot } = this.context.config.paths;
    const root = queue === 'inbox' ? inboxRoot : libraryRoot;
    const resolved = path.resolve(root, requested);

    const isInboxRoot = queue === 'inbox' && resolved === path.resolve(inboxRoot);
    if (!isInboxRoot && !segmentsBelow(root, resolved)) {
      throw this.invalidTarget(`Target for the ${queue} queue must be inside ${root}`);
    }
    return resolved;
  }

  private invalidTarget(message: string): ValidationError {
    return new ValidationError(message, { service: 'WatcherController', operation: 'trigger' });
  }

  private defaultTarget(queue: QueueName): string {
    switch (queue) {
      case 'inbox':
        return this.context.config.paths.inboxRoot;
      case 'library':
        return LIBRARY_TARGET;
      default:
        throw new ValidationError(`A target is required for the ${queue} queue`, {
          service: 'WatcherController',
          operation: 'trigger',
        });
    }
  }
}

import { Request, Response, NextFunction } from 'express';
import { OrchestratorContext } from '../services/orchestrator/OrchestratorContext.js';
import { LyricsScanService } from '../services/lyrics/LyricsScanService.js';
import { ConflictError } from '../errors/index.js';
import { lyricsClearFailedSchema, lyricsPauseSchema } from '../validation/pipelineSchemas.js';
import { logger } from '../middleware/logging.js';
import { getErrorMessage } from '../utils/errorHandling.js';

/**
 * Lyrics Controller
 *
 * Rate limiter and retry ledger inspection, manual cooldown control
 * and the library-wide scan.
 */
export class LyricsController {
  constructor(
    private readonly context: OrchestratorContext,
    private readonly scanner: LyricsScanService
  ) {}

  /**
   * GET /api/lyrics/stats
   */
  getStats = (_req: Request, res: Response): void => {
    const { lyricsLimiter, lyricsLedger, channels } = this.context;
    const exhausted = lyricsLedger.exhaustedTargets();
    res.json({
      rateLimiter: lyricsLimiter.getStats(),
      coolingDown: lyricsLimiter.isCoolingDown(),
      queueDepth: channels.lyrics.queue.size(),
      pending: channels.lyrics.pendingCount(),
      tracksWithFailures: lyricsLedger.trackedCount(),
      exhaustedCount: exhausted.length,
      exhaustedTracks: exhausted,
      maxRetries: lyricsLedger.maxRetries,
      scanRunning: this.scanner.isRunning(),
    });
  };

  /**
   * POST /api/lyrics/scan
   * The walk continues in the background; progress goes to the event log.
   */
  startScan = (_req: Request, res: Response, next: NextFunction): void => {
    try {
      if (this.scanner.isRunning()) {
        throw new ConflictError('lyrics-scan', 'A lyrics scan is already running');
      }

      this.scanner.scan().catch(error => {
        logger.error('[LyricsController] Background lyrics scan failed', {
          service: 'LyricsController',
          operation: 'startScan',
          error: getErrorMessage(error),
        });
      });

      res.status(202).json({ status: 'started' });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/lyrics/pause { seconds? }
   */
  pause = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const { seconds } = lyricsPauseSchema.parse(req.body ?? {});
      const { lyricsLimiter, eventLog } = this.context;

      if (seconds === undefined) {
        lyricsLimiter.triggerCooldown();
      } else {
        lyricsLimiter.triggerCooldown(seconds * 1000);
      }
      const stats = lyricsLimiter.getStats();
      eventLog.append('info', `Lyrics fetching paused until ${stats.cooldownUntil}`);

      res.json({ status: 'paused', cooldownUntil: stats.cooldownUntil });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/lyrics/resume
   */
  resume = (_req: Request, res: Response): void => {
    this.context.lyricsLimiter.clearCooldown();
    this.context.eventLog.append('info', 'Lyrics fetching resumed');
    res.json({ status: 'resumed' });
  };

  /**
   * POST /api/lyrics/failed/clear { target? }
   */
  clearFailed = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const { target } = lyricsClearFailedSchema.parse(req.body ?? {});
      const cleared = this.context.lyricsLedger.clear(target);
      this.context.eventLog.append('info', `Cleared ${cleared} lyrics retry record(s)`);
      res.json({ cleared });
    } catch (error) {
      next(error);
    }
  };
}

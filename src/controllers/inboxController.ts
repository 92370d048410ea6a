import { Request, Response, NextFunction } from 'express';
import { OrchestratorContext } from '../services/orchestrator/OrchestratorContext.js';
import { InboxStatsService } from '../services/stats/InboxStatsService.js';
import { forceRefreshQuerySchema, inboxFolderQuerySchema } from '../validation/pipelineSchemas.js';

export class InboxController {
  constructor(
    private readonly context: OrchestratorContext,
    private readonly inboxStats: InboxStatsService
  ) {}

  /**
   * GET /api/inbox/stats?force_refresh=
   */
  async getStats(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { force_refresh } = forceRefreshQuerySchema.parse(req.query);
      const stats = await this.context.inboxStatsCache.get(force_refresh);
      res.json({ ...stats, cache: this.context.inboxStatsCache.info() });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/inbox/stats/invalidate
   */
  invalidateStats(_req: Request, res: Response): void {
    this.context.inboxStatsCache.invalidate();
    res.json({ status: 'invalidated' });
  }

  /**
   * GET /api/inbox/tree
   */
  async getTree(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      res.json(await this.inboxStats.tree());
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/inbox/folder?artist=&album=
   */
  async getFolder(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { artist, album } = inboxFolderQuerySchema.parse(req.query);
      res.json(await this.inboxStats.folder(artist, album));
    } catch (error) {
      next(error);
    }
  }
}

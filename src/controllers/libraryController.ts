import { Request, Response, NextFunction } from 'express';
import { OrchestratorContext } from '../services/orchestrator/OrchestratorContext.js';
import { LibraryJobHandlers } from '../services/jobHandlers/LibraryJobHandlers.js';
import { AlbumCatalogService } from '../services/catalog/AlbumCatalogService.js';
import { outputExcerpt } from '../services/process/CommandRunner.js';
import { albumsQuerySchema, forceRefreshQuerySchema, recentAlbumsQuerySchema } from '../validation/pipelineSchemas.js';

/**
 * Library Controller
 *
 * Catalog regeneration, manual import, library statistics and the
 * catalog listings.
 */
export class LibraryController {
  constructor(
    private readonly context: OrchestratorContext,
    private readonly handlers: LibraryJobHandlers,
    private readonly catalog: AlbumCatalogService
  ) {}

  /**
   * POST /api/library/refresh
   * Runs synchronously; a failed run surfaces as a 500 carrying the output
   */
  async refresh(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.handlers.regenerate();
      res.json({
        status: 'completed',
        durationMs: result.durationMs,
        output: outputExcerpt(result.output),
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/library/import
   * 409 while another import holds the lease
   */
  async startImport(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { target } = await this.handlers.startManualImport();
      res.status(202).json({ status: 'started', target });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/stats?force_refresh=
   */
  async getStats(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { force_refresh } = forceRefreshQuerySchema.parse(req.query);
      const stats = await this.context.libraryStatsCache.get(force_refresh);
      res.json({ ...stats, cache: this.context.libraryStatsCache.info() });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/stats/invalidate
   */
  invalidateStats(_req: Request, res: Response): void {
    this.context.libraryStatsCache.invalidate();
    res.json({ status: 'invalidated' });
  }

  /**
   * GET /api/albums?limit=
   */
  async getAlbums(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { limit } = albumsQuerySchema.parse(req.query);
      res.json(await this.catalog.listAlbums(limit));
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/albums/recent?limit=
   */
  async getRecent(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { limit } = recentAlbumsQuerySchema.parse(req.query);
      res.json(await this.catalog.listRecent(limit));
    } catch (error) {
      next(error);
    }
  }
}

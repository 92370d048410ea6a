import { Request, Response, NextFunction } from 'express';
import { DownloadServiceClient } from '../services/downloads/DownloadServiceClient.js';
import { downloadSearchQuerySchema, queueDownloadSchema } from '../validation/downloadSchemas.js';
import { logger } from '../middleware/logging.js';

/**
 * Download Controller
 *
 * Proxies searches and transfers to the companion download service.
 */
export class DownloadController {
  constructor(private readonly client: DownloadServiceClient) {}

  /**
   * GET /api/downloads/search?artist=&album=&track=&file_type=
   */
  async search(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const query = downloadSearchQuerySchema.parse(req.query);
      const result = await this.client.search({
        artist: query.artist,
        album: query.album,
        track: query.track,
        fileType: query.file_type,
      });
      res.json(result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/downloads { username, filename }
   */
  async queue(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { username, filename } = queueDownloadSchema.parse(req.body);
      await this.client.queueDownload(username, filename);
      logger.info('[DownloadController] Download queued', {
        service: 'DownloadController',
        operation: 'queue',
        username,
        filename,
      });
      res.status(202).json({ status: 'queued', username, filename });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/downloads
   */
  async list(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      res.json(await this.client.listDownloads());
    } catch (error) {
      next(error);
    }
  }
}

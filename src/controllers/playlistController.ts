import { Request, Response, NextFunction } from 'express';
import { PlaylistService } from '../services/playlist/PlaylistService.js';
import { buildPlaylistSchema } from '../validation/playlistSchemas.js';

export class PlaylistController {
  constructor(private readonly playlists: PlaylistService) {}

  /**
   * POST /api/playlist/build { name, tracks[] }
   * A failed push to the playback device is reported in the body.
   */
  async build(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { name, tracks } = buildPlaylistSchema.parse(req.body);
      res.status(201).json(await this.playlists.build(name, tracks));
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/playlist/list
   */
  async list(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      res.json(await this.playlists.list());
    } catch (error) {
      next(error);
    }
  }
}

import { Router } from 'express';
import { Pipeline } from '../services/orchestrator/Pipeline.js';
import { WatcherController } from '../controllers/watcherController.js';
import { LibraryController } from '../controllers/libraryController.js';
import { InboxController } from '../controllers/inboxController.js';
import { CoverController } from '../controllers/coverController.js';
import { LyricsController } from '../controllers/lyricsController.js';
import { PlaylistController } from '../controllers/playlistController.js';
import { DownloadController } from '../controllers/downloadController.js';
import { validateRequest } from '../middleware/validation.js';
import {
  albumsQuerySchema,
  coverRequestSchema,
  forceRefreshQuerySchema,
  inboxFolderQuerySchema,
  lyricsClearFailedSchema,
  lyricsPauseSchema,
  queueParamSchema,
  recentAlbumsQuerySchema,
  triggerQueueSchema,
  watcherStatusQuerySchema,
} from '../validation/pipelineSchemas.js';
import { buildPlaylistSchema } from '../validation/playlistSchemas.js';
import { downloadSearchQuerySchema, queueDownloadSchema } from '../validation/downloadSchemas.js';
import { logger } from '../middleware/logging.js';

// Initialize router factory function
export const createApiRouter = (pipeline: Pipeline): Router => {
  const router = Router();
  const { context } = pipeline;

  const watcherController = new WatcherController(context, pipeline.workerPool, pipeline.watchers);
  const libraryController = new LibraryController(context, pipeline.handlers.library, pipeline.catalog);
  const inboxController = new InboxController(context, pipeline.inboxStats);
  const coverController = new CoverController(pipeline.handlers.library, context.config.paths.libraryRoot);
  const lyricsController = new LyricsController(context, pipeline.lyricsScanner);
  const playlistController = new PlaylistController(pipeline.playlists);
  const downloadController = new DownloadController(pipeline.downloads);

  // Orchestrator
  logger.debug('[API Router] Registering watcher routes');
  router.get('/watcher/status',
    validateRequest(watcherStatusQuerySchema, 'query'),
    watcherController.getStatus
  );
  router.post('/watcher/:queue/trigger',
    validateRequest(queueParamSchema, 'params'),
    validateRequest(triggerQueueSchema, 'body'),
    watcherController.trigger
  );

  // Library
  router.post('/library/refresh', (req, res, next) => libraryController.refresh(req, res, next));
  router.post('/library/import', (req, res, next) => libraryController.startImport(req, res, next));
  router.get('/stats',
    validateRequest(forceRefreshQuerySchema, 'query'),
    (req, res, next) => libraryController.getStats(req, res, next)
  );
  router.post('/stats/invalidate', (req, res) => libraryController.invalidateStats(req, res));
  router.get('/albums/recent',
    validateRequest(recentAlbumsQuerySchema, 'query'),
    (req, res, next) => libraryController.getRecent(req, res, next)
  );
  router.get('/albums',
    validateRequest(albumsQuerySchema, 'query'),
    (req, res, next) => libraryController.getAlbums(req, res, next)
  );

  // Inbox
  router.get('/inbox/stats',
    validateRequest(forceRefreshQuerySchema, 'query'),
    (req, res, next) => inboxController.getStats(req, res, next)
  );
  router.post('/inbox/stats/invalidate', (req, res) => inboxController.invalidateStats(req, res));
  router.get('/inbox/tree', (req, res, next) => inboxController.getTree(req, res, next));
  router.get('/inbox/folder',
    validateRequest(inboxFolderQuerySchema, 'query'),
    (req, res, next) => inboxController.getFolder(req, res, next)
  );

  // Cover art
  router.post('/cover',
    validateRequest(coverRequestSchema, 'body'),
    (req, res, next) => coverController.fetch(req, res, next)
  );

  // Lyrics
  logger.debug('[API Router] Registering lyrics routes');
  router.get('/lyrics/stats', lyricsController.getStats);
  router.post('/lyrics/scan', lyricsController.startScan);
  router.post('/lyrics/pause', validateRequest(lyricsPauseSchema, 'body'), lyricsController.pause);
  router.post('/lyrics/resume', lyricsController.resume);
  router.post('/lyrics/failed/clear',
    validateRequest(lyricsClearFailedSchema, 'body'),
    lyricsController.clearFailed
  );

  // Playlists
  router.post('/playlist/build',
    validateRequest(buildPlaylistSchema, 'body'),
    (req, res, next) => playlistController.build(req, res, next)
  );
  router.get('/playlist/list', (req, res, next) => playlistController.list(req, res, next));

  // Companion download service
  router.get('/downloads/search',
    validateRequest(downloadSearchQuerySchema, 'query'),
    (req, res, next) => downloadController.search(req, res, next)
  );
  router.get('/downloads', (req, res, next) => downloadController.list(req, res, next));
  router.post('/downloads',
    validateRequest(queueDownloadSchema, 'body'),
    (req, res, next) => downloadController.queue(req, res, next)
  );

  return router;
};

/**
 * Job Handlers Registry
 *
 * Central export point for all job handler classes and the single
 * function that wires them into the worker pool.
 */

import { OrchestratorContext } from '../orchestrator/OrchestratorContext.js';
import { WorkerPool } from '../orchestrator/WorkerPool.js';
import { TaggerClient } from '../tagger/TaggerClient.js';
import { AlbumCatalogService } from '../catalog/AlbumCatalogService.js';
import { CoverArtService } from '../cover/CoverArtService.js';
import { LibraryJobHandlers } from './LibraryJobHandlers.js';
import { LyricsJobHandlers } from './LyricsJobHandlers.js';
import { logger } from '../../middleware/logging.js';

export interface HandlerDependencies {
  context: OrchestratorContext;
  tagger: TaggerClient;
  catalog: AlbumCatalogService;
  covers: CoverArtService;
  hasLyrics: (filePath: string) => Promise<boolean>;
}

export interface RegisteredHandlers {
  library: LibraryJobHandlers;
  lyrics: LyricsJobHandlers;
}

/**
 * Register every queue handler with the pool. The returned instances
 * back the manual triggers of the HTTP API.
 */
export function registerAllJobHandlers(pool: WorkerPool, deps: HandlerDependencies): RegisteredHandlers {
  const library = new LibraryJobHandlers(deps.context, deps.tagger, deps.catalog, deps.covers);
  const lyrics = new LyricsJobHandlers(deps.context, deps.tagger, deps.hasLyrics);

  library.registerHandlers(pool);
  lyrics.registerHandlers(pool);

  logger.info('All job handlers registered successfully', {
    service: 'jobHandlers',
    operation: 'registerAllJobHandlers',
  });

  return { library, lyrics };
}

export { LibraryJobHandlers, LyricsJobHandlers };

/**
 * Pipeline assembly
 *
 * Builds every service around one orchestrator context. The App wires
 * the result into Express and the process lifecycle; tests build one
 * with fakes for the external command runner and the HTTP clients.
 */

import axios, { AxiosInstance } from 'axios';
import { AppConfig } from '../../config/types.js';
import { COVER } from '../../config/constants.js';
import { createOrchestratorContext, OrchestratorContext } from './OrchestratorContext.js';
import { WorkerPool } from './WorkerPool.js';
import { ExclusiveLease } from '../lease/ExclusiveLease.js';
import { CommandRunner, SpawnCommandRunner } from '../process/CommandRunner.js';
import { TaggerClient } from '../tagger/TaggerClient.js';
import { AlbumCatalogService } from '../catalog/AlbumCatalogService.js';
import { CoverArtService } from '../cover/CoverArtService.js';
import { EmbeddedPicture, hasEmbeddedLyrics, readDurationSeconds, readEmbeddedPicture } from '../media/audioTags.js';
import { InboxStatsService } from '../stats/InboxStatsService.js';
import { LibraryStatsService } from '../stats/LibraryStatsService.js';
import { LyricsScanService } from '../lyrics/LyricsScanService.js';
import { PlaylistService } from '../playlist/PlaylistService.js';
import { DownloadServiceClient } from '../downloads/DownloadServiceClient.js';
import { InboxCleanupScheduler } from '../schedulers/InboxCleanupScheduler.js';
import { FileWatcherService } from '../watchers/FileWatcherService.js';
import { registerAllJobHandlers, RegisteredHandlers } from '../jobHandlers/index.js';

export interface PipelineOverrides {
  runner?: CommandRunner;
  /** Client for the cover art archive */
  archiveHttp?: AxiosInstance;
  /** Client for the companion download service */
  downloadHttp?: AxiosInstance;
  importLease?: ExclusiveLease;
  hasLyrics?: (filePath: string) => Promise<boolean>;
  readEmbeddedPicture?: (filePath: string) => Promise<EmbeddedPicture | null>;
  readDuration?: (filePath: string) => Promise<number>;
}

export interface Pipeline {
  context: OrchestratorContext;
  workerPool: WorkerPool;
  watchers: FileWatcherService;
  handlers: RegisteredHandlers;
  catalog: AlbumCatalogService;
  inboxStats: InboxStatsService;
  lyricsScanner: LyricsScanService;
  playlists: PlaylistService;
  downloads: DownloadServiceClient;
  cleanup: InboxCleanupScheduler;
}

export function createPipeline(config: AppConfig, overrides: PipelineOverrides = {}): Pipeline {
  const runner = overrides.runner ?? new SpawnCommandRunner();
  const hasLyrics = overrides.hasLyrics ?? hasEmbeddedLyrics;

  const tagger = new TaggerClient(runner, config.tagger);
  const catalog = new AlbumCatalogService(runner, config);
  const inboxStats = new InboxStatsService(config.paths.inboxRoot, overrides.readDuration ?? readDurationSeconds);
  const libraryStats = new LibraryStatsService(tagger, catalog);

  const context = createOrchestratorContext(config, {
    computeInboxStats: () => inboxStats.compute(),
    computeLibraryStats: () => libraryStats.compute(),
    ...(overrides.importLease && { importLease: overrides.importLease }),
  });

  const covers = new CoverArtService({
    tagger,
    http: overrides.archiveHttp ?? axios.create(),
    readEmbeddedPicture: overrides.readEmbeddedPicture ?? readEmbeddedPicture,
    lookupTimeoutMs: COVER.LOOKUP_TIMEOUT_MS,
  });

  const workerPool = new WorkerPool(context);
  const handlers = registerAllJobHandlers(workerPool, { context, tagger, catalog, covers, hasLyrics });

  return {
    context,
    workerPool,
    watchers: new FileWatcherService(context, workerPool),
    handlers,
    catalog,
    inboxStats,
    lyricsScanner: new LyricsScanService(config.paths.libraryRoot, context.channels.lyrics, context.eventLog, hasLyrics),
    playlists: new PlaylistService(
      runner,
      config.playback,
      config.paths.playlistDir,
      config.paths.libraryRoot,
      context.eventLog
    ),
    downloads: new DownloadServiceClient(config.downloads, overrides.downloadHttp),
    cleanup: new InboxCleanupScheduler(config.paths.inboxRoot, config.cleanup, context.eventLog),
  };
}

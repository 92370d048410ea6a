/**
 * Orchestrator Context
 *
 * All mutable pipeline state in one object, built once at startup and
 * handed to watchers, workers, handlers and controllers. Tests build a
 * fresh one per case.
 */

import { AppConfig, QueueSettings } from '../../config/types.js';
import { createDebouncer } from '../jobQueue/Debouncer.js';
import { DedupGuard } from '../jobQueue/DedupGuard.js';
import { WorkChannel } from '../jobQueue/WorkChannel.js';
import { FifoWorkQueue, PriorityWorkQueue } from '../jobQueue/WorkQueues.js';
import { QueueName, WorkQueue } from '../jobQueue/types.js';
import { ExclusiveLease } from '../lease/ExclusiveLease.js';
import { InMemoryLease } from '../lease/InMemoryLease.js';
import { SocketLease } from '../lease/SocketLease.js';
import { LyricsRateLimiter } from '../lyrics/LyricsRateLimiter.js';
import { RetryLedger } from '../lyrics/RetryLedger.js';
import { ResultCache } from '../cache/ResultCache.js';
import { EventLog } from '../eventLog/EventLog.js';
import type { InboxStats } from '../stats/InboxStatsService.js';
import type { LibraryStats } from '../stats/LibraryStatsService.js';

export interface OrchestratorContext {
  readonly config: AppConfig;
  readonly channels: Readonly<Record<QueueName, WorkChannel>>;
  readonly importLease: ExclusiveLease;
  readonly lyricsLimiter: LyricsRateLimiter;
  readonly lyricsLedger: RetryLedger;
  readonly eventLog: EventLog;
  readonly inboxStatsCache: ResultCache<InboxStats>;
  readonly libraryStatsCache: ResultCache<LibraryStats>;
}

export interface ContextDependencies {
  computeInboxStats: () => Promise<InboxStats>;
  computeLibraryStats: () => Promise<LibraryStats>;
  /** Overrides the lease backend chosen by configuration */
  importLease?: ExclusiveLease;
}

function buildChannel(settings: QueueSettings, queue: WorkQueue): WorkChannel {
  return new WorkChannel(queue, new DedupGuard(), createDebouncer(settings.debouncePolicy, settings.debounceMs));
}

export function createImportLease(config: AppConfig): ExclusiveLease {
  return config.lease.backend === 'memory'
    ? new InMemoryLease(config.lease.key)
    : new SocketLease(config.lease.key, config.paths.leaseRecordFile);
}

export function createOrchestratorContext(
  config: AppConfig,
  deps: ContextDependencies
): OrchestratorContext {
  const { queues } = config;

  return {
    config,
    channels: {
      inbox: buildChannel(queues.inbox, new FifoWorkQueue('inbox')),
      library: buildChannel(queues.library, new FifoWorkQueue('library')),
      cover: buildChannel(queues.cover, new FifoWorkQueue('cover')),
      lyrics: buildChannel(queues.lyrics, new PriorityWorkQueue('lyrics')),
    },
    importLease: deps.importLease ?? createImportLease(config),
    lyricsLimiter: new LyricsRateLimiter({
      maxRequests: config.lyrics.rateLimit,
      windowMs: config.lyrics.windowMs,
      cooldownMs: config.lyrics.cooldownMs,
    }),
    lyricsLedger: new RetryLedger(config.lyrics.maxRetries),
    eventLog: new EventLog(config.eventLogCapacity),
    inboxStatsCache: new ResultCache('inbox-stats', deps.computeInboxStats, config.cache.inboxStatsTtlMs),
    libraryStatsCache: new ResultCache('library-stats', deps.computeLibraryStats, config.cache.libraryStatsTtlMs),
  };
}

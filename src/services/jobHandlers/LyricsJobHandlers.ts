import * as path from 'path';
import * as fs from 'fs-extra';
import { OrchestratorContext } from '../orchestrator/OrchestratorContext.js';
import { WorkerPool } from '../orchestrator/WorkerPool.js';
import { WorkItem } from '../jobQueue/types.js';
import { TaggerClient } from '../tagger/TaggerClient.js';
import { classifyLyricsOutput, LyricsOutcome } from '../lyrics/lyricsOutputClassifier.js';
import { logger } from '../../middleware/logging.js';

export type LyricsJobResult = LyricsOutcome | 'missing' | 'has-lyrics' | 'exhausted' | 'stopped';

/**
 * LyricsJobHandlers
 *
 * Fetches lyrics for one track per job. Every provider call goes through
 * the shared rate limiter; a quota response puts the limiter into
 * cooldown and sends the track back to the queue one priority lower,
 * until the retry ledger gives up on it.
 */
export class LyricsJobHandlers {
  constructor(
    private readonly context: OrchestratorContext,
    private readonly tagger: TaggerClient,
    private readonly hasLyrics: (filePath: string) => Promise<boolean>
  ) {}

  registerHandlers(pool: WorkerPool): void {
    pool.register('lyrics', async (item, signal) => {
      await this.handleFetch(item, signal);
    });
  }

  async handleFetch(item: WorkItem, signal?: AbortSignal): Promise<LyricsJobResult> {
    const { lyricsLimiter, lyricsLedger, eventLog, config } = this.context;
    const track = item.target;
    const name = path.basename(track);

    if (!(await fs.pathExists(track))) {
      return 'missing';
    }
    if (await this.hasLyrics(track)) {
      return 'has-lyrics';
    }
    if (lyricsLedger.isExhausted(track)) {
      logger.debug('[LyricsJobHandlers] Retry ceiling reached, skipping', {
        service: 'LyricsJobHandlers',
        handler: 'handleFetch',
        track,
      });
      return 'exhausted';
    }

    if (!(await lyricsLimiter.waitForSlot(signal))) {
      // Shutdown while waiting; the guard was already released, so a
      // later run can queue the track again.
      return 'stopped';
    }

    const result = await this.tagger.fetchLyrics(track, config.queues.lyrics.actionTimeoutMs);
    const outcome = classifyLyricsOutput(result);

    switch (outcome) {
      case 'quota-exceeded': {
        lyricsLimiter.triggerCooldown();
        const failures = lyricsLedger.recordFailure(track);
        eventLog.append('warning', `Lyrics provider rate limit hit, cooling down (${name})`);
        logger.warn('[LyricsJobHandlers] Provider quota exceeded', {
          service: 'LyricsJobHandlers',
          handler: 'handleFetch',
          track,
          failures,
        });
        if (!lyricsLedger.isExhausted(track)) {
          this.context.channels.lyrics.submit(track, {
            priority: (item.priority ?? 0) + 1,
            attempt: item.attempt + 1,
          });
        }
        break;
      }
      case 'found':
        lyricsLedger.recordSuccess(track);
        eventLog.append('success', `Lyrics fetched: ${name}`);
        break;
      case 'not-found':
        logger.debug('[LyricsJobHandlers] No lyrics available', {
          service: 'LyricsJobHandlers',
          handler: 'handleFetch',
          track,
        });
        break;
      case 'failed':
        lyricsLedger.recordFailure(track);
        logger.warn('[LyricsJobHandlers] Lyrics fetch failed', {
          service: 'LyricsJobHandlers',
          handler: 'handleFetch',
          track,
          exitCode: result.exitCode,
          timedOut: result.timedOut,
        });
        break;
    }

    return outcome;
  }
}

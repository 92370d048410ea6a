import * as path from 'path';
import { WorkChannel } from '../jobQueue/WorkChannel.js';
import { JobHandler, WorkItem, WorkerState } from '../jobQueue/types.js';
import { EventLog } from '../eventLog/EventLog.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

export interface WorkerStatus {
  state: WorkerState;
  queueDepth: number;
  pending: number;
  current: string | null;
  processed: number;
  failed: number;
  debouncePolicy: string;
  debounceMs: number;
}

/**
 * Long-lived consumer of one queue.
 *
 * The stop signal is observed between items and while waiting (pop and
 * debounce). A running handler is never interrupted: stop() resolves
 * once it has returned.
 */
export class QueueWorker {
  private state: WorkerState = 'idle';
  private current: WorkItem | null = null;
  private processed = 0;
  private failed = 0;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly channel: WorkChannel,
    private readonly handler: JobHandler,
    private readonly eventLog: EventLog,
    private readonly popTimeoutMs: number
  ) {}

  start(signal: AbortSignal): void {
    if (this.loop || this.state === 'disabled') {
      return;
    }
    this.loop = this.run(signal);
  }

  disable(): void {
    this.state = 'disabled';
  }

  isDisabled(): boolean {
    return this.state === 'disabled';
  }

  /**
   * Resolves when the loop has exited (immediately if it never started)
   */
  async stopped(): Promise<void> {
    await this.loop;
  }

  status(): WorkerStatus {
    return {
      state: this.state,
      queueDepth: this.channel.queue.size(),
      pending: this.channel.pendingCount(),
      current: this.current?.target ?? null,
      processed: this.processed,
      failed: this.failed,
      debouncePolicy: this.channel.debouncer.policy,
      debounceMs: this.channel.debouncer.windowMs,
    };
  }

  private async run(signal: AbortSignal): Promise<void> {
    const name = this.channel.name;
    logger.info(`[QueueWorker] ${name} worker started`, { service: 'QueueWorker', queue: name });
    this.eventLog.append('info', `${name} worker started`);

    while (!signal.aborted) {
      const item = await this.channel.queue.pop(this.popTimeoutMs, signal);
      if (!item) {
        continue;
      }

      this.current = item;
      this.state = 'waiting';
      const settled = await this.channel.debouncer.settle(item.target, signal);
      // From here on a new notification creates a fresh follow-up item
      this.channel.guard.release(item.target);

      if (!settled) {
        logger.info(`[QueueWorker] ${name} item abandoned on shutdown`, {
          service: 'QueueWorker',
          queue: name,
          target: item.target,
        });
        this.current = null;
        break;
      }

      this.state = 'running';
      await this.execute(item, signal);
      this.current = null;
      this.state = 'idle';
    }

    this.state = 'stopped';
    logger.info(`[QueueWorker] ${name} worker stopped`, { service: 'QueueWorker', queue: name });
  }

  private async execute(item: WorkItem, signal: AbortSignal): Promise<void> {
    const name = this.channel.name;
    const startTime = Date.now();
    try {
      await this.handler(item, signal);
      this.processed++;
    } catch (error) {
      this.failed++;
      logger.error(`[QueueWorker] ${name} job failed`, {
        service: 'QueueWorker',
        operation: 'execute',
        queue: name,
        target: item.target,
        attempt: item.attempt,
        durationMs: Date.now() - startTime,
        error: getErrorMessage(error),
      });
      this.eventLog.append(
        'error',
        `${name} job failed for ${path.basename(item.target)}: ${getErrorMessage(error).slice(0, 200)}`
      );
    }
  }
}

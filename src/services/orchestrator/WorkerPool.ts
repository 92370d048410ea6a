import { OrchestratorContext } from './OrchestratorContext.js';
import { QueueWorker, WorkerStatus } from './QueueWorker.js';
import { JobHandler, QueueName } from '../jobQueue/types.js';
import { ServiceUnavailableError } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';

/**
 * One worker per queue, sharing a single stop signal.
 */
export class WorkerPool {
  private readonly workers = new Map<QueueName, QueueWorker>();
  private readonly controller = new AbortController();

  constructor(private readonly context: OrchestratorContext) {}

  register(name: QueueName, handler: JobHandler): void {
    this.workers.set(
      name,
      new QueueWorker(
        this.context.channels[name],
        handler,
        this.context.eventLog,
        this.context.config.queues.popTimeoutMs
      )
    );
  }

  /**
   * Mark a worker as disabled; it will not start and manual triggers
   * for its queue are refused
   */
  disable(name: QueueName, reason: string): void {
    this.workers.get(name)?.disable();
    logger.warn(`[WorkerPool] ${name} worker disabled`, {
      service: 'WorkerPool',
      operation: 'disable',
      queue: name,
      reason,
    });
    this.context.eventLog.append('warning', `${name} worker disabled: ${reason}`);
  }

  isAvailable(name: QueueName): boolean {
    const worker = this.workers.get(name);
    return worker !== undefined && !worker.isDisabled();
  }

  /**
   * Throws ServiceUnavailableError when the queue has no running worker
   */
  assertAvailable(name: QueueName): void {
    if (!this.isAvailable(name)) {
      throw new ServiceUnavailableError(`${name}-worker`, `The ${name} worker is not running`);
    }
  }

  start(): void {
    for (const worker of this.workers.values()) {
      worker.start(this.controller.signal);
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Signal every worker to stop and wait for in-flight jobs to finish
   */
  async stop(): Promise<void> {
    this.controller.abort();
    await Promise.all([...this.workers.values()].map(worker => worker.stopped()));
    logger.info('[WorkerPool] All workers stopped', { service: 'WorkerPool', operation: 'stop' });
  }

  status(): Partial<Record<QueueName, WorkerStatus>> {
    const result: Partial<Record<QueueName, WorkerStatus>> = {};
    for (const [name, worker] of this.workers) {
      result[name] = worker.status();
    }
    return result;
  }
}

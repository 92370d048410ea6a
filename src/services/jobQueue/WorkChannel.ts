import { Debouncer } from './Debouncer.js';
import { DedupGuard } from './DedupGuard.js';
import { QueueName, WorkItem, WorkQueue } from './types.js';

export interface SubmitOptions {
  priority?: number;
  attempt?: number;
}

/**
 * Entry point of one domain: debouncer, dedup guard and queue wired in
 * that order. Watchers, API triggers and chained jobs all submit here.
 */
export class WorkChannel {
  constructor(
    public readonly queue: WorkQueue,
    public readonly guard: DedupGuard,
    public readonly debouncer: Debouncer
  ) {}

  get name(): QueueName {
    return this.queue.name;
  }

  /**
   * Record a notification for `target` and enqueue it unless an item for
   * it is already pending. Returns whether a new item was enqueued.
   */
  submit(target: string, options: SubmitOptions = {}): boolean {
    this.debouncer.touch(target);

    if (!this.guard.tryMark(target)) {
      return false;
    }

    const item: WorkItem = {
      target,
      enqueuedAt: Date.now(),
      attempt: options.attempt ?? 0,
      ...(options.priority !== undefined && { priority: options.priority }),
    };
    this.queue.push(item);
    return true;
  }

  pendingCount(): number {
    return this.guard.size();
  }
}

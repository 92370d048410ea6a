import { QueueName, WorkItem, WorkQueue, compareWorkItems } from './types.js';

type Waiter = (item: WorkItem | null) => void;

/**
 * Shared waiting logic. Subclasses decide where an item is stored and
 * which item leaves first.
 */
abstract class BlockingWorkQueue implements WorkQueue {
  private waiters: Waiter[] = [];

  constructor(public readonly name: QueueName) {}

  protected abstract insert(item: WorkItem): void;
  protected abstract take(): WorkItem | undefined;
  abstract size(): number;
  abstract snapshot(): WorkItem[];

  push(item: WorkItem): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      // Queue is necessarily empty while someone waits
      waiter(item);
      return;
    }
    this.insert(item);
  }

  pop(timeoutMs: number, signal?: AbortSignal): Promise<WorkItem | null> {
    const next = this.take();
    if (next) {
      return Promise.resolve(next);
    }
    if (signal?.aborted || timeoutMs <= 0) {
      return Promise.resolve(null);
    }

    return new Promise(resolve => {
      const settle: Waiter = item => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(item);
      };
      const withdraw = (): void => {
        this.waiters = this.waiters.filter(waiter => waiter !== settle);
        settle(null);
      };
      const onAbort = (): void => withdraw();
      const timer = setTimeout(withdraw, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(settle);
    });
  }
}

/**
 * Strict arrival order
 */
export class FifoWorkQueue extends BlockingWorkQueue {
  private items: WorkItem[] = [];

  protected insert(item: WorkItem): void {
    this.items.push(item);
  }

  protected take(): WorkItem | undefined {
    return this.items.shift();
  }

  size(): number {
    return this.items.length;
  }

  snapshot(): WorkItem[] {
    return [...this.items];
  }
}

/**
 * Ordered by `compareWorkItems`; items that compare equal keep arrival order.
 */
export class PriorityWorkQueue extends BlockingWorkQueue {
  private items: WorkItem[] = [];

  protected insert(item: WorkItem): void {
    // Insert after every item that does not sort later (stable)
    let low = 0;
    let high = this.items.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const current = this.items[mid];
      if (current !== undefined && compareWorkItems(current, item) <= 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    this.items.splice(low, 0, item);
  }

  protected take(): WorkItem | undefined {
    return this.items.shift();
  }

  size(): number {
    return this.items.length;
  }

  snapshot(): WorkItem[] {
    return [...this.items];
  }
}

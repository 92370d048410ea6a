/**
 * Work Queue Type Definitions
 *
 * Every pipeline domain owns one queue and one worker:
 * inbox → import, library → catalog regeneration, cover → cover fetch,
 * lyrics → lyrics fetch.
 */

export const QUEUE_NAMES = ['inbox', 'library', 'cover', 'lyrics'] as const;

export type QueueName = (typeof QUEUE_NAMES)[number];

export function isQueueName(value: string): value is QueueName {
  return QUEUE_NAMES.some(name => name === value);
}

/**
 * A unit of pending work. Identity is the target: an absolute path,
 * or a well-known key such as `library`.
 */
export interface WorkItem {
  target: string;
  /** epoch ms */
  enqueuedAt: number;
  /** Only meaningful on the lyrics queue; lower dequeues first */
  priority?: number;
  /** Number of earlier failed attempts */
  attempt: number;
}

/**
 * Total order for priority queues: priority ascending, then arrival.
 * Items without a priority sort as priority 0.
 */
export function compareWorkItems(a: WorkItem, b: WorkItem): number {
  const byPriority = (a.priority ?? 0) - (b.priority ?? 0);
  if (byPriority !== 0) {
    return byPriority;
  }
  return a.enqueuedAt - b.enqueuedAt;
}

export interface WorkQueue {
  readonly name: QueueName;

  push(item: WorkItem): void;

  /**
   * Take the next item, waiting up to `timeoutMs` for one to arrive.
   * Resolves null on timeout or when `signal` aborts.
   */
  pop(timeoutMs: number, signal?: AbortSignal): Promise<WorkItem | null>;

  size(): number;

  /** Pending items in dequeue order */
  snapshot(): WorkItem[];
}

/**
 * Domain action bound to a queue. Receives the item after the debounce
 * wait and guard release. Errors are caught and logged by the worker.
 */
export interface JobHandler {
  (item: WorkItem, signal: AbortSignal): Promise<void>;
}

export type WorkerState = 'idle' | 'waiting' | 'running' | 'stopped' | 'disabled';

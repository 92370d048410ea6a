import { DebouncePolicy } from '../../config/types.js';
import { sleep } from '../../utils/sleep.js';

/**
 * Coalesces bursts of notifications for one target.
 *
 * `touch()` runs on every notification; `settle()` runs in the worker
 * after dequeue and resolves once the target may be acted on. It
 * resolves false when the stop signal fires during the wait.
 */
export interface Debouncer {
  readonly policy: DebouncePolicy;
  readonly windowMs: number;
  touch(target: string): void;
  settle(target: string, signal?: AbortSignal): Promise<boolean>;
  lastSeen(target: string): number | undefined;
}

abstract class BaseDebouncer implements Debouncer {
  abstract readonly policy: DebouncePolicy;
  protected readonly seen = new Map<string, number>();

  constructor(public readonly windowMs: number) {}

  touch(target: string): void {
    this.seen.set(target, Date.now());
  }

  lastSeen(target: string): number | undefined {
    return this.seen.get(target);
  }

  abstract settle(target: string, signal?: AbortSignal): Promise<boolean>;
}

/**
 * Sleeps one full window after dequeue. Later notifications are absorbed
 * by the dedup guard and do not extend the wait.
 */
export class FixedDelayDebouncer extends BaseDebouncer {
  readonly policy = 'fixed-delay' as const;

  async settle(target: string, signal?: AbortSignal): Promise<boolean> {
    const completed = await sleep(this.windowMs, signal);
    if (completed) {
      this.seen.delete(target);
    }
    return completed;
  }
}

/**
 * Waits until no notification for the target has arrived for a full
 * window. Every notification pushes the deadline back.
 */
export class SettlingDebouncer extends BaseDebouncer {
  readonly policy = 'settling-timer' as const;

  async settle(target: string, signal?: AbortSignal): Promise<boolean> {
    for (;;) {
      const last = this.seen.get(target) ?? 0;
      const remaining = last + this.windowMs - Date.now();
      if (remaining <= 0) {
        this.seen.delete(target);
        return true;
      }
      if (!(await sleep(remaining, signal))) {
        return false;
      }
    }
  }
}

export function createDebouncer(policy: DebouncePolicy, windowMs: number): Debouncer {
  return policy === 'settling-timer'
    ? new SettlingDebouncer(windowMs)
    : new FixedDelayDebouncer(windowMs);
}

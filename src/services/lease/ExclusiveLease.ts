import { sleep } from '../../utils/sleep.js';

/**
 * Named exclusive lease held across processes.
 *
 * At most one holder per key exists at any time. If the holding process
 * dies, the lease is released by the underlying mechanism without any
 * cleanup code running.
 */
export interface ExclusiveLease {
  readonly key: string;

  /**
   * Try to take the lease. With `timeoutMs` 0 this answers immediately;
   * otherwise it polls until the lease is obtained or the time is up.
   */
  tryAcquire(timeoutMs: number): Promise<boolean>;

  /** Idempotent */
  release(): Promise<void>;

  isHeld(): boolean;
}

export const LEASE_POLL_INTERVAL_MS = 500;

/**
 * Polling loop shared by the lease backends
 */
export abstract class PollingLease implements ExclusiveLease {
  protected held = false;

  constructor(public readonly key: string) {}

  protected abstract attempt(): Promise<boolean>;
  protected abstract relinquish(): Promise<void>;

  async tryAcquire(timeoutMs: number): Promise<boolean> {
    if (this.held) {
      return false;
    }

    const deadline = Date.now() + Math.max(0, timeoutMs);
    for (;;) {
      if (await this.attempt()) {
        this.held = true;
        return true;
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return false;
      }
      await sleep(Math.min(LEASE_POLL_INTERVAL_MS, remaining));
    }
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    this.held = false;
    await this.relinquish();
  }

  isHeld(): boolean {
    return this.held;
  }
}

import { PollingLease } from './ExclusiveLease.js';

/**
 * Single-process lease. Instances sharing a key exclude each other; a
 * crash takes the whole registry with it, which is the release-on-death
 * guarantee for a single-process deployment.
 */
export class InMemoryLease extends PollingLease {
  private static readonly holders = new Set<string>();

  protected attempt(): Promise<boolean> {
    if (InMemoryLease.holders.has(this.key)) {
      return Promise.resolve(false);
    }
    InMemoryLease.holders.add(this.key);
    return Promise.resolve(true);
  }

  protected relinquish(): Promise<void> {
    InMemoryLease.holders.delete(this.key);
    return Promise.resolve();
  }
}

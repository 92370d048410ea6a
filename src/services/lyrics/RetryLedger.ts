/**
 * Per-target failure counts for the lyrics domain. A target that has
 * failed `maxRetries` times is skipped until cleared through the API.
 */
export class RetryLedger {
  private readonly failures = new Map<string, number>();

  constructor(public readonly maxRetries: number) {}

  /**
   * Returns the new failure count
   */
  recordFailure(target: string): number {
    const count = (this.failures.get(target) ?? 0) + 1;
    this.failures.set(target, count);
    return count;
  }

  recordSuccess(target: string): void {
    this.failures.delete(target);
  }

  failureCount(target: string): number {
    return this.failures.get(target) ?? 0;
  }

  isExhausted(target: string): boolean {
    return this.failureCount(target) >= this.maxRetries;
  }

  /**
   * Clear one target, or every target when none is given.
   * Returns the number of entries removed.
   */
  clear(target?: string): number {
    if (target === undefined) {
      const removed = this.failures.size;
      this.failures.clear();
      return removed;
    }
    return this.failures.delete(target) ? 1 : 0;
  }

  trackedCount(): number {
    return this.failures.size;
  }

  exhaustedTargets(): string[] {
    return [...this.failures.entries()]
      .filter(([, count]) => count >= this.maxRetries)
      .map(([target]) => target);
  }
}

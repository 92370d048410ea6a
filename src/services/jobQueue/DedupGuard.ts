/**
 * Set of targets with a pending (not yet dequeued) work item.
 */
export class DedupGuard {
  private readonly pending = new Set<string>();

  /**
   * Mark `target` as pending. Returns false when it already was.
   */
  tryMark(target: string): boolean {
    if (this.pending.has(target)) {
      return false;
    }
    this.pending.add(target);
    return true;
  }

  release(target: string): void {
    this.pending.delete(target);
  }

  has(target: string): boolean {
    return this.pending.has(target);
  }

  size(): number {
    return this.pending.size;
  }

  clear(): void {
    this.pending.clear();
  }
}

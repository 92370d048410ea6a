/**
 * Lyrics Rate Limiter
 *
 * Sliding-window admission control plus a cooldown that the worker sets
 * when the lyrics backend reports an exhausted quota. Callers that are
 * not admitted wait; nothing is dropped here.
 */

import { sleep } from '../../utils/sleep.js';

export interface LyricsRateLimiterConfig {
  /** Requests admitted per window */
  maxRequests: number;
  windowMs: number;
  /** Cooldown applied by `triggerCooldown()` without an explicit duration */
  cooldownMs: number;
}

export interface LyricsRateLimiterStats {
  requestsInWindow: number;
  remainingRequests: number;
  maxRequests: number;
  windowMs: number;
  /** ISO timestamp, null when no cooldown is active */
  cooldownUntil: string | null;
}

export class LyricsRateLimiter {
  private requests: number[] = []; // Timestamps of admitted requests
  private cooldownUntil: number | null = null;

  constructor(private readonly config: LyricsRateLimiterConfig) {}

  /**
   * Whether a request would be admitted right now
   */
  canProceed(): boolean {
    return this.msUntilSlot() === 0;
  }

  /**
   * Admit and record one request if possible
   */
  tryAcquire(): boolean {
    if (!this.canProceed()) {
      return false;
    }
    this.requests.push(Date.now());
    return true;
  }

  /**
   * Wait until a request is admitted, then record it.
   * Resolves false if `signal` aborts first.
   */
  async waitForSlot(signal?: AbortSignal): Promise<boolean> {
    while (!this.tryAcquire()) {
      if (!(await sleep(Math.max(this.msUntilSlot(), 1), signal))) {
        return false;
      }
    }
    return true;
  }

  triggerCooldown(durationMs: number = this.config.cooldownMs): void {
    this.cooldownUntil = Date.now() + durationMs;
  }

  clearCooldown(): void {
    this.cooldownUntil = null;
  }

  isCoolingDown(): boolean {
    return this.cooldownRemainingMs() > 0;
  }

  getRequestCount(): number {
    this.cleanOldRequests();
    return this.requests.length;
  }

  getStats(): LyricsRateLimiterStats {
    const requestsInWindow = this.getRequestCount();
    return {
      requestsInWindow,
      remainingRequests: Math.max(0, this.config.maxRequests - requestsInWindow),
      maxRequests: this.config.maxRequests,
      windowMs: this.config.windowMs,
      cooldownUntil: this.isCoolingDown() && this.cooldownUntil !== null
        ? new Date(this.cooldownUntil).toISOString()
        : null,
    };
  }

  /**
   * Reset the rate limiter (for testing)
   */
  reset(): void {
    this.requests = [];
    this.cooldownUntil = null;
  }

  private cooldownRemainingMs(): number {
    if (this.cooldownUntil === null) {
      return 0;
    }
    const remaining = this.cooldownUntil - Date.now();
    if (remaining <= 0) {
      this.cooldownUntil = null;
      return 0;
    }
    return remaining;
  }

  /**
   * 0 when a request can be admitted now
   */
  private msUntilSlot(): number {
    const cooldown = this.cooldownRemainingMs();
    if (cooldown > 0) {
      return cooldown;
    }

    this.cleanOldRequests();
    const oldest = this.requests[0];
    if (this.requests.length < this.config.maxRequests || oldest === undefined) {
      return 0;
    }
    // Oldest request leaves the window once it is windowMs old
    return Math.max(oldest + this.config.windowMs - Date.now(), 1);
  }

  /**
   * Remove requests outside the current window
   */
  private cleanOldRequests(): void {
    const cutoff = Date.now() - this.config.windowMs;
    this.requests = this.requests.filter(timestamp => timestamp > cutoff);
  }
}

import { logger } from '../../middleware/logging.js';

interface CacheEntry<T> {
  payload: T;
  computedAt: number;
}

export interface CacheInfo {
  name: string;
  cached: boolean;
  ageMs: number | null;
  ttlMs: number;
  computing: boolean;
}

/**
 * TTL memoization of one expensive aggregate read.
 *
 * Concurrent misses share a single computation. An `invalidate()` that
 * lands while a computation is running discards that computation's
 * result, so the next read always recomputes.
 */
export class ResultCache<T> {
  private entry: CacheEntry<T> | undefined;
  private inflight: Promise<T> | undefined;
  private generation = 0;

  constructor(
    public readonly name: string,
    private readonly compute: () => Promise<T>,
    private readonly ttlMs: number
  ) {}

  get(forceRefresh = false): Promise<T> {
    const entry = this.entry;
    if (!forceRefresh && entry && Date.now() - entry.computedAt < this.ttlMs) {
      return Promise.resolve(entry.payload);
    }

    if (this.inflight) {
      return this.inflight;
    }

    const run: Promise<T> = this.recompute(this.generation).finally(() => {
      if (this.inflight === run) {
        this.inflight = undefined;
      }
    });
    this.inflight = run;
    return run;
  }

  invalidate(): void {
    this.generation++;
    this.inflight = undefined;
    if (this.entry) {
      this.entry = undefined;
      logger.debug('[ResultCache] Invalidated', {
        service: 'ResultCache',
        operation: 'invalidate',
        cache: this.name,
      });
    }
  }

  info(): CacheInfo {
    return {
      name: this.name,
      cached: this.entry !== undefined,
      ageMs: this.entry ? Date.now() - this.entry.computedAt : null,
      ttlMs: this.ttlMs,
      computing: this.inflight !== undefined,
    };
  }

  private async recompute(generation: number): Promise<T> {
    const startTime = Date.now();
    const payload = await this.compute();

    if (generation === this.generation) {
      this.entry = { payload, computedAt: Date.now() };
    }

    logger.debug('[ResultCache] Recomputed', {
      service: 'ResultCache',
      operation: 'recompute',
      cache: this.name,
      durationMs: Date.now() - startTime,
      stored: generation === this.generation,
    });

    return payload;
  }
}

/**
 * ResultCache tests
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { ResultCache } from '../../src/services/cache/ResultCache.js';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(res => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('ResultCache', () => {
  let computeCount: number;
  let compute: jest.Mock<() => Promise<string>>;

  beforeEach(() => {
    jest.useFakeTimers({ now: 0 });
    computeCount = 0;
    compute = jest.fn(async () => `P${++computeCount}`);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('serves the cached payload until the TTL expires', async () => {
    const cache = new ResultCache('library-stats', compute, 60000);

    await expect(cache.get()).resolves.toBe('P1');

    jest.setSystemTime(30000);
    await expect(cache.get()).resolves.toBe('P1');
    expect(compute).toHaveBeenCalledTimes(1);

    jest.setSystemTime(61000);
    await expect(cache.get()).resolves.toBe('P2');
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it('recomputes on a forced refresh before expiry', async () => {
    const cache = new ResultCache('library-stats', compute, 60000);
    await cache.get();

    jest.setSystemTime(10000);
    await expect(cache.get(true)).resolves.toBe('P2');
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it('recomputes after invalidate', async () => {
    const cache = new ResultCache('inbox-stats', compute, 60000);
    await cache.get();

    cache.invalidate();

    expect(cache.info().cached).toBe(false);
    await expect(cache.get()).resolves.toBe('P2');
  });

  it('shares one computation between concurrent readers', async () => {
    const pending = deferred<string>();
    const slow = jest.fn(() => pending.promise);
    const cache = new ResultCache('library-stats', slow, 60000);

    const first = cache.get();
    const second = cache.get(true);
    expect(cache.info().computing).toBe(true);

    pending.resolve('shared');

    await expect(first).resolves.toBe('shared');
    await expect(second).resolves.toBe('shared');
    expect(slow).toHaveBeenCalledTimes(1);
    expect(cache.info().computing).toBe(false);
  });

  it('does not store a result computed before an invalidate', async () => {
    const pending = deferred<string>();
    const results = [pending.promise, Promise.resolve('fresh')];
    const cache = new ResultCache('inbox-stats', () => results.shift() ?? Promise.resolve('extra'), 60000);

    const stale = cache.get();
    cache.invalidate();
    pending.resolve('stale');

    await expect(stale).resolves.toBe('stale');
    expect(cache.info().cached).toBe(false);
    await expect(cache.get()).resolves.toBe('fresh');
    expect(cache.info()).toEqual({
      name: 'inbox-stats',
      cached: true,
      ageMs: 0,
      ttlMs: 60000,
      computing: false,
    });
  });

  it('propagates a failed computation and keeps nothing', async () => {
    const cache = new ResultCache<string>('library-stats', () => Promise.reject(new Error('tagger down')), 60000);

    await expect(cache.get()).rejects.toThrow('tagger down');
    expect(cache.info()).toMatchObject({ cached: false, computing: false });
  });
});

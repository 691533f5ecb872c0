import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InMemoryCache, PRUNE_EVERY_WRITES, createCache } from '../cache-layer.js';

describe('InMemoryCache', () => {
  let cache: InMemoryCache;

  beforeEach(() => {
    vi.useFakeTimers();
    cache = new InMemoryCache();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns what was stored', async () => {
    await cache.set('search:abc', { totalFound: 2 }, 60);

    await expect(cache.get('search:abc')).resolves.toEqual({ totalFound: 2 });
  });

  it('returns undefined for a missing key', async () => {
    await expect(cache.get('nope')).resolves.toBeUndefined();
  });

  it('expires entries lazily once the TTL has passed', async () => {
    await cache.set('k', 'v', 10);

    vi.advanceTimersByTime(9_999);
    await expect(cache.get('k')).resolves.toBe('v');

    vi.advanceTimersByTime(1);
    await expect(cache.get('k')).resolves.toBeUndefined();
    expect((await cache.getStats()).entries).toBe(0);
  });

  it('restarts the TTL when a key is overwritten', async () => {
    await cache.set('k', 'old', 10);
    vi.advanceTimersByTime(8_000);
    await cache.set('k', 'new', 10);
    vi.advanceTimersByTime(8_000);

    await expect(cache.get('k')).resolves.toBe('new');
  });

  it('deletes and clears', async () => {
    await cache.set('a', 1, 60);
    await cache.set('b', 2, 60);

    await expect(cache.delete('a')).resolves.toBe(true);
    await expect(cache.delete('a')).resolves.toBe(false);
    await cache.clear();
    await expect(cache.get('b')).resolves.toBeUndefined();
  });

  it('counts hits and misses', async () => {
    await cache.set('a', 1, 60);
    await cache.get('a');
    await cache.get('a');
    await cache.get('b');

    await expect(cache.getStats()).resolves.toEqual({ entries: 1, hits: 2, misses: 1 });
  });

  it('prunes expired entries', async () => {
    await cache.set('short', 1, 1);
    await cache.set('long', 2, 60);
    vi.advanceTimersByTime(2_000);

    expect(cache.prune()).toBe(1);
    expect((await cache.getStats()).entries).toBe(1);
  });

  it('sweeps expired entries that are never read again during later writes', async () => {
    for (let i = 0; i < 1000; i++) {
      await cache.set(`search:${i}`, i, 1);
    }
    vi.advanceTimersByTime(10_000);

    for (let i = 0; i < PRUNE_EVERY_WRITES; i++) {
      await cache.set(`article:${i}`, i, 60);
    }

    expect((await cache.getStats()).entries).toBe(PRUNE_EVERY_WRITES);
    await expect(cache.get('article:0')).resolves.toBe(0);
  });
});

describe('createCache', () => {
  it('uses the in-memory backend without a Redis URL', () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);

    expect(createCache(undefined)).toBeInstanceOf(InMemoryCache);
  });
});

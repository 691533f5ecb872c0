import { beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { CacheAside } from '../cache-aside.js';
import { InMemoryCache, type ICache } from '../cache-layer.js';
import { createLogger } from '../logger.js';

const CountSchema = z.object({ count: z.number() });

class BrokenCache implements ICache {
  async get(): Promise<unknown> {
    throw new Error('connection lost');
  }
  async set(): Promise<void> {
    throw new Error('connection lost');
  }
  async delete(): Promise<boolean> {
    return false;
  }
  async clear(): Promise<void> {}
  async getStats(): Promise<Record<string, number>> {
    return {};
  }
  async close(): Promise<void> {}
}

describe('CacheAside', () => {
  const log = createLogger('CacheAsideTest');

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('loads once and then serves from the cache', async () => {
    const aside = new CacheAside(new InMemoryCache(), log);
    const load = vi.fn(async () => ({ count: 1 }));

    await aside.getOrLoad('k', CountSchema, 60, load);
    const second = await aside.getOrLoad('k', CountSchema, 60, load);

    expect(load).toHaveBeenCalledTimes(1);
    expect(second).toEqual({ count: 1 });
  });

  it('treats a value of the wrong shape as a miss', async () => {
    const cache = new InMemoryCache();
    await cache.set('k', { count: 'one' }, 60);
    const aside = new CacheAside(cache, log);

    await expect(aside.lookup('k', CountSchema)).resolves.toBeUndefined();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('falls through to the loader when the backend fails', async () => {
    const aside = new CacheAside(new BrokenCache(), log);
    const load = vi.fn(async () => ({ count: 2 }));

    await expect(aside.getOrLoad('k', CountSchema, 60, load)).resolves.toEqual({ count: 2 });
    expect(load).toHaveBeenCalledTimes(1);
    // one warning for the failed read, one for the failed write
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('does not store when the loader throws', async () => {
    const cache = new InMemoryCache();
    const aside = new CacheAside(cache, log);

    await expect(
      aside.getOrLoad('k', CountSchema, 60, async () => {
        throw new Error('upstream down');
      })
    ).rejects.toThrow('upstream down');
    await expect(cache.get('k')).resolves.toBeUndefined();
  });
});

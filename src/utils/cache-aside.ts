import type { z } from 'zod';
import type { ICache } from './cache-layer.js';
import { describeError } from './errors.js';
import type { Logger } from './logger.js';

/**
 * Typed read/write helpers over the shared cache. A backend failure degrades
 * to a miss (on read) or a skipped write, with a warning; it never fails the
 * request.
 */
export class CacheAside {
  constructor(
    private readonly cache: ICache,
    private readonly log: Logger
  ) {}

  async lookup<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | undefined> {
    let cached: unknown;
    try {
      cached = await this.cache.get(key);
    } catch (error) {
      this.log.warn('cache read failed, treating as miss', { key, error: describeError(error) });
      return undefined;
    }
    if (cached === undefined) {
      return undefined;
    }

    const parsed = schema.safeParse(cached);
    if (!parsed.success) {
      this.log.warn('cached value has unexpected shape, treating as miss', { key });
      return undefined;
    }
    this.log.debug('cache hit', { key });
    return parsed.data;
  }

  async store(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    try {
      await this.cache.set(key, value, ttlSeconds);
    } catch (error) {
      this.log.warn('cache write failed', { key, error: describeError(error) });
    }
  }

  /**
   * Return the cached value for `key`, or run `load`, store its result for
   * `ttlSeconds`, and return it.
   */
  async getOrLoad<T>(
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    ttlSeconds: number,
    load: () => Promise<T>
  ): Promise<T> {
    const cached = await this.lookup(key, schema);
    if (cached !== undefined) {
      return cached;
    }
    const value = await load();
    await this.store(key, value, ttlSeconds);
    return value;
  }
}

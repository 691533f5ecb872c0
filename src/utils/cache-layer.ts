// cache-layer.ts
import { createClient } from 'redis';
import { createLogger } from './logger.js';

const log = createLogger('Cache');

/**
 * Cache interface - contract for all implementations.
 * `get` resolves to `undefined` for a missing or expired key.
 */
export interface ICache {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  clear(): Promise<void>;
  getStats(): Promise<Record<string, number>>;
  close(): Promise<void>;
}

interface CacheEntry {
  value: unknown;
  expiresAt: number;
}

/** Writes between sweeps of expired entries. */
export const PRUNE_EVERY_WRITES = 100;

/**
 * In-memory cache (default). Expiry is checked lazily on read, and every
 * `PRUNE_EVERY_WRITES` writes sweep out entries that expired unread.
 */
export class InMemoryCache implements ICache {
  private entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;
  private writes = 0;

  async get(key: string) {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    this.hits++;
    return entry.value;
  }

  async set(key: string, value: unknown, ttlSeconds: number) {
    this.writes++;
    if (this.writes % PRUNE_EVERY_WRITES === 0) {
      const removed = this.prune();
      if (removed > 0) {
        log.debug('Pruned expired cache entries', { removed, remaining: this.entries.size });
      }
    }
    this.entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
  }

  async delete(key: string) {
    return this.entries.delete(key);
  }

  async clear() {
    this.entries.clear();
  }

  /**
   * Drop every expired entry. Returns how many were removed.
   */
  prune(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async getStats() {
    return {
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
    };
  }

  async close() {
    this.entries.clear();
  }
}

/**
 * Redis-backed cache (production use). Values are stored as JSON and Redis
 * enforces the TTL.
 */
export class RedisCache implements ICache {
  private client: ReturnType<typeof createClient>;
  private ready: Promise<void>;
  private keyPrefix: string;

  constructor(redisUrl: string, keyPrefix = 'gateway:') {
    this.keyPrefix = keyPrefix;
    this.client = createClient({ url: redisUrl });
    this.client.on('error', (error: unknown) => {
      log.error('Redis client error', { error: error instanceof Error ? error.message : String(error) });
    });
    this.ready = this.client.connect().then(
      () => log.info('Connected to Redis'),
      (error: unknown) => {
        log.error('Failed to connect to Redis', { error: error instanceof Error ? error.message : String(error) });
      }
    );
  }

  private key(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  async get(key: string): Promise<unknown> {
    await this.ready;
    const data = await this.client.get(this.key(key));
    return data === null ? undefined : JSON.parse(data);
  }

  async set(key: string, value: unknown, ttlSeconds: number) {
    await this.ready;
    await this.client.set(this.key(key), JSON.stringify(value), { EX: ttlSeconds });
  }

  async delete(key: string) {
    await this.ready;
    return (await this.client.del(this.key(key))) > 0;
  }

  async clear() {
    await this.ready;
    for await (const key of this.client.scanIterator({ MATCH: `${this.keyPrefix}*` })) {
      await this.client.del(key);
    }
  }

  /** Counts only this cache's keys, the same set `clear()` removes. */
  async getStats() {
    await this.ready;
    let keys = 0;
    for await (const _key of this.client.scanIterator({ MATCH: `${this.keyPrefix}*` })) {
      keys++;
    }
    return { keys };
  }

  async close() {
    await this.ready;
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }
}

/**
 * Pick the cache backend from configuration.
 */
export function createCache(redisUrl?: string): ICache {
  if (redisUrl) {
    log.info('Using Redis cache');
    return new RedisCache(redisUrl);
  }
  log.info('Using in-memory cache');
  return new InMemoryCache();
}

/**
 * Cache Manager
 * Result cache with Redis backend and in-memory fallback
 */

import { createHash } from 'crypto';
import { redisConnection } from './redis.connection';
import { CacheMode, CacheConfig, CacheResult, CacheEntry, CacheStore, CacheKeyParams } from './cache.types';
import { TTLCacheStrategy } from './cache.strategies';
import { env } from '../../config/env';

export type CacheStoreProvider = () => CacheStore | null;

function parseCacheMode(value: string): CacheMode {
  return Object.values(CacheMode).find((mode) => mode === value) ?? CacheMode.ENABLED;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Stable key for a set of inputs and the parameters that shape the result.
 * Input order does not matter.
 */
export function makeCacheKey(inputs: readonly string[], params: CacheKeyParams): string {
  const payload = JSON.stringify({
    inputs: [...inputs].sort(),
    params: Object.fromEntries(Object.entries(params).sort(([a], [b]) => a.localeCompare(b))),
  });
  return createHash('sha256').update(payload).digest('hex');
}

function isCacheEntry(value: unknown): value is CacheEntry<unknown> {
  return typeof value === 'object' && value !== null && 'value' in value && 'createdAt' in value;
}

export class CacheManager {
  private config: CacheConfig;
  private memoryCache: TTLCacheStrategy<unknown>;
  private keyPrefix: string;
  private readonly getStore: CacheStoreProvider;

  constructor(config?: Partial<CacheConfig>, storeProvider?: CacheStoreProvider) {
    this.config = {
      mode: parseCacheMode(env.CACHE_MODE),
      ttl: env.CACHE_TTL || 86400,
      keyPrefix: 'docs:',
      ...config,
    };
    this.keyPrefix = this.config.keyPrefix || 'docs:';
    this.memoryCache = new TTLCacheStrategy(this.config.maxMemoryEntries);
    this.getStore = storeProvider ?? (() => redisConnection.getClient());
  }

  /**
   * Get value from cache. `isValue` guards what comes back from Redis.
   */
  async get<T>(key: string, isValue: (value: unknown) => value is T): Promise<CacheResult<T>> {
    const fullKey = this.getFullKey(key);

    if (this.config.mode === CacheMode.DISABLED) {
      return { data: null, fromCache: false };
    }

    const store = this.config.mode !== CacheMode.BYPASS ? this.getStore() : null;
    if (store) {
      try {
        const cached = await store.get(fullKey);
        if (cached) {
          const parsed: unknown = JSON.parse(cached);

          if (isCacheEntry(parsed) && isValue(parsed.value)) {
            if (parsed.expiresAt && Date.now() > parsed.expiresAt) {
              await this.delete(key);
              return { data: null, fromCache: false };
            }

            return { data: parsed.value, fromCache: true, ttl: this.remainingTtl(parsed.expiresAt) };
          }
          console.warn(`Discarding malformed cache entry ${fullKey}`);
        }
      } catch (error) {
        console.error(`Redis get error for key ${fullKey}:`, messageOf(error));
        // Fall through to memory cache
      }
    }

    const memoryEntry = this.memoryCache.get(fullKey);
    if (memoryEntry && isValue(memoryEntry.value)) {
      return { data: memoryEntry.value, fromCache: true, ttl: this.remainingTtl(memoryEntry.expiresAt) };
    }

    return { data: null, fromCache: false };
  }

  async set<T>(key: string, value: T, ttl?: number): Promise<void> {
    const fullKey = this.getFullKey(key);
    const ttlSeconds = ttl || this.config.ttl || 86400;

    if (this.config.mode === CacheMode.DISABLED || this.config.mode === CacheMode.READ_ONLY) {
      return;
    }

    const entry: CacheEntry<T> = {
      value,
      createdAt: Date.now(),
      expiresAt: Date.now() + ttlSeconds * 1000,
    };

    const store = this.config.mode !== CacheMode.BYPASS ? this.getStore() : null;
    if (store) {
      try {
        await store.setex(fullKey, ttlSeconds, JSON.stringify(entry));
        return;
      } catch (error) {
        console.error(`Redis set error for key ${fullKey}:`, messageOf(error));
        // Fall through to memory cache
      }
    }

    this.memoryCache.set(fullKey, entry, ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    const fullKey = this.getFullKey(key);

    const store = this.getStore();
    if (store) {
      try {
        await store.del(fullKey);
      } catch (error) {
        console.error(`Redis delete error for key ${fullKey}:`, messageOf(error));
      }
    }

    this.memoryCache.delete(fullKey);
  }

  /**
   * Clear every key under this manager's prefix
   */
  async clear(): Promise<void> {
    const store = this.getStore();

    if (store) {
      try {
        const keys = await store.keys(`${this.keyPrefix}*`);
        if (keys.length > 0) {
          await store.del(...keys);
        }
      } catch (error) {
        console.error('Redis clear error:', messageOf(error));
      }
    }

    this.memoryCache.clear();
  }

  private getFullKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  private remainingTtl(expiresAt?: number): number | undefined {
    if (!expiresAt) return undefined;
    const ttl = Math.floor((expiresAt - Date.now()) / 1000);
    return ttl > 0 ? ttl : undefined;
  }

  getStats(): { redisAvailable: boolean; memoryCacheSize: number; mode: CacheMode } {
    return {
      redisAvailable: redisConnection.isAvailable(),
      memoryCacheSize: this.memoryCache.size(),
      mode: this.config.mode,
    };
  }

  /**
   * Drop expired memory entries on an interval. Returns a function that
   * stops the timer.
   */
  startCleanup(intervalMs: number = env.CACHE_CLEANUP_INTERVAL): () => void {
    const timer = setInterval(() => {
      const cleaned = this.memoryCache.cleanExpired();
      if (cleaned > 0) {
        console.log(`🧹 Removed ${cleaned} expired cache entries`);
      }
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }
}

// Export singleton instance
export const cacheManager = new CacheManager();

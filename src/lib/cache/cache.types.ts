/**
 * Cache Types
 * Type definitions for the cache system
 */

/**
 * Cache mode enumeration
 */
export enum CacheMode {
  DISABLED = 'disabled', // No caching
  ENABLED = 'enabled', // Use cache if available
  BYPASS = 'bypass', // Skip Redis, memory only
  READ_ONLY = 'read_only', // Only read from cache
}

/**
 * Cache configuration
 */
export interface CacheConfig {
  mode: CacheMode;
  ttl?: number; // Time to live in seconds
  keyPrefix?: string; // Prefix for cache keys
  maxMemoryEntries?: number;
}

/**
 * Cache result wrapper
 */
export interface CacheResult<T> {
  data: T | null;
  fromCache: boolean;
  ttl?: number;
}

/**
 * Cache entry metadata
 */
export interface CacheEntry<T> {
  value: T;
  expiresAt?: number; // Timestamp when entry expires
  createdAt: number; // Timestamp when entry was created
}

/**
 * The subset of a Redis client the cache uses
 */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  keys(pattern: string): Promise<string[]>;
}

/**
 * Crawl parameters that change the result for the same URLs
 */
export interface CacheKeyParams {
  maxDepth: number;
  maxPages: number;
  charsPerPage: number;
  maxModules?: number;
}

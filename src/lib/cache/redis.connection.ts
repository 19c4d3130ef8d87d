/**
 * Redis Connection Manager
 * Singleton for managing the Redis connection with retry and health checks
 */

import Redis, { RedisOptions } from 'ioredis';
import { env } from '../../config/env';

export class RedisConnection {
  private client: Redis | null = null;
  private isConnecting: boolean = false;
  private connectionAttempts: number = 0;
  private warnedMissingUrl = false;
  private readonly maxConnectionAttempts: number = 5;

  constructor(private readonly url: string = env.REDIS_URL) {}

  /**
   * Get or create Redis client
   */
  getClient(): Redis | null {
    if (this.client) {
      return this.client;
    }

    if (this.isConnecting) {
      return null;
    }

    return this.connect();
  }

  private connect(): Redis | null {
    if (!this.url) {
      if (!this.warnedMissingUrl) {
        console.warn('Redis URL not configured, cache will use in-memory fallback');
        this.warnedMissingUrl = true;
      }
      return null;
    }

    if (this.connectionAttempts >= this.maxConnectionAttempts) {
      console.error('Max Redis connection attempts reached, using in-memory fallback');
      return null;
    }

    this.isConnecting = true;
    this.connectionAttempts++;

    try {
      const options: RedisOptions = {
        retryStrategy: (times: number) => {
          const delay = Math.min(times * 50, 2000);
          console.log(`Redis retry attempt ${times}, waiting ${delay}ms`);
          return delay;
        },
        maxRetriesPerRequest: 3,
        enableReadyCheck: true,
        enableOfflineQueue: false,
        lazyConnect: false,
      };

      if (env.REDIS_PASSWORD) {
        options.password = env.REDIS_PASSWORD;
      }

      options.db = env.REDIS_DB;

      const client = new Redis(this.url, options);

      client.on('ready', () => {
        console.log('Redis: Connected and ready');
        this.isConnecting = false;
        this.connectionAttempts = 0;
      });

      client.on('error', (error: Error) => {
        console.error('Redis error:', error.message);
        this.isConnecting = false;
      });

      client.on('close', () => {
        console.log('Redis: Connection closed');
        this.isConnecting = false;
      });

      client.on('reconnecting', () => {
        console.log('Redis: Reconnecting...');
      });

      this.client = client;
      return client;
    } catch (error) {
      console.error('Failed to create Redis client:', error instanceof Error ? error.message : error);
      this.isConnecting = false;
      return null;
    }
  }

  /**
   * Health check - ping Redis server
   */
  async healthCheck(): Promise<boolean> {
    const client = this.getClient();
    if (!client) {
      return false;
    }

    try {
      const result = await client.ping();
      return result === 'PONG';
    } catch (error) {
      console.error('Redis health check failed:', error instanceof Error ? error.message : error);
      return false;
    }
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
      this.isConnecting = false;
      this.connectionAttempts = 0;
    }
  }

  isAvailable(): boolean {
    return this.client !== null && this.client.status === 'ready';
  }
}

export const redisConnection = new RedisConnection();

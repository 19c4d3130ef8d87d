/**
 * Server Entry Point
 * Initializes the cache connection, inference strategies and the HTTP server
 */

import { createServer } from 'http';
import { createApp } from './app';
import { redisConnection } from './lib/cache/redis.connection';
import { cacheManager } from './lib/cache/cache.manager';
import { registerAllStrategies } from './lib/inference';
import { env } from './config/env';

const startServer = async (): Promise<void> => {
  try {
    // Initialize Redis connection
    console.log('📦 Initializing Redis connection...');
    const redisClient = redisConnection.getClient();
    if (redisClient) {
      // Wait a moment for connection to establish
      await new Promise((resolve) => setTimeout(resolve, 500));
      const isHealthy = await redisConnection.healthCheck();
      if (isHealthy) {
        console.log('✅ Redis connected and ready');
      } else {
        console.log('⚠️  Redis connection established but health check failed, using in-memory fallback');
      }
    } else {
      console.log('⚠️  Redis not available, using in-memory cache fallback');
    }

    const stopCacheCleanup = cacheManager.startCleanup();

    console.log('🤖 Registering inference strategies...');
    registerAllStrategies();

    const app = createApp();
    const httpServer = createServer(app);

    httpServer.listen(env.PORT, () => {
      const redisStatus = redisConnection.isAvailable() ? '✅ Connected' : '⚠️  In-Memory Fallback';

      console.log('');
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log('🚀 Documentation outline server is running');
      console.log(`🚀 Environment: ${env.NODE_ENV}`);
      console.log(`🚀 Port: ${env.PORT}`);
      console.log(`🚀 Redis Cache: ${redisStatus}`);
      console.log(`🚀 API: http://localhost:${env.PORT}/health`);
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log('');
    });

    const shutdown = (signal: string) => {
      console.log(`${signal} signal received: closing HTTP server`);
      stopCacheCleanup();
      httpServer.close(() => {
        console.log('HTTP server closed');
        redisConnection
          .disconnect()
          .then(() => {
            console.log('Redis disconnected');
            process.exit(0);
          })
          .catch((error: unknown) => {
            console.error('Redis disconnect failed:', error);
            process.exit(1);
          });
      });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start the server
void startServer();

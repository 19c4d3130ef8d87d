/**
 * Express Application Configuration
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { errorHandler } from './middleware/error-handler';
import { createExtractorRouter } from './modules/extractor/extractor.router';
import { ExtractorController } from './modules/extractor/extractor.controller';
import { extractorService, ExtractorService } from './modules/extractor/extractor.service';
import { cacheManager, CacheManager } from './lib/cache/cache.manager';

export interface AppOptions {
  extractorService?: ExtractorService;
  cacheManager?: CacheManager;
}

export const createApp = (options: AppOptions = {}): Application => {
  const app = express();
  const cache = options.cacheManager ?? cacheManager;

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  app.use(helmet());

  app.use(
    cors({
      origin: env.CLIENT_URL,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type'],
    })
  );

  app.use(express.json({ limit: '1mb' }));

  // ============================================================================
  // Routes
  // ============================================================================

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      success: true,
      message: 'Documentation outline API is running',
      timestamp: new Date().toISOString(),
      environment: env.NODE_ENV,
      cache: cache.getStats(),
    });
  });

  const controller = new ExtractorController(options.extractorService ?? extractorService);
  app.use('/api/extract', createExtractorRouter(controller));

  // 404 Handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Route not found',
      path: req.path,
    });
  });

  // ============================================================================
  // Error Handler (must be last)
  // ============================================================================

  app.use(errorHandler);

  return app;
};

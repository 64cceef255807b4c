/**
 * Express Application Configuration
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { errorHandler } from './middleware/error-handler';

// Import routers
import crawlerRouter from './modules/crawler/crawler.router';

export const createApp = (): Application => {
  const app = express();

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  app.use(helmet());

  app.use(
    cors({
      origin: env.CLIENT_URL,
      credentials: true,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  app.use(express.json({ limit: '1mb' }));

  // ============================================================================
  // Routes
  // ============================================================================

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      success: true,
      message: 'Product crawler API is running',
      timestamp: new Date().toISOString(),
      environment: env.NODE_ENV,
    });
  });

  app.use('/api/crawl', crawlerRouter);

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

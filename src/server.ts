/**
 * Server Entry Point
 * Starts the Express server for crawl requests
 */

import { createServer } from 'http';
import { createApp } from './app';
import { env } from './config/env';
import { getAppLogger } from './lib/logging';

const logger = getAppLogger();

const startServer = (): void => {
  const app = createApp();
  const httpServer = createServer(app);

  httpServer.on('error', (error) => {
    logger.error(`Failed to start server: ${error.message}`);
    process.exit(1);
  });

  httpServer.listen(env.PORT, () => {
    console.log('');
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log(`🚀 Product crawler is running`);
    console.log(`🚀 Environment: ${env.NODE_ENV}`);
    console.log(`🚀 Port: ${env.PORT}`);
    console.log(`🚀 API: http://localhost:${env.PORT}/health`);
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log('');
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} signal received: closing HTTP server`);
    httpServer.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

startServer();

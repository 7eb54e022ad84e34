import dotenv from "dotenv";
import path from 'path';

// Load environment variables first
dotenv.config({ path: path.join(process.cwd(), '.env') });

import express from "express";
import { loadConfig } from './core/config';
import { loadVersionInfo } from './core/config/config.version-info';
import { logger } from './core/observability/logging';
import { ServiceContainer } from './core/container';
import { setupRoutes } from './routes';

async function main(): Promise<void> {
  const config = loadConfig();
  loadVersionInfo();

  const app = express();

  const services = new ServiceContainer(config);
  await services.initialize();

  setupRoutes(app, services);

  const server = app.listen(config.server.port, () => {
    logger.info(`Server running on port ${config.server.port}`);
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} signal received: closing HTTP server`);
    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force close after 10 seconds
    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start application');
  process.exit(1);
});

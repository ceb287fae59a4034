import type { Server } from 'http';
import { createApp } from './app.js';
import { env } from './config/env.js';
import { logger } from './services/logger.js';
import { getYearConfigStore } from './tax/config/yearConfigStore.js';

function main(): Server {
  const store = getYearConfigStore();
  // Fail fast on a broken default year rather than on the first request
  store.load(store.defaultYear());

  const app = createApp({ store });
  return app.listen(env.PORT, () => {
    logger.info(`Server running on http://localhost:${env.PORT}`);
    logger.info(`Health check: http://localhost:${env.PORT}/api/health`);
  });
}

let server: Server | undefined;

try {
  server = main();
} catch (error) {
  logger.error('Failed to start server:', error);
  process.exit(1);
}

// Graceful shutdown handler
function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  // Give existing requests time to complete (30 seconds max)
  const shutdownTimeout = setTimeout(() => {
    logger.warn('Shutdown timeout reached, forcing exit');
    process.exit(1);
  }, 30000);

  if (!server) {
    clearTimeout(shutdownTimeout);
    process.exit(0);
  }

  server.close(error => {
    clearTimeout(shutdownTimeout);
    if (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
    logger.info('Graceful shutdown completed');
    process.exit(0);
  });
}

process.on('SIGINT', () => gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));

process.on('uncaughtException', error => {
  logger.error('Uncaught exception:', error);
  gracefulShutdown('uncaughtException');
});

process.on('unhandledRejection', reason => {
  logger.error('Unhandled rejection:', { reason });
});

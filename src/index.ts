import { createApp } from './app';
import { env } from './config/environment';
import { errorMessage, logger } from './config/logger';
import { closeConnection, createDocumentStore } from './config/database';
import { seedStoreFromFile } from './repositories/seed';
import { createServices } from './services';

/**
 * Application Entry Point
 *
 * Starts the Express server and handles graceful shutdown
 */
async function startServer(): Promise<void> {
  const store = createDocumentStore();

  // Verify the store is reachable before accepting traffic
  await store.ping();
  logger.info('Document store connection verified', { store: store.name });

  if (env.STORE_SEED_FILE) {
    await seedStoreFromFile(store, env.STORE_SEED_FILE);
  }

  const services = createServices(store);
  await services.cache.start();

  const app = createApp(services);

  const server = app.listen(env.PORT, () => {
    logger.info(`
╔════════════════════════════════════════════════════════════╗
║  Tool Custody API Server                                   ║
╟────────────────────────────────────────────────────────────╢
║  Environment: ${env.NODE_ENV.padEnd(44)} ║
║  Store:       ${store.name.padEnd(44)} ║
║  Base URL:    http://localhost:${String(env.PORT).padEnd(27)} ║
║  Docs:        http://localhost:${`${env.PORT}/docs`.padEnd(27)} ║
║  Health:      http://localhost:${`${env.PORT}/health`.padEnd(27)} ║
╚════════════════════════════════════════════════════════════╝
    `.trim());

    logger.info('Server is ready to accept connections');
  });

  let shuttingDown = false;

  // Graceful shutdown handler
  const gracefulShutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info(`${signal} received, starting graceful shutdown...`);
    services.cache.stop();

    server.close(() => {
      logger.info('HTTP server closed');

      closeConnection()
        .then(() => {
          logger.info('Shutting down gracefully');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Error closing store connection', {
            error: errorMessage(error),
          });
          process.exit(1);
        });
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, 10000).unref();
  };

  // Handle shutdown signals
  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection', { reason });
    gracefulShutdown('unhandledRejection');
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: errorMessage(error),
  });
  process.exit(1);
});

import { createServer } from 'http';
import { config } from './config.js';
import { initDb, closeDb } from './db/index.js';
import { createApi } from './api/index.js';
import { isShuttingDown, markShuttingDown } from './lib/shutdown.js';
import logger from './lib/logger.js';

async function main(): Promise<void> {
  logger.info({ env: config.nodeEnv }, 'Starting server registry');

  initDb();

  const app = createApi();
  const httpServer = createServer(app);

  httpServer.listen(config.port, config.host, () => {
    logger.info({
      port: config.port,
      api: `http://localhost:${config.port}/api/servers/`,
    }, 'Server registry started');
  });

  const shutdown = async (): Promise<void> => {
    if (isShuttingDown()) {
      logger.warn('Shutdown already in progress');
      return;
    }
    markShuttingDown();
    logger.info('Starting graceful shutdown...');

    try {
      // 1. Stop accepting new connections, let in-flight requests finish
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      logger.info('HTTP server closed');

      // 2. Close database
      closeDb();
      logger.info('Database closed');

      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => { void shutdown(); });
  process.on('SIGTERM', () => { void shutdown(); });
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server registry');
  process.exit(1);
});

import 'dotenv/config';
import type { Server } from 'node:http';

import { createApp } from './app.js';
import { loadConfig } from './config/index.js';
import { createServices } from './services/index.js';
import { PgEntityStore } from './store/pg.store.js';
import { createLogger } from './utils/logger.js';

const config = loadConfig();
const logger = createLogger(config.server);

const store = new PgEntityStore({
  connectionString: config.database.url,
  poolMax: config.database.poolMax,
  logger,
});
const services = createServices({ store, config, logger });
const app = createApp({ services, config, logger });

// ============================================
// SERVER STARTUP
// ============================================

const startServer = async (): Promise<Server> => {
  // Fail fast when the database is unreachable
  await store.execute('SELECT 1');
  logger.info('Database connected successfully');

  return app.listen(config.server.port, () => {
    logger.info(`Server running on port ${config.server.port}`);
    logger.info(`Environment: ${config.server.nodeEnv}`);
  });
};

// Graceful shutdown
const shutdown = (server: Server) => (signal: NodeJS.Signals) => {
  logger.info(`${signal} received. Shutting down gracefully...`);
  server.close(() => {
    store
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error while closing the database pool', { error });
        process.exit(1);
      });
  });
};

startServer()
  .then((server) => {
    process.on('SIGTERM', shutdown(server));
    process.on('SIGINT', shutdown(server));
  })
  .catch((error: unknown) => {
    logger.error('Failed to start server', { error });
    process.exit(1);
  });

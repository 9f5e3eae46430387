import pino from 'pino';
import { config } from './config/index.js';
import { closePool, pool } from './db/pool.js';
import { runMigrations } from './db/migrate.js';
import { createApp } from './app.js';
import { DoesPaging } from './paging/does-paging.js';

const logger = pino({ name: 'server' });

// Catch kills/OOM before pino can flush
process.on('uncaughtException', (err) => {
  console.error(`UNCAUGHT EXCEPTION: ${err.message}`);
  console.error(err.stack);
  process.exit(1);
});
process.on('unhandledRejection', (reason) => {
  console.error(`UNHANDLED REJECTION: ${reason}`);
  process.exit(1);
});

async function boot(): Promise<void> {
  // Step 1: Config already validated by Zod at import time
  logger.info(
    { pageSize: config.PAGE_SIZE, maxPageSize: config.MAX_PAGE_SIZE, ignoredParams: config.IGNORED_PARAMS },
    'Configuration validated',
  );

  // Step 2: Test database connection
  logger.info('Connecting to database...');
  await pool.query('SELECT 1');
  logger.info('Database connected');

  // Step 3: Run migrations
  await runMigrations();

  // Step 4: Start Express
  const paging = new DoesPaging({
    pageSize: config.PAGE_SIZE,
    maxPageSize: config.MAX_PAGE_SIZE,
    ignoredParams: config.IGNORED_PARAMS,
  });
  const app = createApp(pool, paging);
  const server = app.listen(config.PORT, () => {
    logger.info(`Server ready on port ${config.PORT}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      closePool()
        .then(() => process.exit(0))
        .catch((err) => {
          logger.error({ err }, 'Pool did not close cleanly');
          process.exit(1);
        });
    });
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

boot().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  const stack = err instanceof Error ? err.stack : '';
  console.error(`BOOT FAILED: ${message}`);
  console.error(`Stack: ${stack}`);
  process.exit(1);
});

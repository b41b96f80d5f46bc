import type { Server } from 'http';
import { validateEnv } from './config/env.js';
import { connectDB, closeDB } from './config/database.js';
import { closePostgresPool } from './config/postgres.js';
import { loadQaConfig } from './config/qaConfig.js';
import { initializeServices } from './config/serviceInitialization.js';
import { createApp } from './app.js';
import { logger } from './utils/logger.js';

function registerShutdown(server: Server): void {
  let shuttingDown = false;

  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    server.close((closeError) => {
      if (closeError) {
        logger.error({ error: closeError.message }, 'HTTP server close failed');
      }
      Promise.all([closeDB(), closePostgresPool()])
        .then(() => process.exit(closeError ? 1 : 0))
        .catch((error: unknown) => {
          logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Connection cleanup failed');
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

async function start(): Promise<void> {
  const env = validateEnv();
  logger.info('Environment variables validated successfully');

  // Provider selection fails here, never at request time
  const qaConfig = loadQaConfig(env);
  await connectDB();

  const services = initializeServices(qaConfig);
  const app = createApp({
    env,
    orchestrator: services.orchestrator,
    similaritySearch: services.similaritySearch,
    health: { similarityIndex: services.similarityIndex },
  });

  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV }, 'Server listening');
  });
  registerShutdown(server);
}

start().catch((error: unknown) => {
  logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Server startup failed');
  process.exit(1);
});

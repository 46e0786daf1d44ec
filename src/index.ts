import { createServer } from './app';
import { createContainer } from './container';
import { loadConfig, loadEnv } from './utils/env';
import { logger } from './utils/logger';

async function bootstrap() {
  loadEnv();
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  const container = createContainer(config);
  const app = createServer(container);

  const server = app.listen(config.port, () => {
    logger.info(`Scrape job service listening on port ${config.port}`, { store: config.store.driver });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, waiting for running jobs`, container.queue.size());

    server.close();
    container.queue
      .onIdle()
      .then(() => {
        logger.info('All jobs finished, exiting');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((error) => {
  logger.error('Failed to bootstrap application', { error });
  process.exit(1);
});

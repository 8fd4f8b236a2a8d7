import { loadConfig } from './config/config';
import { createApp } from './app';
import { BackgroundTaskQueue } from './queue/backgroundTaskQueue';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errorHandler';

function start(): void {
  const config = loadConfig();
  const queue = new BackgroundTaskQueue({ singleFlight: config.queue.singleFlight });
  const app = createApp(config, { queue });

  const server = app.listen(config.server.port, () => {
    logger.info(`Image cache server running at http://localhost:${config.server.port}`);
    logger.info(`Serving final images from ${config.cache.finalImagesDir}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, waiting for ${queue.size} background task(s)`);
    server.close();
    queue
      .drain()
      .then(() => process.exit(0))
      .catch(error => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  start();
} catch (error) {
  logger.error(`Failed to start server: ${errorMessage(error)}`);
  process.exit(1);
}

import express, { Express, NextFunction, Request, Response } from 'express';
import { Config } from './config/config';
import { createImageSearchService } from './images';
import { ImageSearchService } from './images/imageSearchService';
import { BackgroundTaskQueue } from './queue/backgroundTaskQueue';
import { createImageRouter } from './routes/imageRoutes';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errorHandler';

export interface AppDeps {
  service?: ImageSearchService;
  queue?: BackgroundTaskQueue;
}

export function createApp(config: Config, deps: AppDeps = {}): Express {
  const service = deps.service ?? createImageSearchService(config);
  const queue = deps.queue ?? new BackgroundTaskQueue({ singleFlight: config.queue.singleFlight });

  const app = express();

  if (process.env.NODE_ENV === 'production') {
    app.set('trust proxy', 1);
  }

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', backgroundTasks: queue.size });
  });

  app.use(
    createImageRouter({
      service,
      queue,
      finalImagesDir: config.cache.finalImagesDir,
      maxKeywordLength: config.server.maxKeywordLength,
      imageCount: config.cache.defaultCount,
    })
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error(`Unhandled request error: ${errorMessage(err)}`);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

import { Router, Request, Response } from 'express';
import * as fs from 'fs-extra';
import * as path from 'path';
import { ImageSearchService } from '../images/imageSearchService';
import { sanitizeKeyword } from '../images/keyword';
import { BackgroundTaskQueue } from '../queue/backgroundTaskQueue';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errorHandler';

export interface ImageRoutesOptions {
  service: ImageSearchService;
  queue: BackgroundTaskQueue;
  finalImagesDir: string;
  maxKeywordLength: number;
  imageCount: number;
}

function isPlainFileName(name: string): boolean {
  return name.length > 0 && name === path.basename(name) && !name.startsWith('.') && !name.includes('\\');
}

export function createImageRouter(options: ImageRoutesOptions): Router {
  const { service, queue, finalImagesDir, maxKeywordLength, imageCount } = options;
  const router = Router();

  /**
   * GET /api/search?kw=<keyword>
   * Answers from the final cache, or starts populating it and answers empty.
   */
  router.get('/api/search', async (req: Request, res: Response) => {
    const rawKeyword = typeof req.query.kw === 'string' ? req.query.kw.trim() : '';
    if (!rawKeyword) {
      return res.status(400).json({ error: 'Missing keyword parameter', images: [], count: 0 });
    }

    const keyword = rawKeyword.slice(0, maxKeywordLength);
    const keywordKey = sanitizeKeyword(keyword);

    try {
      logger.info('API_SEARCH', {
        keyword,
        client_ip: req.ip,
        user_agent: (req.get('user-agent') ?? '').slice(0, 100),
      });

      if (await service.keywordIsCached(keywordKey, imageCount)) {
        const images = await service.search(keyword, imageCount);
        return res.json({
          keyword,
          images,
          count: images.length,
          cached: true,
          cache_status: 'HIT',
          api_call_made: false,
        });
      }

      queue.enqueue(keywordKey, () => service.search(keyword, imageCount));
      return res.json({
        keyword,
        images: [],
        count: 0,
        cached: false,
        cache_status: 'DOWNLOADING',
        api_call_made: true,
      });
    } catch (error) {
      logger.error('API_SEARCH_ERROR', { keyword, error: errorMessage(error) });
      return res.status(500).json({ error: 'Internal server error', images: [], count: 0 });
    }
  });

  /**
   * GET /image/:filename
   * Serves a promoted image from the final cache directory.
   */
  router.get('/image/:filename', async (req: Request, res: Response) => {
    const { filename } = req.params;
    const notFound = (reason: string) => {
      logger.warn('IMAGE_SERVE_ERROR', { filename, reason });
      return res.status(404).send('Image not found');
    };

    if (!isPlainFileName(filename)) {
      return notFound('invalid file name');
    }

    const filePath = path.join(finalImagesDir, filename);
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        return notFound('not a file');
      }
    } catch (error) {
      return notFound(errorMessage(error));
    }

    return res.sendFile(filePath, error => {
      if (error) {
        logger.error('IMAGE_SERVE_ERROR', { filename, error: errorMessage(error) });
        if (!res.headersSent) {
          res.status(404).send('Image not found');
        }
      }
    });
  });

  return router;
}

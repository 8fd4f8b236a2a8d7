import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { Express } from 'express';
import { createApp } from '../src/app';
import { ConfigSchema } from '../src/config/config';
import { CandidateImageCache } from '../src/images/candidateCache';
import { FinalImageCache } from '../src/images/finalCache';
import { ImageSearchService } from '../src/images/imageSearchService';
import { ImagePromoter } from '../src/images/promoter';
import { BackgroundTaskQueue } from '../src/queue/backgroundTaskQueue';
import { makeTempDir, removeTempDir, writeSolidImage } from './helpers/images';

vi.mock('../src/utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe('image routes', () => {
  let tempDir: string;
  let finalDir: string;
  let service: ImageSearchService;
  let queue: BackgroundTaskQueue;
  let app: Express;

  beforeEach(async () => {
    tempDir = await makeTempDir('routes');
    finalDir = path.join(tempDir, 'images');
    await fs.ensureDir(finalDir);

    const finalStore = new FinalImageCache(finalDir);
    service = new ImageSearchService({
      finalStore,
      candidateStore: new CandidateImageCache(path.join(finalDir, 'cache')),
      promoter: new ImagePromoter(finalStore),
      downloader: { download: vi.fn(async () => null) },
      searchClient: null,
    });
    queue = new BackgroundTaskQueue();

    const config = ConfigSchema.parse({ cache: { finalImagesDir: finalDir }, server: { maxKeywordLength: 20 } });
    app = createApp(config, { service, queue });
  });

  afterEach(async () => {
    await queue.drain();
    vi.restoreAllMocks();
    await removeTempDir(tempDir);
  });

  describe('GET /api/search', () => {
    it('rejects a missing keyword', async () => {
      const res = await request(app).get('/api/search');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Missing keyword parameter', images: [], count: 0 });
    });

    it('rejects a blank keyword', async () => {
      const res = await request(app).get('/api/search').query({ kw: '   ' });
      expect(res.status).toBe(400);
    });

    it('answers from the cache on a hit', async () => {
      for (const slot of [1, 2, 3]) {
        await writeSolidImage(path.join(finalDir, `trending_${slot}.jpg`));
      }
      const enqueue = vi.spyOn(queue, 'enqueue');

      const res = await request(app).get('/api/search').query({ kw: 'Trending' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        keyword: 'Trending',
        images: [1, 2, 3].map(slot => ({
          url: `/image/trending_${slot}.jpg`,
          thumbnail: `/image/trending_${slot}.jpg`,
          title: `Image ${slot}`,
          source: 'Cached',
        })),
        count: 3,
        cached: true,
        cache_status: 'HIT',
        api_call_made: false,
      });
      expect(enqueue).not.toHaveBeenCalled();
    });

    it('starts a background download on a miss and answers immediately', async () => {
      const search = vi.spyOn(service, 'search').mockResolvedValue([]);
      const enqueue = vi.spyOn(queue, 'enqueue');

      const res = await request(app).get('/api/search').query({ kw: 'Red Shoes' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        keyword: 'Red Shoes',
        images: [],
        count: 0,
        cached: false,
        cache_status: 'DOWNLOADING',
        api_call_made: true,
      });
      expect(enqueue).toHaveBeenCalledWith('red_shoes', expect.any(Function));

      await queue.drain();
      expect(search).toHaveBeenCalledWith('Red Shoes', 3);
    });

    it('truncates long keywords before using them', async () => {
      vi.spyOn(service, 'search').mockResolvedValue([]);

      const res = await request(app).get('/api/search').query({ kw: 'abcdefghij'.repeat(3) });

      expect(res.body.keyword).toBe('abcdefghijabcdefghij');
    });

    it('returns 500 when the cache check fails', async () => {
      vi.spyOn(service, 'keywordIsCached').mockRejectedValue(new Error('EACCES'));

      const res = await request(app).get('/api/search').query({ kw: 'cats' });

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'Internal server error', images: [], count: 0 });
    });
  });

  describe('GET /image/:filename', () => {
    it('serves a promoted image', async () => {
      await writeSolidImage(path.join(finalDir, 'cats_1.jpg'));

      const res = await request(app).get('/image/cats_1.jpg');

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('image/jpeg');
    });

    it('returns 404 for a missing image', async () => {
      const res = await request(app).get('/image/cats_9.jpg');
      expect(res.status).toBe(404);
      expect(res.text).toBe('Image not found');
    });

    it('refuses names that escape the image directory', async () => {
      await fs.writeFile(path.join(tempDir, 'secret.jpg'), 'secret');

      const res = await request(app).get('/image/..%2Fsecret.jpg');

      expect(res.status).toBe(404);
      expect(res.text).toBe('Image not found');
    });

    it('refuses directories and hidden files', async () => {
      await fs.ensureDir(path.join(finalDir, 'cache'));
      await fs.writeFile(path.join(finalDir, '.env'), 'GOOGLE_API_KEY=test-secret');

      expect((await request(app).get('/image/cache')).status).toBe(404);
      expect((await request(app).get('/image/.env')).status).toBe(404);
    });
  });

  it('reports health with the background task count', async () => {
    const res = await request(app).get('/health');
    expect(res.body).toEqual({ status: 'ok', backgroundTasks: 0 });
  });
});

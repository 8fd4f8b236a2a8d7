import { Config, hasPrimaryCredentials } from '../config/config';
import { logger } from '../utils/logger';
import { CandidateImageCache } from './candidateCache';
import { selectDiverseImages } from './diversitySelector';
import { ImageDownloader } from './downloader';
import { FinalImageCache } from './finalCache';
import { ImageSearchService } from './imageSearchService';
import { ImagePromoter } from './promoter';
import { GoogleImageClient } from './providers/googleImageClient';

export { ImageSearchService } from './imageSearchService';
export { FinalImageCache, IMAGE_ROUTE_PREFIX } from './finalCache';
export { CandidateImageCache } from './candidateCache';
export { sanitizeKeyword } from './keyword';
export * from './types';

/**
 * Wires the search service from configuration. Without primary credentials
 * the service still serves cached and stored images, it just cannot fetch.
 */
export function createImageSearchService(config: Config): ImageSearchService {
  const { cache, http, google } = config;

  const finalStore = new FinalImageCache(cache.finalImagesDir);
  const candidateStore = new CandidateImageCache(cache.candidatesDir);

  let searchClient: GoogleImageClient | null = null;
  if (hasPrimaryCredentials(google)) {
    searchClient = new GoogleImageClient(google, http.searchTimeoutMs);
  } else {
    logger.warn('Google search credentials are not configured; only cached images can be served');
  }

  return new ImageSearchService({
    finalStore,
    candidateStore,
    searchClient,
    downloader: new ImageDownloader({ timeoutMs: http.downloadTimeoutMs, userAgent: http.userAgent }),
    promoter: new ImagePromoter(finalStore, { thumbnail: cache.thumbnail, targetBytes: cache.targetFileSize }),
    selectImages: (candidates, count) =>
      selectDiverseImages(candidates, count, { similarityThreshold: cache.similarityThreshold }),
    minRequestSize: cache.minRequestSize,
  });
}

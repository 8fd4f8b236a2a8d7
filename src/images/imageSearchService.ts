import { logger } from '../utils/logger';
import { handleError } from '../utils/errorHandler';
import { selectDiverseImages } from './diversitySelector';
import { sanitizeKeyword } from './keyword';
import {
  CandidateDownloader,
  CandidateImage,
  CandidatePromoter,
  CandidateStore,
  FinalImageStore,
  ImageRecord,
  ImageSearchClient,
} from './types';

export const DEFAULT_IMAGE_COUNT = 3;
export const DEFAULT_MIN_REQUEST_SIZE = 10;

export interface ImageSearchServiceDeps {
  finalStore: FinalImageStore;
  candidateStore: CandidateStore;
  promoter: CandidatePromoter;
  downloader: CandidateDownloader;
  /** Null when no search credentials are configured; only the fetch phase needs it. */
  searchClient: ImageSearchClient | null;
  selectImages?: (candidates: CandidateImage[], count: number) => Promise<string[]>;
  minRequestSize?: number;
}

const elapsedSeconds = (startedAt: number): string => `${((Date.now() - startedAt) / 1000).toFixed(3)}s`;

/**
 * Three-phase keyword image search:
 *   1. serve the final cache when every slot is present;
 *   2. otherwise select and promote from stored candidates if there are enough;
 *   3. otherwise fetch new candidates, merge them with stored ones and promote.
 *
 * Failures never escape `search`; they are logged and yield an empty list.
 */
export class ImageSearchService {
  private readonly finalStore: FinalImageStore;
  private readonly candidateStore: CandidateStore;
  private readonly promoter: CandidatePromoter;
  private readonly downloader: CandidateDownloader;
  private readonly searchClient: ImageSearchClient | null;
  private readonly selectImages: (candidates: CandidateImage[], count: number) => Promise<string[]>;
  private readonly minRequestSize: number;

  constructor(deps: ImageSearchServiceDeps) {
    this.finalStore = deps.finalStore;
    this.candidateStore = deps.candidateStore;
    this.promoter = deps.promoter;
    this.downloader = deps.downloader;
    this.searchClient = deps.searchClient;
    this.selectImages = deps.selectImages ?? ((candidates, count) => selectDiverseImages(candidates, count));
    this.minRequestSize = deps.minRequestSize ?? DEFAULT_MIN_REQUEST_SIZE;
  }

  /**
   * Cheap check the web layer uses to choose between answering now and
   * populating the cache in the background.
   */
  async keywordIsCached(keywordKey: string, count: number = DEFAULT_IMAGE_COUNT): Promise<boolean> {
    return this.finalStore.allSlotsPresent(keywordKey, count);
  }

  async search(keyword: string, count: number = DEFAULT_IMAGE_COUNT): Promise<ImageRecord[]> {
    const keywordKey = sanitizeKeyword(keyword);
    try {
      return await this.runPhases(keyword, keywordKey, count);
    } catch (error) {
      handleError(error, `ImageSearch "${keyword}"`);
      return [];
    }
  }

  private async runPhases(keyword: string, keywordKey: string, count: number): Promise<ImageRecord[]> {
    // Phase 1: works without any search credentials
    if (await this.finalStore.allSlotsPresent(keywordKey, count)) {
      logger.info('CACHE_HIT', { keyword, keyword_base: keywordKey, count });
      return this.finalStore.getImages(keywordKey, count);
    }

    // Phase 2: no network involved, so no credentials needed either
    const existing = await this.candidateStore.listValid(keywordKey);
    if (existing.length >= count) {
      logger.info('CANDIDATE_REUSE', { keyword, candidates: existing.length });
      const selected = await this.selectImages(existing, count);
      const saved = await this.promoter.promote(keywordKey, selected);
      if (saved.length === count) {
        await this.candidateStore.clear(keywordKey);
        return this.finalStore.getImages(keywordKey, count);
      }
      logger.warn('CANDIDATE_REUSE_INCOMPLETE', { keyword, promoted: saved.length, required: count });
    }

    // Phase 3
    if (!this.searchClient) {
      logger.error('CREDENTIALS_NOT_CONFIGURED - cannot fetch new images', { keyword });
      return [];
    }

    logger.info('API_CALL_NEEDED', { keyword, existing_candidates: existing.length });
    return this.downloadAndSelect(this.searchClient, keyword, keywordKey, count, existing.length);
  }

  private async downloadAndSelect(
    searchClient: ImageSearchClient,
    keyword: string,
    keywordKey: string,
    count: number,
    existingCount: number
  ): Promise<ImageRecord[]> {
    const requestNum = Math.max(count, this.minRequestSize);
    const urls = await searchClient.searchImageUrls(keyword, requestNum);

    if (urls.length === 0) {
      logger.warn('GOOGLE_API_NO_RESULTS', { keyword, requested: requestNum });
      return [];
    }

    const firstIndex = await this.candidateStore.nextIndex(keywordKey);
    let downloadedNew = 0;
    for (const [offset, url] of urls.entries()) {
      const destination = this.candidateStore.candidateBasePath(keywordKey, firstIndex + offset);
      const saved = await this.downloader.download(url, destination);
      if (saved) {
        downloadedNew++;
      }
    }

    // One listing covers both the new downloads and anything left from earlier runs
    const allCandidates = await this.candidateStore.listValid(keywordKey);

    logger.info('CANDIDATE_PROCESSING', {
      keyword,
      downloaded_new: downloadedNew,
      existing_candidates: existingCount,
      total_candidates: allCandidates.length,
      download_failures: urls.length - downloadedNew,
    });

    if (allCandidates.length < count) {
      logger.error('INSUFFICIENT_CANDIDATES', { keyword, available: allCandidates.length, required: count });
      return [];
    }

    const selectionStart = Date.now();
    const selected = await this.selectImages(allCandidates, count);
    const selectionTime = elapsedSeconds(selectionStart);

    const compressionStart = Date.now();
    const saved = await this.promoter.promote(keywordKey, selected);
    const compressionTime = elapsedSeconds(compressionStart);

    logger.info('IMAGE_PROCESSING', {
      keyword,
      selection_time: selectionTime,
      compression_time: compressionTime,
      final_images: saved.length,
    });

    if (saved.length < count) {
      // Candidates stay on disk for the next attempt
      logger.error(`Failed to save enough images: got ${saved.length}, needed ${count}`, { keyword });
      return [];
    }

    await this.candidateStore.clear(keywordKey);
    logger.info(`Successfully selected ${saved.length} images from ${allCandidates.length} candidates`, { keyword });
    return this.finalStore.getImages(keywordKey, count);
  }
}

import axios from 'axios';
import { GoogleConfig, hasBackupCredentials } from '../../config/config';
import { logger } from '../../utils/logger';
import { ImageCacheError, errorMessage } from '../../utils/errorHandler';
import { ImageSearchClient } from '../types';

interface GoogleSearchItem {
  link?: string;
  title?: string;
}

interface GoogleSearchResponse {
  items?: GoogleSearchItem[];
}

type CredentialSet = 'primary' | 'backup';

/**
 * Google Custom Search image client. A 429 on the primary key is retried once
 * with the backup key; any other failure is thrown to the caller.
 */
export class GoogleImageClient implements ImageSearchClient {
  constructor(
    private readonly google: GoogleConfig,
    private readonly timeoutMs: number = 20000
  ) {}

  async searchImageUrls(keyword: string, num: number): Promise<string[]> {
    try {
      return await this.query('primary', keyword, num);
    } catch (error) {
      if (!isRateLimited(error)) {
        throw toSearchError(error);
      }

      logger.warn('PRIMARY_API_RATE_LIMIT - trying backup API', { keyword });
      if (!hasBackupCredentials(this.google)) {
        logger.error('BACKUP_API_NOT_CONFIGURED', { keyword });
        throw new ImageCacheError('Search quota exhausted and no backup credentials configured', 'QUOTA_EXHAUSTED', 429);
      }

      try {
        return await this.query('backup', keyword, num);
      } catch (backupError) {
        throw isRateLimited(backupError)
          ? new ImageCacheError('Search quota exhausted on primary and backup credentials', 'QUOTA_EXHAUSTED', 429)
          : toSearchError(backupError);
      }
    }
  }

  private async query(api: CredentialSet, keyword: string, num: number): Promise<string[]> {
    const startedAt = Date.now();
    const response = await axios.get<GoogleSearchResponse>(this.google.endpoint, {
      params: {
        key: api === 'primary' ? this.google.apiKey : this.google.backupApiKey,
        cx: api === 'primary' ? this.google.cx : this.google.backupCx,
        q: keyword,
        searchType: 'image',
        num,
        safe: this.google.safeSearch,
      },
      timeout: this.timeoutMs,
    });

    const items = response.data.items || [];
    const urls = items
      .map(item => item.link)
      .filter((link): link is string => typeof link === 'string' && link.length > 0);

    logger.info('GOOGLE_API_CALL', {
      keyword,
      requested: num,
      urls_received: urls.length,
      response_time: `${((Date.now() - startedAt) / 1000).toFixed(3)}s`,
      quota_usage: 1,
      status_code: response.status,
      api,
    });

    return urls;
  }
}

function isRateLimited(error: unknown): boolean {
  return axios.isAxiosError(error) && error.response?.status === 429;
}

function toSearchError(error: unknown): ImageCacheError {
  if (error instanceof ImageCacheError) {
    return error;
  }
  const status = axios.isAxiosError(error) ? error.response?.status : undefined;
  return new ImageCacheError(
    `Image search request failed${status ? ` (${status})` : ''}: ${errorMessage(error)}`,
    'SEARCH_FAILED',
    status ?? 502
  );
}

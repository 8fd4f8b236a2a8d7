import { logger } from './logger';

export type ImageCacheErrorCode =
  | 'SEARCH_FAILED'
  | 'QUOTA_EXHAUSTED'
  | 'DOWNLOAD_FAILED'
  | 'INVALID_CONTENT_TYPE'
  | 'INVALID_IMAGE';

export class ImageCacheError extends Error {
  constructor(
    message: string,
    public code: ImageCacheErrorCode,
    public statusCode: number = 500,
    public recoverable: boolean = false
  ) {
    super(message);
    this.name = 'ImageCacheError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Logs an error with its context. Recoverable cache errors are logged as
 * warnings since the pipeline carries on with a reduced set.
 */
export function handleError(error: unknown, context: string): void {
  if (error instanceof ImageCacheError) {
    if (error.recoverable) {
      logger.warn(`[${context}] ${error.code}: ${error.message}`);
    } else {
      logger.error(`[${context}] ${error.code}: ${error.message}`);
    }
    return;
  }

  logger.error(`[${context}] Unexpected error: ${errorMessage(error)}`);
  if (error instanceof Error && error.stack) {
    logger.debug(`[${context}] Stack trace: ${error.stack}`);
  }
}

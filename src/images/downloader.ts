import axios from 'axios';
import * as fs from 'fs-extra';
import * as path from 'path';
import { Readable } from 'stream';
import { logger } from '../utils/logger';
import { ImageCacheError, errorMessage } from '../utils/errorHandler';
import { isFileAnImage } from './imageValidator';
import { CandidateDownloader, ImageExtension } from './types';

const CONTENT_TYPE_EXTENSIONS: Record<string, ImageExtension> = {
  'image/jpeg': '.jpg',
  'image/jpg': '.jpg',
  'image/pjpeg': '.jpg',
  'image/png': '.png',
  'image/webp': '.webp',
  'image/gif': '.gif',
};

/**
 * Extension for a response content type, or null for anything outside the
 * known image types. Parameters such as `; charset=binary` are ignored.
 */
export function extensionForContentType(contentType: string | undefined): ImageExtension | null {
  if (!contentType) {
    return null;
  }
  const mimeType = contentType.split(';')[0].trim().toLowerCase();
  return CONTENT_TYPE_EXTENSIONS[mimeType] ?? null;
}

export interface DownloaderOptions {
  timeoutMs?: number;
  userAgent?: string;
}

export class ImageDownloader implements CandidateDownloader {
  private readonly timeoutMs: number;
  private readonly userAgent: string | undefined;

  constructor(options: DownloaderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.userAgent = options.userAgent;
  }

  /**
   * Streams `url` to `destinationBase` + extension and validates the result.
   * Rejected or failed items are logged and resolve to null.
   */
  async download(url: string, destinationBase: string): Promise<string | null> {
    try {
      return await this.fetchToFile(url, destinationBase);
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.data instanceof Readable) {
        error.response.data.destroy();
      }
      logger.warn(`Download failed for ${url}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async fetchToFile(url: string, destinationBase: string): Promise<string> {
    await fs.ensureDir(path.dirname(destinationBase));

    const response = await axios.get<Readable>(url, {
      responseType: 'stream',
      timeout: this.timeoutMs,
      headers: this.userAgent ? { 'User-Agent': this.userAgent } : undefined,
    });

    const rawContentType = response.headers['content-type'];
    const contentType = typeof rawContentType === 'string' ? rawContentType : undefined;
    const extension = extensionForContentType(contentType);
    if (!extension) {
      response.data.destroy();
      throw new ImageCacheError(`Rejected content type: ${contentType ?? 'none'}`, 'INVALID_CONTENT_TYPE', 415, true);
    }

    const filePath = destinationBase + extension;
    try {
      await writeStream(response.data, filePath);
    } catch (error) {
      await fs.remove(filePath);
      throw new ImageCacheError(`Transfer failed: ${errorMessage(error)}`, 'DOWNLOAD_FAILED', 502, true);
    }

    if (!(await isFileAnImage(filePath))) {
      await fs.remove(filePath);
      throw new ImageCacheError(`Downloaded file is not a valid image: ${filePath}`, 'INVALID_IMAGE', 422, true);
    }

    return filePath;
  }
}

function writeStream(source: Readable, filePath: string): Promise<void> {
  const writer = fs.createWriteStream(filePath);

  return new Promise((resolve, reject) => {
    let failed = false;
    const fail = (err: Error) => {
      if (failed) return;
      failed = true;
      source.unpipe(writer);
      // Settle only once the descriptor is released so the caller can delete the file
      if (writer.closed) {
        reject(err);
      } else {
        writer.once('close', () => reject(err));
        writer.destroy();
      }
    };

    source.on('error', fail);
    writer.on('error', fail);
    writer.on('close', () => {
      if (!failed) {
        resolve();
      }
    });
    source.pipe(writer);
  });
}

import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errorHandler';
import { isFileAnImage } from './imageValidator';
import { CandidateImage, CandidateStore, isSupportedExtension } from './types';

const CANDIDATE_NAME = /^candidate_(\d+)(\.[a-z]+)?$/;

/**
 * Per-keyword scratch directories of downloaded images awaiting selection.
 * Nothing here is locked; concurrent searches for a keyword share a directory.
 */
export class CandidateImageCache implements CandidateStore {
  constructor(private readonly rootDir: string) {}

  keywordDir(keywordKey: string): string {
    return path.join(this.rootDir, keywordKey);
  }

  candidateBasePath(keywordKey: string, index: number): string {
    return path.join(this.keywordDir(keywordKey), `candidate_${index}`);
  }

  /**
   * Valid candidates with their byte sizes, ordered by candidate number.
   */
  async listValid(keywordKey: string): Promise<CandidateImage[]> {
    const dir = this.keywordDir(keywordKey);
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch {
      return [];
    }

    const valid: CandidateImage[] = [];
    for (const name of names.sort((a, b) => a.localeCompare(b, 'en', { numeric: true }))) {
      const filePath = path.join(dir, name);
      if (!isSupportedExtension(path.extname(name).toLowerCase())) {
        continue;
      }
      if (!(await isFileAnImage(filePath))) {
        continue;
      }
      try {
        const stats = await fs.stat(filePath);
        valid.push({ path: filePath, size: stats.size });
      } catch (error) {
        // Removed by a concurrent cleanup between validation and stat
        logger.debug(`Candidate vanished during listing: ${filePath} (${errorMessage(error)})`);
      }
    }
    return valid;
  }

  /**
   * Index one past the highest `candidate_{n}` already on disk, so new
   * downloads never overwrite candidates left by an earlier run.
   */
  async nextIndex(keywordKey: string): Promise<number> {
    let names: string[];
    try {
      names = await fs.readdir(this.keywordDir(keywordKey));
    } catch {
      return 1;
    }

    let highest = 0;
    for (const name of names) {
      const match = CANDIDATE_NAME.exec(name);
      if (match) {
        highest = Math.max(highest, parseInt(match[1], 10));
      }
    }
    return highest + 1;
  }

  async clear(keywordKey: string): Promise<void> {
    const dir = this.keywordDir(keywordKey);
    try {
      if (!(await fs.pathExists(dir))) {
        return;
      }
      const entries = await fs.readdir(dir, { withFileTypes: true });
      const filesCount = entries.filter(entry => entry.isFile()).length;
      await fs.remove(dir);
      logger.info('CACHE_CLEANUP', {
        keyword_base: keywordKey,
        candidates_deleted: filesCount,
        action: 'delete_candidates',
      });
    } catch (error) {
      logger.warn('CACHE_CLEANUP_ERROR', { keyword_base: keywordKey, error: errorMessage(error) });
    }
  }
}

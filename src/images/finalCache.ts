import * as path from 'path';
import { isFileAnImage, resolveSavedPath } from './imageValidator';
import { FinalImageStore, ImageRecord } from './types';

export const IMAGE_ROUTE_PREFIX = '/image';

/**
 * Served images, one file per keyword slot: `{keywordKey}_{slot}.{ext}`.
 */
export class FinalImageCache implements FinalImageStore {
  constructor(readonly rootDir: string) {}

  slotBasePath(keywordKey: string, slot: number): string {
    return path.join(this.rootDir, `${keywordKey}_${slot}`);
  }

  /**
   * True only when every slot 1..count resolves to a file that decodes.
   * A corrupt slot counts as a miss.
   */
  async allSlotsPresent(keywordKey: string, count: number): Promise<boolean> {
    for (let slot = 1; slot <= count; slot++) {
      const actualPath = await resolveSavedPath(this.slotBasePath(keywordKey, slot));
      if (!actualPath || !(await isFileAnImage(actualPath))) {
        return false;
      }
    }
    return true;
  }

  async getImages(keywordKey: string, count: number): Promise<ImageRecord[]> {
    const images: ImageRecord[] = [];
    for (let slot = 1; slot <= count; slot++) {
      const actualPath = await resolveSavedPath(this.slotBasePath(keywordKey, slot));
      if (actualPath) {
        const url = `${IMAGE_ROUTE_PREFIX}/${path.basename(actualPath)}`;
        images.push({ url, thumbnail: url, title: `Image ${slot}`, source: 'Cached' });
      }
    }
    return images;
  }
}

import * as fs from 'fs-extra';
import * as path from 'path';
import sharp from 'sharp';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errorHandler';
import { compressToTarget, DEFAULT_TARGET_BYTES } from './compressor';
import { isFileAnImage } from './imageValidator';
import {
  CandidatePromoter,
  CompressedImage,
  DecodedImage,
  FinalImageStore,
  SUPPORTED_EXTENSIONS,
} from './types';

export interface PromoterOptions {
  thumbnail?: { width: number; height: number };
  targetBytes?: number;
  compress?: (image: DecodedImage, targetBytes: number) => Promise<CompressedImage>;
}

const WHITE = { r: 255, g: 255, b: 255 };

export class ImagePromoter implements CandidatePromoter {
  private readonly thumbnail: { width: number; height: number };
  private readonly targetBytes: number;
  private readonly compress: (image: DecodedImage, targetBytes: number) => Promise<CompressedImage>;

  constructor(private readonly finalStore: FinalImageStore, options: PromoterOptions = {}) {
    this.thumbnail = options.thumbnail ?? { width: 480, height: 270 };
    this.targetBytes = options.targetBytes ?? DEFAULT_TARGET_BYTES;
    this.compress = options.compress ?? compressToTarget;
  }

  /**
   * Fits the image inside the thumbnail box without enlarging it and centers
   * it on a white canvas of exactly the thumbnail size.
   */
  async renderThumbnail(sourcePath: string): Promise<DecodedImage> {
    const { width, height } = this.thumbnail;
    const { data: fitted, info } = await sharp(sourcePath)
      .resize(width, height, { fit: 'inside', withoutEnlargement: true, kernel: sharp.kernel.lanczos3 })
      .png()
      .toBuffer({ resolveWithObject: true });

    const canvas = await sharp({
      create: { width, height, channels: 3, background: WHITE },
    })
      .composite([
        {
          input: fitted,
          left: Math.floor((width - info.width) / 2),
          top: Math.floor((height - info.height) / 2),
        },
      ])
      .png()
      .toBuffer();

    // Compositing leaves an alpha band behind; the canvas itself is opaque
    const { data, info: canvasInfo } = await sharp(canvas)
      .flatten({ background: WHITE })
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      data,
      info: { width: canvasInfo.width, height: canvasInfo.height, channels: canvasInfo.channels },
    };
  }

  /**
   * Writes `{keywordKey}_{slot}` for each selected candidate, slot = position
   * in the selection. Returns the paths that were written and validated.
   */
  async promote(keywordKey: string, selectedPaths: string[]): Promise<string[]> {
    const savedFiles: string[] = [];

    for (const [index, sourcePath] of selectedPaths.entries()) {
      const slot = index + 1;
      try {
        const thumbnail = await this.renderThumbnail(sourcePath);
        const compressed = await this.compress(thumbnail, this.targetBytes);

        const basePath = this.finalStore.slotBasePath(keywordKey, slot);
        await fs.ensureDir(path.dirname(basePath));
        await this.removeExistingSlot(basePath);

        const finalPath = basePath + compressed.extension;
        await fs.writeFile(finalPath, compressed.data);

        if (await isFileAnImage(finalPath)) {
          savedFiles.push(finalPath);
          logger.info(
            `Saved optimized image: ${path.basename(finalPath)} (~${Math.floor(compressed.data.length / 1024)}KB)`
          );
        } else {
          logger.warn(`Promoted image failed validation: ${finalPath}`);
        }
      } catch (error) {
        logger.error(`Error processing candidate ${sourcePath}: ${errorMessage(error)}`);
      }
    }

    return savedFiles;
  }

  private async removeExistingSlot(basePath: string): Promise<void> {
    for (const ext of SUPPORTED_EXTENSIONS) {
      try {
        await fs.remove(basePath + ext);
      } catch (error) {
        logger.warn(`Could not remove stale image ${basePath + ext}: ${errorMessage(error)}`);
      }
    }
  }
}

import sharp from 'sharp';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errorHandler';
import { CompressedImage, DecodedImage } from './types';

export const DEFAULT_TARGET_BYTES = 25 * 1024;
export const JPEG_QUALITY_RANGE = { low: 30, high: 95 } as const;
export const WEBP_QUALITY_STEPS = [80, 70, 60, 50] as const;
export const FALLBACK_JPEG_QUALITY = 75;

const WHITE = { r: 255, g: 255, b: 255 };

export type Encoder = (quality: number) => Promise<Buffer>;

export interface QualityResult {
  data: Buffer;
  quality: number;
}

/**
 * Binary search for the highest quality whose output fits in `targetBytes`.
 * A fit moves the window up, an overshoot moves it down; stops when low > high.
 */
export async function searchJpegQuality(
  encode: Encoder,
  targetBytes: number,
  range: { low: number; high: number } = JPEG_QUALITY_RANGE
): Promise<QualityResult | null> {
  let { low, high } = range;
  let best: QualityResult | null = null;

  while (low <= high) {
    const quality = Math.floor((low + high) / 2);
    let data: Buffer;
    try {
      data = await encode(quality);
    } catch (error) {
      logger.debug(`JPEG encode failed at quality ${quality}: ${errorMessage(error)}`);
      break;
    }

    if (data.length <= targetBytes) {
      best = { data, quality };
      low = quality + 1;
    } else {
      high = quality - 1;
    }
  }

  return best;
}

/**
 * First WebP step (highest quality first) that fits the target and beats `sizeToBeat`.
 */
export async function scanWebpQuality(
  encode: Encoder,
  targetBytes: number,
  sizeToBeat: number,
  steps: readonly number[] = WEBP_QUALITY_STEPS
): Promise<QualityResult | null> {
  try {
    for (const quality of steps) {
      const data = await encode(quality);
      if (data.length <= targetBytes && data.length < sizeToBeat) {
        return { data, quality };
      }
    }
  } catch (error) {
    logger.debug(`WebP encode failed: ${errorMessage(error)}`);
  }
  return null;
}

function toPipeline(image: DecodedImage | Buffer): sharp.Sharp {
  const pipeline = Buffer.isBuffer(image)
    ? sharp(image)
    : sharp(image.data, { raw: image.info });
  // Transparency goes onto white; palette input is expanded by the decoder
  return pipeline.flatten({ background: WHITE });
}

/**
 * Compresses an image to at most `targetBytes` where any tested setting allows
 * it, preferring the best-quality JPEG and switching to WebP only when smaller.
 * When nothing fits, returns a quality-75 JPEG with no size guarantee.
 */
export async function compressToTarget(
  image: DecodedImage | Buffer,
  targetBytes: number = DEFAULT_TARGET_BYTES
): Promise<CompressedImage> {
  const encodeJpeg: Encoder = quality =>
    toPipeline(image).jpeg({ quality, progressive: true, optimiseCoding: true }).toBuffer();
  const encodeWebp: Encoder = quality =>
    toPipeline(image).webp({ quality, effort: 6 }).toBuffer();

  const jpeg = await searchJpegQuality(encodeJpeg, targetBytes);
  const webp = await scanWebpQuality(encodeWebp, targetBytes, jpeg ? jpeg.data.length : Infinity);

  if (webp) {
    return { data: webp.data, extension: '.webp' };
  }
  if (jpeg) {
    return { data: jpeg.data, extension: '.jpg' };
  }

  const data = await toPipeline(image)
    .jpeg({ quality: FALLBACK_JPEG_QUALITY, optimiseCoding: true })
    .toBuffer();
  return { data, extension: '.jpg' };
}

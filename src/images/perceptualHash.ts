import sharp from 'sharp';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errorHandler';

const HASH_SIZE = 8;

/**
 * 64-bit difference hash as 16 hex characters. The image is reduced to a
 * 9x8 greyscale grid and each bit records whether a pixel is brighter than
 * its left neighbour, row by row.
 */
export async function dHash64Hex(input: string | Buffer): Promise<string> {
  const { data, info } = await sharp(input)
    .removeAlpha()
    .greyscale()
    .resize(HASH_SIZE + 1, HASH_SIZE, { fit: 'fill', kernel: sharp.kernel.lanczos3 })
    .raw()
    .toBuffer({ resolveWithObject: true });

  const width = HASH_SIZE + 1;
  const pixel = (row: number, col: number): number => data[(row * width + col) * info.channels];

  let hex = '';
  let nibble = 0;
  let bitCount = 0;

  for (let row = 0; row < HASH_SIZE; row++) {
    for (let col = 0; col < HASH_SIZE; col++) {
      nibble = (nibble << 1) | (pixel(row, col + 1) > pixel(row, col) ? 1 : 0);
      bitCount++;
      if (bitCount === 4) {
        hex += nibble.toString(16);
        nibble = 0;
        bitCount = 0;
      }
    }
  }

  return hex;
}

/**
 * Hash for similarity grouping, or null when the file cannot be decoded.
 */
export async function computeImageHash(imagePath: string): Promise<string | null> {
  try {
    return await dHash64Hex(imagePath);
  } catch (error) {
    logger.warn(`Failed to compute hash for ${imagePath}: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Number of differing bits between two hex fingerprints of equal length.
 */
export function hammingDistance(a: string, b: string): number {
  if (a.length !== b.length) {
    throw new Error(`Hash length mismatch: ${a.length} vs ${b.length}`);
  }

  let distance = 0;
  for (let i = 0; i < a.length; i++) {
    let diff = parseInt(a[i], 16) ^ parseInt(b[i], 16);
    while (diff) {
      distance += diff & 1;
      diff >>= 1;
    }
  }
  return distance;
}

import * as fs from 'fs-extra';
import sharp from 'sharp';
import { SUPPORTED_EXTENSIONS } from './types';

/**
 * True only for a non-empty file that decodes completely. The header pass
 * catches non-images; the full pixel pass, which fails on any decoder
 * warning, catches truncated or corrupted downloads.
 */
export async function isFileAnImage(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile() || stats.size === 0) {
      return false;
    }

    const metadata = await sharp(filePath).metadata();
    if (!metadata.format || !metadata.width || !metadata.height) {
      return false;
    }

    await sharp(filePath).raw().toBuffer();
    return true;
  } catch {
    return false;
  }
}

/**
 * Finds the file saved under `baseWithoutExt`, which may carry any supported
 * extension since the compressor picks the codec. Returns null when none exists.
 */
export async function resolveSavedPath(baseWithoutExt: string): Promise<string | null> {
  if (await fs.pathExists(baseWithoutExt)) {
    return baseWithoutExt;
  }

  for (const ext of SUPPORTED_EXTENSIONS) {
    const candidate = baseWithoutExt + ext;
    if (await fs.pathExists(candidate)) {
      return candidate;
    }
  }

  return null;
}

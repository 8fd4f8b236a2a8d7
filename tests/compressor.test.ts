import { describe, it, expect, vi } from 'vitest';
import sharp from 'sharp';
import {
  compressToTarget,
  DEFAULT_TARGET_BYTES,
  scanWebpQuality,
  searchJpegQuality,
} from '../src/images/compressor';
import { DecodedImage } from '../src/images/types';
import { noisePixels } from './helpers/images';

vi.mock('../src/utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

// Output size grows linearly with quality: q * 100 bytes
const linearEncoder = () => vi.fn(async (quality: number) => Buffer.alloc(quality * 100));

describe('searchJpegQuality', () => {
  it('finds the highest quality that fits in a handful of encodes', async () => {
    const encode = linearEncoder();

    const result = await searchJpegQuality(encode, 5000);

    expect(result?.quality).toBe(50);
    expect(result?.data.length).toBe(5000);
    expect(encode.mock.calls.map(([q]) => q)).toEqual([62, 45, 53, 49, 51, 50]);
  });

  it('returns null when even the lowest quality overshoots', async () => {
    const result = await searchJpegQuality(linearEncoder(), 2000);
    expect(result).toBeNull();
  });

  it('keeps the best result found before an encoder failure', async () => {
    const encode = vi.fn(async (quality: number) => {
      if (quality !== 62) throw new Error('encoder crashed');
      return Buffer.alloc(10);
    });

    const result = await searchJpegQuality(encode, 5000);

    expect(result?.quality).toBe(62);
    expect(encode).toHaveBeenCalledTimes(2);
  });
});

describe('scanWebpQuality', () => {
  it('returns the first step that fits and beats the size to beat', async () => {
    const result = await scanWebpQuality(linearEncoder(), 6500, 6000);
    expect(result?.quality).toBe(50);
  });

  it('returns null when no step is smaller than the size to beat', async () => {
    const result = await scanWebpQuality(linearEncoder(), 10000, 5000);
    expect(result).toBeNull();
  });
});

describe('compressToTarget', () => {
  const solid = async (): Promise<DecodedImage> => {
    const { data, info } = await sharp({
      create: { width: 480, height: 270, channels: 3, background: { r: 30, g: 144, b: 255 } },
    })
      .raw()
      .toBuffer({ resolveWithObject: true });
    return { data, info: { width: info.width, height: info.height, channels: info.channels } };
  };

  const noise = (): DecodedImage => ({
    data: noisePixels(480, 270, 7),
    info: { width: 480, height: 270, channels: 3 },
  });

  it('fits a simple image under the default target in a matching format', async () => {
    const result = await compressToTarget(await solid());

    expect(result.data.length).toBeLessThanOrEqual(DEFAULT_TARGET_BYTES);
    const { format } = await sharp(result.data).metadata();
    expect(result.extension === '.webp' ? 'webp' : result.extension === '.jpg' ? 'jpeg' : 'other').toBe(format);
  });

  it('accepts an encoded buffer as input', async () => {
    const png = await sharp({
      create: { width: 100, height: 60, channels: 4, background: { r: 0, g: 0, b: 0, alpha: 0 } },
    })
      .png()
      .toBuffer();

    const result = await compressToTarget(png, DEFAULT_TARGET_BYTES);
    const metadata = await sharp(result.data).metadata();

    expect(metadata.width).toBe(100);
    expect(metadata.hasAlpha).toBe(false);
  });

  it('falls back to a quality-75 JPEG when nothing fits', async () => {
    const result = await compressToTarget(noise(), 1000);

    expect(result.extension).toBe('.jpg');
    expect(result.data.length).toBeGreaterThan(1000);
    expect((await sharp(result.data).metadata()).format).toBe('jpeg');
  });
});

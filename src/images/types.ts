/**
 * A downloaded-but-not-yet-promoted image in a keyword's scratch directory.
 */
export interface CandidateImage {
  path: string;
  size: number;   // bytes on disk
}

/**
 * A candidate carrying its difference-hash fingerprint during selection.
 */
export interface HashedCandidate extends CandidateImage {
  hash: string;
}

/**
 * Servable projection of a final image, handed to the web layer.
 */
export interface ImageRecord {
  url: string;         // /image/{finalFilename}
  thumbnail: string;
  title: string;
  source: string;
}

export interface CompressedImage {
  data: Buffer;
  extension: ImageExtension;
}

/**
 * Decoded pixels as sharp hands them back from `.raw().toBuffer({ resolveWithObject: true })`.
 */
export interface DecodedImage {
  data: Buffer;
  info: {
    width: number;
    height: number;
    channels: 1 | 2 | 3 | 4;
  };
}

export const SUPPORTED_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.webp', '.gif', '.bmp'] as const;

export type ImageExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export function isSupportedExtension(ext: string): ext is ImageExtension {
  return (SUPPORTED_EXTENSIONS as readonly string[]).includes(ext);
}

/**
 * Search provider contract: returns image URLs for a keyword, possibly fewer than asked.
 */
export interface ImageSearchClient {
  searchImageUrls(keyword: string, num: number): Promise<string[]>;
}

/**
 * Downloads one URL to `destinationBase` plus an extension chosen from the
 * response. Resolves to the written path, or null when the item was rejected.
 */
export interface CandidateDownloader {
  download(url: string, destinationBase: string): Promise<string | null>;
}

export interface CandidateStore {
  keywordDir(keywordKey: string): string;
  candidateBasePath(keywordKey: string, index: number): string;
  listValid(keywordKey: string): Promise<CandidateImage[]>;
  nextIndex(keywordKey: string): Promise<number>;
  clear(keywordKey: string): Promise<void>;
}

export interface FinalImageStore {
  slotBasePath(keywordKey: string, slot: number): string;
  allSlotsPresent(keywordKey: string, count: number): Promise<boolean>;
  getImages(keywordKey: string, count: number): Promise<ImageRecord[]>;
}

export interface CandidatePromoter {
  promote(keywordKey: string, selectedPaths: string[]): Promise<string[]>;
}

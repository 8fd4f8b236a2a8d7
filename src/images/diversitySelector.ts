import { logger } from '../utils/logger';
import { computeImageHash, hammingDistance } from './perceptualHash';
import { CandidateImage, HashedCandidate } from './types';

export const DEFAULT_SIMILARITY_THRESHOLD = 10;

export interface DiversityOptions {
  similarityThreshold?: number;
  hashImage?: (imagePath: string) => Promise<string | null>;
}

/**
 * Single-pass grouping: each candidate joins the first group whose
 * representative (first member) is within `threshold` bits, else starts one.
 */
export function groupBySimilarity(candidates: HashedCandidate[], threshold: number): HashedCandidate[][] {
  const groups: HashedCandidate[][] = [];

  for (const candidate of candidates) {
    const group = groups.find(g => hammingDistance(candidate.hash, g[0].hash) <= threshold);
    if (group) {
      group.push(candidate);
    } else {
      groups.push([candidate]);
    }
  }

  return groups;
}

const bySizeDesc = (a: CandidateImage, b: CandidateImage): number => b.size - a.size;

/**
 * Picks up to `count` visually distinct candidates: the largest file from each
 * similarity group, groups ordered by their largest member. Falls back to the
 * biggest leftovers when there are fewer groups than slots.
 */
export async function selectDiverseImages(
  candidates: CandidateImage[],
  count: number,
  options: DiversityOptions = {}
): Promise<string[]> {
  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const hashImage = options.hashImage ?? computeImageHash;

  if (candidates.length <= count) {
    return candidates.map(c => c.path);
  }

  const hashed: HashedCandidate[] = [];
  for (const candidate of candidates) {
    const hash = await hashImage(candidate.path);
    if (hash !== null) {
      hashed.push({ ...candidate, hash });
    }
  }

  if (hashed.length === 0) {
    logger.warn(`No candidate could be hashed; ranking ${candidates.length} candidates by size only`);
    return [...candidates].sort(bySizeDesc).slice(0, count).map(c => c.path);
  }

  if (hashed.length <= count) {
    return hashed.map(c => c.path);
  }

  const groups = groupBySimilarity(hashed, threshold)
    .map(group => [...group].sort(bySizeDesc))
    .sort((a, b) => b[0].size - a[0].size);

  const selected: string[] = [];
  for (const group of groups) {
    if (selected.length >= count) break;
    selected.push(group[0].path);
  }

  if (selected.length < count) {
    const leftovers = groups.flatMap(group => group.slice(1)).sort(bySizeDesc);
    for (const candidate of leftovers) {
      if (selected.length >= count) break;
      selected.push(candidate.path);
    }
  }

  logger.info(`Selected ${selected.length} diverse images from ${groups.length} similarity groups`);
  return selected;
}

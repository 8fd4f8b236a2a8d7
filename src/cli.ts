#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from './config/config';
import { createImageSearchService } from './images';
import { CandidateImageCache } from './images/candidateCache';
import { FinalImageCache } from './images/finalCache';
import { sanitizeKeyword } from './images/keyword';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errorHandler';

function parseCount(value: string): number {
  const count = parseInt(value, 10);
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidArgumentError('Count must be a positive integer.');
  }
  return count;
}

const program = new Command();

program
  .name('keyword-image-cache')
  .description('Fetch, dedupe and cache thumbnail images per keyword')
  .version('1.0.0');

program
  .command('search')
  .description('run a full search for a keyword and print the cached image records')
  .argument('<keyword>', 'search keyword')
  .option('-c, --count <n>', 'number of images', parseCount)
  .action(async (keyword: string, options: { count?: number }) => {
    const config = loadConfig();
    const count = options.count ?? config.cache.defaultCount;
    const service = createImageSearchService(config);

    const images = await service.search(keyword, count);
    console.log(JSON.stringify({ keyword, images, count: images.length }, null, 2));
    process.exitCode = images.length === count ? 0 : 1;
  });

program
  .command('status')
  .description('show the cache state for a keyword')
  .argument('<keyword>', 'search keyword')
  .option('-c, --count <n>', 'number of images', parseCount)
  .action(async (keyword: string, options: { count?: number }) => {
    const config = loadConfig();
    const count = options.count ?? config.cache.defaultCount;
    const keywordKey = sanitizeKeyword(keyword);

    const finalCache = new FinalImageCache(config.cache.finalImagesDir);
    const candidateCache = new CandidateImageCache(config.cache.candidatesDir);

    const cached = await finalCache.allSlotsPresent(keywordKey, count);
    const candidates = await candidateCache.listValid(keywordKey);
    console.log(JSON.stringify({ keyword, keywordKey, cached, candidates: candidates.length }, null, 2));
  });

program
  .command('clear')
  .description('delete the stored candidates for a keyword')
  .argument('<keyword>', 'search keyword')
  .action(async (keyword: string) => {
    const config = loadConfig();
    const keywordKey = sanitizeKeyword(keyword);
    await new CandidateImageCache(config.cache.candidatesDir).clear(keywordKey);
    console.log(`Cleared candidates for ${keywordKey}`);
  });

program.parseAsync(process.argv).catch(error => {
  logger.error(`Command failed: ${errorMessage(error)}`);
  process.exit(1);
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { hasBackupCredentials, hasPrimaryCredentials, loadConfig, resolveEnvObject } from '../src/config/config';
import { makeTempDir, removeTempDir } from './helpers/images';

describe('config', () => {
  let tempDir: string;
  const savedEnv = { ...process.env };

  beforeEach(async () => {
    tempDir = await makeTempDir('config');
    await fs.ensureDir(path.join(tempDir, 'config'));
  });

  afterEach(async () => {
    process.env = { ...savedEnv };
    vi.restoreAllMocks();
    await removeTempDir(tempDir);
  });

  describe('resolveEnvObject', () => {
    it('replaces env: references throughout nested values', () => {
      process.env.TEST_IMAGE_KEY = 'test-secret';
      delete process.env.TEST_IMAGE_MISSING;

      expect(
        resolveEnvObject({ a: 'env:TEST_IMAGE_KEY', b: ['plain', 'env:TEST_IMAGE_MISSING'], c: 5 })
      ).toEqual({ a: 'test-secret', b: ['plain', ''], c: 5 });
    });
  });

  describe('loadConfig', () => {
    it('applies defaults and resolves cache directories against the base directory', async () => {
      await fs.writeJson(path.join(tempDir, 'config', 'config.json'), {});

      const config = loadConfig(tempDir);

      expect(config.cache.finalImagesDir).toBe(path.join(tempDir, 'images'));
      expect(config.cache.candidatesDir).toBe(path.join(tempDir, 'images', 'cache'));
      expect(config.cache.targetFileSize).toBe(25600);
      expect(config.cache.thumbnail).toEqual({ width: 480, height: 270 });
      expect(config.cache.similarityThreshold).toBe(10);
      expect(config.google.endpoint).toBe('https://www.googleapis.com/customsearch/v1');
      expect(config.queue.singleFlight).toBe(false);
      expect(config.server.maxKeywordLength).toBe(100);
    });

    it('reads credentials from the environment', async () => {
      process.env.GOOGLE_API_KEY = 'test-key';
      process.env.GOOGLE_CX = 'test-cx';
      delete process.env.GOOGLE_API_KEY_BACKUP;
      delete process.env.GOOGLE_CX_BACKUP;
      await fs.writeJson(path.join(tempDir, 'config', 'config.json'), {
        google: {
          apiKey: 'env:GOOGLE_API_KEY',
          cx: 'env:GOOGLE_CX',
          backupApiKey: 'env:GOOGLE_API_KEY_BACKUP',
          backupCx: 'env:GOOGLE_CX_BACKUP',
        },
      });

      const { google } = loadConfig(tempDir);

      expect(google.apiKey).toBe('test-key');
      expect(hasPrimaryCredentials(google)).toBe(true);
      expect(hasBackupCredentials(google)).toBe(false);
    });

    it('falls back to the example file', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      await fs.writeJson(path.join(tempDir, 'config', 'config.example.json'), { server: { port: 8080 } });

      expect(loadConfig(tempDir).server.port).toBe(8080);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('names every invalid field', async () => {
      await fs.writeJson(path.join(tempDir, 'config', 'config.json'), {
        cache: { similarityThreshold: 80 },
        server: { port: 'eighty' },
      });

      expect(() => loadConfig(tempDir)).toThrow(/^Invalid configuration: cache\.similarityThreshold: .+; server\.port: /);
    });

    it('fails without any configuration file', () => {
      expect(() => loadConfig(tempDir)).toThrow('No configuration file found');
    });
  });
});

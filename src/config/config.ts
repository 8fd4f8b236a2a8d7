import * as fs from 'fs-extra';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36';

export const GoogleConfigSchema = z.object({
  apiKey: z.string().default(''),
  cx: z.string().default(''),
  backupApiKey: z.string().default(''),
  backupCx: z.string().default(''),
  endpoint: z.string().url().default('https://www.googleapis.com/customsearch/v1'),
  safeSearch: z.enum(['active', 'off']).default('active'),
});

export const CacheConfigSchema = z.object({
  finalImagesDir: z.string().min(1).default('images'),
  candidatesDir: z.string().min(1).default('images/cache'),
  // Informational: final images are never expired by this service
  ttlHours: z.number().int().positive().default(2400),
  targetFileSize: z.number().int().positive().default(25 * 1024),
  thumbnail: z
    .object({
      width: z.number().int().positive().default(480),
      height: z.number().int().positive().default(270),
    })
    .default({}),
  similarityThreshold: z.number().int().min(0).max(64).default(10),
  minRequestSize: z.number().int().positive().default(10),
  defaultCount: z.number().int().positive().default(3),
});

export const HttpConfigSchema = z.object({
  searchTimeoutMs: z.number().int().positive().default(20000),
  downloadTimeoutMs: z.number().int().positive().default(30000),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
});

export const QueueConfigSchema = z.object({
  singleFlight: z.boolean().default(false),
});

export const ServerConfigSchema = z.object({
  port: z.number().int().positive().default(3000),
  maxKeywordLength: z.number().int().positive().default(100),
});

export const ConfigSchema = z.object({
  google: GoogleConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  http: HttpConfigSchema.default({}),
  queue: QueueConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
});

export type GoogleConfig = z.infer<typeof GoogleConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

function resolveEnvValue(value: string): string {
  if (value.startsWith('env:')) {
    const envKey = value.substring(4);
    // Every credential is optional: the final-image cache is served without them
    return process.env[envKey] ?? '';
  }
  return value;
}

export function resolveEnvObject(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return resolveEnvValue(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(item => resolveEnvObject(item));
  }
  if (obj && typeof obj === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvObject(value);
    }
    return resolved;
  }
  return obj;
}

/**
 * Loads `config/config.json` (or the example file) from `baseDir`, resolves
 * `env:` references and applies defaults. Cache directories come back absolute.
 */
export function loadConfig(baseDir: string = process.cwd()): Config {
  const configPath = path.join(baseDir, 'config', 'config.json');
  const examplePath = path.join(baseDir, 'config', 'config.example.json');

  let configData: unknown;

  if (fs.existsSync(configPath)) {
    configData = fs.readJsonSync(configPath);
  } else if (fs.existsSync(examplePath)) {
    configData = fs.readJsonSync(examplePath);
    console.warn(`Using example config file. Please create config/config.json for production.`);
  } else {
    throw new Error('No configuration file found. Please create config/config.json');
  }

  const parsed = ConfigSchema.safeParse(resolveEnvObject(configData));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const resolved = parsed.data;
  resolved.cache.finalImagesDir = path.resolve(baseDir, resolved.cache.finalImagesDir);
  resolved.cache.candidatesDir = path.resolve(baseDir, resolved.cache.candidatesDir);
  return resolved;
}

export function hasPrimaryCredentials(google: GoogleConfig): boolean {
  return Boolean(google.apiKey && google.cx);
}

export function hasBackupCredentials(google: GoogleConfig): boolean {
  return Boolean(google.backupApiKey && google.backupCx);
}

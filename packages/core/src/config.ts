/**
 * Environment-driven configuration
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ValidationError } from './errors.js';

const optionalPath = z.string().trim().min(1).optional();

const envSchema = z.object({
  MEDIA_CACHE_ROOT: optionalPath,
  MEDIA_CACHE_SOURCE_DIR: optionalPath,
  MEDIA_CACHE_GENERATED_DIR: optionalPath,
  MEDIA_CACHE_METADATA_DIR: optionalPath,
  MEDIA_CACHE_REGISTRY_PATH: optionalPath,
  MEDIA_CACHE_ENCODER_PATH: z.string().trim().min(1).default('ffmpeg'),
  MEDIA_CACHE_ENCODER_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface MediaCacheConfig {
  rootDir: string;
  sourceDir: string;
  generatedDir: string;
  metadataDir: string;
  registryPath: string;
  encoderPath: string;
  encoderTimeoutMs: number;
  logLevel: LogLevel;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Resolve the configuration from environment variables; explicit overrides win
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<MediaCacheConfig> = {}
): MediaCacheConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError('environment', formatIssues(parsed.error));
  }
  const vars = parsed.data;

  const rootDir = path.resolve(overrides.rootDir ?? vars.MEDIA_CACHE_ROOT ?? path.join(os.tmpdir(), 'media-cache'));
  const metadataDir = path.resolve(
    overrides.metadataDir ?? vars.MEDIA_CACHE_METADATA_DIR ?? path.join(rootDir, 'metadata')
  );

  return {
    rootDir,
    sourceDir: path.resolve(overrides.sourceDir ?? vars.MEDIA_CACHE_SOURCE_DIR ?? path.join(rootDir, 'source')),
    generatedDir: path.resolve(
      overrides.generatedDir ?? vars.MEDIA_CACHE_GENERATED_DIR ?? path.join(rootDir, 'generated')
    ),
    metadataDir,
    registryPath: path.resolve(
      overrides.registryPath ?? vars.MEDIA_CACHE_REGISTRY_PATH ?? path.join(metadataDir, 'registry.json')
    ),
    encoderPath: overrides.encoderPath ?? vars.MEDIA_CACHE_ENCODER_PATH,
    encoderTimeoutMs: overrides.encoderTimeoutMs ?? vars.MEDIA_CACHE_ENCODER_TIMEOUT_MS,
    logLevel: overrides.logLevel ?? vars.LOG_LEVEL,
  };
}

/**
 * Configuration loading tests
 */

import { describe, it, expect } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import { loadConfig } from '../config.js';
import { ValidationError } from '../errors.js';

describe('loadConfig', () => {
  it('should derive every directory from the root by default', () => {
    const config = loadConfig({});
    const root = path.join(os.tmpdir(), 'media-cache');

    expect(config).toEqual({
      rootDir: root,
      sourceDir: path.join(root, 'source'),
      generatedDir: path.join(root, 'generated'),
      metadataDir: path.join(root, 'metadata'),
      registryPath: path.join(root, 'metadata', 'registry.json'),
      encoderPath: 'ffmpeg',
      encoderTimeoutMs: 300_000,
      logLevel: 'info',
    });
  });

  it('should read the environment', () => {
    const config = loadConfig({
      MEDIA_CACHE_ROOT: '/srv/media',
      MEDIA_CACHE_METADATA_DIR: '/var/lib/media-meta',
      MEDIA_CACHE_ENCODER_PATH: '/usr/local/bin/ffmpeg',
      MEDIA_CACHE_ENCODER_TIMEOUT_MS: '60000',
      LOG_LEVEL: 'debug',
    });

    expect(config.sourceDir).toBe('/srv/media/source');
    expect(config.metadataDir).toBe('/var/lib/media-meta');
    expect(config.registryPath).toBe('/var/lib/media-meta/registry.json');
    expect(config.encoderPath).toBe('/usr/local/bin/ffmpeg');
    expect(config.encoderTimeoutMs).toBe(60_000);
    expect(config.logLevel).toBe('debug');
  });

  it('should let overrides win over the environment', () => {
    const config = loadConfig({ MEDIA_CACHE_ROOT: '/srv/media' }, { rootDir: '/data', registryPath: '/data/reg.json' });

    expect(config.generatedDir).toBe('/data/generated');
    expect(config.registryPath).toBe('/data/reg.json');
  });

  it.each([
    ['MEDIA_CACHE_ENCODER_TIMEOUT_MS', 'soon'],
    ['MEDIA_CACHE_ENCODER_TIMEOUT_MS', '-5'],
    ['LOG_LEVEL', 'loud'],
  ])('should reject %s=%s', (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ValidationError);
  });
});

/**
 * CacheManager tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { pino } from 'pino';
import { CacheManager } from '../cacheManager.js';
import { ResourceRegistry } from '../registry.js';
import { derivedId } from '../ids.js';
import { provenancePath } from '../provenance.js';

const silent = pino({ level: 'silent' });

describe('CacheManager', () => {
  let testRoot: string;
  let registry: ResourceRegistry;
  let cache: CacheManager;

  async function writeFile(relative: string, content = 'data'): Promise<string> {
    const filePath = path.join(testRoot, relative);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
    return filePath;
  }

  beforeEach(async () => {
    testRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'media-cache-manager-test-'));
    registry = await ResourceRegistry.open(path.join(testRoot, 'registry.json'), { logger: silent });
    cache = new CacheManager(registry, { logger: silent });
  });

  afterEach(async () => {
    await fs.rm(testRoot, { recursive: true, force: true });
  });

  describe('getOrPlan', () => {
    it('should plan, then hit after registration', async () => {
      const src = await registry.registerSource(await writeFile('source/clip.mp4'));
      const params = { start: 0, duration: 5 };

      const planned = await cache.getOrPlan([src], 'trim', params);
      expect(planned).toEqual({ status: 'miss', id: derivedId([src], 'trim', params), reason: 'absent' });

      const out = await writeFile(`generated/${planned.id}.mp4`);
      await registry.registerGenerated({ inputIds: [src], operation: 'trim', parameters: params, path: out });

      expect(await cache.getOrPlan([src], 'trim', params)).toEqual({ status: 'hit', id: planned.id, path: out });
    });

    it('should miss with missing-file once the artifact is deleted', async () => {
      const src = await registry.registerSource(await writeFile('source/clip.mp4'));
      const out = await writeFile('generated/out.mp4');
      const id = await registry.registerGenerated({ inputIds: [src], operation: 'trim', parameters: {}, path: out });
      await fs.rm(out);

      expect(await cache.getOrPlan([src], 'trim', {})).toEqual({ status: 'miss', id, reason: 'missing-file' });
    });

    it('should miss with stale for entries downstream of a change', async () => {
      const src = await registry.registerSource(await writeFile('source/clip.mp4'));
      const id = await registry.registerGenerated({
        inputIds: [src],
        operation: 'trim',
        parameters: {},
        path: await writeFile('generated/out.mp4'),
      });
      registry.markStale([id], { sourceId: src, reason: 'modified' });

      expect(await cache.getOrPlan([src], 'trim', {})).toEqual({ status: 'miss', id, reason: 'stale' });
    });

    it('should miss with stale when an upstream source changed since the last check', async () => {
      const clip = await writeFile('source/clip.mp4', 'frames');
      const src = await registry.registerSource(clip);
      const trimmed = await registry.registerGenerated({
        inputIds: [src],
        operation: 'trim',
        parameters: {},
        path: await writeFile('generated/trimmed.mp4'),
      });
      const encoded = await registry.registerGenerated({
        inputIds: [trimmed],
        operation: 'encode',
        parameters: {},
        path: await writeFile('generated/encoded.webm'),
      });
      await fs.writeFile(clip, 'new frames, longer');

      expect(await cache.getOrPlan([trimmed], 'encode', {})).toEqual({ status: 'miss', id: encoded, reason: 'stale' });
      expect(registry.isStale(trimmed)).toBe(true);
      expect(await cache.checkSourceChanges()).toEqual([]);
    });
  });

  describe('checkSourceChanges', () => {
    let aPath: string;
    let a: string;
    let b: string;
    let c: string;

    beforeEach(async () => {
      aPath = await writeFile('source/a.wav', 'original');
      a = await registry.registerSource(aPath);
      b = await registry.registerGenerated({
        inputIds: [a],
        operation: 'normalize',
        parameters: {},
        path: await writeFile('generated/b.wav'),
      });
      c = await registry.registerGenerated({
        inputIds: [b],
        operation: 'encode',
        parameters: {},
        path: await writeFile('generated/c.mp3'),
      });
    });

    it('should report nothing when sources are unchanged', async () => {
      expect(await cache.checkSourceChanges()).toEqual([]);
    });

    it('should mark the whole chain stale when a source changes', async () => {
      await fs.writeFile(aPath, 'a longer replacement');

      const divergences = await cache.checkSourceChanges();
      expect(divergences).toHaveLength(1);
      expect(divergences[0]?.sourceId).toBe(a);
      expect(divergences[0]?.kind).toBe('modified');
      expect(divergences[0]?.recorded.size).toBe(8);
      expect(divergences[0]?.current?.size).toBe(20);
      expect([...(divergences[0]?.staleIds ?? [])].sort()).toEqual([b, c].sort());

      expect(registry.isStale(b)).toBe(true);
      expect(registry.isStale(c)).toBe(true);
      expect(await registry.checkCache([a], 'normalize', {})).toBeNull();
    });

    it('should record the new signature so the same change is reported once', async () => {
      await fs.writeFile(aPath, 'a longer replacement');
      await cache.checkSourceChanges();

      expect(await cache.checkSourceChanges()).toEqual([]);
      expect(registry.isStale(b)).toBe(true);
    });

    it('should treat a deleted source as a missing divergence', async () => {
      await fs.rm(aPath);

      const divergence = await cache.checkSourceChange(a);
      expect(divergence?.kind).toBe('missing');
      expect(divergence?.current).toBeNull();
      expect(registry.isStale(c)).toBe(true);
    });

    it('should return null for IDs that are not sources', async () => {
      expect(await cache.checkSourceChange(b)).toBeNull();
      expect(await cache.checkSourceChange('src_unknown_wav')).toBeNull();
    });
  });

  describe('cleanup', () => {
    it('should remove a stale chain leaf-first with its files and sidecars', async () => {
      const aPath = await writeFile('source/a.wav', 'original');
      const a = await registry.registerSource(aPath);
      const bPath = await writeFile('generated/b.wav');
      await writeFile('generated/b.wav.provenance.json', '{}');
      const b = await registry.registerGenerated({ inputIds: [a], operation: 'normalize', parameters: {}, path: bPath });
      const cPath = await writeFile('generated/c.mp3');
      const c = await registry.registerGenerated({ inputIds: [b], operation: 'encode', parameters: {}, path: cPath });

      await fs.writeFile(aPath, 'changed content');
      await cache.checkSourceChanges();
      const removed = await cache.cleanup();

      expect(removed).toEqual([c, b]);
      expect(registry.has(b)).toBe(false);
      expect(registry.has(a)).toBe(true);
      await expect(fs.access(bPath)).rejects.toThrow();
      await expect(fs.access(provenancePath(bPath))).rejects.toThrow();
      await expect(fs.access(cPath)).rejects.toThrow();
    });

    it('should keep live entries and files when asked not to delete', async () => {
      const a = await registry.registerSource(await writeFile('source/a.wav'));
      const bPath = await writeFile('generated/b.wav');
      const b = await registry.registerGenerated({ inputIds: [a], operation: 'normalize', parameters: {}, path: bPath });

      expect(await cache.cleanup()).toEqual([]);

      registry.markStale([b], { sourceId: a, reason: 'modified' });
      expect(await cache.cleanup({ deleteFiles: false })).toEqual([b]);
      await expect(fs.access(bPath)).resolves.toBeUndefined();
    });

    it('should remove entries older than the cutoff', async () => {
      const a = await registry.registerSource(await writeFile('source/a.wav'));
      const old = await registry.registerGenerated({
        inputIds: [a],
        operation: 'normalize',
        parameters: {},
        path: await writeFile('generated/old.wav'),
        createdAt: '2000-01-01T00:00:00.000Z',
      });
      const fresh = await registry.registerGenerated({
        inputIds: [a],
        operation: 'gain',
        parameters: {},
        path: await writeFile('generated/fresh.wav'),
      });

      expect(await cache.cleanup({ olderThanMs: 60_000 })).toEqual([old]);
      expect(registry.has(fresh)).toBe(true);
    });
  });
});

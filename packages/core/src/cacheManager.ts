/**
 * CacheManager - memoization answers and change-driven invalidation on top of the registry
 */

import * as fs from 'fs/promises';
import { errorCode } from './errors.js';
import { derivedId } from './ids.js';
import { createLogger, type Logger } from './logger.js';
import { removeProvenance } from './provenance.js';
import { fileExists, statSignature, type ResourceRegistry } from './registry.js';
import type {
  CacheOutcome,
  CleanupOptions,
  DerivedFileEntry,
  OperationParameters,
  RegistryOptions,
  SourceDivergence,
  SourceFileEntry,
} from './types.js';

export class CacheManager {
  private readonly logger: Logger;

  constructor(
    private readonly registry: ResourceRegistry,
    options: RegistryOptions = {}
  ) {
    this.logger = createLogger({ component: 'cache-manager' }, options.logger);
  }

  /**
   * Hit with the existing artifact, or Miss with the ID registration will compute
   */
  async getOrPlan(
    inputIds: readonly string[],
    operation: string,
    parameters: OperationParameters = {}
  ): Promise<CacheOutcome> {
    const id = derivedId(inputIds, operation, parameters);
    const entry = this.registry.get(id);
    if (!entry) {
      return { status: 'miss', id, reason: 'absent' };
    }
    if (this.registry.isStale(id)) {
      return { status: 'miss', id, reason: 'stale' };
    }
    // An upstream source edited since the last check invalidates the hit.
    const changed = await this.registry.changedSources(inputIds);
    if (changed.length) {
      for (const source of changed) {
        await this.compare(source);
      }
      return { status: 'miss', id, reason: 'stale' };
    }
    if (!(await fileExists(entry.path))) {
      return { status: 'miss', id, reason: 'missing-file' };
    }
    return { status: 'hit', id, path: entry.path };
  }

  /**
   * Compare every source file with its recorded signature and mark everything downstream
   * of a changed source stale
   */
  async checkSourceChanges(): Promise<SourceDivergence[]> {
    const divergences: SourceDivergence[] = [];
    for (const source of this.registry.sources()) {
      const divergence = await this.compare(source);
      if (divergence) divergences.push(divergence);
    }
    return divergences;
  }

  /**
   * Same check for a single source
   */
  async checkSourceChange(sourceId: string): Promise<SourceDivergence | null> {
    const entry = this.registry.get(sourceId);
    if (!entry || entry.kind !== 'source') {
      return null;
    }
    return this.compare(entry);
  }

  /**
   * Remove stale (and optionally old) derived entries that nothing else depends on,
   * leaf-first, so whole stale chains go in one call
   * @returns removed IDs
   */
  async cleanup(options: CleanupOptions = {}): Promise<string[]> {
    const includeStale = options.includeStale ?? true;
    const deleteFiles = options.deleteFiles ?? true;
    const cutoff = options.olderThanMs !== undefined ? Date.now() - options.olderThanMs : null;

    const isCandidate = (entry: DerivedFileEntry): boolean => {
      if (includeStale && this.registry.isStale(entry.id)) return true;
      return cutoff !== null && Date.parse(entry.createdAt) < cutoff;
    };

    const removed: string[] = [];
    let progress = true;
    while (progress) {
      progress = false;
      for (const entry of this.registry.list()) {
        if (entry.kind === 'source' || !isCandidate(entry)) continue;
        if (this.registry.dependentsOf(entry.id).size > 0) continue;

        this.registry.remove(entry.id);
        removed.push(entry.id);
        progress = true;
        if (deleteFiles) {
          await this.deleteFile(entry.path);
          await removeProvenance(entry.path);
        }
      }
    }

    if (removed.length) {
      this.logger.info({ removed }, 'Cleaned up derived artifacts');
    }
    return removed;
  }

  private async compare(source: SourceFileEntry): Promise<SourceDivergence | null> {
    const current = await statSignature(source.path);
    const recorded = { size: source.size, modifiedAt: source.modifiedAt };
    if (current && current.size === recorded.size && current.modifiedAt === recorded.modifiedAt) {
      return null;
    }

    const kind = current ? 'modified' : 'missing';
    const staleIds = this.registry.markStale(this.registry.dependentsOf(source.id), {
      sourceId: source.id,
      reason: kind,
    });
    if (current) {
      this.registry.refreshSource(source.id, current);
    }

    this.logger.warn(
      { sourceId: source.id, kind, recorded, current, staleCount: staleIds.length },
      'Source file changed on disk'
    );
    return { sourceId: source.id, kind, recorded, current, staleIds };
  }

  private async deleteFile(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') throw err;
    }
  }
}

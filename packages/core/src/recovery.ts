/**
 * ResourceRecovery - reconcile the registry with what is actually on disk
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { ConflictError, IntegrityViolation, ValidationError, errorMessage } from './errors.js';
import { derivedId, sourceId } from './ids.js';
import { createLogger, type Logger } from './logger.js';
import {
  idFromArtifactName,
  isProvenancePath,
  readProvenance,
  type RawProvenance,
} from './provenance.js';
import { fileExists, type ResourceRegistry } from './registry.js';
import type {
  IntegrityReport,
  RebuildReport,
  RecoveryDirectories,
  RegistryOptions,
  ResourceCategory,
} from './types.js';

interface Candidate {
  path: string;
  manifest: RawProvenance;
}

function emptyByCategory(): Record<ResourceCategory, string[]> {
  return { source: [], generated: [], metadata: [] };
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

export class ResourceRecovery {
  private readonly logger: Logger;

  constructor(
    private readonly registry: ResourceRegistry,
    options: RegistryOptions = {}
  ) {
    this.logger = createLogger({ component: 'recovery' }, options.logger);
  }

  /**
   * Register everything found under the given directories.
   * Re-discovering a known file is a no-op, so running this twice changes nothing the second time.
   */
  async scanAndRebuild(directories: RecoveryDirectories): Promise<RebuildReport> {
    const report: RebuildReport = {
      registered: emptyByCategory(),
      unchanged: emptyByCategory(),
      orphaned: [],
      conflicts: [],
      missingDirectories: [],
    };

    for (const file of await this.listFiles(directories.sourceDirs ?? [], report)) {
      await this.recoverSource(file, report);
    }

    const derivedFiles = await this.listFiles(
      [...(directories.generatedDirs ?? []), ...(directories.metadataDirs ?? [])],
      report
    );
    const candidates: Candidate[] = [];
    for (const file of derivedFiles) {
      const candidate = await this.matchArtifact(file, report);
      if (candidate) candidates.push(candidate);
    }
    await this.registerInDependencyOrder(candidates, report);

    this.logger.info(
      {
        registered: report.registered,
        orphaned: report.orphaned.length,
        conflicts: report.conflicts.length,
        missingDirectories: report.missingDirectories,
      },
      'Registry rebuild complete'
    );
    return report;
  }

  /**
   * IDs whose backing file is gone, per category. Reporting only; nothing is pruned.
   */
  async validateIntegrity(): Promise<IntegrityReport> {
    const report: IntegrityReport = emptyByCategory();
    for (const entry of this.registry.list()) {
      if (!(await fileExists(entry.path))) {
        report[entry.kind].push(entry.id);
      }
    }
    return report;
  }

  /**
   * Throw IntegrityViolation if any entry lost its backing file
   */
  async assertIntegrity(): Promise<void> {
    const report = await this.validateIntegrity();
    if (report.source.length || report.generated.length || report.metadata.length) {
      throw new IntegrityViolation(report);
    }
  }

  private async listFiles(dirs: readonly string[], report: RebuildReport): Promise<string[]> {
    const files = new Set<string>();
    for (const dir of dirs) {
      const absDir = path.resolve(dir);
      if (!(await isDirectory(absDir))) {
        report.missingDirectories.push(absDir);
        continue;
      }
      const matches = await glob('**/*', {
        cwd: absDir,
        absolute: true,
        nodir: true,
        dot: false,
      });
      for (const match of matches) {
        if (this.isBookkeeping(match)) continue;
        files.add(path.resolve(match));
      }
    }
    return [...files].sort();
  }

  /** The registry document, its temp/backup files and sidecars are never resources */
  private isBookkeeping(file: string): boolean {
    const resolved = path.resolve(file);
    const doc = this.registry.documentPath;
    return resolved === doc || resolved.startsWith(`${doc}.`) || isProvenancePath(resolved);
  }

  private async recoverSource(file: string, report: RebuildReport): Promise<void> {
    const id = sourceId(file);
    const before = this.registry.get(id);
    try {
      await this.registry.registerSource(file);
    } catch (err) {
      if (err instanceof ConflictError) {
        this.recordConflict(report, file, id, before?.path ?? '');
        return;
      }
      throw err;
    }
    const after = this.registry.get(id);
    const unchanged =
      before !== undefined &&
      after !== undefined &&
      before.path === after.path &&
      before.kind === 'source' &&
      after.kind === 'source' &&
      before.size === after.size &&
      before.modifiedAt === after.modifiedAt;
    (unchanged ? report.unchanged : report.registered).source.push(id);
  }

  private async matchArtifact(file: string, report: RebuildReport): Promise<Candidate | null> {
    const provenance = await readProvenance(file);
    if (provenance.status === 'missing') {
      this.recordOrphan(report, file, 'no-provenance');
      return null;
    }
    if (provenance.status === 'invalid') {
      this.recordOrphan(report, file, 'invalid-provenance', provenance.reason);
      return null;
    }

    const { manifest } = provenance;
    const stem = idFromArtifactName(file);
    if (stem !== manifest.id) {
      this.recordOrphan(report, file, 'id-mismatch', `filename says ${stem}, provenance says ${manifest.id}`);
      return null;
    }

    let expected: string;
    try {
      expected = derivedId(manifest.inputIds, manifest.operation, manifest.parameters);
    } catch (err) {
      if (err instanceof ValidationError) {
        this.recordOrphan(report, file, 'invalid-provenance', err.message);
        return null;
      }
      throw err;
    }
    if (expected !== manifest.id) {
      this.recordOrphan(report, file, 'id-mismatch', `provenance derives ${expected}`);
      return null;
    }
    return { path: file, manifest };
  }

  /**
   * Inputs may themselves be artifacts found in this scan, so register in passes
   * until nothing more can be resolved
   */
  private async registerInDependencyOrder(candidates: Candidate[], report: RebuildReport): Promise<void> {
    let pending = candidates;
    let progress = true;
    while (pending.length && progress) {
      progress = false;
      const next: Candidate[] = [];
      for (const candidate of pending) {
        if (!candidate.manifest.inputIds.every((id) => this.registry.has(id))) {
          next.push(candidate);
          continue;
        }
        progress = true;
        await this.recoverArtifact(candidate, report);
      }
      pending = next;
    }

    for (const candidate of pending) {
      const missing = candidate.manifest.inputIds.filter((id) => !this.registry.has(id));
      this.recordOrphan(report, candidate.path, 'unresolved-inputs', `unknown inputs: ${missing.join(', ')}`);
    }
  }

  private async recoverArtifact(candidate: Candidate, report: RebuildReport): Promise<void> {
    const { manifest } = candidate;
    const existing = this.registry.get(manifest.id);
    if (existing) {
      if (existing.path === candidate.path) {
        report.unchanged[existing.kind].push(manifest.id);
        return;
      }
      // Do not resurrect a stale entry from an old copy of the same derivation.
      if (this.registry.isStale(manifest.id)) {
        this.recordConflict(report, candidate.path, manifest.id, existing.path);
        return;
      }
    }

    try {
      await this.registry.registerGenerated({
        inputIds: manifest.inputIds,
        operation: manifest.operation,
        parameters: manifest.parameters,
        path: candidate.path,
        kind: manifest.kind,
        createdAt: manifest.createdAt,
      });
      report.registered[manifest.kind].push(manifest.id);
    } catch (err) {
      if (err instanceof ConflictError) {
        this.recordConflict(report, candidate.path, manifest.id, existing?.path ?? '');
        return;
      }
      this.logger.warn({ path: candidate.path, err: errorMessage(err) }, 'Could not recover artifact');
      throw err;
    }
  }

  private recordOrphan(
    report: RebuildReport,
    file: string,
    reason: RebuildReport['orphaned'][number]['reason'],
    detail?: string
  ): void {
    report.orphaned.push(detail === undefined ? { path: file, reason } : { path: file, reason, detail });
    this.logger.warn({ path: file, reason, detail }, 'Orphaned file');
  }

  private recordConflict(report: RebuildReport, file: string, id: string, existingPath: string): void {
    report.conflicts.push({ path: file, id, existingPath });
    this.logger.warn({ path: file, id, existingPath }, 'Conflicting file for registered ID');
  }
}

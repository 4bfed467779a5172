/**
 * ResourceRegistry - persistent index of source files, derived artifacts,
 * the operation log and the dependency graph between them
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConflictError, NotFoundError, errorCode } from './errors.js';
import { canonicalizeParameters, derivedId, sourceId } from './ids.js';
import { createLogger, type Logger } from './logger.js';
import {
  backupCorruptDocument,
  emptyState,
  readRegistryDocument,
  serializeRegistryDocument,
  writeRegistryDocument,
  type RegistryState,
  type Stored,
} from './registryDocument.js';
import type {
  BrokenDependency,
  DerivedCategory,
  DerivedFileEntry,
  FileSignature,
  OperationParameters,
  OperationRecord,
  RegisterGeneratedParams,
  RegistryOptions,
  ResourceCategory,
  ResourceEntry,
  SourceDivergenceKind,
  SourceFileEntry,
  StaleMark,
} from './types.js';

/**
 * Size and mtime of a file, or null if it does not exist
 */
export async function statSignature(filePath: string): Promise<FileSignature | null> {
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) return null;
    return { size: stat.size, modifiedAt: stat.mtimeMs };
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') return null;
    throw err;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  return (await statSignature(filePath)) !== null;
}

function freezeSource(entry: SourceFileEntry): SourceFileEntry {
  return Object.freeze({ ...entry });
}

function freezeDerived(entry: DerivedFileEntry): DerivedFileEntry {
  return Object.freeze({ ...entry, inputIds: Object.freeze([...entry.inputIds]) });
}

function freezeEntry(entry: ResourceEntry): ResourceEntry {
  return entry.kind === 'source' ? freezeSource(entry) : freezeDerived(entry);
}

export class ResourceRegistry {
  readonly documentPath: string;
  private readonly logger: Logger;
  private state: RegistryState = emptyState();
  /** Reverse edges: input ID -> IDs that consume it */
  private readonly dependents = new Map<string, Set<string>>();
  private dirty = false;
  private saving: Promise<void> = Promise.resolve();
  private readonly loadWarnings: string[] = [];

  private constructor(documentPath: string, options: RegistryOptions = {}) {
    this.documentPath = path.resolve(documentPath);
    this.logger = createLogger({ component: 'registry' }, options.logger);
  }

  /**
   * Construct from a document path and load it
   */
  static async open(documentPath: string, options: RegistryOptions = {}): Promise<ResourceRegistry> {
    const registry = new ResourceRegistry(documentPath, options);
    await registry.load();
    return registry;
  }

  /** Problems found on the last load */
  get warnings(): readonly string[] {
    return this.loadWarnings;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  /**
   * Replace in-memory state with the document on disk.
   * A corrupt document degrades to an empty registry and is copied aside.
   */
  async load(): Promise<void> {
    const result = await readRegistryDocument(this.documentPath);
    this.loadWarnings.length = 0;

    if (result.corruption) {
      const backupPath = await backupCorruptDocument(this.documentPath);
      this.logger.error(
        { err: result.corruption, backupPath },
        'Registry document is corrupt; starting from an empty registry'
      );
      this.loadWarnings.push(result.corruption.message);
    }
    for (const warning of result.warnings) {
      this.logger.warn({ documentPath: this.documentPath }, warning);
      this.loadWarnings.push(warning);
    }

    this.state = result.state;
    this.rebuildDependents();
    for (const { id, missingInputIds } of this.danglingDependencies()) {
      const warning = `${id} depends on unregistered inputs: ${missingInputIds.join(', ')}`;
      this.logger.warn({ id, missingInputIds }, 'Entry has dangling inputs');
      this.loadWarnings.push(warning);
    }
    this.dirty = result.corruption !== null || result.warnings.length > 0;
  }

  /**
   * Persist the whole state. Calls are serialized; each write reflects the state at its turn.
   */
  async save(): Promise<void> {
    const run = this.saving.then(async () => {
      const content = serializeRegistryDocument(this.state);
      this.dirty = false;
      try {
        await writeRegistryDocument(this.documentPath, content);
      } catch (err) {
        this.dirty = true;
        throw err;
      }
    });
    // Keep the chain alive after a failed write; the caller still sees the rejection.
    this.saving = run.catch(() => undefined);
    return run;
  }

  // --- registration -------------------------------------------------------

  /**
   * Insert or refresh a source file
   */
  async registerSource(filePath: string): Promise<string> {
    const absPath = path.resolve(filePath);
    const signature = await statSignature(absPath);
    if (!signature) {
      throw new NotFoundError('Source file', absPath);
    }
    const id = sourceId(absPath);

    const existing = this.state.sourceFiles.get(id);
    if (existing && existing.value.path !== absPath) {
      throw new ConflictError(id, 'source ID already registered for a different path', {
        existingPath: existing.value.path,
        attemptedPath: absPath,
      });
    }
    if (
      existing &&
      existing.value.size === signature.size &&
      existing.value.modifiedAt === signature.modifiedAt
    ) {
      return id;
    }
    if (existing) {
      // A refreshed signature must not hide the change from everything built on the old file.
      this.markStale(this.dependentsOf(id), { sourceId: id, reason: 'modified' });
    }

    const entry: SourceFileEntry = {
      kind: 'source',
      id,
      path: absPath,
      size: signature.size,
      modifiedAt: signature.modifiedAt,
      createdAt: existing?.value.createdAt ?? new Date().toISOString(),
    };
    this.state.sourceFiles.set(id, { value: entry, extra: existing?.extra ?? {} });
    this.dirty = true;
    this.logger.info({ id, path: absPath, refreshed: Boolean(existing) }, 'Registered source file');
    return id;
  }

  /**
   * Record a source's new on-disk signature (after a detected change)
   */
  refreshSource(id: string, signature: FileSignature): void {
    const stored = this.state.sourceFiles.get(id);
    if (!stored) throw new NotFoundError('Source file', id);
    stored.value = { ...stored.value, size: signature.size, modifiedAt: signature.modifiedAt };
    this.dirty = true;
  }

  /**
   * Register the output of an operation.
   *
   * Idempotent for an identical artifact. Replaces an entry that is stale or whose
   * backing file is gone. Any other path mismatch is a ConflictError.
   */
  async registerGenerated(params: RegisterGeneratedParams): Promise<string> {
    const kind: DerivedCategory = params.kind ?? 'generated';
    const parameters = canonicalizeParameters(params.parameters);
    const inputIds = [...params.inputIds];
    const id = derivedId(inputIds, params.operation, parameters);
    const absPath = path.resolve(params.path);

    const signature = await statSignature(absPath);
    if (!signature) {
      throw new NotFoundError('Generated file', absPath);
    }
    const prior = this.findDerived(id);
    const priorLive =
      prior !== undefined && prior.value.path !== absPath && (await fileExists(prior.value.path));

    // No awaits from here on: the registration lands completely or not at all.
    for (const inputId of inputIds) {
      if (!this.has(inputId)) {
        throw new NotFoundError('Input resource', inputId);
      }
    }
    if (inputIds.includes(id) || inputIds.some((inputId) => this.ancestorsOf(inputId).has(id))) {
      throw new ConflictError(id, 'registration would create a dependency cycle');
    }

    const existing = this.findDerived(id);
    let replacing = false;
    if (existing) {
      if (existing.value.kind !== kind) {
        throw new ConflictError(id, `already registered as ${existing.value.kind}`);
      }
      const stale = this.state.stale.has(id);
      if (existing.value.path === absPath && !stale) {
        return id;
      }
      // An entry that changed while we were checking the disk is treated as live.
      const live = existing === prior ? priorLive : true;
      if (!stale && existing.value.path !== absPath && live) {
        throw new ConflictError(id, 'ID already registered for a different path', {
          existingPath: existing.value.path,
          attemptedPath: absPath,
        });
      }
      replacing = true;
    }

    const createdAt = params.createdAt ?? new Date().toISOString();
    const entry: DerivedFileEntry = {
      kind,
      id,
      path: absPath,
      operation: params.operation,
      inputIds,
      parameters,
      size: signature.size,
      createdAt,
    };
    this.mapFor(kind).set(id, { value: entry, extra: existing?.extra ?? {} });
    this.state.operations.push({
      value: { outputId: id, operation: params.operation, inputIds, parameters, timestamp: createdAt },
      extra: {},
    });
    this.state.stale.delete(id);
    this.addEdges(id, inputIds);
    this.dirty = true;

    this.logger.info(
      { id, kind, operation: params.operation, inputIds, path: absPath, replacing },
      replacing ? 'Replaced derived artifact' : 'Registered derived artifact'
    );
    return id;
  }

  /**
   * Register an auxiliary JSON/plan document
   */
  registerMetadata(params: Omit<RegisterGeneratedParams, 'kind'>): Promise<string> {
    return this.registerGenerated({ ...params, kind: 'metadata' });
  }

  /**
   * Explicit cleanup of a derived entry. Entries that still feed others cannot be removed.
   */
  remove(id: string): DerivedFileEntry {
    const stored = this.findDerived(id);
    if (!stored) {
      if (this.state.sourceFiles.has(id)) {
        throw new ConflictError(id, 'source files are never removed from the registry');
      }
      throw new NotFoundError('Resource', id);
    }
    const consumers = [...(this.dependents.get(id) ?? [])];
    if (consumers.length) {
      throw new ConflictError(id, 'entry still has dependents', { dependents: consumers });
    }

    this.mapFor(stored.value.kind).delete(id);
    this.state.stale.delete(id);
    for (const inputId of stored.value.inputIds) {
      this.dependents.get(inputId)?.delete(id);
    }
    this.dirty = true;
    this.logger.info({ id }, 'Removed derived artifact');
    return freezeDerived(stored.value);
  }

  // --- lookup ------------------------------------------------------------

  has(id: string): boolean {
    return this.get(id) !== undefined;
  }

  get(id: string): ResourceEntry | undefined {
    const stored = this.state.sourceFiles.get(id) ?? this.findDerived(id);
    return stored ? freezeEntry(stored.value) : undefined;
  }

  /**
   * Path of any registered resource
   */
  resolve(id: string): string {
    const entry = this.get(id);
    if (!entry) throw new NotFoundError('Resource', id);
    return entry.path;
  }

  list(category?: ResourceCategory): ResourceEntry[] {
    const entries: ResourceEntry[] = [];
    if (!category || category === 'source') {
      for (const { value } of this.state.sourceFiles.values()) entries.push(freezeSource(value));
    }
    if (!category || category === 'generated') {
      for (const { value } of this.state.generatedFiles.values()) entries.push(freezeDerived(value));
    }
    if (!category || category === 'metadata') {
      for (const { value } of this.state.metadataFiles.values()) entries.push(freezeDerived(value));
    }
    return entries;
  }

  sources(): SourceFileEntry[] {
    return [...this.state.sourceFiles.values()].map(({ value }) => freezeSource(value));
  }

  operations(): OperationRecord[] {
    return this.state.operations.map(({ value }) => ({ ...value, inputIds: [...value.inputIds] }));
  }

  /**
   * Memoization check: the expected ID if its artifact is registered, on disk and not stale
   */
  async checkCache(
    inputIds: readonly string[],
    operation: string,
    parameters: OperationParameters
  ): Promise<string | null> {
    const id = derivedId(inputIds, operation, parameters);
    const stored = this.findDerived(id);
    if (!stored || this.isStale(id)) return null;
    if ((await this.changedSources(inputIds)).length > 0) return null;
    return (await fileExists(stored.value.path)) ? id : null;
  }

  /**
   * Sources upstream of `inputIds` whose file no longer matches the recorded signature
   */
  async changedSources(inputIds: readonly string[]): Promise<SourceFileEntry[]> {
    const upstream = new Set<string>();
    for (const inputId of inputIds) {
      upstream.add(inputId);
      for (const ancestor of this.ancestorsOf(inputId)) upstream.add(ancestor);
    }

    const changed: SourceFileEntry[] = [];
    for (const id of upstream) {
      const stored = this.state.sourceFiles.get(id);
      if (!stored) continue;
      const current = await statSignature(stored.value.path);
      if (!current || current.size !== stored.value.size || current.modifiedAt !== stored.value.modifiedAt) {
        changed.push(freezeSource(stored.value));
      }
    }
    return changed;
  }

  // --- dependency graph --------------------------------------------------

  /**
   * Derived entries whose recorded inputs are not registered (e.g. rows dropped on load)
   */
  danglingDependencies(): BrokenDependency[] {
    const broken: BrokenDependency[] = [];
    for (const map of [this.state.generatedFiles, this.state.metadataFiles]) {
      for (const [id, { value }] of map) {
        const missingInputIds = value.inputIds.filter((inputId) => !this.has(inputId));
        if (missingInputIds.length) broken.push({ id, missingInputIds });
      }
    }
    return broken;
  }

  /**
   * Remove entries with dangling inputs together with everything derived from them.
   * Files stay on disk so a later rebuild can adopt them again once the inputs are back.
   * @returns removed IDs, leaf-first
   */
  repairBrokenDependencies(): string[] {
    const doomed = new Set<string>();
    for (const { id } of this.danglingDependencies()) {
      doomed.add(id);
      for (const dependent of this.dependentsOf(id)) doomed.add(dependent);
    }

    const removed: string[] = [];
    let progress = true;
    while (doomed.size && progress) {
      progress = false;
      for (const id of doomed) {
        if (this.dependents.get(id)?.size) continue;
        this.remove(id);
        doomed.delete(id);
        removed.push(id);
        progress = true;
      }
    }
    if (removed.length) {
      this.logger.warn({ removed }, 'Removed entries with dangling inputs');
    }
    return removed;
  }

  /** Direct inputs of an entry */
  dependenciesOf(id: string): string[] {
    return [...(this.findDerived(id)?.value.inputIds ?? [])];
  }

  /**
   * Every entry that used `id` as an input, directly or transitively
   */
  dependentsOf(id: string): Set<string> {
    const found = new Set<string>();
    const queue = [id];
    while (queue.length) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const dependent of this.dependents.get(current) ?? []) {
        if (!found.has(dependent)) {
          found.add(dependent);
          queue.push(dependent);
        }
      }
    }
    return found;
  }

  /**
   * Every entry `id` was derived from, directly or transitively
   */
  ancestorsOf(id: string): Set<string> {
    const found = new Set<string>();
    const stack = this.dependenciesOf(id);
    while (stack.length) {
      const current = stack.pop();
      if (current === undefined || found.has(current)) continue;
      found.add(current);
      stack.push(...this.dependenciesOf(current));
    }
    return found;
  }

  // --- staleness ----------------------------------------------------------

  markStale(ids: Iterable<string>, cause: { sourceId: string; reason: SourceDivergenceKind }): string[] {
    const marked: string[] = [];
    const markedAt = new Date().toISOString();
    for (const id of ids) {
      if (!this.findDerived(id)) continue;
      const mark: StaleMark = { id, sourceId: cause.sourceId, reason: cause.reason, markedAt };
      this.state.stale.set(id, { value: mark, extra: {} });
      marked.push(id);
    }
    if (marked.length) {
      this.dirty = true;
      this.logger.info({ sourceId: cause.sourceId, reason: cause.reason, ids: marked }, 'Marked entries stale');
    }
    return marked;
  }

  /**
   * True if the entry or anything upstream of it is marked stale
   */
  isStale(id: string): boolean {
    if (this.state.stale.has(id)) return true;
    for (const ancestor of this.ancestorsOf(id)) {
      if (this.state.stale.has(ancestor)) return true;
    }
    return false;
  }

  staleEntries(): StaleMark[] {
    return [...this.state.stale.values()].map(({ value }) => ({ ...value }));
  }

  // --- internals ---------------------------------------------------------

  private findDerived(id: string): Stored<DerivedFileEntry> | undefined {
    return this.state.generatedFiles.get(id) ?? this.state.metadataFiles.get(id);
  }

  private mapFor(kind: DerivedCategory): Map<string, Stored<DerivedFileEntry>> {
    return kind === 'metadata' ? this.state.metadataFiles : this.state.generatedFiles;
  }

  private addEdges(id: string, inputIds: readonly string[]): void {
    for (const inputId of inputIds) {
      let consumers = this.dependents.get(inputId);
      if (!consumers) {
        consumers = new Set();
        this.dependents.set(inputId, consumers);
      }
      consumers.add(id);
    }
  }

  private rebuildDependents(): void {
    this.dependents.clear();
    for (const map of [this.state.generatedFiles, this.state.metadataFiles]) {
      for (const [id, { value }] of map) {
        this.addEdges(id, value.inputIds);
      }
    }
  }
}

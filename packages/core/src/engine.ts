/**
 * MediaCacheEngine main class
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { CacheManager } from './cacheManager.js';
import { ConflictError, NotFoundError, TransformError, errorMessage } from './errors.js';
import { assertValidOperation, canonicalizeParameters, sourceId } from './ids.js';
import { createLogger, logger as rootLogger, type Logger } from './logger.js';
import {
  artifactPath,
  createProvenance,
  removeProvenance,
  writeProvenance,
} from './provenance.js';
import { ResourceRecovery } from './recovery.js';
import { ResourceRegistry, statSignature } from './registry.js';
import type {
  CachedOperation,
  CanonicalParameters,
  CleanupOptions,
  CreateOperationParams,
  DerivedCategory,
  IntegrityReport,
  MediaCacheEngineOptions,
  OperationParameters,
  OperationRunResult,
  PlanOptions,
  PlanOutcome,
  RebuildReport,
  RunOperationParams,
  SourceDivergence,
} from './types.js';

/**
 * A Miss waiting for its artifact
 */
interface PendingPlan {
  id: string;
  kind: DerivedCategory;
  operation: string;
  inputIds: string[];
  parameters: CanonicalParameters;
  outputPath: string;
}

/** Plans kept when callers never commit or abandon */
const DEFAULT_MAX_PENDING_PLANS = 1024;

function defaultExtension(kind: DerivedCategory, firstInputPath: string | undefined): string {
  if (kind === 'metadata') return 'json';
  const ext = firstInputPath ? path.extname(firstInputPath).slice(1).toLowerCase() : '';
  return ext || 'bin';
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Operation aborted');
}

export class MediaCacheEngine {
  readonly registry: ResourceRegistry;
  readonly cache: CacheManager;
  readonly recovery: ResourceRecovery;
  private readonly options: MediaCacheEngineOptions;
  private readonly logger: Logger;
  private readonly pending = new Map<string, PendingPlan>();
  /** Transform runs in progress, one per output ID */
  private readonly inflight = new Map<string, Promise<OperationRunResult>>();
  private readonly maxPendingPlans: number;

  private constructor(options: MediaCacheEngineOptions, registry: ResourceRegistry) {
    this.options = options;
    this.maxPendingPlans = options.maxPendingPlans ?? DEFAULT_MAX_PENDING_PLANS;
    const parent = options.logger ?? rootLogger;
    this.logger = createLogger({ component: 'engine' }, parent);
    this.registry = registry;
    this.cache = new CacheManager(registry, { logger: parent });
    this.recovery = new ResourceRecovery(registry, { logger: parent });
  }

  /**
   * Open the registry document and wire up the components around it
   */
  static async open(options: MediaCacheEngineOptions): Promise<MediaCacheEngine> {
    const registryOptions = options.logger ? { logger: options.logger } : {};
    const registry = await ResourceRegistry.open(options.registryPath, registryOptions);
    return new MediaCacheEngine(options, registry);
  }

  /**
   * Hit with the existing artifact, or Miss with the ID and output path to produce.
   * A Miss is remembered until commit() or abandon().
   */
  async lookupOrPlan(
    inputs: readonly string[],
    operation: string,
    parameters: OperationParameters = {},
    options: PlanOptions = {}
  ): Promise<PlanOutcome> {
    assertValidOperation(operation);
    const canonical = canonicalizeParameters(parameters);
    for (const inputId of inputs) {
      if (!this.registry.has(inputId)) {
        throw new NotFoundError('Input resource', inputId);
      }
    }

    const outcome = await this.cache.getOrPlan(inputs, operation, canonical);
    // Freshness checks may have marked entries stale.
    await this.saveIfDirty();
    if (outcome.status === 'hit') {
      this.pending.delete(outcome.id);
      this.logger.debug({ id: outcome.id, operation }, 'Cache hit');
      return outcome;
    }

    const kind = options.kind ?? 'generated';
    const firstInput = inputs[0];
    const extension =
      options.extension ?? defaultExtension(kind, firstInput ? this.registry.resolve(firstInput) : undefined);
    const dir = kind === 'metadata' ? this.options.metadataDir : this.options.generatedDir;
    const outputPath = path.resolve(artifactPath(dir, outcome.id, extension));

    this.pending.delete(outcome.id);
    if (this.pending.size >= this.maxPendingPlans) {
      const oldest = this.pending.keys().next();
      if (!oldest.done) {
        this.pending.delete(oldest.value);
        this.logger.warn({ id: oldest.value }, 'Dropped oldest pending plan');
      }
    }
    this.pending.set(outcome.id, {
      id: outcome.id,
      kind,
      operation,
      inputIds: [...inputs],
      parameters: canonical,
      outputPath,
    });
    this.logger.debug({ id: outcome.id, operation, reason: outcome.reason }, 'Cache miss');
    return { status: 'miss', id: outcome.id, outputPath, reason: outcome.reason };
  }

  /**
   * Register the artifact produced for a planned Miss and persist the registry
   */
  async commit(outputId: string, filePath?: string): Promise<{ id: string; path: string }> {
    const plan = this.pending.get(outputId);
    if (!plan) {
      throw new NotFoundError('Pending plan', outputId);
    }
    const target = path.resolve(filePath ?? plan.outputPath);

    const signature = await statSignature(target);
    if (!signature || signature.size === 0) {
      throw new TransformError(plan.operation, `no non-empty output at ${target}`);
    }

    const createdAt = new Date().toISOString();
    await writeProvenance(
      target,
      createProvenance({
        id: plan.id,
        kind: plan.kind,
        operation: plan.operation,
        inputIds: plan.inputIds,
        parameters: plan.parameters,
        createdAt,
      })
    );

    let id: string;
    try {
      id = await this.registry.registerGenerated({
        inputIds: plan.inputIds,
        operation: plan.operation,
        parameters: plan.parameters,
        path: target,
        kind: plan.kind,
        createdAt,
      });
    } catch (err) {
      await removeProvenance(target);
      throw err;
    }
    if (id !== outputId) {
      throw new ConflictError(outputId, `registration derived a different ID (${id})`);
    }

    this.pending.delete(outputId);
    await this.registry.save();
    return { id, path: this.registry.resolve(id) };
  }

  /**
   * Drop a planned Miss; the registry is left as it was
   */
  abandon(outputId: string): boolean {
    return this.pending.delete(outputId);
  }

  resolve(id: string): string {
    return this.registry.resolve(id);
  }

  async registerSource(filePath: string): Promise<string> {
    const id = await this.registry.registerSource(filePath);
    await this.saveIfDirty();
    return id;
  }

  /**
   * Re-check one source file and mark everything derived from it stale if it changed
   */
  async invalidateSinceChange(sourcePath: string): Promise<SourceDivergence | null> {
    const id = sourceId(sourcePath);
    const entry = this.registry.get(id);
    if (!entry || entry.kind !== 'source') {
      throw new NotFoundError('Source file', sourcePath);
    }
    const divergence = await this.cache.checkSourceChange(id);
    await this.saveIfDirty();
    return divergence;
  }

  async checkSourceChanges(): Promise<SourceDivergence[]> {
    const divergences = await this.cache.checkSourceChanges();
    await this.saveIfDirty();
    return divergences;
  }

  async cleanup(options: CleanupOptions = {}): Promise<string[]> {
    const removed = await this.cache.cleanup(options);
    await this.saveIfDirty();
    return removed;
  }

  /**
   * Rebuild the registry from the configured directories
   */
  async rebuild(): Promise<RebuildReport> {
    const report = await this.recovery.scanAndRebuild({
      sourceDirs: [this.options.sourceDir],
      generatedDirs: [this.options.generatedDir],
      metadataDirs: [this.options.metadataDir],
    });
    await this.saveIfDirty();
    return report;
  }

  integrityReport(): Promise<IntegrityReport> {
    return this.recovery.validateIntegrity();
  }

  /**
   * Drop entries whose inputs are no longer registered, with everything derived from them
   */
  async repairDependencies(): Promise<string[]> {
    const removed = this.registry.repairBrokenDependencies();
    await this.saveIfDirty();
    return removed;
  }

  /**
   * Create a cached operation: a callable that returns the memoized artifact or
   * runs the transform, verifies its output and commits it
   */
  createOperation(params: CreateOperationParams): CachedOperation {
    const operation = assertValidOperation(params.operation);
    const { extension, transform } = params;
    const kind = params.kind ?? 'generated';

    const run = async (runParams: RunOperationParams): Promise<OperationRunResult> => {
      return this.execute(operation, kind, extension, transform, runParams);
    };
    run.operation = operation;
    return run;
  }

  async close(): Promise<void> {
    await this.saveIfDirty();
  }

  private async execute(
    operation: string,
    kind: DerivedCategory,
    extension: string,
    transform: CreateOperationParams['transform'],
    params: RunOperationParams
  ): Promise<OperationRunResult> {
    const outcome = await this.lookupOrPlan(params.inputs, operation, params.parameters ?? {}, { extension, kind });
    if (outcome.status === 'hit') {
      return { id: outcome.id, path: outcome.path, cached: true };
    }

    // Identical requests share one run and one output path.
    const running = this.inflight.get(outcome.id);
    if (running) {
      const shared = await running;
      return { ...shared, cached: true };
    }
    const attempt = this.runTransform(operation, transform, outcome, params);
    this.inflight.set(outcome.id, attempt);
    try {
      return await attempt;
    } finally {
      this.inflight.delete(outcome.id);
    }
  }

  private async runTransform(
    operation: string,
    transform: CreateOperationParams['transform'],
    outcome: Extract<PlanOutcome, { status: 'miss' }>,
    params: RunOperationParams
  ): Promise<OperationRunResult> {
    const { inputs, signal } = params;
    const plan = this.pending.get(outcome.id);
    if (!plan) {
      throw new NotFoundError('Pending plan', outcome.id);
    }
    const { outputPath } = outcome;

    try {
      if (signal?.aborted) throw abortReason(signal);
      await fs.mkdir(path.dirname(outputPath), { recursive: true });

      const result = await transform({
        operation,
        inputPaths: inputs.map((id) => this.registry.resolve(id)),
        parameters: plan.parameters,
        outputPath,
        ...(signal ? { signal } : {}),
      });
      if (signal?.aborted) throw abortReason(signal);
      if (!result.success) {
        throw new TransformError(operation, 'transform reported failure', result.log);
      }

      const committed = await this.commit(outcome.id, outputPath);
      return { ...committed, cached: false };
    } catch (err) {
      this.abandon(outcome.id);
      // No partial artifact survives a failed or cancelled attempt, but a registered one stays.
      if (this.registry.get(outcome.id)?.path !== outputPath) {
        await fs.rm(outputPath, { force: true });
      }
      this.logger.warn({ id: outcome.id, operation, err: errorMessage(err) }, 'Operation failed');
      throw err;
    }
  }

  private async saveIfDirty(): Promise<void> {
    if (this.registry.isDirty) {
      await this.registry.save();
    }
  }
}

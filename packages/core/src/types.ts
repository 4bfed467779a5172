/**
 * media-cache type definitions
 */

import type { Logger } from './logger.js';

/**
 * A parameter value after canonicalization
 */
export type CanonicalValue =
  | string
  | number
  | boolean
  | null
  | readonly CanonicalValue[]
  | { readonly [key: string]: CanonicalValue };

/**
 * Parameter mapping after canonicalization (sorted keys, fixed-precision numbers)
 */
export type CanonicalParameters = { readonly [key: string]: CanonicalValue };

/**
 * Parameters as supplied by callers, before canonicalization
 */
export type OperationParameters = Record<string, unknown>;

export type ResourceCategory = 'source' | 'generated' | 'metadata';

/** Derived categories (entries produced by an operation) */
export type DerivedCategory = Exclude<ResourceCategory, 'source'>;

export interface SourceFileEntry {
  kind: 'source';
  id: string;
  /** Absolute path */
  path: string;
  size: number;
  /** mtime in milliseconds */
  modifiedAt: number;
  /** First registration time */
  createdAt: string;
}

export interface DerivedFileEntry {
  kind: DerivedCategory;
  id: string;
  /** Absolute path */
  path: string;
  operation: string;
  inputIds: readonly string[];
  parameters: CanonicalParameters;
  /** Size in bytes at registration */
  size: number;
  createdAt: string;
}

export type ResourceEntry = SourceFileEntry | DerivedFileEntry;

/**
 * Append-only operation log entry
 */
export interface OperationRecord {
  outputId: string;
  operation: string;
  inputIds: readonly string[];
  parameters: CanonicalParameters;
  timestamp: string;
}

export interface StaleMark {
  id: string;
  /** Source whose change made this entry stale */
  sourceId: string;
  reason: SourceDivergenceKind;
  markedAt: string;
}

export interface BrokenDependency {
  id: string;
  /** Recorded inputs that are not registered */
  missingInputIds: string[];
}

export interface RegisterGeneratedParams {
  inputIds: readonly string[];
  operation: string;
  parameters: OperationParameters;
  path: string;
  /** Defaults to 'generated' */
  kind?: DerivedCategory;
  /** Creation time to record, defaults to now */
  createdAt?: string;
}

export interface RegistryOptions {
  logger?: Logger;
}

export type CacheMissReason = 'absent' | 'missing-file' | 'stale';

export type CacheOutcome =
  | { status: 'hit'; id: string; path: string }
  | { status: 'miss'; id: string; reason: CacheMissReason };

export interface FileSignature {
  size: number;
  modifiedAt: number;
}

export type SourceDivergenceKind = 'modified' | 'missing';

export interface SourceDivergence {
  sourceId: string;
  kind: SourceDivergenceKind;
  recorded: FileSignature;
  current: FileSignature | null;
  /** Entries marked stale because of this divergence */
  staleIds: string[];
}

export interface CleanupOptions {
  /** Remove entries created before now - olderThanMs */
  olderThanMs?: number;
  /** Remove stale entries, default true */
  includeStale?: boolean;
  /** Delete backing files, default true */
  deleteFiles?: boolean;
}

export interface RecoveryDirectories {
  sourceDirs?: readonly string[];
  generatedDirs?: readonly string[];
  metadataDirs?: readonly string[];
}

export type OrphanReason =
  | 'no-provenance'
  | 'invalid-provenance'
  | 'id-mismatch'
  | 'unresolved-inputs';

export interface OrphanedFile {
  path: string;
  reason: OrphanReason;
  detail?: string;
}

export interface RebuildConflict {
  path: string;
  id: string;
  existingPath: string;
}

export interface RebuildReport {
  registered: Record<ResourceCategory, string[]>;
  unchanged: Record<ResourceCategory, string[]>;
  orphaned: OrphanedFile[];
  conflicts: RebuildConflict[];
  missingDirectories: string[];
}

export type IntegrityReport = Record<ResourceCategory, string[]>;

/**
 * Provenance sidecar written next to every derived artifact
 */
export interface ProvenanceManifest {
  manifestVersion: string;
  id: string;
  kind: DerivedCategory;
  operation: string;
  inputIds: string[];
  parameters: CanonicalParameters;
  createdAt: string;
}

/**
 * Request handed to a transform (the external encoder)
 */
export interface TransformRequest {
  operation: string;
  inputPaths: string[];
  parameters: CanonicalParameters;
  outputPath: string;
  signal?: AbortSignal;
}

export interface TransformResult {
  success: boolean;
  /** Textual log of the run */
  log: string;
}

export type Transform = (request: TransformRequest) => Promise<TransformResult>;

export type PlanOutcome =
  | { status: 'hit'; id: string; path: string }
  | { status: 'miss'; id: string; outputPath: string; reason: CacheMissReason };

export interface CreateOperationParams {
  operation: string;
  /** Output file extension, without the dot */
  extension: string;
  /** Defaults to 'generated' */
  kind?: DerivedCategory;
  transform: Transform;
}

export interface PlanOptions {
  /** Output extension; defaults to the first input's extension ('json' for metadata) */
  extension?: string;
  /** Defaults to 'generated' */
  kind?: DerivedCategory;
}

export interface RunOperationParams {
  /** Input IDs, in order */
  inputs: readonly string[];
  parameters?: OperationParameters;
  signal?: AbortSignal;
}

export interface OperationRunResult {
  id: string;
  path: string;
  cached: boolean;
}

/**
 * Callable operation returned by MediaCacheEngine.createOperation
 */
export interface CachedOperation {
  (params: RunOperationParams): Promise<OperationRunResult>;
  operation: string;
}

export interface MediaCacheEngineOptions {
  /** Registry JSON document */
  registryPath: string;
  sourceDir: string;
  generatedDir: string;
  metadataDir: string;
  /** Planned misses kept until commit or abandon; the oldest is dropped beyond this. Default 1024 */
  maxPendingPlans?: number;
  logger?: Logger;
}

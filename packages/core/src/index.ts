/**
 * media-cache - content-addressed registry for media artifacts
 *
 * Core concepts:
 * - Same inputs + operation + parameters → same ID
 * - Source change → everything downstream is stale
 * - The filesystem alone is enough to rebuild the registry
 */

export { MediaCacheEngine } from './engine.js';
export { ResourceRegistry, statSignature, fileExists } from './registry.js';
export { CacheManager } from './cacheManager.js';
export { ResourceRecovery } from './recovery.js';

export {
  SOURCE_ID_PREFIX,
  FLOAT_PRECISION,
  DIGEST_LENGTH,
  sourceId,
  isSourceId,
  assertValidOperation,
  canonicalizeParameters,
  canonicalText,
  derivedId,
  parseDerivedId,
} from './ids.js';

export {
  PROVENANCE_SUFFIX,
  PROVENANCE_VERSION,
  artifactPath,
  idFromArtifactName,
  provenancePath,
  readProvenance,
} from './provenance.js';

export { REGISTRY_DOCUMENT_VERSION } from './registryDocument.js';

export {
  MediaCacheError,
  NotFoundError,
  ConflictError,
  CorruptStateError,
  IntegrityViolation,
  ValidationError,
  TransformError,
  errorMessage,
} from './errors.js';

export { runCommand, createCommandTransform, createEncoderTransform, expandArgs } from './command.js';
export type { CommandOptions, CreateCommandTransformParams } from './command.js';

export { loadConfig } from './config.js';
export type { MediaCacheConfig, LogLevel } from './config.js';

export { logger, createLogger, createRootLogger } from './logger.js';
export type { Logger, LogDestination } from './logger.js';

export type {
  BrokenDependency,
  CanonicalValue,
  CanonicalParameters,
  OperationParameters,
  ResourceCategory,
  DerivedCategory,
  SourceFileEntry,
  DerivedFileEntry,
  ResourceEntry,
  OperationRecord,
  StaleMark,
  RegisterGeneratedParams,
  RegistryOptions,
  CacheMissReason,
  CacheOutcome,
  FileSignature,
  SourceDivergenceKind,
  SourceDivergence,
  CleanupOptions,
  RecoveryDirectories,
  OrphanReason,
  OrphanedFile,
  RebuildConflict,
  RebuildReport,
  IntegrityReport,
  ProvenanceManifest,
  TransformRequest,
  TransformResult,
  Transform,
  PlanOutcome,
  PlanOptions,
  CreateOperationParams,
  RunOperationParams,
  OperationRunResult,
  CachedOperation,
  MediaCacheEngineOptions,
} from './types.js';

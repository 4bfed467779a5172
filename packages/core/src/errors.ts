/**
 * Error classes
 */

import type { IntegrityReport } from './types.js';

/**
 * Base error class for all media-cache errors
 */
export class MediaCacheError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MediaCacheError';
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * An ID (or the file behind a path) is unknown
 */
export class NotFoundError extends MediaCacheError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 'NOT_FOUND', { resource, identifier });
    this.name = 'NotFoundError';
  }
}

/**
 * Same ID claimed by two different paths, or a registration that would close a cycle
 */
export class ConflictError extends MediaCacheError {
  constructor(id: string, message: string, details: Record<string, unknown> = {}) {
    super(`Conflict on ${id}: ${message}`, 'CONFLICT', { id, ...details });
    this.name = 'ConflictError';
  }
}

/**
 * Persisted registry document could not be read
 */
export class CorruptStateError extends MediaCacheError {
  constructor(documentPath: string, reason: string) {
    super(`Registry document ${documentPath} is corrupt: ${reason}`, 'CORRUPT_STATE', {
      documentPath,
      reason,
    });
    this.name = 'CorruptStateError';
  }
}

/**
 * Registry entries whose backing files are missing
 */
export class IntegrityViolation extends MediaCacheError {
  public readonly report: IntegrityReport;

  constructor(report: IntegrityReport) {
    const missing = report.source.length + report.generated.length + report.metadata.length;
    super(`${missing} registry entries have no backing file`, 'INTEGRITY_VIOLATION', {
      source: report.source,
      generated: report.generated,
      metadata: report.metadata,
    });
    this.name = 'IntegrityViolation';
    this.report = report;
  }
}

export class ValidationError extends MediaCacheError {
  constructor(field: string, message: string) {
    super(`Validation failed for ${field}: ${message}`, 'VALIDATION_ERROR', { field, message });
    this.name = 'ValidationError';
  }
}

/**
 * External transform failed or produced no output
 */
export class TransformError extends MediaCacheError {
  constructor(operation: string, message: string, log = '') {
    super(`Operation ${operation} failed: ${message}`, 'TRANSFORM_FAILED', {
      operation,
      log: log.substring(0, 1000),
    });
    this.name = 'TransformError';
  }
}

/**
 * Node fs error code, if any
 */
export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

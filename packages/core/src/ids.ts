/**
 * Deterministic identifiers for source files and derived artifacts
 */

import { createHash } from 'crypto';
import { ValidationError } from './errors.js';
import type { CanonicalParameters, CanonicalValue, OperationParameters } from './types.js';

/** Namespace prefix of source IDs */
export const SOURCE_ID_PREFIX = 'src_';

/** Decimal places kept for non-integer numbers */
export const FLOAT_PRECISION = 6;

/** Hex characters of the SHA-256 digest kept in derived IDs */
export const DIGEST_LENGTH = 16;

/** Bumped whenever the canonical text layout changes */
const DERIVATION_VERSION = 'v1';

const OPERATION_PATTERN = /^[a-z][a-z0-9_-]*$/;
const DERIVED_ID_PATTERN = new RegExp(`^([a-z][a-z0-9_-]*)_([0-9a-f]{${DIGEST_LENGTH}})$`);

/**
 * Source ID from a filename (or path).
 *
 * Directories are stripped and the whole name, extension included, is lowercased,
 * so `Clip.MP4` and `clip.mp4` map to the same ID. Runs of anything outside
 * `[a-z0-9]` collapse to a single `_`.
 */
export function sourceId(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? '';
  const normalized = base
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return `${SOURCE_ID_PREFIX}${normalized || 'unnamed'}`;
}

export function isSourceId(id: string): boolean {
  return id.startsWith(SOURCE_ID_PREFIX);
}

export function assertValidOperation(operation: string): string {
  if (typeof operation !== 'string' || !OPERATION_PATTERN.test(operation)) {
    throw new ValidationError(
      'operation',
      `"${String(operation)}" must start with a lowercase letter and contain only [a-z0-9_-]`
    );
  }
  // Keeps derived IDs out of the source namespace.
  if (operation === 'src' || operation.startsWith(SOURCE_ID_PREFIX)) {
    throw new ValidationError('operation', `"${operation}" is reserved for source IDs`);
  }
  return operation;
}

function canonicalNumber(value: number, field: string): number {
  if (!Number.isFinite(value)) {
    throw new ValidationError(field, `number ${value} is not finite`);
  }
  const rounded = Number(value.toFixed(FLOAT_PRECISION));
  // Also folds -0 into 0
  return rounded === 0 ? 0 : rounded;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function canonicalValue(value: unknown, field: string): CanonicalValue | undefined {
  if (value === undefined) return undefined;
  if (value === null) return null;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return canonicalNumber(value, field);
    case 'object':
      break;
    default:
      throw new ValidationError(field, `unsupported ${typeof value} value`);
  }

  if (Array.isArray(value)) {
    // Order is meaningful for arrays; undefined holes become null as in JSON.
    return value.map((item, index) => canonicalValue(item, `${field}[${index}]`) ?? null);
  }
  if (!isPlainObject(value)) {
    throw new ValidationError(field, 'only plain objects, arrays and primitives are supported');
  }
  return canonicalObject(Object.entries(value), field);
}

function canonicalObject(entries: [string, unknown][], field: string): CanonicalParameters {
  const out: Record<string, CanonicalValue> = {};
  const keys = new Set<string>();
  const normalized: [string, CanonicalValue][] = [];

  for (const [rawKey, rawValue] of entries) {
    const key = rawKey.trim();
    const childField = field ? `${field}.${key}` : key;
    if (keys.has(key)) {
      throw new ValidationError(childField, 'duplicate key after trimming whitespace');
    }
    keys.add(key);
    const value = canonicalValue(rawValue, childField);
    if (value !== undefined) normalized.push([key, value]);
  }

  normalized.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [key, value] of normalized) {
    out[key] = value;
  }
  return out;
}

/**
 * Normalize a parameter mapping.
 *
 * The result is what gets hashed, persisted and handed to transforms, so the
 * "same settings" always hash the same.
 */
export function canonicalizeParameters(parameters: OperationParameters = {}): CanonicalParameters {
  if (parameters === null || typeof parameters !== 'object' || Array.isArray(parameters)) {
    throw new ValidationError('parameters', 'must be an object');
  }
  return canonicalObject(Object.entries(parameters), '');
}

function encodeNumber(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return value.toFixed(FLOAT_PRECISION).replace(/0+$/, '');
}

function isCanonicalArray(value: CanonicalValue): value is readonly CanonicalValue[] {
  return Array.isArray(value);
}

function encode(value: CanonicalValue): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return encodeNumber(value);
  if (typeof value === 'string' || typeof value === 'boolean') return JSON.stringify(value);
  if (isCanonicalArray(value)) {
    return '[' + value.map(encode).join(',') + ']';
  }
  return encodeObject(value);
}

function encodeObject(value: CanonicalParameters): string {
  const keys = Object.keys(value).sort();
  const pairs = keys.map((k) => {
    const item = value[k];
    return JSON.stringify(k) + ':' + (item === undefined ? 'null' : encode(item));
  });
  return '{' + pairs.join(',') + '}';
}

/**
 * Stable textual form of a parameter mapping
 */
export function canonicalText(parameters: OperationParameters): string {
  return encodeObject(canonicalizeParameters(parameters));
}

/**
 * Derived ID: `<operation>_<first 16 hex chars of sha256>`.
 *
 * Input order is part of the identity; parameter key order is not.
 */
export function derivedId(
  inputIds: readonly string[],
  operation: string,
  parameters: OperationParameters = {}
): string {
  assertValidOperation(operation);
  inputIds.forEach((id, index) => {
    if (typeof id !== 'string' || !id) {
      throw new ValidationError(`inputIds[${index}]`, 'must be a non-empty string');
    }
  });

  const content = [
    DERIVATION_VERSION,
    `op=${operation}`,
    `inputs=${JSON.stringify(inputIds)}`,
    `params=${canonicalText(parameters)}`,
  ].join('\n');
  const digest = createHash('sha256').update(content).digest('hex').slice(0, DIGEST_LENGTH);
  return `${operation}_${digest}`;
}

/**
 * Split a derived ID into operation and digest
 */
export function parseDerivedId(id: string): { operation: string; digest: string } | null {
  if (isSourceId(id)) return null;
  const match = DERIVED_ID_PATTERN.exec(id);
  if (!match) return null;
  const [, operation, digest] = match;
  if (!operation || !digest) return null;
  return { operation, digest };
}

/**
 * Registry document: the single JSON file that persists registry state
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { CorruptStateError, errorCode, errorMessage } from './errors.js';
import type {
  CanonicalParameters,
  CanonicalValue,
  DerivedFileEntry,
  OperationRecord,
  SourceFileEntry,
  StaleMark,
} from './types.js';

/** Current document version */
export const REGISTRY_DOCUMENT_VERSION = 1;

const canonicalValueSchema: z.ZodType<CanonicalValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(canonicalValueSchema),
    z.record(z.string(), canonicalValueSchema),
  ])
);

const parametersSchema: z.ZodType<CanonicalParameters> = z.record(z.string(), canonicalValueSchema);

// Entries keep unknown fields so newer writers do not lose data through older readers.
const sourceEntrySchema = z
  .object({
    id: z.string().min(1),
    path: z.string().min(1),
    size: z.number().nonnegative(),
    modifiedAt: z.number(),
    createdAt: z.string(),
  })
  .passthrough();

const derivedEntrySchema = z
  .object({
    id: z.string().min(1),
    path: z.string().min(1),
    operation: z.string().min(1),
    inputIds: z.array(z.string().min(1)),
    parameters: parametersSchema,
    size: z.number().nonnegative().default(0),
    createdAt: z.string(),
  })
  .passthrough();

const operationRecordSchema = z
  .object({
    outputId: z.string().min(1),
    operation: z.string().min(1),
    inputIds: z.array(z.string()),
    parameters: parametersSchema,
    timestamp: z.string(),
  })
  .passthrough();

const staleMarkSchema = z
  .object({
    id: z.string().min(1),
    sourceId: z.string(),
    reason: z.enum(['modified', 'missing']),
    markedAt: z.string(),
  })
  .passthrough();

/** Top-level keys owned by the registry; everything else is carried through untouched */
const KNOWN_KEYS = new Set([
  'version',
  'updatedAt',
  'sourceFiles',
  'generatedFiles',
  'metadataFiles',
  'operations',
  'dependencies',
  'stale',
]);

/** Entry plus whatever unknown fields it was loaded with */
export interface Stored<T> {
  value: T;
  extra: Record<string, unknown>;
}

export interface RegistryState {
  sourceFiles: Map<string, Stored<SourceFileEntry>>;
  generatedFiles: Map<string, Stored<DerivedFileEntry>>;
  metadataFiles: Map<string, Stored<DerivedFileEntry>>;
  operations: Stored<OperationRecord>[];
  stale: Map<string, Stored<StaleMark>>;
  /** Unknown top-level fields */
  extra: Record<string, unknown>;
}

export interface LoadResult {
  state: RegistryState;
  /** Non-fatal problems (dropped entries) */
  warnings: string[];
  /** Set when the whole document had to be discarded */
  corruption: CorruptStateError | null;
}

export function emptyState(): RegistryState {
  return {
    sourceFiles: new Map(),
    generatedFiles: new Map(),
    metadataFiles: new Map(),
    operations: [],
    stale: new Map(),
    extra: {},
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function splitExtra(
  raw: Record<string, unknown>,
  known: readonly string[]
): Record<string, unknown> {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!known.includes(key)) extra[key] = value;
  }
  return extra;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function readSection<O extends Record<string, unknown>, T>(
  raw: Record<string, unknown>,
  section: string,
  schema: z.ZodType<O>,
  build: (parsed: O, key: string) => T,
  known: readonly string[],
  warnings: string[]
): Map<string, Stored<T>> {
  const out = new Map<string, Stored<T>>();
  const value = raw[section];
  if (value === undefined) return out;
  if (!isRecord(value)) {
    warnings.push(`section "${section}" is not an object; ignored`);
    return out;
  }
  for (const [key, entry] of Object.entries(value)) {
    const parsed = schema.safeParse(entry);
    if (!parsed.success) {
      warnings.push(`${section}.${key} dropped: ${formatIssues(parsed.error)}`);
      continue;
    }
    out.set(key, { value: build(parsed.data, key), extra: splitExtra(parsed.data, known) });
  }
  return out;
}

const SOURCE_KEYS = ['id', 'path', 'size', 'modifiedAt', 'createdAt', 'kind'] as const;
const DERIVED_KEYS = [
  'id',
  'path',
  'operation',
  'inputIds',
  'parameters',
  'size',
  'createdAt',
  'kind',
] as const;
const OPERATION_KEYS = ['outputId', 'operation', 'inputIds', 'parameters', 'timestamp'] as const;
const STALE_KEYS = ['id', 'sourceId', 'reason', 'markedAt'] as const;

/**
 * Parse document text into registry state
 */
export function parseRegistryDocument(text: string, documentPath: string): LoadResult {
  const warnings: string[] = [];

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return {
      state: emptyState(),
      warnings,
      corruption: new CorruptStateError(documentPath, `invalid JSON (${errorMessage(err)})`),
    };
  }
  if (!isRecord(raw)) {
    return {
      state: emptyState(),
      warnings,
      corruption: new CorruptStateError(documentPath, 'root is not an object'),
    };
  }
  const version = raw['version'];
  if (version !== undefined && version !== REGISTRY_DOCUMENT_VERSION) {
    return {
      state: emptyState(),
      warnings,
      corruption: new CorruptStateError(documentPath, `unsupported version ${String(version)}`),
    };
  }

  const sourceFiles = readSection(
    raw,
    'sourceFiles',
    sourceEntrySchema,
    (e, key): SourceFileEntry => ({
      kind: 'source',
      id: key,
      path: e.path,
      size: e.size,
      modifiedAt: e.modifiedAt,
      createdAt: e.createdAt,
    }),
    SOURCE_KEYS,
    warnings
  );

  const derivedSection = (section: string, kind: DerivedFileEntry['kind']) =>
    readSection(
      raw,
      section,
      derivedEntrySchema,
      (e, key): DerivedFileEntry => ({
        kind,
        id: key,
        path: e.path,
        operation: e.operation,
        inputIds: e.inputIds,
        parameters: e.parameters,
        size: e.size,
        createdAt: e.createdAt,
      }),
      DERIVED_KEYS,
      warnings
    );

  const stale = readSection(
    raw,
    'stale',
    staleMarkSchema,
    (e, key): StaleMark => ({
      id: key,
      sourceId: e.sourceId,
      reason: e.reason,
      markedAt: e.markedAt,
    }),
    STALE_KEYS,
    warnings
  );

  const operations: Stored<OperationRecord>[] = [];
  const rawOperations = raw['operations'];
  if (Array.isArray(rawOperations)) {
    rawOperations.forEach((entry: unknown, index) => {
      const parsed = operationRecordSchema.safeParse(entry);
      if (!parsed.success) {
        warnings.push(`operations[${index}] dropped: ${formatIssues(parsed.error)}`);
        return;
      }
      const { outputId, operation, inputIds, parameters, timestamp } = parsed.data;
      operations.push({
        value: { outputId, operation, inputIds, parameters, timestamp },
        extra: splitExtra(parsed.data, OPERATION_KEYS),
      });
    });
  } else if (rawOperations !== undefined) {
    warnings.push('section "operations" is not an array; ignored');
  }

  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!KNOWN_KEYS.has(key)) extra[key] = value;
  }

  return {
    state: {
      sourceFiles,
      generatedFiles: derivedSection('generatedFiles', 'generated'),
      metadataFiles: derivedSection('metadataFiles', 'metadata'),
      operations,
      stale,
      extra,
    },
    warnings,
    corruption: null,
  };
}

function storedToJson<T extends object>(stored: Stored<T>, omit: readonly string[] = []) {
  const out: Record<string, unknown> = { ...stored.extra };
  for (const [key, value] of Object.entries(stored.value)) {
    if (!omit.includes(key)) out[key] = value;
  }
  return out;
}

function mapToJson<T extends object>(map: Map<string, Stored<T>>, omit: readonly string[] = []) {
  const out: Record<string, unknown> = {};
  for (const [id, stored] of [...map.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    out[id] = storedToJson(stored, omit);
  }
  return out;
}

/**
 * Serialize registry state
 */
export function serializeRegistryDocument(state: RegistryState, updatedAt = new Date()): string {
  const dependencies: Record<string, string[]> = {};
  for (const map of [state.generatedFiles, state.metadataFiles]) {
    for (const [id, { value }] of map) {
      dependencies[id] = [...value.inputIds];
    }
  }

  const doc = {
    ...state.extra,
    version: REGISTRY_DOCUMENT_VERSION,
    updatedAt: updatedAt.toISOString(),
    // `kind` is implied by the section an entry lives in.
    sourceFiles: mapToJson(state.sourceFiles, ['kind']),
    generatedFiles: mapToJson(state.generatedFiles, ['kind']),
    metadataFiles: mapToJson(state.metadataFiles, ['kind']),
    operations: state.operations.map((op) => storedToJson(op)),
    dependencies,
    stale: mapToJson(state.stale),
  };
  return JSON.stringify(doc, null, 2);
}

/**
 * Read the document from disk. A missing file is an empty registry, not corruption.
 */
export async function readRegistryDocument(documentPath: string): Promise<LoadResult> {
  let text: string;
  try {
    text = await fs.readFile(documentPath, 'utf-8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      return { state: emptyState(), warnings: [], corruption: null };
    }
    return {
      state: emptyState(),
      warnings: [],
      corruption: new CorruptStateError(documentPath, `unreadable (${errorMessage(err)})`),
    };
  }
  return parseRegistryDocument(text, documentPath);
}

/**
 * Write through a temp file and rename so readers never see a half-written document
 */
export async function writeRegistryDocument(documentPath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(documentPath), { recursive: true });
  const random = Math.random().toString(36).slice(2, 10);
  const tempPath = `${documentPath}.tmp-${random}`;
  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, documentPath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

/**
 * Keep a copy of a corrupt document before it gets overwritten by the next save
 * @returns backup path, or null when there was nothing to copy
 */
export async function backupCorruptDocument(documentPath: string, now = new Date()): Promise<string | null> {
  const stamp = now.toISOString().replace(/[:.]/g, '-');
  const backupPath = `${documentPath}.corrupt-${stamp}`;
  try {
    await fs.copyFile(documentPath, backupPath);
    return backupPath;
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return null;
    throw err;
  }
}

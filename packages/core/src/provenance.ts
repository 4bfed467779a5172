/**
 * Provenance sidecars: the naming convention that lets recovery rebuild
 * derived entries from the filesystem alone
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { errorCode, errorMessage } from './errors.js';
import type { DerivedFileEntry, ProvenanceManifest } from './types.js';

/** Sidecar suffix appended to the artifact filename */
export const PROVENANCE_SUFFIX = '.provenance.json';

/** Current provenance manifest version */
export const PROVENANCE_VERSION = '1.0.0';

const provenanceSchema = z
  .object({
    manifestVersion: z.string(),
    id: z.string().min(1),
    kind: z.enum(['generated', 'metadata']),
    operation: z.string().min(1),
    inputIds: z.array(z.string().min(1)),
    parameters: z.record(z.string(), z.unknown()),
    createdAt: z.string(),
  })
  .passthrough();

/**
 * Artifact path for a derived ID: `<dir>/<id>.<extension>`
 */
export function artifactPath(dir: string, id: string, extension: string): string {
  const ext = extension.replace(/^\.+/, '');
  return path.join(dir, ext ? `${id}.${ext}` : id);
}

/**
 * ID encoded in an artifact filename (the part before the first dot)
 */
export function idFromArtifactName(filePath: string): string {
  const base = path.basename(filePath);
  const dot = base.indexOf('.');
  return dot === -1 ? base : base.slice(0, dot);
}

export function provenancePath(artifact: string): string {
  return `${artifact}${PROVENANCE_SUFFIX}`;
}

export function isProvenancePath(filePath: string): boolean {
  return filePath.endsWith(PROVENANCE_SUFFIX);
}

export function createProvenance(
  entry: Pick<DerivedFileEntry, 'id' | 'kind' | 'operation' | 'inputIds' | 'parameters' | 'createdAt'>
): ProvenanceManifest {
  return {
    manifestVersion: PROVENANCE_VERSION,
    id: entry.id,
    kind: entry.kind,
    operation: entry.operation,
    inputIds: [...entry.inputIds],
    parameters: entry.parameters,
    createdAt: entry.createdAt,
  };
}

export async function writeProvenance(artifact: string, manifest: ProvenanceManifest): Promise<void> {
  await fs.writeFile(provenancePath(artifact), JSON.stringify(manifest, null, 2), 'utf-8');
}

/** Sidecar as read from disk; parameters are not trusted to be canonical yet */
export type RawProvenance = Omit<ProvenanceManifest, 'parameters'> & {
  parameters: Record<string, unknown>;
};

export type ProvenanceReadResult =
  | { status: 'ok'; manifest: RawProvenance }
  | { status: 'missing' }
  | { status: 'invalid'; reason: string };

/**
 * Read and validate the sidecar of an artifact
 */
export async function readProvenance(artifact: string): Promise<ProvenanceReadResult> {
  let text: string;
  try {
    text = await fs.readFile(provenancePath(artifact), 'utf-8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return { status: 'missing' };
    return { status: 'invalid', reason: errorMessage(err) };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { status: 'invalid', reason: `invalid JSON (${errorMessage(err)})` };
  }
  const parsed = provenanceSchema.safeParse(raw);
  if (!parsed.success) {
    return { status: 'invalid', reason: parsed.error.issues.map((i) => i.message).join('; ') };
  }
  const { manifestVersion, id, kind, operation, inputIds, parameters, createdAt } = parsed.data;
  return {
    status: 'ok',
    manifest: { manifestVersion, id, kind, operation, inputIds, parameters, createdAt },
  };
}

/**
 * Remove a sidecar if present
 */
export async function removeProvenance(artifact: string): Promise<void> {
  await fs.rm(provenancePath(artifact), { force: true });
}

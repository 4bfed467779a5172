/**
 * Registry document parsing and serialization tests
 */

import { describe, it, expect } from 'vitest';
import {
  REGISTRY_DOCUMENT_VERSION,
  emptyState,
  parseRegistryDocument,
  serializeRegistryDocument,
} from '../registryDocument.js';
import { CorruptStateError } from '../errors.js';

const DOC = '/data/metadata/registry.json';

describe('parseRegistryDocument', () => {
  it('should flag invalid JSON as corruption', () => {
    const result = parseRegistryDocument('{', DOC);
    expect(result.corruption).toBeInstanceOf(CorruptStateError);
    expect(result.state.sourceFiles.size).toBe(0);
  });

  it('should flag a non-object root as corruption', () => {
    expect(parseRegistryDocument('[]', DOC).corruption?.message).toContain('root is not an object');
  });

  it('should flag an unsupported version as corruption', () => {
    expect(parseRegistryDocument('{"version": 99}', DOC).corruption?.message).toContain('unsupported version 99');
  });

  it('should drop invalid entries with a warning and keep the rest', () => {
    const text = JSON.stringify({
      version: REGISTRY_DOCUMENT_VERSION,
      sourceFiles: {
        src_a_wav: { id: 'src_a_wav', path: '/a.wav', size: 1, modifiedAt: 2, createdAt: 't' },
        src_b_wav: { id: 'src_b_wav', path: '/b.wav', size: 'big' },
      },
      generatedFiles: 'nope',
    });
    const result = parseRegistryDocument(text, DOC);

    expect(result.corruption).toBeNull();
    expect([...result.state.sourceFiles.keys()]).toEqual(['src_a_wav']);
    expect(result.warnings).toHaveLength(2);
    expect(result.warnings[0]).toMatch(/^sourceFiles\.src_b_wav dropped: /);
    expect(result.warnings[1]).toBe('section "generatedFiles" is not an object; ignored');
  });

  it('should treat an empty object as an empty registry', () => {
    const result = parseRegistryDocument('{}', DOC);
    expect(result.corruption).toBeNull();
    expect(result.warnings).toEqual([]);
  });
});

describe('serializeRegistryDocument', () => {
  it('should write the versioned layout with a derived dependencies section', () => {
    const state = emptyState();
    state.sourceFiles.set('src_a_wav', {
      value: { kind: 'source', id: 'src_a_wav', path: '/a.wav', size: 1, modifiedAt: 2, createdAt: 't' },
      extra: {},
    });
    state.generatedFiles.set('gain_0123456789abcdef', {
      value: {
        kind: 'generated',
        id: 'gain_0123456789abcdef',
        path: '/g.wav',
        operation: 'gain',
        inputIds: ['src_a_wav'],
        parameters: { db: 3 },
        size: 4,
        createdAt: 't',
      },
      extra: { note: 'x' },
    });

    const doc: unknown = JSON.parse(serializeRegistryDocument(state, new Date('2024-01-02T03:04:05.000Z')));
    expect(doc).toEqual({
      version: 1,
      updatedAt: '2024-01-02T03:04:05.000Z',
      sourceFiles: {
        src_a_wav: { id: 'src_a_wav', path: '/a.wav', size: 1, modifiedAt: 2, createdAt: 't' },
      },
      generatedFiles: {
        gain_0123456789abcdef: {
          note: 'x',
          id: 'gain_0123456789abcdef',
          path: '/g.wav',
          operation: 'gain',
          inputIds: ['src_a_wav'],
          parameters: { db: 3 },
          size: 4,
          createdAt: 't',
        },
      },
      metadataFiles: {},
      operations: [],
      dependencies: { gain_0123456789abcdef: ['src_a_wav'] },
      stale: {},
    });
  });
});

/**
 * Identifier derivation tests
 */

import { describe, it, expect } from 'vitest';
import {
  assertValidOperation,
  canonicalText,
  canonicalizeParameters,
  derivedId,
  isSourceId,
  parseDerivedId,
  sourceId,
} from '../ids.js';
import { ValidationError } from '../errors.js';

describe('sourceId', () => {
  it('should normalize the filename into the source namespace', () => {
    expect(sourceId('clip.mp4')).toBe('src_clip_mp4');
    expect(sourceId('/media/in/Clip.MP4')).toBe('src_clip_mp4');
    expect(sourceId('My Holiday -- 2024.mov')).toBe('src_my_holiday_2024_mov');
  });

  it('should be deterministic', () => {
    expect(sourceId('take-01.wav')).toBe(sourceId('take-01.wav'));
  });

  it('should keep the extension so formats do not collide', () => {
    expect(sourceId('clip.mp4')).not.toBe(sourceId('clip.mov'));
  });

  it('should fall back for names with nothing to keep', () => {
    expect(sourceId('---')).toBe('src_unnamed');
  });

  it('should be recognized as a source ID', () => {
    expect(isSourceId(sourceId('a.wav'))).toBe(true);
    expect(isSourceId('trim_0123456789abcdef')).toBe(false);
  });
});

describe('assertValidOperation', () => {
  it('should accept lowercase names', () => {
    expect(assertValidOperation('trim')).toBe('trim');
    expect(assertValidOperation('scale-720p_v2')).toBe('scale-720p_v2');
  });

  it.each(['', 'Trim', '1pass', 'cut clip', 'src', 'src_trim'])('should reject %j', (operation) => {
    expect(() => assertValidOperation(operation)).toThrow(ValidationError);
  });
});

describe('canonicalizeParameters', () => {
  it('should sort keys recursively', () => {
    const canonical = canonicalizeParameters({ b: 1, a: { d: 2, c: 3 } });
    expect(Object.keys(canonical)).toEqual(['a', 'b']);
    expect(canonical['a']).toEqual({ c: 3, d: 2 });
  });

  it('should trim keys and drop undefined values', () => {
    expect(canonicalizeParameters({ ' start ': 0, skip: undefined })).toEqual({ start: 0 });
  });

  it('should reject keys that collide after trimming', () => {
    expect(() => canonicalizeParameters({ a: 1, ' a': 2 })).toThrow(ValidationError);
  });

  it('should round floats to six decimals and fold negative zero', () => {
    expect(canonicalizeParameters({ gain: 0.1 + 0.2, offset: -0 })).toEqual({ gain: 0.3, offset: 0 });
    expect(canonicalizeParameters({ x: 1.0000004 })).toEqual({ x: 1 });
  });

  it('should keep array order', () => {
    expect(canonicalizeParameters({ chain: ['b', 'a'] })).toEqual({ chain: ['b', 'a'] });
  });

  it('should be idempotent', () => {
    const once = canonicalizeParameters({ z: [1.5, { y: 2, x: null }], a: 'text' });
    expect(canonicalizeParameters(once)).toEqual(once);
  });

  it.each([
    ['NaN', { n: Number.NaN }],
    ['Infinity', { n: Number.POSITIVE_INFINITY }],
    ['bigint', { n: BigInt(1) }],
    ['function', { n: () => 1 }],
    ['Date', { n: new Date(0) }],
  ])('should reject %s values', (_label, parameters) => {
    expect(() => canonicalizeParameters(parameters)).toThrow(ValidationError);
  });
});

describe('canonicalText', () => {
  it('should encode integers and floats in a fixed form', () => {
    expect(canonicalText({ start: 0, duration: 5.25, label: 'a' })).toBe(
      '{"duration":5.25,"label":"a","start":0}'
    );
  });
});

describe('derivedId', () => {
  const inputs = ['src_clip_mp4'];

  it('should produce a known ID for a known derivation', () => {
    expect(derivedId(inputs, 'trim', { start: 0, duration: 5 })).toBe('trim_dec023af91e597e5');
  });

  it('should follow the <operation>_<16 hex> format', () => {
    expect(derivedId(inputs, 'scale', { height: 720 })).toMatch(/^scale_[0-9a-f]{16}$/);
  });

  it('should ignore parameter key order', () => {
    expect(derivedId(inputs, 'trim', { start: 0, duration: 5 })).toBe(
      derivedId(inputs, 'trim', { duration: 5, start: 0 })
    );
  });

  it('should treat float noise as the same setting', () => {
    expect(derivedId(inputs, 'gain', { db: 0.1 + 0.2 })).toBe(derivedId(inputs, 'gain', { db: 0.3 }));
  });

  it('should be sensitive to values, operation and input order', () => {
    const base = derivedId(['src_a_wav', 'src_b_wav'], 'mix', { level: 1 });
    expect(derivedId(['src_a_wav', 'src_b_wav'], 'mix', { level: 2 })).not.toBe(base);
    expect(derivedId(['src_a_wav', 'src_b_wav'], 'concat', { level: 1 })).not.toBe(base);
    expect(derivedId(['src_b_wav', 'src_a_wav'], 'mix', { level: 1 })).not.toBe(base);
  });

  it('should default to empty parameters', () => {
    expect(derivedId(inputs, 'probe')).toBe(derivedId(inputs, 'probe', {}));
  });

  it('should reject empty input IDs', () => {
    expect(() => derivedId([''], 'trim')).toThrow(ValidationError);
  });
});

describe('parseDerivedId', () => {
  it('should split operation and digest', () => {
    expect(parseDerivedId('trim_dec023af91e597e5')).toEqual({ operation: 'trim', digest: 'dec023af91e597e5' });
    expect(parseDerivedId('scale_720p_0123456789abcdef')).toEqual({
      operation: 'scale_720p',
      digest: '0123456789abcdef',
    });
  });

  it('should return null for source IDs and junk', () => {
    expect(parseDerivedId('src_clip_mp4')).toBeNull();
    expect(parseDerivedId('trim_xyz')).toBeNull();
  });
});

/**
 * Tests for stable identifiers
 */

import { createHash } from 'node:crypto';
import { describe, it, expect } from 'vitest';
import { chunkId, sectionPathKey, sha256Hex, stableHash } from '../../src/lib/ids.js';

describe('stableHash', () => {
  it('should be a prefix of the SHA-256 digest', () => {
    const full = createHash('sha256').update('hello', 'utf8').digest('hex');
    expect(sha256Hex('hello')).toBe(full);
    expect(stableHash('hello')).toBe(full.slice(0, 32));
    expect(stableHash('hello', 8)).toBe(full.slice(0, 8));
  });
});

describe('sectionPathKey', () => {
  it('should keep paths with different splits apart', () => {
    expect(sectionPathKey(['a b', 'c'])).not.toBe(sectionPathKey(['a', 'b c']));
    expect(sectionPathKey([])).toBe('');
  });
});

describe('chunkId', () => {
  it('should be 32 hex characters', () => {
    expect(chunkId('A/Paris', ['History'], 0)).toMatch(/^[0-9a-f]{32}$/);
  });

  it('should be a pure function of its inputs', () => {
    expect(chunkId('A/Paris', ['History', 'Roman era'], 2)).toBe(chunkId('A/Paris', ['History', 'Roman era'], 2));
  });

  it('should change with article, path and sequence', () => {
    const base = chunkId('A/Paris', ['History'], 0);
    expect(chunkId('A/Rome', ['History'], 0)).not.toBe(base);
    expect(chunkId('A/Paris', ['Geography'], 0)).not.toBe(base);
    expect(chunkId('A/Paris', ['History'], 1)).not.toBe(base);
  });

  it('should treat occurrence 0 as absent and distinguish later occurrences', () => {
    const base = chunkId('A/Paris', ['Notes'], 0);
    expect(chunkId('A/Paris', ['Notes'], 0, 0)).toBe(base);
    expect(chunkId('A/Paris', ['Notes'], 0, 1)).not.toBe(base);
  });

  it('should hash the fields with separators', () => {
    const expected = createHash('sha256')
      .update(['A/Paris', 'History\u001fRoman era', '3'].join('\u0000'), 'utf8')
      .digest('hex')
      .slice(0, 32);
    expect(chunkId('A/Paris', ['History', 'Roman era'], 3)).toBe(expected);
  });
});

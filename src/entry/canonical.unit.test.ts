import { describe, expect, it } from 'vitest';
import { canonicalJson, contentId, sortEntries, treeIdOf } from './canonical.js';
import { EntryType } from '../types/enums.js';

describe('canonicalJson', () => {
  it('sorts keys and drops undefined fields', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: undefined }], c: null } })).toBe(
      '{"a":{"c":null,"d":[2,{"z":1}]},"b":1}'
    );
  });
});

describe('contentId', () => {
  it('hashes the canonical encoding', () => {
    expect(contentId({ a: 1, b: 2 })).toBe(contentId({ b: 2, a: 1 }));
    expect(contentId({ a: 1 })).not.toBe(contentId({ a: 2 }));
    expect(contentId('test')).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('treeIdOf', () => {
  it('ignores entry order', () => {
    const a = { name: 'a', type: EntryType.FILE, mode: 0o644, mtime: '2020-01-01T00:00:00.000Z' };
    const b = { name: 'b', type: EntryType.FILE, mode: 0o644, mtime: '2020-01-01T00:00:00.000Z' };
    expect(treeIdOf([a, b])).toBe(treeIdOf([b, a]));
    expect(sortEntries([b, a]).map((entry) => entry.name)).toEqual(['a', 'b']);
    expect(treeIdOf([a])).toMatch(/^[0-9a-f]{64}$/);
  });
});

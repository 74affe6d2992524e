import { describe, expect, it } from 'vitest';
import { CachingTreeStore } from './CachingTreeStore.js';
import { makeFile, makeRepository } from '../store/memory/memoryTestHelpers.js';
import { StorageError } from '../types/error.js';

describe('CachingTreeStore', () => {
  it('loads each tree from the backing store once', async () => {
    const repo = makeRepository();
    const id = repo.saveTree([makeFile('a', '2020-01-01T00:00:00.000Z')]);
    const cache = new CachingTreeStore(repo);

    const first = await cache.loadTree(id);
    const second = await cache.loadTree(id);

    expect(second).toBe(first);
    expect(repo.loadCount(id)).toBe(1);
  });

  it('evicts the least recently used tree', async () => {
    const repo = makeRepository();
    const a = repo.saveTree([makeFile('a', '2020-01-01T00:00:00.000Z')]);
    const b = repo.saveTree([makeFile('b', '2020-01-01T00:00:00.000Z')]);
    const c = repo.saveTree([makeFile('c', '2020-01-01T00:00:00.000Z')]);
    const cache = new CachingTreeStore(repo, 2);

    await cache.loadTree(a);
    await cache.loadTree(b);
    await cache.loadTree(a);
    await cache.loadTree(c);
    await cache.loadTree(a);
    await cache.loadTree(b);

    expect(cache.size).toBe(2);
    expect(repo.loadCount(a)).toBe(1);
    expect(repo.loadCount(b)).toBe(2);
    expect(repo.loadCount(c)).toBe(1);
  });

  it('does not cache with a size of zero', async () => {
    const repo = makeRepository();
    const a = repo.saveTree([makeFile('a', '2020-01-01T00:00:00.000Z')]);
    const cache = new CachingTreeStore(repo, 0);
    await cache.loadTree(a);
    await cache.loadTree(a);
    expect(repo.loadCount(a)).toBe(2);
    expect(cache.size).toBe(0);
  });

  it('passes load failures through', async () => {
    const cache = new CachingTreeStore(makeRepository());
    await expect(cache.loadTree('missing')).rejects.toThrowError(StorageError);
    expect(cache.size).toBe(0);
  });
});

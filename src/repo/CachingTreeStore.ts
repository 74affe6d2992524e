import type { Tree } from '../types/entry.js';
import type { TreeId } from '../types/ids.js';
import type { TreeStore } from './Repository.js';

export const DEFAULT_TREE_CACHE_SIZE = 1024;

/**
 * Keeps the most recently loaded trees so that subtrees shared between snapshots are fetched from the
 * backing store once. Tree ids are content addresses, so a cached tree never goes stale.
 */
export class CachingTreeStore implements TreeStore {
  private readonly trees = new Map<TreeId, Tree>();

  constructor(
    private readonly inner: TreeStore,
    private readonly maxEntries = DEFAULT_TREE_CACHE_SIZE
  ) {}

  async loadTree(treeId: TreeId, signal?: AbortSignal): Promise<Tree> {
    const cached = this.trees.get(treeId);
    if (cached) {
      this.trees.delete(treeId);
      this.trees.set(treeId, cached);
      return cached;
    }
    const tree = await this.inner.loadTree(treeId, signal);
    if (this.maxEntries <= 0) return tree;
    this.trees.set(treeId, tree);
    if (this.trees.size > this.maxEntries) {
      const oldest = this.trees.keys().next();
      if (!oldest.done) this.trees.delete(oldest.value);
    }
    return tree;
  }

  get size(): number {
    return this.trees.size;
  }
}

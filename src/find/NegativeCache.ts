import type { TreeId } from '../types/ids.js';

/**
 * Tree ids whose whole subtree holds no match. Only meaningful for the criteria it was filled under,
 * which is why a `Finder` creates its own and never shares it.
 */
export class NegativeCache {
  private readonly ids = new Set<TreeId>();

  has(treeId: TreeId): boolean {
    return this.ids.has(treeId);
  }

  insert(treeId: TreeId): void {
    this.ids.add(treeId);
  }

  get size(): number {
    return this.ids.size;
  }
}

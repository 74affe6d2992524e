import type { Tree } from '../types/entry.js';
import type { LockId, SnapshotId, TreeId } from '../types/ids.js';
import type { Snapshot } from '../types/snapshot.js';

export interface TreeStore {
  loadTree(treeId: TreeId, signal?: AbortSignal): Promise<Tree>;
}

export interface SnapshotIndex {
  listSnapshots(signal?: AbortSignal): Promise<Snapshot[]>;
  loadSnapshot(snapshotId: SnapshotId): Promise<Snapshot>;
}

export interface RepositoryLock {
  readonly lockId: LockId;
  readonly exclusive: boolean;
  release(): void;
}

export interface LockOptions {
  exclusive?: boolean;
}

export interface Repository extends TreeStore, SnapshotIndex {
  lock(options?: LockOptions): RepositoryLock;
}

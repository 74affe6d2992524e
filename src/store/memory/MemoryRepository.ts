import type { LockOptions, Repository, RepositoryLock } from '../../repo/Repository.js';
import { lockConflicts, newLockId } from '../../repo/lock.js';
import type { Entry, Tree } from '../../types/entry.js';
import type { LockId, SnapshotId, TreeId } from '../../types/ids.js';
import type { Snapshot, SnapshotInput } from '../../types/snapshot.js';
import { ErrorCode } from '../../types/enums.js';
import { LockConflictError, StorageError, throwIfAborted } from '../../types/error.js';
import { contentId, sortEntries } from '../../entry/canonical.js';
import { compareSnapshots } from '../../snapshot/sort.js';

export class MemoryRepository implements Repository {
  private readonly trees = new Map<TreeId, Tree>();
  private readonly snapshots = new Map<SnapshotId, Snapshot>();
  private readonly locks = new Map<LockId, { exclusive: boolean }>();
  private readonly treeLoads = new Map<TreeId, number>();

  // Stores entries as given (sorted by name); saving identical content twice yields the same id.
  saveTree(entries: readonly Entry[]): TreeId {
    const sorted = sortEntries(entries);
    const id = contentId(sorted);
    if (!this.trees.has(id)) {
      this.trees.set(id, Object.freeze({ id, entries: Object.freeze(sorted) }));
    }
    return id;
  }

  saveSnapshot(input: SnapshotInput): Snapshot {
    const snapshotId = contentId(input);
    const snapshot: Snapshot = { ...input, snapshotId };
    this.snapshots.set(snapshotId, snapshot);
    return snapshot;
  }

  async loadTree(treeId: TreeId, signal?: AbortSignal): Promise<Tree> {
    throwIfAborted(signal);
    this.treeLoads.set(treeId, this.loadCount(treeId) + 1);
    const tree = this.trees.get(treeId);
    if (!tree) {
      throw new StorageError(ErrorCode.TREE_NOT_FOUND, `tree ${treeId} not found`, { treeId });
    }
    return tree;
  }

  async listSnapshots(signal?: AbortSignal): Promise<Snapshot[]> {
    throwIfAborted(signal);
    return Array.from(this.snapshots.values()).sort(compareSnapshots);
  }

  async loadSnapshot(snapshotId: SnapshotId): Promise<Snapshot> {
    const snapshot = this.snapshots.get(snapshotId);
    if (!snapshot) {
      throw new StorageError(ErrorCode.SNAPSHOT_NOT_FOUND, `snapshot ${snapshotId} not found`, { snapshotId });
    }
    return snapshot;
  }

  lock(options: LockOptions = {}): RepositoryLock {
    const exclusive = options.exclusive ?? false;
    if (lockConflicts(Array.from(this.locks.values()), exclusive)) {
      throw new LockConflictError({ exclusive });
    }
    const lockId = newLockId();
    this.locks.set(lockId, { exclusive });
    const locks = this.locks;
    return {
      lockId,
      exclusive,
      release() {
        locks.delete(lockId);
      }
    };
  }

  loadCount(treeId: TreeId): number {
    return this.treeLoads.get(treeId) ?? 0;
  }

  get heldLocks(): number {
    return this.locks.size;
  }
}

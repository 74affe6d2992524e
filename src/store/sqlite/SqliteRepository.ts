import Database from 'better-sqlite3';
import type { LockOptions, Repository, RepositoryLock } from '../../repo/Repository.js';
import { lockConflicts, newLockId } from '../../repo/lock.js';
import type { Entry, Tree } from '../../types/entry.js';
import type { SnapshotId, TreeId } from '../../types/ids.js';
import type { Snapshot, SnapshotInput } from '../../types/snapshot.js';
import { ErrorCode } from '../../types/enums.js';
import { LockConflictError, StorageError, throwIfAborted } from '../../types/error.js';
import { contentId, sortEntries } from '../../entry/canonical.js';
import { compareSnapshots } from '../../snapshot/sort.js';
import { nowInstant } from '../../utils/time.js';
import { ensureSchema } from './schema.js';
import { mapSnapshotRow, mapTreeRow, type LockRow, type SnapshotRow, type TreeRow } from './rowMapper.js';

export interface SqliteRepositoryOptions {
  path?: string;
  mustExist?: boolean;
}

export class SqliteRepository implements Repository {
  private readonly db: Database.Database;

  constructor(options: SqliteRepositoryOptions = {}) {
    const path = options.path ?? ':memory:';
    this.db = new Database(path, { fileMustExist: options.mustExist ?? false });
    ensureSchema(this.db);
  }

  close(): void {
    this.db.close();
  }

  saveTree(entries: readonly Entry[]): TreeId {
    const sorted = sortEntries(entries);
    const treeId = contentId(sorted);
    this.db
      .prepare('INSERT OR IGNORE INTO trees (treeId, entriesJson) VALUES (?, ?)')
      .run(treeId, JSON.stringify(sorted));
    return treeId;
  }

  saveSnapshot(input: SnapshotInput): Snapshot {
    const snapshotId = contentId(input);
    this.db
      .prepare(
        `INSERT OR REPLACE INTO snapshots (snapshotId, treeId, time, hostname, username, pathsJson, tagsJson, parent)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        snapshotId,
        input.tree,
        input.time,
        input.hostname,
        input.username,
        JSON.stringify(input.paths),
        JSON.stringify(input.tags),
        input.parent ?? null
      );
    return { ...input, snapshotId };
  }

  async loadTree(treeId: TreeId, signal?: AbortSignal): Promise<Tree> {
    throwIfAborted(signal);
    const row = this.db.prepare<[string], TreeRow>('SELECT treeId, entriesJson FROM trees WHERE treeId = ?').get(treeId);
    if (!row) {
      throw new StorageError(ErrorCode.TREE_NOT_FOUND, `tree ${treeId} not found`, { treeId });
    }
    return { id: row.treeId, entries: mapTreeRow(row) };
  }

  async listSnapshots(signal?: AbortSignal): Promise<Snapshot[]> {
    throwIfAborted(signal);
    const rows = this.db.prepare<[], SnapshotRow>('SELECT * FROM snapshots').all();
    return rows.map(mapSnapshotRow).sort(compareSnapshots);
  }

  async loadSnapshot(snapshotId: SnapshotId): Promise<Snapshot> {
    const row = this.db.prepare<[string], SnapshotRow>('SELECT * FROM snapshots WHERE snapshotId = ?').get(snapshotId);
    if (!row) {
      throw new StorageError(ErrorCode.SNAPSHOT_NOT_FOUND, `snapshot ${snapshotId} not found`, { snapshotId });
    }
    return mapSnapshotRow(row);
  }

  lock(options: LockOptions = {}): RepositoryLock {
    const exclusive = options.exclusive ?? false;
    const lockId = newLockId();
    const acquire = this.db.transaction(() => {
      const held = this.db
        .prepare<[], LockRow>('SELECT lockId, exclusive FROM locks')
        .all()
        .map((row) => ({ exclusive: row.exclusive === 1 }));
      if (lockConflicts(held, exclusive)) {
        throw new LockConflictError({ exclusive });
      }
      this.db
        .prepare('INSERT INTO locks (lockId, exclusive, pid, createdAt) VALUES (?, ?, ?, ?)')
        .run(lockId, exclusive ? 1 : 0, process.pid, nowInstant());
    });
    acquire();
    const db = this.db;
    return {
      lockId,
      exclusive,
      release() {
        if (db.open) {
          db.prepare('DELETE FROM locks WHERE lockId = ?').run(lockId);
        }
      }
    };
  }

  heldLocks(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM locks').get();
    return row?.count ?? 0;
  }
}

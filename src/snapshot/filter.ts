import type { SnapshotIndex } from '../repo/Repository.js';
import type { Snapshot } from '../types/snapshot.js';
import type { Logger } from '../logger/index.js';
import { throwIfAborted } from '../types/error.js';
import { cleanPath } from '../vpath/normalize.js';

export interface SnapshotFilter {
  host?: string;
  tags?: string[];
  paths?: string[];
  snapshotIds?: string[];
}

export const LATEST = 'latest';

export function hasTags(snapshot: Snapshot, tags: readonly string[]): boolean {
  return tags.every((tag) => snapshot.tags.includes(tag));
}

export function hasPaths(snapshot: Snapshot, paths: readonly string[]): boolean {
  const own = new Set(snapshot.paths.map(cleanPath));
  return paths.every((path) => own.has(cleanPath(path)));
}

export function matchesFilter(snapshot: Snapshot, filter: SnapshotFilter): boolean {
  if (filter.host !== undefined && filter.host !== '' && snapshot.hostname !== filter.host) return false;
  if (!hasTags(snapshot, filter.tags ?? [])) return false;
  return hasPaths(snapshot, filter.paths ?? []);
}

export type SnapshotLookup = { snapshot: Snapshot } | { reason: 'not-found' | 'ambiguous' };

/**
 * Resolves a full id, a unique id prefix, or `latest` (the newest snapshot passing the host, tag and
 * path criteria). `snapshots` must be sorted oldest first.
 */
export function lookupSnapshot(snapshots: readonly Snapshot[], id: string, filter: SnapshotFilter): SnapshotLookup {
  if (id === LATEST) {
    const candidates = snapshots.filter((snapshot) => matchesFilter(snapshot, filter));
    const latest = candidates[candidates.length - 1];
    return latest ? { snapshot: latest } : { reason: 'not-found' };
  }
  const exact = snapshots.find((snapshot) => snapshot.snapshotId === id);
  if (exact) return { snapshot: exact };
  const prefixed = id === '' ? [] : snapshots.filter((snapshot) => snapshot.snapshotId.startsWith(id));
  if (prefixed.length === 1) return { snapshot: prefixed[0] };
  return { reason: prefixed.length === 0 ? 'not-found' : 'ambiguous' };
}

/**
 * Lazily yields the snapshots to search. Explicit ids win over the host/tag/path criteria and keep the
 * order they were given in; ids that resolve to nothing, or to a snapshot already selected, are reported
 * and skipped.
 */
export async function* findFilteredSnapshots(
  repo: SnapshotIndex,
  filter: SnapshotFilter,
  logger: Logger,
  signal?: AbortSignal
): AsyncGenerator<Snapshot, void, undefined> {
  const snapshots = await repo.listSnapshots(signal);
  const ids = filter.snapshotIds ?? [];

  if (ids.length > 0) {
    const seen = new Set<string>();
    for (const id of ids) {
      throwIfAborted(signal);
      const found = lookupSnapshot(snapshots, id, filter);
      if ('reason' in found) {
        logger.warn({ snapshotId: id, reason: found.reason }, `Ignoring ${JSON.stringify(id)}, it is not a snapshot id`);
        continue;
      }
      if (seen.has(found.snapshot.snapshotId)) {
        logger.warn(
          { snapshotId: id, resolved: found.snapshot.snapshotId },
          `Ignoring ${JSON.stringify(id)}, snapshot already selected`
        );
        continue;
      }
      seen.add(found.snapshot.snapshotId);
      yield found.snapshot;
    }
    return;
  }

  for (const snapshot of snapshots) {
    throwIfAborted(signal);
    if (matchesFilter(snapshot, filter)) {
      yield snapshot;
    }
  }
}

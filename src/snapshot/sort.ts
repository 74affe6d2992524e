import type { Snapshot } from '../types/snapshot.js';
import { instantMillis } from '../utils/time.js';
import { compareUtf8 } from '../utils/utf8.js';

function compareOptionalNumber(a?: number, b?: number): number {
  if (a === undefined && b === undefined) return 0;
  if (a === undefined) return -1;
  if (b === undefined) return 1;
  return a - b;
}

// Oldest first; equal times fall back to the id so listing order is stable.
export function compareSnapshots(a: Snapshot, b: Snapshot): number {
  const byTime = compareOptionalNumber(instantMillis(a.time), instantMillis(b.time));
  if (byTime !== 0) return byTime;
  return compareUtf8(a.snapshotId, b.snapshotId);
}

import type { Instant, SnapshotId, TreeId } from './ids.js';

export interface SnapshotInput {
  tree: TreeId;
  time: Instant;
  hostname: string;
  username: string;
  paths: string[];
  tags: string[];
  parent?: SnapshotId;
}

export interface Snapshot extends SnapshotInput {
  snapshotId: SnapshotId;
}

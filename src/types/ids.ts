export type TreeId = string;
export type SnapshotId = string;
export type Instant = string;
export type LockId = string;

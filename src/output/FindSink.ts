import type { Entry } from '../types/entry.js';
import type { Snapshot } from '../types/snapshot.js';

export interface OutputWriter {
  write(chunk: string): void;
}

/**
 * Receives matches in traversal order. All matches of one snapshot arrive contiguously; `finish` is
 * called once after the last snapshot, and also after a failed search so that output stays well formed.
 */
export interface FindSink {
  emit(prefix: string, entry: Entry, snapshot: Snapshot): void;
  finish(): void;
}

import type { Entry } from './entry.js';
import type { Snapshot } from './snapshot.js';

// Compiled once per invocation; `pattern` is already lower-cased when `ignoreCase` is set.
export interface FindPattern {
  readonly pattern: string;
  readonly ignoreCase: boolean;
  readonly matcher: RegExp;
  readonly oldest?: number;
  readonly newest?: number;
}

export interface MatchRecord {
  prefix: string;
  entry: Entry;
  snapshot: Snapshot;
}

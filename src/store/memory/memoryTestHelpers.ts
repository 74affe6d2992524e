import pino from 'pino';
import { MemoryRepository } from './MemoryRepository.js';
import { EntryType } from '../../types/enums.js';
import type { Entry } from '../../types/entry.js';
import type { TreeId } from '../../types/ids.js';
import type { Snapshot, SnapshotInput } from '../../types/snapshot.js';
import type { MatchRecord } from '../../types/find.js';
import { appendPath } from '../../vpath/build.js';
import type { FindSink, OutputWriter } from '../../output/FindSink.js';
import type { Logger } from '../../logger/index.js';

export function makeRepository(): MemoryRepository {
  return new MemoryRepository();
}

export function makeFile(name: string, mtime: string, extra: Partial<Entry> = {}): Entry {
  return { name, type: EntryType.FILE, mode: 0o644, mtime, ...extra };
}

export function makeDir(name: string, subtree: TreeId, mtime = '2020-01-01T00:00:00.000Z', extra: Partial<Entry> = {}): Entry {
  return { name, type: EntryType.DIR, mode: 0o755, mtime, subtree, ...extra };
}

export function makeSnapshot(repo: MemoryRepository, tree: TreeId, overrides: Partial<SnapshotInput> = {}): Snapshot {
  return repo.saveSnapshot({
    tree,
    time: '2021-07-01T00:00:00.000Z',
    hostname: 'host-a',
    username: 'user',
    paths: ['/home/user'],
    tags: [],
    ...overrides
  });
}

export class StringWriter implements OutputWriter {
  chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  text(): string {
    return this.chunks.join('');
  }
}

export interface RecordedMatch {
  path: string;
  snapshotId: string;
}

export class RecordingSink implements FindSink {
  readonly records: MatchRecord[] = [];
  finished = 0;

  emit(prefix: string, entry: Entry, snapshot: Snapshot): void {
    this.records.push({ prefix, entry, snapshot });
  }

  finish(): void {
    this.finished += 1;
  }

  get matches(): RecordedMatch[] {
    return this.records.map(({ prefix, entry, snapshot }) => ({
      path: appendPath(prefix, entry.name),
      snapshotId: snapshot.snapshotId
    }));
  }

  paths(): string[] {
    return this.matches.map((match) => match.path);
  }
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

// Collects log records as parsed JSON objects.
export function recordingLogger(level = 'debug'): { logger: Logger; records: Record<string, unknown>[] } {
  const records: Record<string, unknown>[] = [];
  const logger = pino(
    { level },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      }
    }
  );
  return { logger, records };
}

// The three-entry fixture: T1 = { a.txt, sub -> T2 }, T2 = { b.txt }.
export function makeBasicTrees(repo: MemoryRepository): { t1: TreeId; t2: TreeId } {
  const t2 = repo.saveTree([makeFile('b.txt', '2021-06-01T00:00:00.000Z')]);
  const t1 = repo.saveTree([makeFile('a.txt', '2020-01-01T00:00:00.000Z'), makeDir('sub', t2)]);
  return { t1, t2 };
}

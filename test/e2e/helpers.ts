import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { SqliteRepository } from '../../src/store/sqlite/SqliteRepository.js';
import { EntryType } from '../../src/types/enums.js';
import type { Entry } from '../../src/types/entry.js';
import type { TreeId } from '../../src/types/ids.js';
import type { Snapshot } from '../../src/types/snapshot.js';
import type { OutputWriter } from '../../src/output/FindSink.js';

// Each test gets its own temp directory so the files can run in parallel.
export function createTempDir(prefix = 'snapfind-e2e-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export class BufferWriter implements OutputWriter {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  text(): string {
    return this.chunks.join('');
  }
}

export interface Fixture {
  dbPath: string;
  home: TreeId;
  docs: TreeId;
  monday: Snapshot;
  tuesday: Snapshot;
  server: Snapshot;
}

/**
 * Two snapshots of the same home directory (the second adds `notes/todo.md`) and one of a server.
 *
 *   /docs/Report.PDF    2021-03-01
 *   /docs/readme.md     2020-06-15
 *   /photo.jpg          2019-12-24
 *   /latest -> docs     symlink
 */
export function writeFixture(dir: string): Fixture {
  const dbPath = path.join(dir, 'repo.sqlite');
  const repo = new SqliteRepository({ path: dbPath });
  try {
    const docs = repo.saveTree([
      file('Report.PDF', '2021-03-01T10:00:00.000Z', { size: 2048, uid: 1000, gid: 100 }),
      file('readme.md', '2020-06-15T08:30:00.000Z', { size: 17, uid: 1000, gid: 100 })
    ]);
    const base: Entry[] = [
      { name: 'docs', type: EntryType.DIR, mode: 0o755, mtime: '2021-03-01T10:00:00.000Z', subtree: docs },
      file('photo.jpg', '2019-12-24T18:00:00.000Z', { size: 500000 }),
      { name: 'latest', type: EntryType.SYMLINK, mode: 0o777, mtime: '2021-03-01T10:00:00.000Z', linkTarget: 'docs' }
    ];
    const home = repo.saveTree(base);
    const notes = repo.saveTree([file('todo.md', '2021-04-02T09:00:00.000Z', { size: 5 })]);
    const homeLater = repo.saveTree([
      ...base,
      { name: 'notes', type: EntryType.DIR, mode: 0o700, mtime: '2021-04-02T09:00:00.000Z', subtree: notes }
    ]);
    const etc = repo.saveTree([file('hosts', '2018-01-01T00:00:00.000Z', { size: 120 })]);

    const monday = repo.saveSnapshot({
      tree: home,
      time: '2021-04-05T00:00:00.000Z',
      hostname: 'laptop',
      username: 'user',
      paths: ['/home/user'],
      tags: ['daily']
    });
    const tuesday = repo.saveSnapshot({
      tree: homeLater,
      time: '2021-04-06T00:00:00.000Z',
      hostname: 'laptop',
      username: 'user',
      paths: ['/home/user'],
      tags: ['daily'],
      parent: monday.snapshotId
    });
    const server = repo.saveSnapshot({
      tree: etc,
      time: '2021-04-07T00:00:00.000Z',
      hostname: 'server',
      username: 'root',
      paths: ['/etc'],
      tags: []
    });
    return { dbPath, home, docs, monday, tuesday, server };
  } finally {
    repo.close();
  }
}

function file(name: string, mtime: string, extra: Partial<Entry> = {}): Entry {
  return { name, type: EntryType.FILE, mode: 0o644, mtime, ...extra };
}

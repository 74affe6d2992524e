import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { SqliteRepository } from '../../../../src/store/sqlite/SqliteRepository.js';
import { EntryType } from '../../../../src/types/enums.js';
import type { Entry } from '../../../../src/types/entry.js';
import type { TreeId } from '../../../../src/types/ids.js';

export function makeRepository(): SqliteRepository {
  return new SqliteRepository({ path: ':memory:' });
}

export function createTempDir(prefix = 'snapfind-int-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function file(name: string, mtime = '2020-01-01T00:00:00.000Z', extra: Partial<Entry> = {}): Entry {
  return { name, type: EntryType.FILE, mode: 0o644, mtime, ...extra };
}

export function dir(name: string, subtree: TreeId, mtime = '2020-01-01T00:00:00.000Z'): Entry {
  return { name, type: EntryType.DIR, mode: 0o755, mtime, subtree };
}

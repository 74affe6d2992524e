import { z } from 'zod';
import type { Entry } from '../../types/entry.js';
import type { Snapshot } from '../../types/snapshot.js';
import { EntryType, ErrorCode } from '../../types/enums.js';
import { StorageError } from '../../types/error.js';

export interface TreeRow {
  treeId: string;
  entriesJson: string;
}

export interface SnapshotRow {
  snapshotId: string;
  treeId: string;
  time: string;
  hostname: string;
  username: string;
  pathsJson: string;
  tagsJson: string;
  parent: string | null;
}

export interface LockRow {
  lockId: string;
  exclusive: number;
}

const EntrySchema = z.object({
  name: z.string(),
  type: z.nativeEnum(EntryType),
  mode: z.number().int(),
  mtime: z.string(),
  atime: z.string().optional(),
  ctime: z.string().optional(),
  uid: z.number().int().optional(),
  gid: z.number().int().optional(),
  user: z.string().optional(),
  group: z.string().optional(),
  inode: z.number().int().optional(),
  deviceId: z.number().int().optional(),
  size: z.number().int().nonnegative().optional(),
  links: z.number().int().optional(),
  linkTarget: z.string().optional(),
  device: z.number().int().optional(),
  content: z.array(z.string()).optional(),
  extendedAttributes: z.array(z.object({ name: z.string(), value: z.string() })).optional(),
  subtree: z.string().optional()
});

const EntriesSchema = z.array(EntrySchema);
const StringListSchema = z.array(z.string());

function parseJson<T>(schema: z.ZodType<T>, raw: string, what: string, id: string): T {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new StorageError(ErrorCode.MALFORMED_TREE, `${what} ${id} is not valid JSON`, {
      id,
      cause: err instanceof Error ? err.message : String(err)
    });
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new StorageError(ErrorCode.MALFORMED_TREE, `${what} ${id} is malformed`, {
      id,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    });
  }
  return parsed.data;
}

export function mapTreeRow(row: TreeRow): Entry[] {
  return parseJson(EntriesSchema, row.entriesJson, 'tree', row.treeId);
}

export function mapSnapshotRow(row: SnapshotRow): Snapshot {
  return {
    snapshotId: row.snapshotId,
    tree: row.treeId,
    time: row.time,
    hostname: row.hostname,
    username: row.username,
    paths: parseJson(StringListSchema, row.pathsJson, 'snapshot paths', row.snapshotId),
    tags: parseJson(StringListSchema, row.tagsJson, 'snapshot tags', row.snapshotId),
    ...(row.parent !== null && { parent: row.parent })
  };
}

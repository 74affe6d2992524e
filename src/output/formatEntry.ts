import type { Entry } from '../types/entry.js';
import { EntryType } from '../types/enums.js';
import { formatPermissions } from '../entry/mode.js';
import { appendPath } from '../vpath/build.js';
import { formatLocalTimestamp } from '../utils/time.js';

function padStart(value: number, width: number): string {
  return value.toString().padStart(width, ' ');
}

export function formatEntry(prefix: string, entry: Entry, long: boolean): string {
  const path = appendPath(prefix, entry.name);
  if (!long) return path;
  const line = [
    formatPermissions(entry),
    padStart(entry.uid ?? 0, 5),
    padStart(entry.gid ?? 0, 5),
    padStart(entry.size ?? 0, 6),
    formatLocalTimestamp(entry.mtime),
    path
  ].join(' ');
  if (entry.type === EntryType.SYMLINK && entry.linkTarget !== undefined) {
    return `${line} -> ${entry.linkTarget}`;
  }
  return line;
}

// The raw name is folded into `path`; inode, xattrs, device, content and subtree are storage internals.
export function renderMatch(prefix: string, entry: Entry): string {
  const { name, inode, extendedAttributes, device, content, subtree, ...attributes } = entry;
  return JSON.stringify({
    path: appendPath(prefix, name),
    permissions: formatPermissions(entry),
    ...attributes
  });
}

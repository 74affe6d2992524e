import { createHash } from 'node:crypto';
import type { Entry } from '../types/entry.js';
import type { TreeId } from '../types/ids.js';
import { compareUtf8 } from '../utils/utf8.js';

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    const keys = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => compareUtf8(a, b));
    for (const [key, item] of keys) {
      out[key] = canonicalize(item);
    }
    return out;
  }
  return value;
}

// Key order and absent fields never change the encoding, so equal content always yields one id.
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function contentId(value: unknown): string {
  return createHash('sha256').update(canonicalJson(value), 'utf8').digest('hex');
}

export function sortEntries(entries: readonly Entry[]): Entry[] {
  return [...entries].sort((a, b) => compareUtf8(a.name, b.name));
}

export function treeIdOf(entries: readonly Entry[]): TreeId {
  return contentId(sortEntries(entries));
}

import type { Instant, TreeId } from './ids.js';
import { EntryType } from './enums.js';

export interface Entry {
  name: string;
  type: EntryType;
  mode: number;
  mtime: Instant;
  atime?: Instant;
  ctime?: Instant;
  uid?: number;
  gid?: number;
  user?: string;
  group?: string;
  inode?: number;
  deviceId?: number;
  size?: number;
  links?: number;
  linkTarget?: string;
  device?: number;
  content?: string[];
  extendedAttributes?: ExtendedAttribute[];
  subtree?: TreeId;
}

export interface ExtendedAttribute {
  name: string;
  value: string;
}

export interface Tree {
  id: TreeId;
  entries: readonly Entry[];
}

import type { Entry } from '../types/entry.js';
import { EntryType } from '../types/enums.js';

const TYPE_CHARS: Record<EntryType, string> = {
  [EntryType.FILE]: '-',
  [EntryType.DIR]: 'd',
  [EntryType.SYMLINK]: 'l',
  [EntryType.DEV]: 'b',
  [EntryType.CHARDEV]: 'c',
  [EntryType.FIFO]: 'p',
  [EntryType.SOCKET]: 's'
};

const S_ISUID = 0o4000;
const S_ISGID = 0o2000;
const S_ISVTX = 0o1000;

function execChar(mode: number, execBit: number, specialBit: number, set: string, unset: string): string {
  const special = (mode & specialBit) !== 0;
  const exec = (mode & execBit) !== 0;
  if (special) return exec ? set : unset;
  return exec ? 'x' : '-';
}

/**
 * Renders an entry's type and mode bits the way `ls -l` does, e.g. `drwxr-xr-x` or `-rwsr-x---`.
 */
export function formatPermissions(entry: Pick<Entry, 'type' | 'mode'>): string {
  const mode = entry.mode;
  return [
    TYPE_CHARS[entry.type],
    mode & 0o400 ? 'r' : '-',
    mode & 0o200 ? 'w' : '-',
    execChar(mode, 0o100, S_ISUID, 's', 'S'),
    mode & 0o040 ? 'r' : '-',
    mode & 0o020 ? 'w' : '-',
    execChar(mode, 0o010, S_ISGID, 's', 'S'),
    mode & 0o004 ? 'r' : '-',
    mode & 0o002 ? 'w' : '-',
    execChar(mode, 0o001, S_ISVTX, 't', 'T')
  ].join('');
}

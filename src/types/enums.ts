export enum EntryType {
  FILE = 'file',
  DIR = 'dir',
  SYMLINK = 'symlink',
  DEV = 'dev',
  CHARDEV = 'chardev',
  FIFO = 'fifo',
  SOCKET = 'socket'
}

export enum ErrorCode {
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',
  INVALID_OPTIONS = 'INVALID_OPTIONS',
  INVALID_PATTERN = 'INVALID_PATTERN',
  INVALID_TIME = 'INVALID_TIME',
  TREE_NOT_FOUND = 'TREE_NOT_FOUND',
  SNAPSHOT_NOT_FOUND = 'SNAPSHOT_NOT_FOUND',
  MALFORMED_TREE = 'MALFORMED_TREE',
  LOCK_CONFLICT = 'LOCK_CONFLICT',
  ABORTED = 'ABORTED'
}

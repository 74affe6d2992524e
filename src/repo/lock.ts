import { randomUUID } from 'node:crypto';
import type { LockId } from '../types/ids.js';
import type { Repository } from './Repository.js';

export interface WithLockOptions {
  noLock?: boolean;
}

// Holds a shared lock for the duration of `fn`; it is released on every exit path.
export async function withLock<T>(
  repo: Pick<Repository, 'lock'>,
  fn: () => Promise<T>,
  options: WithLockOptions = {}
): Promise<T> {
  if (options.noLock) return fn();
  const lock = repo.lock({ exclusive: false });
  try {
    return await fn();
  } finally {
    lock.release();
  }
}

export function lockConflicts(held: readonly { exclusive: boolean }[], exclusive: boolean): boolean {
  if (exclusive) return held.length > 0;
  return held.some((lock) => lock.exclusive);
}

export function newLockId(): LockId {
  return `lock:${randomUUID()}`;
}

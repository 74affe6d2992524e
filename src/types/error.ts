import { ErrorCode } from './enums.js';

export class FindError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined && { details: this.details })
      }
    };
  }
}

// Raised before any traversal starts; nothing has been written when it surfaces.
export class ConfigError extends FindError {}

export class StorageError extends FindError {}

export class LockConflictError extends FindError {
  constructor(details?: Record<string, unknown>) {
    super(ErrorCode.LOCK_CONFLICT, 'repository is already locked exclusively', details);
  }
}

export class AbortError extends FindError {
  constructor() {
    super(ErrorCode.ABORTED, 'operation aborted');
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new AbortError();
}

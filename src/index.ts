export { Finder, type FinderOptions } from './find/Finder.js';
export { NegativeCache } from './find/NegativeCache.js';
export { compilePattern, matchesName, withinWindow, type PatternInput } from './find/pattern.js';
export { globToRegExp } from './find/glob.js';
export { parseTime } from './find/time.js';
export { runFind, buildPattern, type FindContext, type FindSummary } from './find/runFind.js';
export { createSink, JsonSink, TextSink, type FindSink, type OutputWriter } from './output/index.js';
export { formatEntry, renderMatch } from './output/formatEntry.js';
export { findFilteredSnapshots, lookupSnapshot, matchesFilter, type SnapshotFilter } from './snapshot/filter.js';
export type { Repository, RepositoryLock, SnapshotIndex, TreeStore } from './repo/Repository.js';
export { CachingTreeStore } from './repo/CachingTreeStore.js';
export { withLock } from './repo/lock.js';
export { MemoryRepository } from './store/memory/MemoryRepository.js';
export { SqliteRepository, type SqliteRepositoryOptions } from './store/sqlite/SqliteRepository.js';
export { loadFindOptions, loadLoggingConfig } from './config/load.js';
export { FindOptionsSchema, LoggingConfigSchema, type FindOptions, type LoggingConfig } from './config/schema.js';
export { createLogger, type Logger } from './logger/index.js';
export { AbortError, ConfigError, FindError, LockConflictError, StorageError } from './types/error.js';
export { EntryType, ErrorCode } from './types/enums.js';
export type { Entry, ExtendedAttribute, Tree } from './types/entry.js';
export type { Snapshot, SnapshotInput } from './types/snapshot.js';
export type { FindPattern, MatchRecord } from './types/find.js';
export type { Instant, SnapshotId, TreeId } from './types/ids.js';

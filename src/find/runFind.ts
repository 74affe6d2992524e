import type { Repository } from '../repo/Repository.js';
import { CachingTreeStore } from '../repo/CachingTreeStore.js';
import { withLock } from '../repo/lock.js';
import type { FindOptions } from '../config/schema.js';
import type { Logger } from '../logger/index.js';
import { createSink, type OutputWriter } from '../output/index.js';
import { findFilteredSnapshots } from '../snapshot/filter.js';
import { ErrorCode } from '../types/enums.js';
import { ConfigError, throwIfAborted } from '../types/error.js';
import type { FindPattern } from '../types/find.js';
import { Finder } from './Finder.js';
import { compilePattern } from './pattern.js';
import { parseTime } from './time.js';

export interface FindContext {
  repository: Repository;
  stdout: OutputWriter;
  // Text-mode group headers; defaults to stdout.
  info?: OutputWriter;
  logger: Logger;
  signal?: AbortSignal;
}

export interface FindSummary {
  snapshots: number;
}

// Everything that can be wrong with the invocation itself surfaces here, before the repository is touched.
export function buildPattern(options: FindOptions): FindPattern {
  if (options.args.length !== 1) {
    throw new ConfigError(ErrorCode.INVALID_ARGUMENTS, 'wrong number of arguments', { count: options.args.length });
  }
  return compilePattern({
    pattern: options.args[0],
    ignoreCase: options.ignoreCase,
    oldest: options.oldest === undefined ? undefined : parseTime(options.oldest),
    newest: options.newest === undefined ? undefined : parseTime(options.newest)
  });
}

export async function runFind(options: FindOptions, context: FindContext): Promise<FindSummary> {
  const { repository, logger, signal } = context;
  const pattern = buildPattern(options);

  return withLock(
    repository,
    async () => {
      const sink = createSink(options, { stdout: context.stdout, info: context.info }, logger);
      const finder = new Finder({
        trees: new CachingTreeStore(repository, options.treeCacheSize),
        pattern,
        sink,
        logger
      });
      let snapshots = 0;
      try {
        const filter = {
          host: options.host,
          tags: options.tags,
          paths: options.paths,
          snapshotIds: options.snapshotIds
        };
        for await (const snapshot of findFilteredSnapshots(repository, filter, logger, signal)) {
          throwIfAborted(signal);
          await finder.findInSnapshot(snapshot, signal);
          snapshots += 1;
        }
      } finally {
        sink.finish();
      }
      logger.debug({ snapshots, knownEmptyTrees: finder.knownEmptyTrees }, 'search finished');
      return { snapshots };
    },
    { noLock: options.noLock }
  );
}

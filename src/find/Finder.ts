import type { TreeStore } from '../repo/Repository.js';
import type { FindSink } from '../output/FindSink.js';
import type { Logger } from '../logger/index.js';
import type { FindPattern } from '../types/find.js';
import type { TreeId } from '../types/ids.js';
import type { Snapshot } from '../types/snapshot.js';
import { EntryType, ErrorCode } from '../types/enums.js';
import { StorageError, throwIfAborted } from '../types/error.js';
import { appendPath } from '../vpath/build.js';
import { NegativeCache } from './NegativeCache.js';
import { matchesName, withinWindow } from './pattern.js';

export interface FinderOptions {
  trees: TreeStore;
  pattern: FindPattern;
  sink: FindSink;
  logger: Logger;
}

/**
 * Searches snapshots for entries matching one fixed pattern.
 *
 * Every tree found to hold no match anywhere below it is remembered by id and never scanned again
 * during this Finder's lifetime. Tree ids are content addresses, so the same id reached from another
 * snapshot or another path has the same outcome. The cache belongs to the pattern: a new pattern needs
 * a new Finder.
 */
export class Finder {
  private readonly trees: TreeStore;
  private readonly pattern: FindPattern;
  private readonly sink: FindSink;
  private readonly logger: Logger;
  private readonly notFound = new NegativeCache();

  constructor(options: FinderOptions) {
    this.trees = options.trees;
    this.pattern = options.pattern;
    this.sink = options.sink;
    this.logger = options.logger;
  }

  async findInSnapshot(snapshot: Snapshot, signal?: AbortSignal): Promise<void> {
    this.logger.debug(
      { snapshotId: snapshot.snapshotId, oldest: this.pattern.oldest, newest: this.pattern.newest },
      'searching snapshot'
    );
    await this.findInTree(snapshot.tree, '/', snapshot, signal);
  }

  get knownEmptyTrees(): number {
    return this.notFound.size;
  }

  // Resolves to true when this tree or any tree below it produced a match.
  private async findInTree(treeId: TreeId, prefix: string, snapshot: Snapshot, signal?: AbortSignal): Promise<boolean> {
    if (this.notFound.has(treeId)) {
      this.logger.debug({ prefix, treeId }, 'skipping tree, already checked');
      return false;
    }

    throwIfAborted(signal);
    this.logger.debug({ prefix, treeId }, 'checking tree');
    const tree = await this.trees.loadTree(treeId, signal);

    let found = false;
    for (const entry of tree.entries) {
      if (matchesName(this.pattern, entry.name)) {
        if (withinWindow(this.pattern, entry.mtime)) {
          found = true;
          this.sink.emit(prefix, entry, snapshot);
        } else {
          this.logger.debug({ prefix, name: entry.name, mtime: entry.mtime }, 'name matches, mtime outside window');
        }
      }

      if (entry.type === EntryType.DIR) {
        if (entry.subtree === undefined) {
          throw new StorageError(ErrorCode.MALFORMED_TREE, `directory ${appendPath(prefix, entry.name)} has no subtree`, {
            treeId,
            name: entry.name
          });
        }
        if (await this.findInTree(entry.subtree, appendPath(prefix, entry.name), snapshot, signal)) {
          found = true;
        }
      }
    }

    if (!found) {
      this.notFound.insert(treeId);
    }
    return found;
  }
}

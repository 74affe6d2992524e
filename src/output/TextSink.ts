import type { Entry } from '../types/entry.js';
import type { Snapshot } from '../types/snapshot.js';
import type { FindSink, OutputWriter } from './FindSink.js';
import { formatEntry } from './formatEntry.js';

export interface TextSinkOptions {
  out: OutputWriter;
  // Group headers; defaults to `out`.
  info?: OutputWriter;
  long?: boolean;
  quiet?: boolean;
}

export class TextSink implements FindSink {
  private readonly out: OutputWriter;
  private readonly info: OutputWriter;
  private readonly long: boolean;
  private readonly quiet: boolean;
  private previous: Snapshot | undefined;

  constructor(options: TextSinkOptions) {
    this.out = options.out;
    this.info = options.info ?? options.out;
    this.long = options.long ?? false;
    this.quiet = options.quiet ?? false;
  }

  emit(prefix: string, entry: Entry, snapshot: Snapshot): void {
    if (this.previous?.snapshotId !== snapshot.snapshotId) {
      if (!this.quiet) {
        if (this.previous) this.info.write('\n');
        this.info.write(`Found matching entries in snapshot ${snapshot.snapshotId}\n`);
      }
      this.previous = snapshot;
    }
    this.out.write(`${formatEntry(prefix, entry, this.long)}\n`);
  }

  finish(): void {}
}

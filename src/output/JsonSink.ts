import type { Entry } from '../types/entry.js';
import type { Snapshot } from '../types/snapshot.js';
import type { Logger } from '../logger/index.js';
import { appendPath } from '../vpath/build.js';
import type { FindSink, OutputWriter } from './FindSink.js';
import { renderMatch } from './formatEntry.js';

export interface JsonSinkOptions {
  out: OutputWriter;
  logger: Logger;
  render?: (prefix: string, entry: Entry) => string;
}

/**
 * Streams `[{"matches":[...],"hits":N,"snapshot":"<id>"},...]` one record at a time.
 *
 * State: whether the outer array is open, the snapshot whose group is open, and how many records that
 * group holds. A group is closed only when the next snapshot's first record arrives or on `finish`.
 */
export class JsonSink implements FindSink {
  private readonly out: OutputWriter;
  private readonly logger: Logger;
  private readonly render: (prefix: string, entry: Entry) => string;
  private opened = false;
  private finished = false;
  private group: Snapshot | undefined;
  private hits = 0;

  constructor(options: JsonSinkOptions) {
    this.out = options.out;
    this.logger = options.logger;
    this.render = options.render ?? renderMatch;
  }

  emit(prefix: string, entry: Entry, snapshot: Snapshot): void {
    let record: string;
    try {
      record = this.render(prefix, entry);
    } catch (err) {
      this.logger.warn({ err, path: appendPath(prefix, entry.name) }, 'unable to serialize match, skipping it');
      return;
    }

    if (!this.opened) {
      this.out.write('[');
      this.opened = true;
    }
    if (this.group?.snapshotId !== snapshot.snapshotId) {
      this.closeGroup(',');
      this.out.write('{"matches":[');
      this.group = snapshot;
      this.hits = 0;
    }
    if (this.hits > 0) {
      this.out.write(',');
    }
    this.out.write(record);
    this.hits += 1;
  }

  finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.closeGroup('');
    this.out.write(this.opened ? ']\n' : '[]\n');
  }

  private closeGroup(separator: string): void {
    if (!this.group) return;
    this.out.write(`],"hits":${this.hits},"snapshot":${JSON.stringify(this.group.snapshotId)}}${separator}`);
  }
}

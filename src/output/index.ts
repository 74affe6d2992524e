import type { Logger } from '../logger/index.js';
import type { FindSink, OutputWriter } from './FindSink.js';
import { JsonSink } from './JsonSink.js';
import { TextSink } from './TextSink.js';

export interface SinkOptions {
  json: boolean;
  long: boolean;
  quiet: boolean;
}

export interface SinkWriters {
  stdout: OutputWriter;
  info?: OutputWriter;
}

export function createSink(options: SinkOptions, writers: SinkWriters, logger: Logger): FindSink {
  if (options.json) {
    return new JsonSink({ out: writers.stdout, logger });
  }
  return new TextSink({ out: writers.stdout, info: writers.info, long: options.long, quiet: options.quiet });
}

export type { FindSink, OutputWriter } from './FindSink.js';
export { JsonSink } from './JsonSink.js';
export { TextSink } from './TextSink.js';

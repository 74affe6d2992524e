import pino, { type Logger } from 'pino';
import type { LoggingConfig } from '../config/schema.js';

export type { Logger } from 'pino';

// Logs go to stderr so that stdout carries nothing but search results.
export function createLogger(config: LoggingConfig): Logger {
  if (config.pretty) {
    return pino({
      level: config.level,
      transport: { target: 'pino-pretty', options: { destination: 2 } }
    });
  }
  return pino({ level: config.level }, pino.destination(2));
}

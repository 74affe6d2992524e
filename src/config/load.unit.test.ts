import { describe, expect, it } from 'vitest';
import { loadFindOptions, loadLoggingConfig, splitTags } from './load.js';
import { ConfigError } from '../types/error.js';
import { ErrorCode } from '../types/enums.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('loadFindOptions', () => {
  it('fills defaults', () => {
    const options = loadFindOptions({ args: ['*.txt'] });
    expect(options).toEqual({
      args: ['*.txt'],
      snapshotIds: [],
      tags: [],
      paths: [],
      ignoreCase: false,
      long: false,
      json: false,
      quiet: false,
      noLock: false,
      treeCacheSize: 1024
    });
  });

  it('splits comma-separated tags', () => {
    const options = loadFindOptions({ args: ['x'], tags: ['daily,home', ' work '] });
    expect(options.tags).toEqual(['daily', 'home', 'work']);
  });

  it('rejects wrongly typed options', () => {
    expect(() => loadFindOptions({ args: ['x'], ignoreCase: 'yes' })).toThrowError(ConfigError);
    expect(() => loadFindOptions({ args: 'x' })).toThrowError(/^invalid find options: args: /);
    expect(thrown(() => loadFindOptions({ args: 'x' }))).toMatchObject({ code: ErrorCode.INVALID_OPTIONS });
  });
});

describe('splitTags', () => {
  it('drops empty items', () => {
    expect(splitTags(['a,,b', ''])).toEqual(['a', 'b']);
  });
});

describe('loadLoggingConfig', () => {
  it('defaults to warn without pretty printing', () => {
    expect(loadLoggingConfig({}, {})).toEqual({ level: 'warn', pretty: false });
  });

  it('takes the level from the environment unless given explicitly', () => {
    expect(loadLoggingConfig({}, { SNAPFIND_LOG_LEVEL: 'debug' }).level).toBe('debug');
    expect(loadLoggingConfig({ level: 'error' }, { SNAPFIND_LOG_LEVEL: 'debug' }).level).toBe('error');
  });

  it('turns on pretty printing from the environment', () => {
    expect(loadLoggingConfig({}, { SNAPFIND_LOG_PRETTY: '1' })).toEqual({ level: 'warn', pretty: true });
    expect(loadLoggingConfig({}, { SNAPFIND_LOG_PRETTY: 'TRUE' }).pretty).toBe(true);
    expect(loadLoggingConfig({}, { SNAPFIND_LOG_PRETTY: 'off' }).pretty).toBe(false);
    expect(loadLoggingConfig({ pretty: false }, { SNAPFIND_LOG_PRETTY: 'yes' }).pretty).toBe(false);
    expect(() => loadLoggingConfig({}, { SNAPFIND_LOG_PRETTY: 'sometimes' })).toThrowError(
      'invalid SNAPFIND_LOG_PRETTY: "sometimes"'
    );
  });

  it('rejects unknown levels', () => {
    expect(() => loadLoggingConfig({ level: 'loud' }, {})).toThrowError(ConfigError);
  });
});

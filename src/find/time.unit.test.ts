import { describe, expect, it } from 'vitest';
import { parseTime } from './time.js';
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

describe('parseTime', () => {
  it('parses dates in local time', () => {
    expect(parseTime('2020-06-01')).toBe(new Date(2020, 5, 1).getTime());
    expect(parseTime('2020-06-01 13:45')).toBe(new Date(2020, 5, 1, 13, 45).getTime());
    expect(parseTime('2020-06-01 13:45:30')).toBe(new Date(2020, 5, 1, 13, 45, 30).getTime());
  });

  it('parses day-first dotted dates', () => {
    expect(parseTime('01.06.2020')).toBe(new Date(2020, 5, 1).getTime());
    expect(parseTime('01.06.2020 08:00:01')).toBe(new Date(2020, 5, 1, 8, 0, 1).getTime());
  });

  it('honours explicit zones', () => {
    expect(parseTime('2020-06-01 12:00:00 +0200')).toBe(Date.UTC(2020, 5, 1, 10, 0, 0));
    expect(parseTime('2020-06-01 12:00:00 UTC')).toBe(Date.UTC(2020, 5, 1, 12, 0, 0));
    expect(parseTime('01.06.2020 12:00:00 -0130')).toBe(Date.UTC(2020, 5, 1, 13, 30, 0));
  });

  it('parses unix date output', () => {
    expect(parseTime('Mon Jun 1 12:00:00 +0000 UTC 2020')).toBe(Date.UTC(2020, 5, 1, 12, 0, 0));
    expect(parseTime('Tue Jan  2 15:04:05 -0700 MST 2006')).toBe(Date.UTC(2006, 0, 2, 22, 4, 5));
  });

  it('rejects unknown layouts and out-of-range fields', () => {
    expect(() => parseTime('yesterday')).toThrowError(ConfigError);
    expect(() => parseTime('2020-13-01')).toThrowError('unable to parse time: "2020-13-01"');
    expect(() => parseTime('2021-02-29')).toThrowError(ConfigError);
    expect(() => parseTime('2020-06-01 24:00')).toThrowError(ConfigError);
    expect(() => parseTime('2020-06-01 12:00:00 CEST')).toThrowError(ConfigError);
    expect(thrown(() => parseTime('nope'))).toMatchObject({ code: ErrorCode.INVALID_TIME });
  });
});

import { ErrorCode } from '../types/enums.js';
import { ConfigError } from '../types/error.js';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const TIME_SUFFIX = '(?: (\\d{2}):(\\d{2})(?::(\\d{2})(?: ([+-]\\d{4}|[A-Za-z]{1,5}))?)?)?';
const ISO_DATE = new RegExp(`^(\\d{4})-(\\d{2})-(\\d{2})${TIME_SUFFIX}$`);
const DOTTED_DATE = new RegExp(`^(\\d{2})\\.(\\d{2})\\.(\\d{4})${TIME_SUFFIX}$`);
const UNIX_DATE =
  /^(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun) (Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) {1,2}(\d{1,2}) (\d{2}):(\d{2}):(\d{2}) ([+-]\d{4}) [A-Za-z]{1,5} (\d{4})$/;

interface Fields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  // Minutes east of UTC; undefined means local time.
  offset?: number;
}

function unparseable(value: string): ConfigError {
  return new ConfigError(ErrorCode.INVALID_TIME, `unable to parse time: ${JSON.stringify(value)}`, { value });
}

function parseZone(zone: string | undefined): number | undefined | null {
  if (zone === undefined) return undefined;
  const numeric = /^([+-])(\d{2})(\d{2})$/.exec(zone);
  if (numeric) {
    const minutes = Number(numeric[2]) * 60 + Number(numeric[3]);
    return numeric[1] === '-' ? -minutes : minutes;
  }
  const upper = zone.toUpperCase();
  if (upper === 'UTC' || upper === 'GMT' || upper === 'Z') return 0;
  return null;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toMillis(fields: Fields): number | undefined {
  const { year, month, day, hour, minute, second, offset } = fields;
  if (month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;
  if (hour > 23 || minute > 59 || second > 59) return undefined;
  if (offset === undefined) {
    return new Date(year, month - 1, day, hour, minute, second).getTime();
  }
  return Date.UTC(year, month - 1, day, hour, minute, second) - offset * 60_000;
}

function fromDateMatch(year: string, month: string, day: string, rest: (string | undefined)[]): Fields | null {
  const [hour, minute, second, zone] = rest;
  const offset = parseZone(zone);
  if (offset === null) return null;
  return {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: hour === undefined ? 0 : Number(hour),
    minute: minute === undefined ? 0 : Number(minute),
    second: second === undefined ? 0 : Number(second),
    offset
  };
}

function matchFields(value: string): Fields | null {
  const iso = ISO_DATE.exec(value);
  if (iso) return fromDateMatch(iso[1], iso[2], iso[3], iso.slice(4));
  const dotted = DOTTED_DATE.exec(value);
  if (dotted) return fromDateMatch(dotted[3], dotted[2], dotted[1], dotted.slice(4));
  const unix = UNIX_DATE.exec(value);
  if (unix) {
    const offset = parseZone(unix[6]);
    if (offset === null || offset === undefined) return null;
    return {
      year: Number(unix[7]),
      month: MONTHS.indexOf(unix[1]) + 1,
      day: Number(unix[2]),
      hour: Number(unix[3]),
      minute: Number(unix[4]),
      second: Number(unix[5]),
      offset
    };
  }
  return null;
}

/**
 * Parses a human-entered timestamp into epoch milliseconds.
 *
 * Accepted layouts: `2006-01-02`, `2006-01-02 15:04`, `2006-01-02 15:04:05` with an optional
 * `-0700` or `UTC` zone, the same with a `02.01.2006` date, and `Mon Jan 2 15:04:05 -0700 MST 2006`.
 * Times without a zone are local.
 */
export function parseTime(value: string): number {
  const fields = matchFields(value.trim());
  const millis = fields ? toMillis(fields) : undefined;
  if (millis === undefined) throw unparseable(value);
  return millis;
}

import type { Instant } from '../types/ids.js';

export function nowInstant(): Instant {
  return new Date().toISOString();
}

export function instantMillis(value: Instant): number | undefined {
  const millis = Date.parse(value);
  return Number.isNaN(millis) ? undefined : millis;
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

// "YYYY-MM-DD HH:mm:ss" in local time, as used by long listings.
export function formatLocalTimestamp(value: Instant): string {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return value;
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  return `${day} ${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

import type { FindPattern } from '../types/find.js';
import type { Instant } from '../types/ids.js';
import { instantMillis } from '../utils/time.js';
import { globToRegExp } from './glob.js';

export interface PatternInput {
  pattern: string;
  ignoreCase?: boolean;
  oldest?: number;
  newest?: number;
}

export function compilePattern(input: PatternInput): FindPattern {
  const ignoreCase = input.ignoreCase ?? false;
  const pattern = ignoreCase ? input.pattern.toLowerCase() : input.pattern;
  return Object.freeze({
    pattern,
    ignoreCase,
    matcher: globToRegExp(pattern),
    oldest: input.oldest,
    newest: input.newest
  });
}

export function matchesName(pattern: FindPattern, name: string): boolean {
  return pattern.matcher.test(pattern.ignoreCase ? name.toLowerCase() : name);
}

// Both bounds are inclusive. An unreadable mtime never satisfies a bound that is set.
export function withinWindow(pattern: FindPattern, mtime: Instant): boolean {
  if (pattern.oldest === undefined && pattern.newest === undefined) return true;
  const millis = instantMillis(mtime);
  if (millis === undefined) return false;
  if (pattern.oldest !== undefined && millis < pattern.oldest) return false;
  if (pattern.newest !== undefined && millis > pattern.newest) return false;
  return true;
}

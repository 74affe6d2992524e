import { ErrorCode } from '../types/enums.js';
import { ConfigError } from '../types/error.js';

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function escapeClassChar(ch: string): string {
  return /[\\\][^-]/.test(ch) ? `\\${ch}` : ch;
}

function badPattern(pattern: string, reason: string): ConfigError {
  return new ConfigError(ErrorCode.INVALID_PATTERN, `syntax error in pattern ${JSON.stringify(pattern)}: ${reason}`, {
    pattern
  });
}

function readChar(pattern: string, start: number): { ch: string; next: number } {
  let i = start;
  if (pattern[i] === '\\') {
    if (i + 1 >= pattern.length) throw badPattern(pattern, 'trailing escape');
    i += 1;
  }
  const ch = String.fromCodePoint(pattern.codePointAt(i) ?? 0);
  return { ch, next: i + ch.length };
}

function codePoint(ch: string): number {
  return ch.codePointAt(0) ?? 0;
}

function readClass(pattern: string, start: number): { source: string; end: number } {
  let i = start;
  let negate = false;
  if (pattern[i] === '^' || pattern[i] === '!') {
    negate = true;
    i += 1;
  }
  const items: string[] = [];
  for (;;) {
    if (i >= pattern.length) throw badPattern(pattern, 'unterminated character class');
    if (pattern[i] === ']') break;
    // An unquoted `-` only ever sits between the two ends of a range.
    if (pattern[i] === '-') throw badPattern(pattern, 'dangling "-" in character class');
    const lo = readChar(pattern, i);
    i = lo.next;
    if (pattern[i] === '-') {
      if (i + 1 >= pattern.length) throw badPattern(pattern, 'unterminated character class');
      if (pattern[i + 1] === ']' || pattern[i + 1] === '-') {
        throw badPattern(pattern, 'dangling "-" in character class');
      }
      const hi = readChar(pattern, i + 1);
      i = hi.next;
      if (codePoint(lo.ch) > codePoint(hi.ch)) throw badPattern(pattern, 'invalid character range');
      items.push(`${escapeClassChar(lo.ch)}-${escapeClassChar(hi.ch)}`);
    } else {
      items.push(escapeClassChar(lo.ch));
    }
  }
  if (items.length === 0) throw badPattern(pattern, 'empty character class');
  return { source: `[${negate ? '^' : ''}${items.join('')}]`, end: i + 1 };
}

/**
 * Compiles a shell glob that matches a single path element.
 *
 * `*` matches any run of characters and `?` exactly one, neither crossing `/`. Classes take `[abc]`,
 * `[a-z]` and the negations `[^...]` / `[!...]`; a backslash quotes the next character. There is no
 * recursive `**`: it behaves like a single `*`. Malformed patterns throw a `ConfigError`.
 */
export function globToRegExp(pattern: string): RegExp {
  let out = '';
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === '*') {
      out += '[^/]*';
      i += 1;
      continue;
    }
    if (ch === '?') {
      out += '[^/]';
      i += 1;
      continue;
    }
    if (ch === '[') {
      const klass = readClass(pattern, i + 1);
      out += klass.source;
      i = klass.end;
      continue;
    }
    const literal = readChar(pattern, i);
    out += escapeRegex(literal.ch);
    i = literal.next;
  }
  return new RegExp(`^${out}$`, 'u');
}

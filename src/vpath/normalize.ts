/**
 * Lexically cleans a slash-separated path: repeated separators collapse, `.` segments drop and `..`
 * removes the segment before it. Relative paths stay relative; the empty path becomes `.`.
 */
export function cleanPath(value: string): string {
  const absolute = value.startsWith('/');
  const out: string[] = [];
  for (const part of value.split('/')) {
    if (part === '' || part === '.') continue;
    if (part === '..') {
      if (out.length > 0 && out[out.length - 1] !== '..') {
        out.pop();
      } else if (!absolute) {
        out.push(part);
      }
      continue;
    }
    out.push(part);
  }
  if (absolute) return `/${out.join('/')}`;
  return out.length === 0 ? '.' : out.join('/');
}

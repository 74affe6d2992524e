// Joins a search prefix and an entry name; the root prefix is "/".
export function appendPath(prefix: string, name: string): string {
  if (prefix === '/' || prefix === '') {
    return `/${name}`;
  }
  return `${prefix}/${name}`;
}

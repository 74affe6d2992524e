// Orders strings by their UTF-8 encoding, which differs from `<` on UTF-16 code units above U+FFFF.
export function compareUtf8(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

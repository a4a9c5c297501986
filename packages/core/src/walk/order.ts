export type PathComparator = (a: string, b: string) => number;

export function comparePathBytes(a: string, b: string): number {
  return Buffer.from(a, 'utf8').compare(Buffer.from(b, 'utf8'));
}

function asciiLowerBytes(value: string): Buffer {
  const bytes = Buffer.from(value, 'utf8');
  for (let i = 0; i < bytes.length; i += 1) {
    const b = bytes[i];
    if (b >= 0x41 && b <= 0x5a) bytes[i] = b + 0x20;
  }
  return bytes;
}

/**
 * Orders by ASCII-lowercased bytes. Names equal under folding (`A.txt`, `a.txt`) fall back
 * to byte order so the result stays total.
 */
export function comparePathsCaseInsensitive(a: string, b: string): number {
  const folded = asciiLowerBytes(a).compare(asciiLowerBytes(b));
  return folded !== 0 ? folded : comparePathBytes(a, b);
}

export function pathComparator(caseInsensitive: boolean): PathComparator {
  return caseInsensitive ? comparePathsCaseInsensitive : comparePathBytes;
}

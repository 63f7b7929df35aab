// Byte-level helpers. Case folding and whitespace are ASCII-only so that
// non-ASCII bytes pass through untouched.

const ASCII_WHITESPACE = new Set([0x20, 0x09, 0x0a, 0x0b, 0x0c, 0x0d]);
const LINE_BREAKS = new Set([0x0a, 0x0d]);

export const EMPTY = Buffer.alloc(0);

export function isEmpty(bytes: Buffer): boolean {
  return bytes.length === 0;
}

function stripSet(bytes: Buffer, set: ReadonlySet<number>): Buffer {
  let start = 0;
  let end = bytes.length;
  while (start < end && set.has(bytes[start])) start++;
  while (end > start && set.has(bytes[end - 1])) end--;
  return bytes.subarray(start, end);
}

export function trimWhitespace(bytes: Buffer): Buffer {
  return stripSet(bytes, ASCII_WHITESPACE);
}

export function trimLineBreaks(bytes: Buffer): Buffer {
  return stripSet(bytes, LINE_BREAKS);
}

export function lowerAscii(bytes: Buffer): Buffer {
  const out = Buffer.from(bytes);
  for (let i = 0; i < out.length; i++) {
    if (out[i] >= 0x41 && out[i] <= 0x5a) {
      out[i] += 0x20;
    }
  }
  return out;
}

export function keepOnly(bytes: Buffer, allowed: ReadonlySet<number>): Buffer {
  return Buffer.from(bytes.filter((byte) => allowed.has(byte)));
}

export function dropAll(bytes: Buffer, removed: ReadonlySet<number>): Buffer {
  return Buffer.from(bytes.filter((byte) => !removed.has(byte)));
}

export function reverseBytes(bytes: Buffer): Buffer {
  return Buffer.from(bytes).reverse();
}

export function byteSet(chars: string): ReadonlySet<number> {
  return new Set(Buffer.from(chars, 'latin1'));
}

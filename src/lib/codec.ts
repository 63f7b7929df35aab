/**
 * Codec
 *
 * Moves credential fields between raw dump bytes and text. Dump files mix
 * UTF-8 with legacy single-byte encodings, so anything that is not valid
 * UTF-8 is re-read as Windows-1252 before it is stored.
 */

import iconv from 'iconv-lite';
import { CodecError } from './errors';

const LEGACY_ENCODING = 'win1252';

export type ByteInput = Buffer | string;

export function toBytes(value: ByteInput): Buffer {
  return typeof value === 'string' ? Buffer.from(value, 'utf8') : value;
}

/**
 * True when the buffer survives a UTF-8 decode/encode cycle unchanged.
 */
export function isValidUtf8(bytes: Buffer): boolean {
  const text = iconv.decode(bytes, 'utf8', { stripBOM: false });
  return iconv.encode(text, 'utf8', { addBOM: false }).equals(bytes);
}

/**
 * Strict UTF-8 decode.
 */
export function decode(bytes: Buffer): string {
  if (!isValidUtf8(bytes)) {
    throw new CodecError(`Invalid UTF-8 sequence in ${bytes.toString('latin1').slice(0, 64)}`);
  }
  return iconv.decode(bytes, 'utf8', { stripBOM: false });
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

// Padded standard alphabet only; Buffer.from would skip anything else.
export function isBase64(text: string): boolean {
  return BASE64_PATTERN.test(text);
}

export function encode(text: string): Buffer {
  return iconv.encode(text, 'utf8', { addBOM: false });
}

export function repairEncoding(bytes: Buffer): Buffer {
  if (isValidUtf8(bytes)) {
    return bytes;
  }
  return encode(iconv.decode(bytes, LEGACY_ENCODING));
}

// 10xxxxxx
function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

function sequenceLength(leadByte: number): number {
  if (leadByte < 0x80) return 1;
  if ((leadByte & 0xe0) === 0xc0) return 2;
  if ((leadByte & 0xf0) === 0xe0) return 3;
  if ((leadByte & 0xf8) === 0xf0) return 4;
  return 1;
}

/**
 * Keep at most the first `limit` bytes without cutting a multi-byte sequence.
 */
export function truncateHead(bytes: Buffer, limit: number): Buffer {
  if (bytes.length <= limit) {
    return bytes;
  }

  let end = limit;
  // walk back to the lead byte of the sequence straddling the limit
  let lead = end;
  while (lead > 0 && isContinuationByte(bytes[lead])) {
    lead--;
  }
  if (lead < end && lead + sequenceLength(bytes[lead]) > end) {
    end = lead;
  }
  return bytes.subarray(0, end);
}

/**
 * Keep at most the last `limit` bytes without starting mid-sequence.
 */
export function truncateTail(bytes: Buffer, limit: number): Buffer {
  if (bytes.length <= limit) {
    return bytes;
  }

  let start = bytes.length - limit;
  while (start < bytes.length && isContinuationByte(bytes[start])) {
    start++;
  }
  return bytes.subarray(start);
}

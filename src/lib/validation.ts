/**
 * Credential Field Validation
 *
 * Classification predicates used to decide which slot a dump value belongs
 * in. Every predicate accepts raw bytes or text and matches against the
 * latin1 view of the bytes, so one pattern character always covers exactly
 * one input byte.
 */

import { toBytes, type ByteInput } from './codec';
import { QueryValidationError } from './errors';

// ============================================================================
// PATTERNS
// ============================================================================

const MAX_EMAIL_LENGTH = 128;

// Inputs longer than this are never handed to a pattern.
const PATTERN_INPUT_CEILING = 1024;

const EMAIL_PATTERN = /^[A-Z0-9_\-.+]+@[A-Z0-9_\-.]+\.[A-Z]{2,8}$/i;
const EMAIL_SEARCH_PATTERN = /[A-Z0-9_\-.+]+@[A-Z0-9_\-.]+\.[A-Z]{2,8}/i;
const FUZZY_EMAIL_PATTERN = /^[^\n]+@[^\n]+\.[^\n]+/;
const DOMAIN_PATTERN = /^[A-Z0-9_\-.]*\.[A-Z]{2,8}$/i;
const WORD_PATTERN = /[a-z]{3,20}/gi;
const HEX_HASH_PATTERN = /[a-f0-9]{20,}/i;
const CRYPT_HASH_PATTERN = /^\$[^\n]{1,13}\$[a-z0-9:/.]{20,}/i;

const BASE64_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/';

export type QueryType = 'email' | 'domain';

function latin1(value: ByteInput): string {
  return toBytes(value).toString('latin1');
}

// ============================================================================
// PREDICATES
// ============================================================================

export function isEmail(value: ByteInput): boolean {
  const text = latin1(value);
  if (text.length > MAX_EMAIL_LENGTH) {
    return false;
  }
  return EMAIL_PATTERN.test(text);
}

/**
 * Loose check: something@something.something
 */
export function isFuzzyEmail(value: ByteInput): boolean {
  const text = latin1(value);
  if (text.length > MAX_EMAIL_LENGTH) {
    return false;
  }
  return FUZZY_EMAIL_PATTERN.test(text);
}

export function isDomain(value: ByteInput): boolean {
  const text = latin1(value);
  if (text.length > PATTERN_INPUT_CEILING) {
    return false;
  }
  return DOMAIN_PATTERN.test(text);
}

/**
 * Lenient base64 check. Characters outside the alphabet are skipped, and
 * decoding stops at the first complete padding group.
 */
function isDecodableBase64(text: string): boolean {
  let quadPos = 0;
  let pads = 0;

  for (const char of text) {
    if (char === '=') {
      if (quadPos >= 2 && quadPos + ++pads >= 4) {
        return true;
      }
      continue;
    }
    if (!BASE64_ALPHABET.includes(char)) {
      continue;
    }
    pads = 0;
    quadPos = (quadPos + 1) % 4;
  }

  return quadPos === 0;
}

/**
 * Heuristic: does this password slot actually hold a hash?
 *
 * Checked in order: padded base64 over 10 bytes, a run of 20+ hex
 * characters, then a crypt-style `$scheme$digest` value. Any padded token
 * that decodes counts, false positives included.
 */
export function isHash(value: ByteInput): boolean {
  const text = latin1(value);
  if (text.length > PATTERN_INPUT_CEILING) {
    return false;
  }

  if (text.length > 10 && text.endsWith('=')) {
    return isDecodableBase64(text);
  }

  if (HEX_HASH_PATTERN.test(text)) {
    return true;
  }

  if (text.length >= 23 && CRYPT_HASH_PATTERN.test(text)) {
    return true;
  }

  return false;
}

// ============================================================================
// EXTRACTION
// ============================================================================

/**
 * First email-shaped run inside a larger value, or null.
 */
export function findEmail(value: ByteInput): Buffer | null {
  const text = latin1(value);
  if (text.length > PATTERN_INPUT_CEILING) {
    return null;
  }
  const match = EMAIL_SEARCH_PATTERN.exec(text);
  return match ? Buffer.from(match[0], 'latin1') : null;
}

export function passwordBaseWords(value: ByteInput): string[] {
  const text = latin1(value);
  if (text.length > PATTERN_INPUT_CEILING) {
    return [];
  }

  const words: string[] = [];
  for (const match of text.matchAll(WORD_PATTERN)) {
    const word = match[0].toLowerCase();
    if (!words.includes(word)) {
      words.push(word);
    }
  }
  return words;
}

// ============================================================================
// QUERY CLASSIFICATION
// ============================================================================

/**
 * Resolve the type of a search query, auto-detecting when the requested
 * type is missing or does not fit.
 */
export function validateQueryType(query: string, queryType: string = 'auto'): QueryType {
  const requested = queryType.trim().toLowerCase();

  if (requested === 'email' && isEmail(query)) {
    return 'email';
  }
  if (requested === 'domain' && isDomain(query)) {
    return 'domain';
  }

  if (isEmail(query)) {
    return 'email';
  }
  if (isDomain(query)) {
    return 'domain';
  }

  throw new QueryValidationError(`Invalid query: "${query}"`);
}

export { MAX_EMAIL_LENGTH, PATTERN_INPUT_CEILING };

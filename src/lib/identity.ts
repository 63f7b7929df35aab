/**
 * Account Identifiers
 *
 * `<reversed domain>|<fingerprint>`
 *
 * The reversed domain groups accounts by TLD and then domain, so a prefix
 * range scan over `_id` returns every account for a domain. With an email
 * the fingerprint is two 6-byte SHA-256 prefixes (local part, then the full
 * record); without one it is a single 12-byte prefix of the record digest.
 * Identical records always get identical ids, which is how duplicates
 * collapse.
 */

import { createHash } from 'node:crypto';
import type { Account } from './account';
import { isEmpty, reverseBytes } from './bytes';
import { decode, encode } from './codec';
import { RecordConstructionError } from './errors';

const ID_SEPARATOR = '|';
const SPLIT_FINGERPRINT_BYTES = 6;
const SINGLE_FINGERPRINT_BYTES = 12;

export interface ParsedAccountId {
  domainChunk: string;
  fingerprint: string;
}

function sha256(data: Buffer): Buffer {
  return createHash('sha256').update(data).digest();
}

function fingerprint(digest: Buffer, length: number): string {
  return digest.subarray(0, length).toString('base64');
}

export function accountId(account: Account): string {
  const recordDigest = sha256(account.bytes);

  if (isEmpty(account.email)) {
    return ['', fingerprint(recordDigest, SINGLE_FINGERPRINT_BYTES)].join(ID_SEPARATOR);
  }

  const [local, domain] = account.splitEmail();
  const domainChunk = decode(reverseBytes(domain));
  const emailHash = fingerprint(sha256(local), SPLIT_FINGERPRINT_BYTES);
  const recordHash = fingerprint(recordDigest, SPLIT_FINGERPRINT_BYTES);

  return [domainChunk, emailHash + recordHash].join(ID_SEPARATOR);
}

export function parseAccountId(id: string): ParsedAccountId {
  const separator = id.indexOf(ID_SEPARATOR);
  if (separator < 0) {
    throw new RecordConstructionError(`Malformed account id: "${id.slice(0, 64)}"`);
  }
  return {
    domainChunk: id.slice(0, separator),
    fingerprint: id.slice(separator + 1),
  };
}

export function domainChunkOf(id: string): string {
  return parseAccountId(id).domainChunk;
}

/**
 * Rebuild a full email from the stored local part and the id's reversed
 * domain.
 */
export function recoverEmail(localPart: string, id: string): Buffer {
  const domain = reverseBytes(encode(domainChunkOf(id)));
  return Buffer.concat([encode(localPart), Buffer.from('@'), domain]);
}

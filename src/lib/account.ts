/**
 * Account Normalization
 *
 * Turns a raw (email, username, password, hash, misc) tuple from a dump into
 * a canonical Account. Dump columns are unreliable: usernames are often
 * emails, passwords are often hashes, and long "passwords" are usually
 * notes. All reclassification happens here, in a fixed order, and the
 * resulting account never changes afterwards.
 */

import { decode, repairEncoding, toBytes, truncateHead, truncateTail, type ByteInput } from './codec';
import {
  EMPTY,
  byteSet,
  dropAll,
  isEmpty,
  keepOnly,
  lowerAscii,
  trimLineBreaks,
  trimWhitespace,
} from './bytes';
import { RecordConstructionError } from './errors';
import { isEmail, isHash } from './validation';

// ============================================================================
// TYPES
// ============================================================================

export interface RawAccountFields {
  email?: ByteInput;
  username?: ByteInput;
  password?: ByteInput;
  hash?: ByteInput;
  misc?: ByteInput;
}

export interface AccountOptions {
  strict?: boolean;
}

export type AccountField = 'email' | 'username' | 'password' | 'hash' | 'misc';

export const ACCOUNT_FIELDS: readonly AccountField[] = ['email', 'username', 'password', 'hash', 'misc'];

// email, username, password
export const MAX_SHORT_FIELD = 128;
// hash, misc
export const MAX_LONG_FIELD = 1000;

// Passwords at least this long are treated as notes.
const MISC_PASSWORD_LENGTH = 100;

const EMAIL_CHARS = byteSet('abcdefghijklmnopqrstuvwxyz0123456789-_.+@');
const USERNAME_NOISE = byteSet("'\\");
const FIELD_SEPARATOR = Buffer.from([0x00]);
const AT_SIGN = 0x40;

// ============================================================================
// ACCOUNT
// ============================================================================

export class Account {
  readonly email: Buffer;
  readonly username: Buffer;
  readonly password: Buffer;
  readonly hash: Buffer;
  readonly misc: Buffer;

  private constructor(email: Buffer, username: Buffer, password: Buffer, hash: Buffer, misc: Buffer) {
    this.email = email;
    this.username = username;
    this.password = password;
    this.hash = hash;
    this.misc = misc;
  }

  /**
   * Run the normalization pipeline over a raw tuple.
   *
   * In strict mode a malformed email is rejected instead of being demoted to
   * the username slot.
   *
   * @throws RecordConstructionError when the tuple carries too little to
   * identify an account, or when strict email validation fails
   */
  static create(raw: RawAccountFields, options: AccountOptions = {}): Account {
    const rawEmail = toBytes(raw.email ?? EMPTY);
    const rawHash = toBytes(raw.hash ?? EMPTY);

    let email = keepOnly(lowerAscii(trimWhitespace(rawEmail)), EMAIL_CHARS);
    let username = dropAll(trimWhitespace(toBytes(raw.username ?? EMPTY)), USERNAME_NOISE);
    let password = trimLineBreaks(toBytes(raw.password ?? EMPTY));
    let hash = trimLineBreaks(rawHash);
    let misc = trimLineBreaks(toBytes(raw.misc ?? EMPTY));

    if (isEmpty(email)) {
      if (isEmail(username)) {
        email = lowerAscii(username);
        username = EMPTY;
      }
    } else if (!isEmail(email)) {
      if (options.strict) {
        throw new RecordConstructionError(
          `Email validation failed on "${preview(rawEmail)}" and strict mode is enabled`
        );
      }
      if (isEmpty(username)) {
        username = email;
        email = EMPTY;
      }
    }

    if (isEmpty(hash) && !isEmpty(password) && isHash(password)) {
      hash = password;
      password = EMPTY;
    }

    if (isEmpty(misc) && password.length >= MISC_PASSWORD_LENGTH) {
      misc = password;
      password = EMPTY;
    }

    if (!isIdentifiable(email, username, password, hash, misc)) {
      throw new RecordConstructionError(
        `Not enough information to create account: ${preview(Buffer.concat([email, username, password, hash, misc]))}`
      );
    }

    return new Account(
      truncateTail(repairEncoding(email), MAX_SHORT_FIELD),
      truncateHead(repairEncoding(username), MAX_SHORT_FIELD),
      truncateHead(repairEncoding(password), MAX_SHORT_FIELD),
      truncateHead(repairEncoding(hash), MAX_LONG_FIELD),
      truncateHead(repairEncoding(misc), MAX_LONG_FIELD)
    );
  }

  /**
   * Rebuild an account from fields that were already normalized once.
   * Nothing is reclassified or repaired; only the bounds and the validity
   * gate are checked.
   */
  static restore(fields: Record<AccountField, Buffer>): Account {
    for (const name of ACCOUNT_FIELDS) {
      const limit = name === 'hash' || name === 'misc' ? MAX_LONG_FIELD : MAX_SHORT_FIELD;
      if (fields[name].length > limit) {
        throw new RecordConstructionError(`Stored ${name} exceeds ${limit} bytes`);
      }
    }

    const { email, username, password, hash, misc } = fields;
    if (!isIdentifiable(email, username, password, hash, misc)) {
      throw new RecordConstructionError(
        `Not enough information to restore account: ${preview(Buffer.concat([email, username, password, hash, misc]))}`
      );
    }

    return new Account(email, username, password, hash, misc);
  }

  /**
   * All five fields joined by NUL. Identity and equality are defined over
   * this value.
   */
  get bytes(): Buffer {
    return Buffer.concat([
      this.email,
      FIELD_SEPARATOR,
      this.username,
      FIELD_SEPARATOR,
      this.password,
      FIELD_SEPARATOR,
      this.hash,
      FIELD_SEPARATOR,
      this.misc,
    ]);
  }

  /**
   * Local part and domain of the email, split at the first `@`. Without an
   * `@` the whole value is the local part.
   */
  splitEmail(): [Buffer, Buffer] {
    const at = this.email.indexOf(AT_SIGN);
    if (at < 0) {
      return [this.email, EMPTY];
    }
    return [this.email.subarray(0, at), this.email.subarray(at + 1)];
  }

  get label(): string {
    return decode(isEmpty(this.username) ? this.email : this.username);
  }

  equals(other: Account): boolean {
    return this.bytes.equals(other.bytes);
  }

  toString(): string {
    return ACCOUNT_FIELDS.map((name) => decode(this[name])).join(':');
  }
}

// ============================================================================
// METADATA
// ============================================================================

/**
 * Provenance labels (which dumps an account was seen in). Not part of the
 * account's identity.
 */
export class AccountMetadata implements Iterable<string> {
  private readonly sources: string[];

  constructor(sources: Iterable<string> = []) {
    this.sources = [...sources];
  }

  add(source: string): void {
    this.sources.push(source);
  }

  get size(): number {
    return this.sources.length;
  }

  toArray(): string[] {
    return [...this.sources];
  }

  [Symbol.iterator](): Iterator<string> {
    return this.sources[Symbol.iterator]();
  }

  toString(): string {
    return this.sources.map((source) => ` |- ${source}`).join('\n');
  }
}

function isIdentifiable(email: Buffer, username: Buffer, password: Buffer, hash: Buffer, misc: Buffer): boolean {
  return !isEmpty(email) || (!isEmpty(username) && (!isEmpty(password) || !isEmpty(hash) || !isEmpty(misc)));
}

function preview(bytes: Buffer): string {
  return bytes.toString('latin1').slice(0, 64);
}

import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import { Account } from '../src/lib/account';
import { RecordConstructionError } from '../src/lib/errors';
import { accountId, domainChunkOf, parseAccountId, recoverEmail } from '../src/lib/identity';

function digestPrefix(data: string, length: number): string {
  return createHash('sha256').update(Buffer.from(data, 'latin1')).digest().subarray(0, length).toString('base64');
}

describe('accountId', () => {
  it('should prefix the reversed domain and split the fingerprint', () => {
    const account = Account.create({ username: 'John.Doe@Example.com', password: 'hunter2' });
    const expected =
      'moc.elpmaxe|' +
      digestPrefix('john.doe', 6) +
      digestPrefix('john.doe@example.com\0\0hunter2\0\0', 6);
    expect(accountId(account)).toBe(expected);
  });

  it('should use a single 12-byte fingerprint without an email', () => {
    const account = Account.create({ username: 'bob', password: 'hunter2' });
    expect(accountId(account)).toBe('|' + digestPrefix('\0bob\0hunter2\0\0', 12));
  });

  it('should produce 8-character fingerprint halves', () => {
    const id = accountId(Account.create({ email: 'a@b.io' }));
    expect(parseAccountId(id).fingerprint).toHaveLength(16);
    expect(parseAccountId(id).domainChunk).toBe('oi.b');
  });

  it('should be deterministic', () => {
    const raw = { email: 'carol@example.com', password: 'pw', misc: 'note' };
    expect(accountId(Account.create(raw))).toBe(accountId(Account.create(raw)));
  });

  it('should collapse tuples that normalize to the same fields', () => {
    const first = Account.create({ username: 'John.Doe@Example.com', password: 'hunter2' });
    const second = Account.create({ email: ' JOHN.DOE@example.com ', password: 'hunter2\r\n' });
    expect(accountId(first)).toBe(accountId(second));
  });

  it('should share the domain chunk and email fingerprint across passwords', () => {
    const first = accountId(Account.create({ email: 'carol@example.com', password: 'one' }));
    const second = accountId(Account.create({ email: 'carol@example.com', password: 'two' }));
    expect(first.slice(0, first.indexOf('|') + 9)).toBe(second.slice(0, second.indexOf('|') + 9));
    expect(first).not.toBe(second);
  });

  it('should leave the domain chunk empty for an email without @', () => {
    const account = Account.create({ email: 'nodomain', username: 'bob', password: 'pw' });
    const id = accountId(account);
    expect(domainChunkOf(id)).toBe('');
    expect(parseAccountId(id).fingerprint).toBe(
      digestPrefix('nodomain', 6) + digestPrefix('nodomain\0bob\0pw\0\0', 6)
    );
  });
});

describe('parseAccountId', () => {
  it('should split on the first separator', () => {
    expect(parseAccountId('moc.elpmaxe|abc|def')).toEqual({ domainChunk: 'moc.elpmaxe', fingerprint: 'abc|def' });
  });

  it('should reject ids without a separator', () => {
    expect(() => parseAccountId('nope')).toThrow(RecordConstructionError);
  });
});

describe('recoverEmail', () => {
  it('should rebuild the email from local part and reversed domain', () => {
    expect(recoverEmail('john.doe', 'moc.elpmaxe|AAAAAAAAAAAAAAAA').toString()).toBe('john.doe@example.com');
  });

  it('should keep a trailing @ when the id has no domain', () => {
    expect(recoverEmail('nodomain', '|AAAAAAAAAAAAAAAA').toString()).toBe('nodomain@');
  });

  it('should restore every @ after the first from the domain chunk', () => {
    const account = Account.create({ email: 'a@b@c.com', username: 'carol', password: 'pw' });
    const id = accountId(account);
    expect(domainChunkOf(id)).toBe('moc.c@b');
    expect(recoverEmail('a', id).toString()).toBe('a@b@c.com');
  });
});

import { describe, it, expect } from 'vitest';
import { Account } from '../src/lib/account';
import { fromDocument, toDocument, toPresentation } from '../src/lib/document';
import { RecordConstructionError } from '../src/lib/errors';
import { accountId } from '../src/lib/identity';

describe('toDocument', () => {
  it('should store the local part and omit empty fields', () => {
    const account = Account.create({ username: 'John.Doe@Example.com', password: 'hunter2' });
    expect(toDocument(account)).toEqual({
      _id: accountId(account),
      e: 'john.doe',
      p: 'hunter2',
    });
  });

  it('should include every populated field', () => {
    const account = Account.create({ username: 'bob', password: 'pw', hash: 'deadbeef', misc: 'note' });
    const doc = toDocument(account);
    expect(Object.keys(doc)).toEqual(['_id', 'u', 'p', 'h', 'm']);
    expect(doc.u).toBe('bob');
    expect(doc.h).toBe('deadbeef');
    expect(doc.m).toBe('note');
  });

  it('should return only the id when asked', () => {
    const account = Account.create({ email: 'a@b.io', password: 'pw' });
    expect(toDocument(account, { idOnly: true })).toEqual({ _id: accountId(account) });
  });
});

describe('toPresentation', () => {
  it('should always carry all five fields', () => {
    const account = Account.create({ username: 'bob', password: '5f4dcc3b5aa765d61d8327deb882cf99' });
    expect(toPresentation(account)).toEqual({
      i: accountId(account),
      e: '',
      u: 'bob',
      p: '',
      h: '5f4dcc3b5aa765d61d8327deb882cf99',
      m: '',
    });
  });

  it('should keep the full email', () => {
    const account = Account.create({ email: 'carol@example.com' });
    expect(toPresentation(account).e).toBe('carol@example.com');
  });
});

describe('fromDocument', () => {
  it('should recover the full email through the id', () => {
    const account = Account.create({ email: 'carol@example.com', password: 'pw', misc: 'note' });
    const restored = fromDocument(toDocument(account));
    expect(restored.email.toString()).toBe('carol@example.com');
    expect(restored.equals(account)).toBe(true);
    expect(accountId(restored)).toBe(accountId(account));
  });

  it('should rebuild an account without an email', () => {
    const account = Account.create({ username: 'bob', hash: 'deadbeef' });
    const restored = fromDocument(toDocument(account));
    expect(restored.email.length).toBe(0);
    expect(restored.equals(account)).toBe(true);
  });

  it('should round-trip an email without a domain', () => {
    const account = Account.create({ email: 'nodomain', username: 'bob', password: 'pw' });
    expect(fromDocument(toDocument(account)).equals(account)).toBe(true);
  });

  it('should round-trip an email ending in @', () => {
    const account = Account.create({ email: 'broken@', username: 'carol', password: 'pw' });
    const doc = toDocument(account);
    expect(doc.e).toBe('broken');
    const restored = fromDocument(doc);
    expect(restored.email.toString()).toBe('broken@');
    expect(accountId(restored)).toBe(doc._id);
  });

  it('should round-trip an email with several @', () => {
    const account = Account.create({ email: 'a@b@c.com', username: 'carol', password: 'pw' });
    const doc = toDocument(account);
    const restored = fromDocument(doc);
    expect(restored.email.toString()).toBe('a@b@c.com');
    expect(restored.equals(account)).toBe(true);
    expect(accountId(restored)).toBe(doc._id);
  });

  it('should not reclassify a stored password that grew during repair', () => {
    const account = Account.create({ email: 'dave@example.org', password: Buffer.alloc(90, 0xe9) });
    expect(account.password.length).toBe(128);

    const doc = toDocument(account);
    const restored = fromDocument(doc);
    expect(restored.password.length).toBe(128);
    expect(restored.misc.length).toBe(0);
    expect(accountId(restored)).toBe(doc._id);
  });

  it('should reject a document whose fields do not hash to its id', () => {
    const doc = toDocument(Account.create({ email: 'carol@example.com', password: 'pw' }));
    expect(() => fromDocument({ ...doc, p: 'other' })).toThrow(/does not match its id/);
  });

  it('should round-trip non-ASCII fields', () => {
    const account = Account.create({ email: 'dave@example.org', password: 'pässwörd' });
    expect(fromDocument(toDocument(account)).password.toString()).toBe('pässwörd');
  });

  it('should reject documents that cannot form an account', () => {
    expect(() => fromDocument({ _id: '|AAAAAAAAAAAAAAAA', u: 'bob' })).toThrow(RecordConstructionError);
  });

  it('should reject a malformed id', () => {
    expect(() => fromDocument({ _id: 'no-separator', e: 'carol' })).toThrow(RecordConstructionError);
  });
});

/**
 * Document Mapping
 *
 * Storage documents keep only the email's local part under `e`; the domain
 * is already in `_id`. Empty fields are left out. The presentation shape
 * always carries all five fields.
 */

import { Account } from './account';
import { isEmpty } from './bytes';
import { decode, encode } from './codec';
import { CodecError, RecordConstructionError } from './errors';
import { accountId, domainChunkOf, recoverEmail } from './identity';

// ============================================================================
// TYPES
// ============================================================================

export interface AccountDocument {
  _id: string;
  e?: string;
  u?: string;
  p?: string;
  h?: string;
  m?: string;
}

export interface AccountPresentation {
  i: string;
  e: string;
  u: string;
  p: string;
  h: string;
  m: string;
}

export interface DocumentOptions {
  idOnly?: boolean;
}

// ============================================================================
// MAPPING
// ============================================================================

function render<T>(account: Account, build: () => T): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof CodecError) {
      throw new RecordConstructionError(`Error formatting ${account.bytes.toString('latin1').slice(0, 64)}`);
    }
    throw error;
  }
}

export function toDocument(account: Account, options: DocumentOptions = {}): AccountDocument {
  return render(account, () => {
    const doc: AccountDocument = { _id: accountId(account) };
    if (options.idOnly) {
      return doc;
    }

    if (!isEmpty(account.email)) {
      doc.e = decode(account.splitEmail()[0]);
    }
    if (!isEmpty(account.username)) {
      doc.u = decode(account.username);
    }
    if (!isEmpty(account.password)) {
      doc.p = decode(account.password);
    }
    if (!isEmpty(account.hash)) {
      doc.h = decode(account.hash);
    }
    if (!isEmpty(account.misc)) {
      doc.m = decode(account.misc);
    }
    return doc;
  });
}

export function toPresentation(account: Account): AccountPresentation {
  return render(account, () => ({
    i: accountId(account),
    e: decode(account.email),
    u: decode(account.username),
    p: decode(account.password),
    h: decode(account.hash),
    m: decode(account.misc),
  }));
}

/**
 * Rebuild an account from a stored document without normalizing it again.
 *
 * An empty domain chunk cannot tell `local` from `local@`, so both are tried
 * and the one whose id matches `_id` is kept.
 *
 * @throws RecordConstructionError when the id is malformed, the fields no
 * longer form a valid account, or the rebuilt account does not hash to `_id`
 */
export function fromDocument(document: AccountDocument): Account {
  const rest = {
    username: encode(document.u ?? ''),
    password: encode(document.p ?? ''),
    hash: encode(document.h ?? ''),
    misc: encode(document.m ?? ''),
  };

  const candidates: Buffer[] = [];
  if (document.e === undefined) {
    candidates.push(Buffer.alloc(0));
  } else {
    const email = recoverEmail(document.e, document._id);
    if (domainChunkOf(document._id) === '') {
      candidates.push(encode(document.e));
    }
    candidates.push(email);
  }

  for (const email of candidates) {
    const account = Account.restore({ email, ...rest });
    if (accountId(account) === document._id) {
      return account;
    }
  }

  throw new RecordConstructionError(`Document does not match its id "${document._id.slice(0, 64)}"`);
}

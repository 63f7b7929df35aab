/**
 * Batch Ingestion Service
 *
 * Normalizes a batch of raw dump records, collapses duplicates by account
 * id, and reports the records that could not become accounts.
 */

import { Account, AccountMetadata } from '../lib/account';
import { isBase64 } from '../lib/codec';
import { toDocument, toPresentation, type AccountDocument } from '../lib/document';
import { RecordConstructionError } from '../lib/errors';
import { accountId } from '../lib/identity';
import type { IngestedAccount, RawRecordInput, SkippedRecord } from '../types';

export interface IngestOptions {
  strict?: boolean;
  quiet?: boolean;
  source?: string;
}

export interface IngestResult {
  accounts: IngestedAccount[];
  documents: AccountDocument[];
  skipped: SkippedRecord[];
  duplicates: number;
}

interface Entry {
  account: Account;
  metadata: AccountMetadata;
}

function fieldBytes(value: string | undefined, input: RawRecordInput): Buffer {
  if (value === undefined) {
    return Buffer.alloc(0);
  }
  if (input.encoding !== 'base64') {
    return Buffer.from(value, 'utf8');
  }
  if (!isBase64(value)) {
    throw new RecordConstructionError(`Invalid base64 field: "${value.slice(0, 64)}"`);
  }
  return Buffer.from(value, 'base64');
}

export function accountFromInput(input: RawRecordInput, strict: boolean = false): Account {
  return Account.create(
    {
      email: fieldBytes(input.email, input),
      username: fieldBytes(input.username, input),
      password: fieldBytes(input.password, input),
      hash: fieldBytes(input.hash, input),
      misc: fieldBytes(input.misc, input),
    },
    { strict }
  );
}

export function ingestBatch(records: RawRecordInput[], options: IngestOptions = {}): IngestResult {
  const entries = new Map<string, Entry>();
  const skipped: SkippedRecord[] = [];
  let duplicates = 0;

  records.forEach((input, index) => {
    let account: Account;
    try {
      account = accountFromInput(input, options.strict ?? false);
    } catch (error) {
      if (!(error instanceof RecordConstructionError)) {
        throw error;
      }
      if (!options.quiet) {
        console.warn(`Skipping record ${index}:`, error.message);
      }
      skipped.push({ index, reason: error.message });
      return;
    }

    const id = accountId(account);
    const source = input.source ?? options.source;
    const existing = entries.get(id);

    if (existing) {
      duplicates++;
      if (source) existing.metadata.add(source);
      return;
    }

    entries.set(id, {
      account,
      metadata: new AccountMetadata(source ? [source] : []),
    });
  });

  const accounts: IngestedAccount[] = [];
  const documents: AccountDocument[] = [];
  for (const { account, metadata } of entries.values()) {
    accounts.push({ ...toPresentation(account), sources: metadata.toArray() });
    documents.push(toDocument(account));
  }

  return { accounts, documents, skipped, duplicates };
}

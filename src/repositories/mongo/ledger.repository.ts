import { ClientSession } from 'mongoose';

import { ILedgerEntry, LedgerEntryModel } from '../../models';
import { parseCurrencyKind } from '../../services/currency/currency.types';
import { LedgerEntry } from '../../services/ledger/ledger.entry';
import { parseLedgerEntryKind, parseLedgerEntryStatus } from '../../services/ledger/ledger.types';
import { LedgerFilter, LedgerRepository } from '../types';
import { restoreRecord, rethrowDuplicateKey } from './errors';

const toEntry = (doc: ILedgerEntry): LedgerEntry =>
  restoreRecord('ledger_entries', doc.entryId, () =>
    LedgerEntry.restore({
      id: doc.entryId,
      ownerId: doc.ownerId,
      kind: parseLedgerEntryKind(doc.kind),
      currencyKind: parseCurrencyKind(doc.currencyKind),
      amount: doc.amount,
      balanceBefore: doc.balanceBefore,
      balanceAfter: doc.balanceAfter,
      status: parseLedgerEntryStatus(doc.status),
      externalRequestRef: doc.externalRequestRef ?? undefined,
      requester: doc.requester ?? undefined,
      metadata: doc.metadata ?? {},
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    })
  );

export class MongoLedgerRepository implements LedgerRepository {
  constructor(private readonly session?: ClientSession) {}

  async append(entry: LedgerEntry): Promise<void> {
    const { id, ...rest } = entry.toSnapshot();
    try {
      await new LedgerEntryModel({ entryId: id, ...rest }).save({ session: this.session });
    } catch (error) {
      rethrowDuplicateKey('ledger_entries', error);
    }
  }

  async findById(id: string): Promise<LedgerEntry | null> {
    const doc = await LedgerEntryModel.findOne({ entryId: id }, null, { session: this.session });
    return doc ? toEntry(doc) : null;
  }

  async findByOwner(
    ownerId: string,
    limit: number,
    offset: number,
    filter: LedgerFilter = {}
  ): Promise<LedgerEntry[]> {
    const query: Record<string, string> = { ownerId };
    if (filter.currencyKind) {
      query.currencyKind = filter.currencyKind;
    }
    if (filter.kind) {
      query.kind = filter.kind;
    }

    const docs = await LedgerEntryModel.find(query, null, { session: this.session })
      .sort({ createdAt: -1, entryId: -1 })
      .skip(offset)
      .limit(limit);
    return docs.map(toEntry);
  }

  async findByExternalRef(ref: string): Promise<LedgerEntry | null> {
    const doc = await LedgerEntryModel.findOne({ externalRequestRef: ref }, null, {
      session: this.session,
    });
    return doc ? toEntry(doc) : null;
  }
}

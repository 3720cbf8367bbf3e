import { ClientSession } from 'mongoose';

import { CurrencyAccountModel, ICurrencyAccount } from '../../models';
import { CurrencyAccount } from '../../services/currency/currency.account';
import { CurrencyKind, parseCurrencyKind } from '../../services/currency/currency.types';
import { OptimisticLockError } from '../errors';
import { AccountRepository } from '../types';
import { restoreRecord, rethrowDuplicateKey } from './errors';

const toAccount = (doc: ICurrencyAccount): CurrencyAccount =>
  restoreRecord('currency_accounts', `${doc.ownerId}/${doc.currencyKind}`, () =>
    CurrencyAccount.restore({
      ownerId: doc.ownerId,
      currencyKind: parseCurrencyKind(doc.currencyKind),
      balance: doc.balance,
      version: doc.version,
    })
  );

export class MongoAccountRepository implements AccountRepository {
  constructor(private readonly session?: ClientSession) {}

  async findByOwnerAndKind(ownerId: string, currencyKind: CurrencyKind): Promise<CurrencyAccount | null> {
    const doc = await CurrencyAccountModel.findOne({ ownerId, currencyKind }, null, {
      session: this.session,
    });
    return doc ? toAccount(doc) : null;
  }

  async findByOwner(ownerId: string): Promise<CurrencyAccount[]> {
    const docs = await CurrencyAccountModel.find({ ownerId }, null, { session: this.session });
    return docs.map(toAccount);
  }

  async create(account: CurrencyAccount): Promise<void> {
    const snapshot = account.toSnapshot();
    try {
      await new CurrencyAccountModel(snapshot).save({ session: this.session });
    } catch (error) {
      rethrowDuplicateKey('currency_accounts', error);
    }
    account.markPersisted();
  }

  /**
   * Write balance and version only if the stored version is still the one we read
   */
  async save(account: CurrencyAccount): Promise<void> {
    const { ownerId, currencyKind, balance, version } = account.toSnapshot();
    const result = await CurrencyAccountModel.updateOne(
      { ownerId, currencyKind, version: account.persistedVersion },
      { $set: { balance, version } },
      { session: this.session }
    );

    if (result.matchedCount === 0) {
      throw new OptimisticLockError(ownerId, account.persistedVersion);
    }
    account.markPersisted();
  }
}

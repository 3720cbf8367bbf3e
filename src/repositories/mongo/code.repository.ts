import { ClientSession } from 'mongoose';

import { CodeRedemptionModel, IRedemptionCode, RedemptionCodeModel } from '../../models';
import { parseCurrencyKind } from '../../services/currency/currency.types';
import {
  RedemptionCode,
  parseCodeStatus,
  parseCodeType,
} from '../../services/redemption/redemption.code';
import { RedemptionRecord } from '../../services/redemption/redemption.record';
import { RecordInUseError, RecordNotFoundError } from '../errors';
import { CodePage, CodeRepository } from '../types';
import { restoreRecord, rethrowDuplicateKey } from './errors';

const toCode = (doc: IRedemptionCode): RedemptionCode =>
  restoreRecord('redemption_codes', doc.code, () =>
    RedemptionCode.restore({
      code: doc.code,
      codeType: parseCodeType(doc.codeType),
      currencyKind: parseCurrencyKind(doc.currencyKind),
      amount: doc.amount,
      maxUses: doc.maxUses,
      currentUses: doc.currentUses,
      validFrom: doc.validFrom,
      validUntil: doc.validUntil,
      status: parseCodeStatus(doc.status),
      metadata: doc.metadata ?? {},
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    })
  );

export class MongoCodeRepository implements CodeRepository {
  constructor(private readonly session?: ClientSession) {}

  async findByCode(code: string): Promise<RedemptionCode | null> {
    const doc = await RedemptionCodeModel.findOne({ code }, null, { session: this.session });
    return doc ? toCode(doc) : null;
  }

  async update(code: RedemptionCode): Promise<void> {
    const { code: key, ...fields } = code.toSnapshot();
    const result = await RedemptionCodeModel.updateOne(
      { code: key },
      {
        $set: {
          currentUses: fields.currentUses,
          status: fields.status,
          maxUses: fields.maxUses,
          validFrom: fields.validFrom,
          validUntil: fields.validUntil,
          metadata: fields.metadata,
          updatedAt: fields.updatedAt,
        },
      },
      { session: this.session }
    );

    if (result.matchedCount === 0) {
      throw new RecordNotFoundError('redemption_codes', key);
    }
  }

  async create(code: RedemptionCode): Promise<void> {
    try {
      await new RedemptionCodeModel(code.toSnapshot()).save({ session: this.session });
    } catch (error) {
      rethrowDuplicateKey('redemption_codes', error);
    }
  }

  async delete(code: string): Promise<void> {
    const referenced = await CodeRedemptionModel.exists({ code }).session(this.session ?? null);
    if (referenced) {
      throw new RecordInUseError('redemption_codes', code);
    }

    const result = await RedemptionCodeModel.deleteOne({ code }, { session: this.session });
    if (result.deletedCount === 0) {
      throw new RecordNotFoundError('redemption_codes', code);
    }
  }

  async findAll(limit: number, offset: number): Promise<CodePage> {
    // sequential: a session must not run operations in parallel
    const total = await RedemptionCodeModel.countDocuments({}, { session: this.session });
    const docs = await RedemptionCodeModel.find({}, null, { session: this.session })
      .sort({ createdAt: -1, code: 1 })
      .skip(offset)
      .limit(limit);
    return { codes: docs.map(toCode), total };
  }

  async hasUserRedeemed(code: string, userId: string): Promise<boolean> {
    const existing = await CodeRedemptionModel.exists({ code, userId }).session(this.session ?? null);
    return existing !== null;
  }

  async saveRedemption(record: RedemptionRecord): Promise<void> {
    try {
      await new CodeRedemptionModel(record.toSnapshot()).save({ session: this.session });
    } catch (error) {
      rethrowDuplicateKey('code_redemptions', error);
    }
  }
}

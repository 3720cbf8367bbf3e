import { ApiError } from '../../middlewares/errorHandler';
import { isValidIdentifier } from '../currency/currency.types';

export interface RedemptionRecordSnapshot {
  redemptionId: string;
  code: string;
  userId: string;
  ledgerEntryId: string;
  redeemedAt: Date;
}

/**
 * Proof that one user redeemed one code. The store keeps at most one per (code, userId).
 */
export class RedemptionRecord {
  private constructor(private readonly state: RedemptionRecordSnapshot) {}

  static create(
    input: Omit<RedemptionRecordSnapshot, 'redeemedAt'>,
    now: Date = new Date()
  ): RedemptionRecord {
    return RedemptionRecord.restore({ ...input, redeemedAt: now });
  }

  static restore(snapshot: RedemptionRecordSnapshot): RedemptionRecord {
    if (!isValidIdentifier(snapshot.redemptionId)) {
      throw ApiError.validationError(`invalid redemption id: ${snapshot.redemptionId}`);
    }
    if (snapshot.code.trim() === '') {
      throw ApiError.validationError('invalid code');
    }
    if (!isValidIdentifier(snapshot.userId)) {
      throw ApiError.validationError(`invalid user id: ${snapshot.userId}`);
    }
    if (!isValidIdentifier(snapshot.ledgerEntryId)) {
      throw ApiError.validationError(`invalid ledger entry id: ${snapshot.ledgerEntryId}`);
    }
    return new RedemptionRecord({ ...snapshot });
  }

  get redemptionId(): string {
    return this.state.redemptionId;
  }

  get code(): string {
    return this.state.code;
  }

  get userId(): string {
    return this.state.userId;
  }

  get ledgerEntryId(): string {
    return this.state.ledgerEntryId;
  }

  get redeemedAt(): Date {
    return this.state.redeemedAt;
  }

  toSnapshot(): RedemptionRecordSnapshot {
    return { ...this.state };
  }
}

import { ApiError } from '../../middlewares/errorHandler';
import { parseEnumValue } from '../../utils/enum';
import { assertValidAmount } from '../currency/currency.account';
import { CurrencyKind, parseCurrencyKind } from '../currency/currency.types';

export enum CodeType {
  PROMOTION = 'promotion',
  GIFT = 'gift',
  EVENT = 'event',
}

/**
 * Code lifecycle.
 *
 *   ACTIVE ──disable()──► DISABLED
 *     │
 *     └────expire()────► EXPIRED
 *
 * Only ACTIVE codes can be redeemed. Leaving the validity window does not change the
 * status; that is checked on every redemption instead.
 */
export enum CodeStatus {
  ACTIVE = 'active',
  EXPIRED = 'expired',
  DISABLED = 'disabled',
}

export const parseCodeType = (value: string): CodeType =>
  parseEnumValue(CodeType, value, 'code type');

export const parseCodeStatus = (value: string): CodeStatus =>
  parseEnumValue(CodeStatus, value, 'code status');

export interface RedemptionCodeSnapshot {
  code: string;
  codeType: CodeType;
  currencyKind: CurrencyKind;
  amount: number;
  /** 0 means unlimited */
  maxUses: number;
  currentUses: number;
  validFrom: Date;
  validUntil: Date;
  status: CodeStatus;
  metadata: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewRedemptionCode {
  code: string;
  codeType: string;
  currencyKind: string;
  amount: number;
  maxUses: number;
  validFrom: Date;
  validUntil: Date;
  metadata?: Record<string, unknown>;
}

const MAX_CODE_LENGTH = 255;

export class RedemptionCode {
  private constructor(private readonly state: RedemptionCodeSnapshot) {}

  /**
   * Validate a new code; it starts ACTIVE with no uses
   */
  static create(input: NewRedemptionCode, now: Date = new Date()): RedemptionCode {
    return RedemptionCode.restore({
      code: input.code,
      codeType: parseCodeType(input.codeType),
      currencyKind: parseCurrencyKind(input.currencyKind),
      amount: input.amount,
      maxUses: input.maxUses,
      currentUses: 0,
      validFrom: input.validFrom,
      validUntil: input.validUntil,
      status: CodeStatus.ACTIVE,
      metadata: input.metadata ?? {},
      createdAt: now,
      updatedAt: now,
    });
  }

  static restore(snapshot: RedemptionCodeSnapshot): RedemptionCode {
    const code = snapshot.code.trim();
    if (code === '' || code.length > MAX_CODE_LENGTH) {
      throw ApiError.validationError('invalid code');
    }
    assertValidAmount(snapshot.amount);
    if (!Number.isSafeInteger(snapshot.maxUses) || snapshot.maxUses < 0) {
      throw ApiError.validationError(`invalid max uses: ${snapshot.maxUses}`);
    }
    if (!Number.isSafeInteger(snapshot.currentUses) || snapshot.currentUses < 0) {
      throw ApiError.validationError(`invalid current uses: ${snapshot.currentUses}`);
    }
    if (snapshot.maxUses > 0 && snapshot.currentUses > snapshot.maxUses) {
      throw ApiError.validationError('current uses exceed max uses');
    }
    if (Number.isNaN(snapshot.validFrom.getTime()) || Number.isNaN(snapshot.validUntil.getTime())) {
      throw ApiError.validationError('invalid validity window');
    }
    if (snapshot.validFrom.getTime() > snapshot.validUntil.getTime()) {
      throw ApiError.validationError('validFrom must not be after validUntil');
    }

    return new RedemptionCode({
      ...snapshot,
      code,
      codeType: parseCodeType(snapshot.codeType),
      currencyKind: parseCurrencyKind(snapshot.currencyKind),
      status: parseCodeStatus(snapshot.status),
      metadata: { ...snapshot.metadata },
    });
  }

  get code(): string {
    return this.state.code;
  }

  get codeType(): CodeType {
    return this.state.codeType;
  }

  get currencyKind(): CurrencyKind {
    return this.state.currencyKind;
  }

  get amount(): number {
    return this.state.amount;
  }

  get maxUses(): number {
    return this.state.maxUses;
  }

  get currentUses(): number {
    return this.state.currentUses;
  }

  get validFrom(): Date {
    return this.state.validFrom;
  }

  get validUntil(): Date {
    return this.state.validUntil;
  }

  get status(): CodeStatus {
    return this.state.status;
  }

  get metadata(): Readonly<Record<string, unknown>> {
    return this.state.metadata;
  }

  get createdAt(): Date {
    return this.state.createdAt;
  }

  get updatedAt(): Date {
    return this.state.updatedAt;
  }

  /**
   * Active, inside [validFrom, validUntil] and under the use cap
   */
  isValid(now: Date = new Date()): boolean {
    if (this.state.status !== CodeStatus.ACTIVE) {
      return false;
    }

    const at = now.getTime();
    if (at < this.state.validFrom.getTime() || at > this.state.validUntil.getTime()) {
      return false;
    }

    if (this.state.maxUses > 0 && this.state.currentUses >= this.state.maxUses) {
      return false;
    }

    return true;
  }

  canBeRedeemed(now: Date = new Date()): boolean {
    return this.isValid(now);
  }

  /**
   * Consume one use. Per-user idempotency is the redemption record's job, not this one's.
   */
  redeem(now: Date = new Date()): void {
    if (!this.canBeRedeemed(now)) {
      throw ApiError.codeNotRedeemable();
    }
    this.state.currentUses += 1;
    this.state.updatedAt = now;
  }

  disable(now: Date = new Date()): void {
    this.state.status = CodeStatus.DISABLED;
    this.state.updatedAt = now;
  }

  expire(now: Date = new Date()): void {
    this.state.status = CodeStatus.EXPIRED;
    this.state.updatedAt = now;
  }

  toSnapshot(): RedemptionCodeSnapshot {
    return { ...this.state, metadata: { ...this.state.metadata } };
  }
}

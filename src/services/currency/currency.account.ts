import { ApiError } from '../../middlewares/errorHandler';
import {
  CurrencyKind,
  MAX_AMOUNT,
  MIN_BALANCE,
  isCurrencyKind,
  isValidIdentifier,
} from './currency.types';

export interface CurrencyAccountSnapshot {
  ownerId: string;
  currencyKind: CurrencyKind;
  balance: number;
  version: number;
}

/**
 * Reject oversized, non-integer and non-positive amounts. Any integer above
 * MAX_AMOUNT is too large, including those past 2^53.
 */
export const assertValidAmount = (amount: number): void => {
  if (Number.isInteger(amount) && amount > MAX_AMOUNT) {
    throw ApiError.amountTooLarge();
  }
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw ApiError.invalidAmount();
  }
};

export const isBalanceInRange = (balance: number): boolean =>
  Number.isSafeInteger(balance) && balance >= MIN_BALANCE && balance <= MAX_AMOUNT;

/**
 * Balance of one currency kind for one owner.
 *
 * `version` is the optimistic-lock token: every successful mutation bumps it by one,
 * and `persistedVersion` remembers the value read from the store so a save can be
 * conditioned on nobody else having written in between.
 */
export class CurrencyAccount {
  private constructor(
    readonly ownerId: string,
    readonly currencyKind: CurrencyKind,
    private currentBalance: number,
    private currentVersion: number,
    private loadedVersion: number
  ) {}

  /**
   * A fresh account with a zero balance, for an owner that has none of this kind yet
   */
  static open(ownerId: string, currencyKind: CurrencyKind): CurrencyAccount {
    return CurrencyAccount.restore({ ownerId, currencyKind, balance: 0, version: 0 });
  }

  /**
   * Rebuild an account from stored state
   */
  static restore(snapshot: CurrencyAccountSnapshot): CurrencyAccount {
    if (!isValidIdentifier(snapshot.ownerId)) {
      throw ApiError.validationError(`invalid owner id: ${snapshot.ownerId}`);
    }
    if (!isCurrencyKind(snapshot.currencyKind)) {
      throw ApiError.validationError(`invalid currency kind: ${String(snapshot.currencyKind)}`);
    }
    if (!isBalanceInRange(snapshot.balance)) {
      throw ApiError.balanceOutOfRange();
    }
    if (!Number.isSafeInteger(snapshot.version) || snapshot.version < 0) {
      throw ApiError.validationError(`invalid version: ${snapshot.version}`);
    }
    return new CurrencyAccount(
      snapshot.ownerId,
      snapshot.currencyKind,
      snapshot.balance,
      snapshot.version,
      snapshot.version
    );
  }

  get balance(): number {
    return this.currentBalance;
  }

  get version(): number {
    return this.currentVersion;
  }

  get persistedVersion(): number {
    return this.loadedVersion;
  }

  grant(amount: number): void {
    assertValidAmount(amount);
    // compared this way round so the sum is never formed past the bound
    if (this.currentBalance > MAX_AMOUNT - amount) {
      throw ApiError.balanceOutOfRange();
    }
    this.apply(this.currentBalance + amount);
  }

  consume(amount: number): void {
    assertValidAmount(amount);
    if (this.currentBalance < amount) {
      throw ApiError.insufficientBalance();
    }
    this.apply(this.currentBalance - amount);
  }

  /**
   * Consume without the sufficiency check, for refunds, compensation and manual
   * adjustments. Still bounded below by MIN_BALANCE.
   */
  consumeAllowNegative(amount: number): void {
    assertValidAmount(amount);
    if (this.currentBalance < MIN_BALANCE + amount) {
      throw ApiError.balanceOutOfRange();
    }
    this.apply(this.currentBalance - amount);
  }

  /**
   * Called by repositories once the current state has been written
   */
  markPersisted(): void {
    this.loadedVersion = this.currentVersion;
  }

  toSnapshot(): CurrencyAccountSnapshot {
    return {
      ownerId: this.ownerId,
      currencyKind: this.currencyKind,
      balance: this.currentBalance,
      version: this.currentVersion,
    };
  }

  private apply(balance: number): void {
    this.currentBalance = balance;
    this.currentVersion += 1;
  }
}

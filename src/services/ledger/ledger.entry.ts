import { ApiError } from '../../middlewares/errorHandler';
import { CurrencyKind, isCurrencyKind, isValidIdentifier } from '../currency/currency.types';
import { assertValidAmount, isBalanceInRange } from '../currency/currency.account';
import { LedgerEntryKind, LedgerEntryStatus, parseLedgerEntryKind, parseLedgerEntryStatus } from './ledger.types';

export interface LedgerEntrySnapshot {
  id: string;
  ownerId: string;
  kind: LedgerEntryKind;
  currencyKind: CurrencyKind;
  amount: number;
  balanceBefore: number;
  balanceAfter: number;
  status: LedgerEntryStatus;
  externalRequestRef?: string;
  requester?: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

export type NewLedgerEntry = Omit<LedgerEntrySnapshot, 'createdAt' | 'updatedAt' | 'metadata'> & {
  metadata?: Record<string, unknown>;
};

/**
 * Immutable record of one balance change.
 * Only the status and the optional references can change after creation.
 */
export class LedgerEntry {
  private constructor(private readonly state: LedgerEntrySnapshot) {}

  static create(entry: NewLedgerEntry, now: Date = new Date()): LedgerEntry {
    return LedgerEntry.restore({
      ...entry,
      metadata: entry.metadata ?? {},
      createdAt: now,
      updatedAt: now,
    });
  }

  static restore(snapshot: LedgerEntrySnapshot): LedgerEntry {
    if (!isValidIdentifier(snapshot.id)) {
      throw ApiError.validationError(`invalid ledger entry id: ${snapshot.id}`);
    }
    if (!isValidIdentifier(snapshot.ownerId)) {
      throw ApiError.validationError(`invalid owner id: ${snapshot.ownerId}`);
    }
    if (!isCurrencyKind(snapshot.currencyKind)) {
      throw ApiError.validationError(`invalid currency kind: ${String(snapshot.currencyKind)}`);
    }
    assertValidAmount(snapshot.amount);
    if (!isBalanceInRange(snapshot.balanceBefore) || !isBalanceInRange(snapshot.balanceAfter)) {
      throw ApiError.balanceOutOfRange();
    }

    return new LedgerEntry({
      ...snapshot,
      kind: parseLedgerEntryKind(snapshot.kind),
      status: parseLedgerEntryStatus(snapshot.status),
      metadata: { ...snapshot.metadata },
    });
  }

  get id(): string {
    return this.state.id;
  }

  get ownerId(): string {
    return this.state.ownerId;
  }

  get kind(): LedgerEntryKind {
    return this.state.kind;
  }

  get currencyKind(): CurrencyKind {
    return this.state.currencyKind;
  }

  get amount(): number {
    return this.state.amount;
  }

  get balanceBefore(): number {
    return this.state.balanceBefore;
  }

  get balanceAfter(): number {
    return this.state.balanceAfter;
  }

  get status(): LedgerEntryStatus {
    return this.state.status;
  }

  get externalRequestRef(): string | undefined {
    return this.state.externalRequestRef;
  }

  get requester(): string | undefined {
    return this.state.requester;
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

  updateStatus(status: LedgerEntryStatus, now: Date = new Date()): void {
    this.state.status = parseLedgerEntryStatus(status);
    this.state.updatedAt = now;
  }

  setExternalRequestRef(ref: string, now: Date = new Date()): void {
    this.state.externalRequestRef = ref;
    this.state.updatedAt = now;
  }

  setRequester(requester: string, now: Date = new Date()): void {
    this.state.requester = requester;
    this.state.updatedAt = now;
  }

  toSnapshot(): LedgerEntrySnapshot {
    return { ...this.state, metadata: { ...this.state.metadata } };
  }
}

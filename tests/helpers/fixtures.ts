import { CurrencyKind } from '../../src/services/currency/currency.types';
import {
  CodeStatus,
  CodeType,
  RedemptionCode,
  RedemptionCodeSnapshot,
} from '../../src/services/redemption/redemption.code';
import { InMemoryStore } from './inMemoryStore';

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export const fixedClock = (): Date => new Date(FIXED_NOW.getTime());

export const daysFrom = (base: Date, days: number): Date =>
  new Date(base.getTime() + days * 24 * 60 * 60 * 1000);

/**
 * Code snapshot that is redeemable at FIXED_NOW unless overridden
 */
export const buildCode = (overrides: Partial<RedemptionCodeSnapshot> = {}): RedemptionCodeSnapshot => ({
  code: 'TESTCODE123',
  codeType: CodeType.PROMOTION,
  currencyKind: CurrencyKind.PAID,
  amount: 1000,
  maxUses: 0,
  currentUses: 0,
  validFrom: daysFrom(FIXED_NOW, -1),
  validUntil: daysFrom(FIXED_NOW, 30),
  status: CodeStatus.ACTIVE,
  metadata: {},
  createdAt: daysFrom(FIXED_NOW, -2),
  updatedAt: daysFrom(FIXED_NOW, -2),
  ...overrides,
});

/**
 * Throws on invalid input; for test setup only
 */
export const mustRestoreCode = (overrides: Partial<RedemptionCodeSnapshot> = {}): RedemptionCode =>
  RedemptionCode.restore(buildCode(overrides));

export const seedCode = (
  store: InMemoryStore,
  overrides: Partial<RedemptionCodeSnapshot> = {}
): RedemptionCodeSnapshot => {
  const snapshot = mustRestoreCode(overrides).toSnapshot();
  store.putCode(snapshot);
  return snapshot;
};

export const seedAccount = (
  store: InMemoryStore,
  ownerId: string,
  currencyKind: CurrencyKind,
  balance: number,
  version: number
): void => {
  store.putAccount({ ownerId, currencyKind, balance, version });
};

/**
 * Outcome of a settled promise, for asserting on mixed results
 */
export const settle = async <T>(promise: Promise<T>): Promise<{ ok: true; value: T } | { ok: false; error: unknown }> => {
  try {
    return { ok: true, value: await promise };
  } catch (error) {
    return { ok: false, error };
  }
};

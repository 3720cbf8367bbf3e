import { parseEnumValue, isEnumValue } from '../../utils/enum';

/**
 * Largest amount a single mutation may carry, and the upper balance bound (10 trillion)
 */
export const MAX_AMOUNT = 10_000_000_000_000;

/**
 * Lower balance bound; balances may go negative through refunds and manual adjustments
 */
export const MIN_BALANCE = -10_000_000_000_000;

export enum CurrencyKind {
  PAID = 'paid',
  FREE = 'free',
}

export const parseCurrencyKind = (value: string): CurrencyKind =>
  parseEnumValue(CurrencyKind, value, 'currency kind');

export const isCurrencyKind = (value: unknown): value is CurrencyKind =>
  isEnumValue(CurrencyKind, value);

/**
 * Consume request kind that spends free gems first and takes the rest from paid
 */
export const AUTO_CURRENCY_KIND = 'auto';

/** Order in which a priority consume drains the kinds */
export const CONSUME_PRIORITY: readonly CurrencyKind[] = [CurrencyKind.FREE, CurrencyKind.PAID];

/**
 * Owner and entry ids: 1-255 chars of letters, digits and `_ - . @`
 */
export const IDENTIFIER_PATTERN = /^[a-zA-Z0-9_\-.@]{1,255}$/;

export const isValidIdentifier = (value: string): boolean => IDENTIFIER_PATTERN.test(value);

export interface BalanceView {
  userId: string;
  balances: Record<CurrencyKind, number>;
}

export interface GrantCurrencyRequest {
  userId: string;
  currencyKind: string;
  amount: number;
  reason?: string;
  requester?: string;
  metadata?: Record<string, unknown>;
}

export interface ConsumeCurrencyRequest {
  userId: string;
  /** "paid", "free", or "auto" for a priority consume */
  currencyKind: string;
  amount: number;
  /** Spend free gems first, whatever `currencyKind` says */
  usePriority?: boolean;
  itemId?: string;
  requester?: string;
  metadata?: Record<string, unknown>;
}

export interface BalanceMutationResult {
  ledgerEntryId: string;
  currencyKind: CurrencyKind;
  amount: number;
  balanceBefore: number;
  balanceAfter: number;
  status: 'completed';
}

export const isPriorityConsume = (
  request: Pick<ConsumeCurrencyRequest, 'currencyKind' | 'usePriority'>
): boolean => request.usePriority === true || request.currencyKind === AUTO_CURRENCY_KIND;

export interface ConsumptionDetail {
  ledgerEntryId: string;
  currencyKind: CurrencyKind;
  amount: number;
  balanceBefore: number;
  balanceAfter: number;
}

export interface PriorityConsumeResult {
  consumptionId: string;
  totalConsumed: number;
  details: ConsumptionDetail[];
  status: 'completed';
}

export interface HistoryQuery {
  limit?: number;
  offset?: number;
  currencyKind?: string;
  kind?: string;
}

export interface MutationOptions {
  signal?: AbortSignal;
}

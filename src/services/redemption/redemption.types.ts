import { CurrencyKind } from '../currency/currency.types';
import { RedemptionCodeSnapshot } from './redemption.code';

export interface RedeemCodeRequest {
  code: string;
  userId: string;
}

export interface RedeemCodeResult {
  redemptionId: string;
  ledgerEntryId: string;
  code: string;
  currencyKind: CurrencyKind;
  amount: number;
  balanceAfter: number;
  status: 'completed';
}

export interface CreateCodeRequest {
  code: string;
  codeType: string;
  currencyKind: string;
  amount: number;
  maxUses?: number;
  validFrom: Date;
  validUntil: Date;
  metadata?: Record<string, unknown>;
}

export interface ListCodesQuery {
  limit?: number;
  offset?: number;
  status?: string;
  codeType?: string;
}

export interface CodeList {
  codes: RedemptionCodeSnapshot[];
  /** Total stored codes, before status/type filtering */
  total: number;
  limit: number;
  offset: number;
}

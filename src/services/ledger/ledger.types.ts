import { parseEnumValue } from '../../utils/enum';

export enum LedgerEntryKind {
  GRANT = 'grant',
  CONSUME = 'consume',
  REFUND = 'refund',
  EXPIRE = 'expire',
  COMPENSATE = 'compensate',
}

export enum LedgerEntryStatus {
  PENDING = 'pending',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export const parseLedgerEntryKind = (value: string): LedgerEntryKind =>
  parseEnumValue(LedgerEntryKind, value, 'ledger entry kind');

export const parseLedgerEntryStatus = (value: string): LedgerEntryStatus =>
  parseEnumValue(LedgerEntryStatus, value, 'ledger entry status');

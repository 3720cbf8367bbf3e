export { CurrencyAccountModel, ICurrencyAccount } from './CurrencyAccount';
export { LedgerEntryModel, ILedgerEntry } from './LedgerEntry';
export { RedemptionCodeModel, IRedemptionCode } from './RedemptionCode';
export { CodeRedemptionModel, ICodeRedemption } from './CodeRedemption';

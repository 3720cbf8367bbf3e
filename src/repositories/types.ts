import { CurrencyAccount } from '../services/currency/currency.account';
import { CurrencyKind } from '../services/currency/currency.types';
import { LedgerEntry } from '../services/ledger/ledger.entry';
import { LedgerEntryKind } from '../services/ledger/ledger.types';
import { RedemptionCode } from '../services/redemption/redemption.code';
import { RedemptionRecord } from '../services/redemption/redemption.record';

export interface AccountRepository {
  findByOwnerAndKind(ownerId: string, currencyKind: CurrencyKind): Promise<CurrencyAccount | null>;
  findByOwner(ownerId: string): Promise<CurrencyAccount[]>;
  /** Throws DuplicateKeyError when the (owner, kind) pair already exists */
  create(account: CurrencyAccount): Promise<void>;
  /** Throws OptimisticLockError when the stored version no longer matches */
  save(account: CurrencyAccount): Promise<void>;
}

/** Narrows an owner's history; an absent field matches everything */
export interface LedgerFilter {
  currencyKind?: CurrencyKind;
  kind?: LedgerEntryKind;
}

export interface LedgerRepository {
  append(entry: LedgerEntry): Promise<void>;
  findById(id: string): Promise<LedgerEntry | null>;
  findByOwner(
    ownerId: string,
    limit: number,
    offset: number,
    filter?: LedgerFilter
  ): Promise<LedgerEntry[]>;
  findByExternalRef(ref: string): Promise<LedgerEntry | null>;
}

export interface CodePage {
  codes: RedemptionCode[];
  total: number;
}

export interface CodeRepository {
  findByCode(code: string): Promise<RedemptionCode | null>;
  /** Throws RecordNotFoundError when the code is gone */
  update(code: RedemptionCode): Promise<void>;
  /** Throws DuplicateKeyError when the code already exists */
  create(code: RedemptionCode): Promise<void>;
  /** Throws RecordInUseError when a redemption references the code */
  delete(code: string): Promise<void>;
  findAll(limit: number, offset: number): Promise<CodePage>;
  hasUserRedeemed(code: string, userId: string): Promise<boolean>;
  /** Throws DuplicateKeyError when (code, userId) already has a record */
  saveRedemption(record: RedemptionRecord): Promise<void>;
}

export interface RepositorySet {
  accounts: AccountRepository;
  ledger: LedgerRepository;
  codes: CodeRepository;
}

/**
 * All-or-nothing execution of a unit of work.
 *
 * `work` receives repositories bound to the scope. Its writes commit only if it
 * resolves; a rejection (or a throw) rolls everything back and is re-raised.
 */
export interface AtomicScope {
  run<T>(work: (repositories: RepositorySet) => Promise<T>, signal?: AbortSignal): Promise<T>;
}

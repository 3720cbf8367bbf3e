import { ApiError, toPersistenceError } from '../../middlewares/errorHandler';
import { addLogContext } from '../../observability/log-context';
import { createServiceLogger } from '../../observability/logger';
import { ledgerAmount, ledgerEntriesTotal } from '../../observability/metrics';
import { withSpan } from '../../observability/tracing';
import { AtomicScope, LedgerFilter, RepositorySet } from '../../repositories';
import { ensureNotAborted } from '../../utils/backoff';
import { generateLedgerEntryId } from '../../utils/ids';
import { clampPagination } from '../../utils/pagination';
import { LedgerEntry, LedgerEntrySnapshot } from '../ledger/ledger.entry';
import { LedgerEntryKind, LedgerEntryStatus, parseLedgerEntryKind } from '../ledger/ledger.types';
import { CurrencyAccount, assertValidAmount } from './currency.account';
import { RetryPolicy, defaultRetryPolicy, mutateWithRetry } from './currency.retry';
import {
  BalanceMutationResult,
  BalanceView,
  CONSUME_PRIORITY,
  ConsumeCurrencyRequest,
  ConsumptionDetail,
  CurrencyKind,
  GrantCurrencyRequest,
  HistoryQuery,
  MutationOptions,
  PriorityConsumeResult,
  isValidIdentifier,
  parseCurrencyKind,
} from './currency.types';

const log = createServiceLogger('currency');

export interface CurrencyServiceDependencies {
  repositories: RepositorySet;
  scope: AtomicScope;
  retryPolicy?: RetryPolicy;
  clock?: () => Date;
}

export interface LedgerHistory {
  userId: string;
  entries: LedgerEntrySnapshot[];
  limit: number;
  offset: number;
  filter: LedgerFilter;
}

interface MutationPlan {
  userId: string;
  currencyKind: CurrencyKind;
  amount: number;
  kind: LedgerEntryKind.GRANT | LedgerEntryKind.CONSUME;
  requester?: string;
  metadata: Record<string, unknown>;
}

export const assertValidUserId = (userId: string): void => {
  if (!isValidIdentifier(userId)) {
    throw ApiError.validationError(`invalid user id: ${userId}`);
  }
};

const balancesOf = (accounts: CurrencyAccount[]): Record<CurrencyKind, number> => {
  const balances: Record<CurrencyKind, number> = {
    [CurrencyKind.PAID]: 0,
    [CurrencyKind.FREE]: 0,
  };
  for (const account of accounts) {
    balances[account.currencyKind] = account.balance;
  }
  return balances;
};

const consumeMetadata = (request: ConsumeCurrencyRequest): Record<string, unknown> => {
  const metadata: Record<string, unknown> = { ...request.metadata };
  if (request.itemId) {
    metadata.itemId = request.itemId;
  }
  return metadata;
};

export class CurrencyService {
  private readonly repositories: RepositorySet;
  private readonly scope: AtomicScope;
  private readonly retryPolicy: RetryPolicy;
  private readonly clock: () => Date;

  constructor(deps: CurrencyServiceDependencies) {
    this.repositories = deps.repositories;
    this.scope = deps.scope;
    this.retryPolicy = deps.retryPolicy ?? defaultRetryPolicy();
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Paid and free balances; a kind the user has never held reads as 0
   */
  async getBalance(userId: string): Promise<BalanceView> {
    assertValidUserId(userId);
    return { userId, balances: await this.loadBalances(this.repositories, userId) };
  }

  async grant(request: GrantCurrencyRequest, options: MutationOptions = {}): Promise<BalanceMutationResult> {
    assertValidUserId(request.userId);
    const currencyKind = parseCurrencyKind(request.currencyKind);
    assertValidAmount(request.amount);

    const metadata: Record<string, unknown> = { ...request.metadata };
    if (request.reason) {
      metadata.reason = request.reason;
    }

    return this.mutate(
      {
        userId: request.userId,
        currencyKind,
        amount: request.amount,
        kind: LedgerEntryKind.GRANT,
        requester: request.requester,
        metadata,
      },
      options.signal
    );
  }

  async consume(
    request: ConsumeCurrencyRequest,
    options: MutationOptions = {}
  ): Promise<BalanceMutationResult> {
    assertValidUserId(request.userId);
    const currencyKind = parseCurrencyKind(request.currencyKind);
    assertValidAmount(request.amount);

    return this.mutate(
      {
        userId: request.userId,
        currencyKind,
        amount: request.amount,
        kind: LedgerEntryKind.CONSUME,
        requester: request.requester,
        metadata: consumeMetadata(request),
      },
      options.signal
    );
  }

  /**
   * Spend free gems first and take whatever is left from paid ones, in one atomic
   * scope. Each kind touched gets its own ledger entry, `<consumptionId>_free` and
   * `<consumptionId>_paid`, both carrying the consumption id in their metadata.
   */
  async consumeWithPriority(
    request: ConsumeCurrencyRequest,
    options: MutationOptions = {}
  ): Promise<PriorityConsumeResult> {
    const { userId, amount } = request;
    assertValidUserId(userId);
    assertValidAmount(amount);
    ensureNotAborted(options.signal);
    const consumptionId = generateLedgerEntryId();
    addLogContext({ userId, consumptionId });
    log.info({ userId, amount }, 'Consuming currency with priority');

    const metadata = { ...consumeMetadata(request), consumptionId };
    const now = this.clock();

    const details = await withSpan(
      'currency.consume_priority',
      { 'user.id': userId, 'currency.amount': amount },
      () =>
        this.scope.run(async (repositories) => {
          const available = await this.loadBalances(repositories, userId);
          const spendable = CONSUME_PRIORITY.reduce(
            (sum, kind) => sum + Math.max(available[kind], 0),
            0
          );
          if (spendable < amount) {
            throw ApiError.insufficientBalance();
          }

          const consumed: ConsumptionDetail[] = [];
          let remaining = amount;

          for (const [index, currencyKind] of CONSUME_PRIORITY.entries()) {
            const isLast = index === CONSUME_PRIORITY.length - 1;
            if (remaining === 0 || (!isLast && available[currencyKind] <= 0)) {
              continue;
            }

            // recomputed on every attempt, from the balance that attempt read
            let part = 0;
            const { account, balanceBefore } = await mutateWithRetry(
              repositories.accounts,
              {
                ownerId: userId,
                currencyKind,
                operation: 'consume_priority',
                mutate: (target) => {
                  part = isLast ? remaining : Math.min(remaining, Math.max(target.balance, 0));
                  if (part > 0) {
                    target.consume(part);
                  }
                },
              },
              this.retryPolicy,
              options.signal
            );
            if (part === 0) {
              continue;
            }

            const entry = LedgerEntry.create(
              {
                id: `${consumptionId}_${currencyKind}`,
                ownerId: userId,
                kind: LedgerEntryKind.CONSUME,
                currencyKind,
                amount: part,
                balanceBefore,
                balanceAfter: account.balance,
                status: LedgerEntryStatus.COMPLETED,
                requester: request.requester,
                metadata,
              },
              now
            );

            try {
              await repositories.ledger.append(entry);
            } catch (error) {
              throw toPersistenceError('failed to append ledger entry', error);
            }

            consumed.push({
              ledgerEntryId: entry.id,
              currencyKind,
              amount: part,
              balanceBefore,
              balanceAfter: account.balance,
            });
            remaining -= part;
          }

          return consumed;
        }, options.signal)
    );

    for (const detail of details) {
      ledgerEntriesTotal.inc({ kind: LedgerEntryKind.CONSUME, currency_kind: detail.currencyKind });
      ledgerAmount.observe({ kind: LedgerEntryKind.CONSUME }, detail.amount);
    }
    log.info(
      { userId, consumptionId, totalConsumed: amount, kinds: details.map((detail) => detail.currencyKind) },
      'Currency consumed with priority'
    );

    return { consumptionId, totalConsumed: amount, details, status: 'completed' };
  }

  /**
   * Ledger entries for a user, newest first, optionally narrowed by currency kind
   * and entry kind. Filters apply before paging.
   */
  async getHistory(userId: string, query: HistoryQuery = {}): Promise<LedgerHistory> {
    assertValidUserId(userId);
    const page = clampPagination(query.limit, query.offset);
    const filter: LedgerFilter = {};
    if (query.currencyKind) {
      filter.currencyKind = parseCurrencyKind(query.currencyKind);
    }
    if (query.kind) {
      filter.kind = parseLedgerEntryKind(query.kind);
    }

    let entries: LedgerEntry[];
    try {
      entries = await this.repositories.ledger.findByOwner(userId, page.limit, page.offset, filter);
    } catch (error) {
      throw toPersistenceError('failed to list ledger entries', error);
    }

    return {
      userId,
      entries: entries.map((entry) => entry.toSnapshot()),
      limit: page.limit,
      offset: page.offset,
      filter,
    };
  }

  /**
   * Look up one ledger entry owned by the user
   */
  async getLedgerEntry(userId: string, entryId: string): Promise<LedgerEntrySnapshot> {
    assertValidUserId(userId);

    let entry: LedgerEntry | null;
    try {
      entry = await this.repositories.ledger.findById(entryId);
    } catch (error) {
      throw toPersistenceError('failed to find ledger entry', error);
    }

    if (!entry || entry.ownerId !== userId) {
      throw ApiError.notFound('Ledger entry');
    }
    return entry.toSnapshot();
  }

  private async loadBalances(
    repositories: RepositorySet,
    userId: string
  ): Promise<Record<CurrencyKind, number>> {
    try {
      return balancesOf(await repositories.accounts.findByOwner(userId));
    } catch (error) {
      throw toPersistenceError('failed to load currency accounts', error);
    }
  }

  private async mutate(plan: MutationPlan, signal?: AbortSignal): Promise<BalanceMutationResult> {
    const { userId, currencyKind, amount, kind } = plan;
    ensureNotAborted(signal);
    const ledgerEntryId = generateLedgerEntryId();
    addLogContext({ userId, ledgerEntryId });

    const result = await withSpan(
      `currency.${kind}`,
      { 'user.id': userId, 'currency.kind': currencyKind, 'currency.amount': amount },
      () =>
        this.scope.run(async (repositories) => {
          const { account, balanceBefore } = await mutateWithRetry(
            repositories.accounts,
            {
              ownerId: userId,
              currencyKind,
              operation: kind,
              mutate: (target) =>
                kind === LedgerEntryKind.GRANT ? target.grant(amount) : target.consume(amount),
            },
            this.retryPolicy,
            signal
          );

          const entry = LedgerEntry.create(
            {
              id: ledgerEntryId,
              ownerId: userId,
              kind,
              currencyKind,
              amount,
              balanceBefore,
              balanceAfter: account.balance,
              status: LedgerEntryStatus.COMPLETED,
              requester: plan.requester,
              metadata: plan.metadata,
            },
            this.clock()
          );

          try {
            await repositories.ledger.append(entry);
          } catch (error) {
            throw toPersistenceError('failed to append ledger entry', error);
          }

          return {
            ledgerEntryId: entry.id,
            currencyKind,
            amount,
            balanceBefore,
            balanceAfter: account.balance,
            status: 'completed' as const,
          };
        }, signal)
    );

    ledgerEntriesTotal.inc({ kind, currency_kind: currencyKind });
    ledgerAmount.observe({ kind }, amount);
    log.info(
      { userId, currencyKind, amount, kind, balanceAfter: result.balanceAfter },
      'Balance updated'
    );

    return result;
  }
}

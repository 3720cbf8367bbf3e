import { ApiError, toPersistenceError } from '../../middlewares/errorHandler';
import { ErrorCode } from '../../types/errors';
import { addLogContext } from '../../observability/log-context';
import { createServiceLogger } from '../../observability/logger';
import {
  ledgerAmount,
  ledgerEntriesTotal,
  redemptionDuration,
  redemptionsTotal,
} from '../../observability/metrics';
import { withSpan } from '../../observability/tracing';
import {
  DuplicateKeyError,
  RecordInUseError,
  RecordNotFoundError,
} from '../../repositories/errors';
import { AtomicScope, CodePage, RepositorySet } from '../../repositories';
import { ensureNotAborted } from '../../utils/backoff';
import { generateLedgerEntryId, generateRedemptionId } from '../../utils/ids';
import { clampPagination } from '../../utils/pagination';
import { RetryPolicy, defaultRetryPolicy, mutateWithRetry } from '../currency/currency.retry';
import { assertValidUserId } from '../currency/currency.service';
import { MutationOptions } from '../currency/currency.types';
import { LedgerEntry } from '../ledger/ledger.entry';
import { LedgerEntryKind, LedgerEntryStatus } from '../ledger/ledger.types';
import {
  CodeStatus,
  CodeType,
  RedemptionCode,
  RedemptionCodeSnapshot,
  parseCodeStatus,
  parseCodeType,
} from './redemption.code';
import { RedemptionRecord } from './redemption.record';
import {
  CodeList,
  CreateCodeRequest,
  ListCodesQuery,
  RedeemCodeRequest,
  RedeemCodeResult,
} from './redemption.types';

const log = createServiceLogger('redemption');

export interface RedemptionServiceDependencies {
  repositories: RepositorySet;
  scope: AtomicScope;
  retryPolicy?: RetryPolicy;
  clock?: () => Date;
}

const normalizeCode = (code: string): string => {
  const trimmed = code.trim();
  if (trimmed === '') {
    throw ApiError.validationError('code is required');
  }
  return trimmed;
};

/**
 * Metric label for how a redemption ended
 */
const outcomeOf = (error: unknown): string => {
  if (error instanceof ApiError) {
    return ErrorCode[error.errorCode].toLowerCase();
  }
  return 'error';
};

export class RedemptionService {
  private readonly repositories: RepositorySet;
  private readonly scope: AtomicScope;
  private readonly retryPolicy: RetryPolicy;
  private readonly clock: () => Date;

  constructor(deps: RedemptionServiceDependencies) {
    this.repositories = deps.repositories;
    this.scope = deps.scope;
    this.retryPolicy = deps.retryPolicy ?? defaultRetryPolicy();
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Redeem a code for a user: one use of the code, one grant to the user's account,
   * one ledger entry and one redemption record, all committed together or not at all.
   *
   * Validation happens up front and again inside the scope against a fresh copy of
   * the code. The (code, userId) unique index is what finally makes a second
   * redemption by the same user fail.
   */
  async redeem(request: RedeemCodeRequest, options: MutationOptions = {}): Promise<RedeemCodeResult> {
    const code = normalizeCode(request.code);
    const { userId } = request;
    assertValidUserId(userId);
    addLogContext({ userId, code });
    log.info({ code, userId }, 'Redeeming code');

    const stopTimer = redemptionDuration.startTimer();
    try {
      const result = await withSpan(
        'redemption.redeem',
        { 'redemption.code': code, 'user.id': userId },
        () => this.executeRedeem(code, userId, options.signal)
      );

      stopTimer({ outcome: 'completed' });
      redemptionsTotal.inc({ outcome: 'completed' });
      ledgerEntriesTotal.inc({ kind: LedgerEntryKind.GRANT, currency_kind: result.currencyKind });
      ledgerAmount.observe({ kind: LedgerEntryKind.GRANT }, result.amount);
      log.info(
        {
          code,
          userId,
          redemptionId: result.redemptionId,
          amount: result.amount,
          balanceAfter: result.balanceAfter,
        },
        'Code redeemed'
      );
      return result;
    } catch (error) {
      const outcome = outcomeOf(error);
      stopTimer({ outcome });
      redemptionsTotal.inc({ outcome });

      if (error instanceof ApiError && error.isOperational) {
        log.warn({ code, userId, errorCode: error.errorCode }, `Redemption rejected: ${error.message}`);
      } else {
        log.error({ code, userId, err: error }, 'Redemption failed');
      }
      throw error;
    }
  }

  private async executeRedeem(
    codeKey: string,
    userId: string,
    signal?: AbortSignal
  ): Promise<RedeemCodeResult> {
    ensureNotAborted(signal);
    const now = this.clock();

    const code = await this.findCode(this.repositories, codeKey);
    if (!code.isValid(now)) {
      throw ApiError.codeNotRedeemable();
    }

    let alreadyRedeemed: boolean;
    try {
      alreadyRedeemed = await this.repositories.codes.hasUserRedeemed(codeKey, userId);
    } catch (error) {
      throw toPersistenceError('failed to check redemption status', error);
    }
    if (alreadyRedeemed) {
      throw ApiError.userAlreadyRedeemed();
    }

    // the use cap may have been reached while we were checking
    if (!code.canBeRedeemed(now)) {
      throw ApiError.codeNotRedeemable();
    }

    const ledgerEntryId = generateLedgerEntryId();
    const redemptionId = generateRedemptionId();
    addLogContext({ redemptionId, ledgerEntryId });

    return this.scope.run(async (repositories) => {
      const current = await this.findCode(repositories, codeKey);
      current.redeem(now);

      try {
        await repositories.codes.update(current);
      } catch (error) {
        if (error instanceof RecordNotFoundError) {
          throw ApiError.codeNotFound();
        }
        throw toPersistenceError('failed to update code', error);
      }

      const { account, balanceBefore } = await mutateWithRetry(
        repositories.accounts,
        {
          ownerId: userId,
          currencyKind: current.currencyKind,
          operation: 'redeem',
          mutate: (target) => target.grant(current.amount),
        },
        this.retryPolicy,
        signal
      );

      const entry = LedgerEntry.create(
        {
          id: ledgerEntryId,
          ownerId: userId,
          kind: LedgerEntryKind.GRANT,
          currencyKind: current.currencyKind,
          amount: current.amount,
          balanceBefore,
          balanceAfter: account.balance,
          status: LedgerEntryStatus.COMPLETED,
          metadata: { code: current.code, codeType: current.codeType, redemptionId },
        },
        now
      );

      try {
        await repositories.ledger.append(entry);
      } catch (error) {
        throw toPersistenceError('failed to append ledger entry', error);
      }

      const record = RedemptionRecord.create(
        { redemptionId, code: current.code, userId, ledgerEntryId },
        now
      );

      try {
        await repositories.codes.saveRedemption(record);
      } catch (error) {
        if (error instanceof DuplicateKeyError) {
          throw ApiError.userAlreadyRedeemed();
        }
        throw toPersistenceError('failed to save redemption', error);
      }

      return {
        redemptionId,
        ledgerEntryId,
        code: current.code,
        currencyKind: current.currencyKind,
        amount: current.amount,
        balanceAfter: account.balance,
        status: 'completed' as const,
      };
    }, signal);
  }

  async createCode(request: CreateCodeRequest): Promise<RedemptionCodeSnapshot> {
    const code = RedemptionCode.create(
      {
        code: request.code,
        codeType: request.codeType,
        currencyKind: request.currencyKind,
        amount: request.amount,
        maxUses: request.maxUses ?? 0,
        validFrom: request.validFrom,
        validUntil: request.validUntil,
        metadata: request.metadata,
      },
      this.clock()
    );

    try {
      await this.repositories.codes.create(code);
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        throw ApiError.codeAlreadyExists();
      }
      throw toPersistenceError('failed to create code', error);
    }

    log.info(
      { code: code.code, codeType: code.codeType, amount: code.amount, maxUses: code.maxUses },
      'Code created'
    );
    return code.toSnapshot();
  }

  /**
   * Delete a code nobody has redeemed yet
   */
  async deleteCode(codeKey: string): Promise<void> {
    const key = normalizeCode(codeKey);

    await this.scope.run(async (repositories) => {
      await this.findCode(repositories, key);

      try {
        await repositories.codes.delete(key);
      } catch (error) {
        if (error instanceof RecordInUseError) {
          throw ApiError.codeCannotBeDeleted();
        }
        if (error instanceof RecordNotFoundError) {
          throw ApiError.codeNotFound();
        }
        throw toPersistenceError('failed to delete code', error);
      }
    });

    log.info({ code: key }, 'Code deleted');
  }

  async getCode(codeKey: string): Promise<RedemptionCodeSnapshot> {
    const code = await this.findCode(this.repositories, normalizeCode(codeKey));
    return code.toSnapshot();
  }

  /**
   * One page of codes, newest first. Status and type filters apply to the fetched page.
   */
  async listCodes(query: ListCodesQuery = {}): Promise<CodeList> {
    const status: CodeStatus | undefined = query.status ? parseCodeStatus(query.status) : undefined;
    const codeType: CodeType | undefined = query.codeType
      ? parseCodeType(query.codeType)
      : undefined;
    const page = clampPagination(query.limit, query.offset);

    let result: CodePage;
    try {
      result = await this.repositories.codes.findAll(page.limit, page.offset);
    } catch (error) {
      throw toPersistenceError('failed to list codes', error);
    }

    const codes = result.codes.filter(
      (code) =>
        (status === undefined || code.status === status) &&
        (codeType === undefined || code.codeType === codeType)
    );

    return {
      codes: codes.map((code) => code.toSnapshot()),
      total: result.total,
      limit: page.limit,
      offset: page.offset,
    };
  }

  private async findCode(repositories: RepositorySet, codeKey: string): Promise<RedemptionCode> {
    let code: RedemptionCode | null;
    try {
      code = await repositories.codes.findByCode(codeKey);
    } catch (error) {
      throw toPersistenceError('failed to find code', error);
    }

    if (!code) {
      throw ApiError.codeNotFound();
    }
    return code;
  }
}

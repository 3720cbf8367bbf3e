import { ApiError, toPersistenceError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability/logger';
import { optimisticLockConflictsTotal } from '../../observability/metrics';
import { DuplicateKeyError, OptimisticLockError } from '../../repositories/errors';
import { AccountRepository } from '../../repositories/types';
import { RetryPolicy, backoffDelay, defaultRetryPolicy, waitFor } from '../../utils/backoff';
import { CurrencyAccount } from './currency.account';
import { CurrencyKind } from './currency.types';

const log = createServiceLogger('currency');

export { RetryPolicy, defaultRetryPolicy };

export interface AccountMutation {
  ownerId: string;
  currencyKind: CurrencyKind;
  /** Label for logs and the conflict metric, e.g. "redeem" or "consume" */
  operation: string;
  /** Applies the change; domain errors thrown here are never retried */
  mutate: (account: CurrencyAccount) => void;
}

export interface MutatedAccount {
  account: CurrencyAccount;
  balanceBefore: number;
}

const isConflict = (error: unknown, isNew: boolean): boolean =>
  error instanceof OptimisticLockError || (isNew && error instanceof DuplicateKeyError);

/**
 * Load (or open) the account, apply the mutation and persist it conditioned on the
 * version that was read. A version conflict reloads and tries again after
 * baseBackoffMs * 2^(attempt - 1); running out of attempts is a persistence failure.
 *
 * A missing account is opened with a zero balance and inserted on success, so a
 * consume against it fails with INSUFFICIENT_BALANCE and writes nothing.
 */
export const mutateWithRetry = async (
  accounts: AccountRepository,
  mutation: AccountMutation,
  policy: RetryPolicy = defaultRetryPolicy(),
  signal?: AbortSignal
): Promise<MutatedAccount> => {
  const { ownerId, currencyKind, operation } = mutation;
  let lastConflict: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    await waitFor(backoffDelay(attempt, policy.baseBackoffMs), signal);

    let existing: CurrencyAccount | null;
    try {
      existing = await accounts.findByOwnerAndKind(ownerId, currencyKind);
    } catch (error) {
      throw toPersistenceError('failed to load currency account', error);
    }

    const isNew = existing === null;
    const account = existing ?? CurrencyAccount.open(ownerId, currencyKind);
    const balanceBefore = account.balance;

    mutation.mutate(account);

    try {
      if (isNew) {
        await accounts.create(account);
      } else {
        await accounts.save(account);
      }
      return { account, balanceBefore };
    } catch (error) {
      if (!isConflict(error, isNew)) {
        throw toPersistenceError('failed to save currency account', error);
      }

      lastConflict = error;
      optimisticLockConflictsTotal.inc({ operation });
      log.warn(
        { ownerId, currencyKind, operation, attempt, maxAttempts: policy.maxAttempts },
        'Currency account version conflict'
      );
    }
  }

  throw ApiError.database(
    `failed to save currency account after ${policy.maxAttempts} attempts`,
    lastConflict
  );
};

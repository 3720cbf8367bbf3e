import { ClientSession, Connection } from 'mongoose';

import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability/logger';
import { optimisticLockConflictsTotal } from '../../observability/metrics';
import {
  RetryPolicy,
  backoffDelay,
  defaultRetryPolicy,
  ensureNotAborted,
  waitFor,
} from '../../utils/backoff';
import { AtomicScope, RepositorySet } from '../types';
import { MongoAccountRepository } from './account.repository';
import { MongoCodeRepository } from './code.repository';
import { isTransientTransactionError } from './errors';
import { MongoLedgerRepository } from './ledger.repository';

const log = createServiceLogger('mongo-scope');

/**
 * Repositories that run their operations on `session`, or auto-commit when none is given
 */
export const createMongoRepositories = (session?: ClientSession): RepositorySet => ({
  accounts: new MongoAccountRepository(session),
  ledger: new MongoLedgerRepository(session),
  codes: new MongoCodeRepository(session),
});

/**
 * Runs a unit of work inside a MongoDB multi-document transaction.
 * Needs a replica set (a single-node one is enough).
 *
 * A transaction that loses a write conflict is aborted by the server and cannot
 * go on, so the whole unit of work runs again on a new transaction, like
 * `session.withTransaction` does, bounded by the retry policy.
 */
export class MongoAtomicScope implements AtomicScope {
  constructor(
    private readonly connection: Connection,
    private readonly retryPolicy: RetryPolicy = defaultRetryPolicy()
  ) {}

  async run<T>(work: (repositories: RepositorySet) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const { maxAttempts, baseBackoffMs } = this.retryPolicy;
    let lastConflict: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      await waitFor(backoffDelay(attempt, baseBackoffMs), signal);

      try {
        return await this.runOnce(work, signal);
      } catch (error) {
        if (!isTransientTransactionError(error)) {
          throw error;
        }

        lastConflict = error;
        optimisticLockConflictsTotal.inc({ operation: 'transaction' });
        log.warn({ attempt, maxAttempts, err: error }, 'Transaction conflict, running atomic scope again');
      }
    }

    throw ApiError.database(`atomic scope conflicted ${maxAttempts} times`, lastConflict);
  }

  private async runOnce<T>(
    work: (repositories: RepositorySet) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    let session: ClientSession;
    try {
      session = await this.connection.startSession();
    } catch (error) {
      throw ApiError.database('failed to begin atomic scope', error);
    }

    try {
      session.startTransaction();
      const result = await work(createMongoRepositories(session));
      ensureNotAborted(signal);
      await session.commitTransaction();
      return result;
    } catch (error) {
      if (session.inTransaction()) {
        try {
          await session.abortTransaction();
        } catch (abortError) {
          log.error({ err: abortError }, 'Failed to roll back atomic scope');
        }
      }
      throw error;
    } finally {
      await session.endSession();
    }
  }
}

import mongoose from 'mongoose';

import { CorruptRecordError, DuplicateKeyError } from '../errors';

const DUPLICATE_KEY_CODE = 11000;
const WRITE_CONFLICT_CODE = 112;
const TRANSIENT_TRANSACTION_LABEL = 'TransientTransactionError';

/** How far down a `cause` chain to look for the driver error */
const MAX_CAUSE_DEPTH = 5;

export const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoServerError && error.code === DUPLICATE_KEY_CODE;

/**
 * True when the server aborted the transaction because of a concurrent write
 * (or another condition it labels as transient). Services wrap repository errors
 * with context, so the driver error may sit a few `cause` links down.
 */
export const isTransientTransactionError = (error: unknown): boolean => {
  let current: unknown = error;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current instanceof Error; depth++) {
    if (
      current instanceof mongoose.mongo.MongoError &&
      (current.hasErrorLabel(TRANSIENT_TRANSACTION_LABEL) || current.code === WRITE_CONFLICT_CODE)
    ) {
      return true;
    }
    current = current.cause;
  }
  return false;
};

/**
 * Rethrow a unique-index violation as DuplicateKeyError; anything else unchanged
 */
export const rethrowDuplicateKey = (collection: string, error: unknown): never => {
  if (isDuplicateKeyError(error)) {
    throw new DuplicateKeyError(collection, { cause: error });
  }
  throw error;
};

/**
 * Rebuild a domain object from a stored document. A document the domain rejects
 * is a storage fault, not a client error.
 */
export const restoreRecord = <T>(collection: string, key: string, restore: () => T): T => {
  try {
    return restore();
  } catch (error) {
    throw new CorruptRecordError(collection, key, { cause: error });
  }
};

/**
 * Storage-level signals raised by repositories. Services translate them into
 * domain errors (or retry, for optimistic-lock conflicts).
 */

export class OptimisticLockError extends Error {
  constructor(
    readonly ownerId: string,
    readonly expectedVersion: number
  ) {
    super(`account ${ownerId} was modified concurrently (expected version ${expectedVersion})`);
    this.name = 'OptimisticLockError';
  }
}

export class DuplicateKeyError extends Error {
  constructor(
    readonly collection: string,
    options?: { cause?: unknown }
  ) {
    super(`duplicate key in ${collection}`, options);
    this.name = 'DuplicateKeyError';
  }
}

export class RecordInUseError extends Error {
  constructor(readonly collection: string, readonly key: string) {
    super(`${collection} ${key} is still referenced`);
    this.name = 'RecordInUseError';
  }
}

export class RecordNotFoundError extends Error {
  constructor(readonly collection: string, readonly key: string) {
    super(`${collection} ${key} not found`);
    this.name = 'RecordNotFoundError';
  }
}

export class CorruptRecordError extends Error {
  constructor(
    readonly collection: string,
    readonly key: string,
    options?: { cause?: unknown }
  ) {
    super(`${collection} ${key} holds an invalid record`, options);
    this.name = 'CorruptRecordError';
  }
}

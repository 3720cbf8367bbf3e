import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped fields stamped onto every log line written while the request runs.
 * Services add the ids they mint, so a failed redemption can be traced from the
 * request log to its ledger entry.
 */
export interface LogContext {
  correlationId: string;
  userId?: string;
  /** Promotional code being redeemed */
  code?: string;
  redemptionId?: string;
  ledgerEntryId?: string;
  /** Groups the entries of one priority consume */
  consumptionId?: string;
}

type ContextField = Exclude<keyof LogContext, 'correlationId'>;

const CONTEXT_FIELDS: readonly ContextField[] = [
  'userId',
  'code',
  'redemptionId',
  'ledgerEntryId',
  'consumptionId',
];

export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

export const getCorrelationId = (): string | undefined => {
  return asyncLocalStorage.getStore()?.correlationId;
};

export const getLogContext = (): LogContext | undefined => {
  return asyncLocalStorage.getStore();
};

/**
 * Attach fields to the current request; a no-op outside one
 */
export const addLogContext = (context: Partial<Omit<LogContext, 'correlationId'>>): void => {
  const store = asyncLocalStorage.getStore();
  if (store) {
    Object.assign(store, context);
  }
};

/**
 * The fields set so far, for merging into a log line. Unset fields are left out.
 */
export const logContextFields = (): Partial<LogContext> => {
  const store = asyncLocalStorage.getStore();
  if (!store) {
    return {};
  }

  const fields: Partial<LogContext> = { correlationId: store.correlationId };
  for (const field of CONTEXT_FIELDS) {
    const value = store[field];
    if (value !== undefined) {
      fields[field] = value;
    }
  }
  return fields;
};

export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return asyncLocalStorage.run(context, fn);
};

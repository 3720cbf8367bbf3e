export { CurrencyService, CurrencyServiceDependencies, LedgerHistory } from './currency.service';
export { CurrencyController } from './currency.controller';
export { createCurrencyAdminRoutes, createCurrencyRoutes } from './currency.routes';
export { CurrencyAccount } from './currency.account';
export { mutateWithRetry, RetryPolicy } from './currency.retry';
export * from './currency.types';

import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth';
import { apiKeyMiddleware } from '../../middlewares/apiKey';
import { validateRequest } from '../../middlewares/validateRequest';
import { CurrencyController } from './currency.controller';
import {
  consumeValidation,
  grantValidation,
  historyQueryValidation,
  ledgerEntryParamValidation,
  userConsumeValidation,
  userGrantValidation,
  userHistoryValidation,
  userParamValidation,
} from './currency.validation';

export const createCurrencyRoutes = (controller: CurrencyController): Router => {
  const router = Router();

  // GET /currency/balance - Paid and free balances
  router.get('/balance', authMiddleware, (req: Request, res: Response, next: NextFunction) => controller.getBalance(req, res, next));

  // GET /currency/transactions - Ledger history
  router.get('/transactions', authMiddleware, historyQueryValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getHistory(req, res, next));

  // GET /currency/transactions/:entryId - One ledger entry
  router.get('/transactions/:entryId', authMiddleware, ledgerEntryParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getLedgerEntry(req, res, next));

  // POST /currency/consume - Spend currency ("auto" or usePriority spends free first)
  router.post('/consume', authMiddleware, consumeValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.consume(req, res, next));

  // POST /currency/grant - Grant currency (service-to-service)
  router.post('/grant', apiKeyMiddleware, grantValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.grant(req, res, next));

  return router;
};

/**
 * Balance operations on any user, mounted under /admin/users
 */
export const createCurrencyAdminRoutes = (controller: CurrencyController): Router => {
  const router = Router();

  router.use(apiKeyMiddleware);

  // GET /admin/users/:userId/balance
  router.get('/:userId/balance', userParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getUserBalance(req, res, next));

  // GET /admin/users/:userId/transactions
  router.get('/:userId/transactions', userHistoryValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getUserHistory(req, res, next));

  // POST /admin/users/:userId/grant
  router.post('/:userId/grant', userGrantValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.grantToUser(req, res, next));

  // POST /admin/users/:userId/consume
  router.post('/:userId/consume', userConsumeValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.consumeForUser(req, res, next));

  return router;
};

import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth';
import { apiKeyMiddleware } from '../../middlewares/apiKey';
import { createRedeemLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';
import { RedemptionController } from './redemption.controller';
import {
  codeParamValidation,
  createCodeValidation,
  listCodesValidation,
  redeemValidation,
} from './redemption.validation';

/**
 * Player-facing routes, mounted at /codes
 */
export const createRedemptionRoutes = (controller: RedemptionController): Router => {
  const router = Router();
  const redeemLimiter = createRedeemLimiter();

  // POST /codes/redeem - Redeem a code for the authenticated user
  router.post('/redeem', authMiddleware, redeemLimiter, redeemValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.redeem(req, res, next));

  return router;
};

/**
 * Code administration, mounted at /admin/codes
 */
export const createCodeAdminRoutes = (controller: RedemptionController): Router => {
  const router = Router();

  router.use(apiKeyMiddleware);

  // POST /admin/codes - Create a code
  router.post('/', createCodeValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.createCode(req, res, next));

  // GET /admin/codes - List codes
  router.get('/', listCodesValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.listCodes(req, res, next));

  // GET /admin/codes/:code - Get a code
  router.get('/:code', codeParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.getCode(req, res, next));

  // DELETE /admin/codes/:code - Delete an unredeemed code
  router.delete('/:code', codeParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.deleteCode(req, res, next));

  return router;
};

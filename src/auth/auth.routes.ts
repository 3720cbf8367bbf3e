import { Router, Request, Response, NextFunction } from 'express';

import { apiKeyMiddleware } from '../middlewares/apiKey';
import { validateRequest } from '../middlewares/validateRequest';
import { AuthController } from './auth.controller';
import { issueTokenValidation } from './auth.validation';

/**
 * Token issuance, mounted under /admin/users
 */
export const createAuthAdminRoutes = (controller: AuthController): Router => {
  const router = Router();

  // POST /admin/users/:userId/issue_token
  router.post('/:userId/issue_token', apiKeyMiddleware, issueTokenValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => controller.issueToken(req, res, next));

  return router;
};

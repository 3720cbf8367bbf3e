import { Response, NextFunction } from 'express';

import { ApiError } from '../middlewares/errorHandler';
import { addLogContext } from '../observability/log-context';
import { authService } from './auth.service';
import { AuthRequest } from './auth.types';

export const authMiddleware = (req: AuthRequest, _res: Response, next: NextFunction): void => {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      throw ApiError.unauthorized('No authorization header provided');
    }

    if (!authHeader.startsWith('Bearer ')) {
      throw ApiError.unauthorized('Invalid authorization format. Use: Bearer <token>');
    }

    const token = authHeader.substring(7);

    if (!token) {
      throw ApiError.unauthorized('No token provided');
    }

    const payload = authService.verifyToken(token);

    req.auth = { userId: payload.userId };
    addLogContext({ userId: payload.userId });
    next();
  } catch (error) {
    next(error);
  }
};

/**
 * User id set by authMiddleware
 */
export const requireUserId = (req: AuthRequest): string => {
  if (!req.auth) {
    throw ApiError.unauthorized('Not authenticated');
  }
  return req.auth.userId;
};

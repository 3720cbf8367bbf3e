/**
 * Rate Limiting Middleware
 *
 * Limiters keep their counters in process memory, so each app instance gets its own.
 * Behind several instances a player's effective limit is multiplied by the instance count.
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit, { Options } from 'express-rate-limit';

import { AuthRequest } from '../auth/auth.types';
import { config } from '../config';
import { getCorrelationId, logger } from '../observability';
import { ErrorCode, ErrorResponse } from '../types/errors';

export interface LimiterOptions {
  windowMs: number;
  maxRequests: number;
  errorCode: ErrorCode;
  message: string;
  keyGenerator?: (req: Request) => string;
}

/**
 * No-op middleware that passes through (used when rate limiting is disabled)
 */
const noopLimiter: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

export const createLimiter = (
  options: LimiterOptions,
  disabled: boolean = config.rateLimit.disabled
): RequestHandler => {
  if (disabled) {
    logger.warn('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
    return noopLimiter;
  }

  const limiterOptions: Partial<Options> = {
    windowMs: options.windowMs,
    limit: options.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req: Request, res: Response, _next: NextFunction, used: Options) => {
      logger.warn({ path: req.path, method: req.method }, 'Rate limit exceeded');

      const response: ErrorResponse = {
        success: false,
        error: {
          code: options.errorCode,
          message: options.message,
          timestamp: new Date().toISOString(),
          correlationId: getCorrelationId(),
        },
      };
      res.status(used.statusCode).json(response);
    },
  };

  if (options.keyGenerator) {
    limiterOptions.keyGenerator = options.keyGenerator;
    limiterOptions.validate = false;
  }

  return rateLimit(limiterOptions);
};

/**
 * Per-player limiter for code redemption; must run after authMiddleware
 */
export const createRedeemLimiter = (): RequestHandler =>
  createLimiter({
    windowMs: config.rateLimit.redeem.windowMs,
    maxRequests: config.rateLimit.redeem.maxRequests,
    errorCode: ErrorCode.RATE_LIMIT_EXCEEDED,
    message: 'Too many redemption attempts, please try again later',
    keyGenerator: (req: AuthRequest) => req.auth?.userId || req.ip || 'unknown',
  });

import { timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction } from 'express';

import { config } from '../config';
import { ApiError } from './errorHandler';

const API_KEY_HEADER = 'x-api-key';

const keysMatch = (provided: string, expected: string): boolean => {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
};

/**
 * Guards administrative and service-to-service routes with a shared API key.
 * An unset key rejects every request.
 */
export const createApiKeyMiddleware = (expectedKey: string) => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const provided = req.header(API_KEY_HEADER);

    if (!provided) {
      next(ApiError.invalidApiKey('API key is required'));
      return;
    }

    if (!expectedKey || !keysMatch(provided, expectedKey)) {
      next(ApiError.invalidApiKey());
      return;
    }

    next();
  };
};

export const apiKeyMiddleware = createApiKeyMiddleware(config.adminApiKey);

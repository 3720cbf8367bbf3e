import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { asyncLocalStorage, LogContext } from './log-context';
import { logger } from './logger';

/** Ids echoed into headers, logs and error bodies; anything else is replaced */
const CORRELATION_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

const headerValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

/**
 * The caller's id when it is usable, else a fresh one
 */
export const resolveCorrelationId = (...candidates: Array<string | undefined>): string =>
  candidates.find(
    (candidate): candidate is string => candidate !== undefined && CORRELATION_ID_PATTERN.test(candidate)
  ) ?? uuid();

/**
 * Correlation ID middleware
 * - Takes x-correlation-id, then x-request-id, or generates one
 * - Runs the rest of the request inside its log context
 * - Echoes the id in x-correlation-id
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId = resolveCorrelationId(
    headerValue(req.headers['x-correlation-id']),
    headerValue(req.headers['x-request-id'])
  );

  res.setHeader('x-correlation-id', correlationId);

  const context: LogContext = {
    correlationId,
  };

  asyncLocalStorage.run(context, () => {
    logger.info(
      {
        method: req.method,
        path: req.path,
        userAgent: req.headers['user-agent'],
      },
      'Request started'
    );

    // finish fires outside the request's async context
    res.on('finish', () => {
      logger.info(
        {
          correlationId,
          userId: context.userId,
          code: context.code,
          redemptionId: context.redemptionId,
          consumptionId: context.consumptionId,
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
        },
        'Request completed'
      );
    });

    next();
  });
};

/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * error logging, and appropriate error sanitization for production.
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  /** Set by body-parser for malformed request bodies */
  status?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * Logs errors with correlation ID for traceability.
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const clientStatus = err.status !== undefined && err.status < 500 ? err.status : undefined;
  const errorCode =
    err.errorCode || (clientStatus !== undefined ? ErrorCode.INVALID_INPUT : ErrorCode.INTERNAL_ERROR);
  const statusCode = err.statusCode || clientStatus || errorCodeToStatus[errorCode] || 500;

  const logFields = {
    correlationId,
    errorCode,
    statusCode,
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    cause: err.cause instanceof Error ? err.cause.message : undefined,
    path: req.path,
    method: req.method,
    isOperational: err.isOperational,
  };

  if (statusCode >= 500) {
    logger.error(logFields, `Error: ${err.message}`);
  } else {
    logger.warn(logFields, `Request rejected: ${err.message}`);
  }

  // Sanitize error message for production 5xx errors
  const message =
    config.isProduction && statusCode >= 500
      ? 'Internal server error'
      : err.message || 'An error occurred';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (err.validationErrors) {
    response.error.details = err.validationErrors;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  res.status(404).json(response);
};

/**
 * Map HTTP status codes to error codes for status-style construction
 */
const statusToErrorCode: Record<number, ErrorCode> = {
  400: ErrorCode.VALIDATION_ERROR,
  401: ErrorCode.UNAUTHORIZED,
  403: ErrorCode.UNAUTHORIZED,
  404: ErrorCode.RESOURCE_NOT_FOUND,
  409: ErrorCode.CODE_ALREADY_EXISTS,
  429: ErrorCode.RATE_LIMIT_EXCEEDED,
  500: ErrorCode.INTERNAL_ERROR,
  503: ErrorCode.DATABASE_ERROR,
};

const isErrorCode = (value: number): value is ErrorCode => value in errorCodeToStatus;

export interface ApiErrorOptions {
  statusCode?: number;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
  cause?: unknown;
}

/**
 * API Error class for throwing operational errors
 *
 * Accepts either an ErrorCode or a plain HTTP status code.
 * ErrorCodes are 1000+ while HTTP status codes are < 600.
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(codeOrStatus: ErrorCode | number, message: string, options?: ApiErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ApiError';

    if (isErrorCode(codeOrStatus)) {
      this.errorCode = codeOrStatus;
      this.statusCode = options?.statusCode || errorCodeToStatus[codeOrStatus] || 500;
    } else {
      this.statusCode = codeOrStatus;
      this.errorCode = statusToErrorCode[codeOrStatus] || ErrorCode.INTERNAL_ERROR;
    }

    this.isOperational = options?.isOperational ?? true;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Factory methods for common errors
   */
  static unauthorized(message = 'Unauthorized'): ApiError {
    return new ApiError(ErrorCode.UNAUTHORIZED, message);
  }

  static invalidToken(message = 'Invalid token'): ApiError {
    return new ApiError(ErrorCode.INVALID_TOKEN, message);
  }

  static tokenExpired(message = 'Token expired'): ApiError {
    return new ApiError(ErrorCode.TOKEN_EXPIRED, message);
  }

  static invalidApiKey(message = 'Invalid API key'): ApiError {
    return new ApiError(ErrorCode.INVALID_API_KEY, message);
  }

  static validationError(message: string, validationErrors?: Record<string, string[]>): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, {
      validationErrors,
    });
  }

  static invalidAmount(message = 'invalid amount'): ApiError {
    return new ApiError(ErrorCode.INVALID_AMOUNT, message);
  }

  static amountTooLarge(message = 'amount too large'): ApiError {
    return new ApiError(ErrorCode.AMOUNT_TOO_LARGE, message);
  }

  static balanceOutOfRange(message = 'balance out of range'): ApiError {
    return new ApiError(ErrorCode.BALANCE_OUT_OF_RANGE, message);
  }

  static insufficientBalance(message = 'insufficient balance'): ApiError {
    return new ApiError(ErrorCode.INSUFFICIENT_BALANCE, message);
  }

  static codeNotFound(message = 'code not found'): ApiError {
    return new ApiError(ErrorCode.CODE_NOT_FOUND, message);
  }

  static codeNotRedeemable(message = 'code not redeemable'): ApiError {
    return new ApiError(ErrorCode.CODE_NOT_REDEEMABLE, message);
  }

  static userAlreadyRedeemed(message = 'user already redeemed'): ApiError {
    return new ApiError(ErrorCode.USER_ALREADY_REDEEMED, message);
  }

  static codeAlreadyExists(message = 'code already exists'): ApiError {
    return new ApiError(ErrorCode.CODE_ALREADY_EXISTS, message);
  }

  static codeCannotBeDeleted(message = 'code cannot be deleted'): ApiError {
    return new ApiError(ErrorCode.CODE_CANNOT_BE_DELETED, message);
  }

  static notFound(resource: string): ApiError {
    const codeMap: Record<string, ErrorCode> = {
      code: ErrorCode.CODE_NOT_FOUND,
      'ledger entry': ErrorCode.LEDGER_ENTRY_NOT_FOUND,
    };
    const code = codeMap[resource.toLowerCase()] || ErrorCode.RESOURCE_NOT_FOUND;
    return new ApiError(code, `${resource} not found`);
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, {
      isOperational: false,
    });
  }

  /**
   * Infrastructure failure with operation context, e.g. "failed to find code: <cause>"
   */
  static database(context: string, cause?: unknown): ApiError {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    return new ApiError(ErrorCode.DATABASE_ERROR, `${context}${detail}`, {
      cause,
      isOperational: false,
    });
  }

  static aborted(message = 'operation aborted'): ApiError {
    return new ApiError(ErrorCode.OPERATION_ABORTED, message);
  }
}

/**
 * Pass domain errors through untouched and wrap anything else as a persistence failure
 */
export const toPersistenceError = (context: string, error: unknown): ApiError =>
  error instanceof ApiError ? error : ApiError.database(context, error);

/**
 * Async handler wrapper to catch errors in async route handlers
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

/**
 * Error Codes for the Gem Ledger API
 *
 * Categorized by error type:
 * - 1xxx: Authentication errors
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 4xxx: Rate limiting errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Authentication errors (1xxx)
  UNAUTHORIZED = 1001,
  INVALID_TOKEN = 1002,
  TOKEN_EXPIRED = 1003,
  INVALID_API_KEY = 1004,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,
  AMOUNT_TOO_LARGE = 2004,

  // Business errors (3xxx)
  INSUFFICIENT_BALANCE = 3001,
  BALANCE_OUT_OF_RANGE = 3002,
  CODE_NOT_FOUND = 3003,
  CODE_NOT_REDEEMABLE = 3004,
  USER_ALREADY_REDEEMED = 3005,
  CODE_ALREADY_EXISTS = 3006,
  CODE_CANNOT_BE_DELETED = 3007,
  LEDGER_ENTRY_NOT_FOUND = 3008,
  RESOURCE_NOT_FOUND = 3010,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
  OPERATION_ABORTED = 5003,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Auth errors -> 401
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.TOKEN_EXPIRED]: 401,
  [ErrorCode.INVALID_API_KEY]: 401,

  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.AMOUNT_TOO_LARGE]: 400,

  // Business errors -> 400/404/409/422
  [ErrorCode.INSUFFICIENT_BALANCE]: 400,
  [ErrorCode.BALANCE_OUT_OF_RANGE]: 422,
  [ErrorCode.CODE_NOT_FOUND]: 404,
  [ErrorCode.CODE_NOT_REDEEMABLE]: 400,
  [ErrorCode.USER_ALREADY_REDEEMED]: 409,
  [ErrorCode.CODE_ALREADY_EXISTS]: 409,
  [ErrorCode.CODE_CANNOT_BE_DELETED]: 409,
  [ErrorCode.LEDGER_ENTRY_NOT_FOUND]: 404,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  // Rate limiting errors -> 429
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,

  // System errors -> 500/503
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
  [ErrorCode.OPERATION_ABORTED]: 503,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}

export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
}

export type ApiResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;

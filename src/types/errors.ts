/**
 * Error Codes for the CardLedger API
 *
 * Categorized by error type:
 * - 2xxx: Validation errors
 * - 3xxx: Ledger errors
 * - 4xxx: Rate limiting errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,
  MISSING_REQUIRED_FIELD = 2004,
  INVALID_CARDS = 2005,
  UNKNOWN_TRANSACTION_KIND = 2006,

  // Ledger errors (3xxx)
  TRANSACTION_NOT_FOUND = 3004,
  DUPLICATE_TRANSACTION = 3006,
  RESOURCE_NOT_FOUND = 3010,
  INVALID_STATUS_TRANSITION = 3011,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,
  TOO_MANY_TRANSACTIONS = 4003,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
  REDIS_ERROR = 5003,
  PROVIDER_ERROR = 5006,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.MISSING_REQUIRED_FIELD]: 400,
  [ErrorCode.INVALID_CARDS]: 400,
  [ErrorCode.UNKNOWN_TRANSACTION_KIND]: 400,

  [ErrorCode.TRANSACTION_NOT_FOUND]: 404,
  [ErrorCode.DUPLICATE_TRANSACTION]: 409,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,
  [ErrorCode.INVALID_STATUS_TRANSITION]: 409,

  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.TOO_MANY_TRANSACTIONS]: 429,

  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
  [ErrorCode.REDIS_ERROR]: 503,
  [ErrorCode.PROVIDER_ERROR]: 502,
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

/**
 * Standard success response format
 */
export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
}

export type ApiResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;

/**
 * Error types and codes
 */

// Standard error codes
export enum ErrorCode {
  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_INPUT = 'INVALID_INPUT',

  // Not found errors (404)
  ITEM_NOT_FOUND = 'ITEM_NOT_FOUND',
  STAFF_NOT_FOUND = 'STAFF_NOT_FOUND',
  BATCH_NOT_FOUND = 'BATCH_NOT_FOUND',

  // Precondition errors (409)
  ALREADY_CHECKED_OUT = 'ALREADY_CHECKED_OUT',
  NOT_CHECKED_OUT = 'NOT_CHECKED_OUT',
  INSUFFICIENT_QUANTITY = 'INSUFFICIENT_QUANTITY',
  STAFF_INACTIVE = 'STAFF_INACTIVE',

  // Optimistic-lock retries exhausted (409, retryable)
  TRANSACTION_CONFLICT = 'TRANSACTION_CONFLICT',

  // Batch validation errors (422)
  BATCH_TYPE_MISMATCH = 'BATCH_TYPE_MISMATCH',
  ALREADY_IN_BATCH = 'ALREADY_IN_BATCH',
  BATCH_EMPTY = 'BATCH_EMPTY',
  BATCH_SUBMITTING = 'BATCH_SUBMITTING',

  // Best-effort history writes (logged only)
  LEDGER_WRITE_FAILED = 'LEDGER_WRITE_FAILED',

  // Server errors (500)
  DATABASE_ERROR = 'DATABASE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export enum ErrorCategory {
  PRECONDITION_FAILED = 'PRECONDITION_FAILED',
  NOT_FOUND = 'NOT_FOUND',
  TRANSACTION_CONFLICT = 'TRANSACTION_CONFLICT',
  LEDGER_WRITE_FAILED = 'LEDGER_WRITE_FAILED',
  BATCH_VALIDATION_FAILED = 'BATCH_VALIDATION_FAILED',
  INVALID_REQUEST = 'INVALID_REQUEST',
  INTERNAL = 'INTERNAL',
}

const CATEGORY_BY_CODE: Record<ErrorCode, ErrorCategory> = {
  [ErrorCode.VALIDATION_ERROR]: ErrorCategory.INVALID_REQUEST,
  [ErrorCode.INVALID_INPUT]: ErrorCategory.INVALID_REQUEST,
  [ErrorCode.ITEM_NOT_FOUND]: ErrorCategory.NOT_FOUND,
  [ErrorCode.STAFF_NOT_FOUND]: ErrorCategory.NOT_FOUND,
  [ErrorCode.BATCH_NOT_FOUND]: ErrorCategory.NOT_FOUND,
  [ErrorCode.ALREADY_CHECKED_OUT]: ErrorCategory.PRECONDITION_FAILED,
  [ErrorCode.NOT_CHECKED_OUT]: ErrorCategory.PRECONDITION_FAILED,
  [ErrorCode.INSUFFICIENT_QUANTITY]: ErrorCategory.PRECONDITION_FAILED,
  [ErrorCode.STAFF_INACTIVE]: ErrorCategory.PRECONDITION_FAILED,
  [ErrorCode.TRANSACTION_CONFLICT]: ErrorCategory.TRANSACTION_CONFLICT,
  [ErrorCode.BATCH_TYPE_MISMATCH]: ErrorCategory.BATCH_VALIDATION_FAILED,
  [ErrorCode.ALREADY_IN_BATCH]: ErrorCategory.BATCH_VALIDATION_FAILED,
  [ErrorCode.BATCH_EMPTY]: ErrorCategory.BATCH_VALIDATION_FAILED,
  [ErrorCode.BATCH_SUBMITTING]: ErrorCategory.BATCH_VALIDATION_FAILED,
  [ErrorCode.LEDGER_WRITE_FAILED]: ErrorCategory.LEDGER_WRITE_FAILED,
  [ErrorCode.DATABASE_ERROR]: ErrorCategory.INTERNAL,
  [ErrorCode.INTERNAL_ERROR]: ErrorCategory.INTERNAL,
};

// Custom application error class
export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  get category(): ErrorCategory {
    return CATEGORY_BY_CODE[this.code];
  }

  /**
   * Whether the caller may retry the same request unchanged
   */
  get retryable(): boolean {
    return this.code === ErrorCode.TRANSACTION_CONFLICT;
  }
}

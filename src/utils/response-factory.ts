import type { ZodError } from 'zod';
import { ApiSuccessResponse, ApiErrorResponse, FieldError } from '../types/api.types';
import { AppError, ErrorCode } from '../types/error.types';

/**
 * Create a standardized success response
 */
export function createSuccessResponse<T>(data: T, message?: string): ApiSuccessResponse<T> {
  const response: ApiSuccessResponse<T> = { data };

  if (message) {
    response.message = message;
  }

  return response;
}

/**
 * Create a standardized error response
 */
export function createErrorResponse(
  code: ErrorCode | 'NOT_FOUND',
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  return {
    error: {
      code,
      message,
      ...(details ? { details } : {}),
    },
  };
}

/**
 * Error body for an AppError; clients branch on `category` and `retryable`
 */
export function createAppErrorResponse(error: AppError): ApiErrorResponse {
  return createErrorResponse(error.code, error.message, {
    ...error.details,
    category: error.category,
    retryable: error.retryable,
  });
}

/**
 * 400 body listing each failed field as `body.staff_uid`, `query.limit`, ...
 */
export function createValidationErrorResponse(error: ZodError): ApiErrorResponse {
  const errors: FieldError[] = error.errors.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));

  return createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', { errors });
}

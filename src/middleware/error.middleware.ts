import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, ErrorCode } from '../types/error.types';
import {
  createAppErrorResponse,
  createErrorResponse,
  createValidationErrorResponse,
} from '../utils/response-factory';
import { logger } from '../config/logger';

/**
 * Global error handling middleware
 *
 * Catches all errors and returns consistent error responses
 */
export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  // AppError (known application errors)
  if (err instanceof AppError) {
    const log = err.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log('Request failed', {
      code: err.code,
      category: err.category,
      error: err.message,
      path: req.path,
      method: req.method,
    });

    return res.status(err.statusCode).json(createAppErrorResponse(err));
  }

  // Zod validation errors
  if (err instanceof ZodError) {
    logger.warn('Request validation failed', { path: req.path, method: req.method, issues: err.errors });

    return res.status(400).json(createValidationErrorResponse(err));
  }

  // Malformed JSON body from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    return res.status(400).json(createErrorResponse(ErrorCode.INVALID_INPUT, 'Malformed JSON body'));
  }

  logger.error('Unhandled error', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  // Unknown errors - don't expose internals
  return res
    .status(500)
    .json(createErrorResponse(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred'));
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (req: Request, res: Response) => {
  res
    .status(404)
    .json(createErrorResponse('NOT_FOUND', `Route ${req.method} ${req.path} not found`));
};

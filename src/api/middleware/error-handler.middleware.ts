import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger, generateRequestId } from '../../config/logger';
import { AppError } from '../../utils/app-error';
import { ErrorCodes, HttpStatus } from '../../utils/error-codes';

/**
 * Field-level validation failures in response bodies
 */
export function formatZodIssues(error: ZodError, prefix?: string): Array<{ field: string; message: string }> {
  return error.errors.map((err) => ({
    field: prefix ? [prefix, ...err.path].join('.') : err.path.join('.'),
    message: err.message,
  }));
}

/**
 * Global error handler middleware
 * Catches all errors and formats consistent error responses
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const requestId = res.getHeader('X-Request-Id')?.toString() ?? generateRequestId();

  const errorContext = {
    requestId,
    method: req.method,
    path: req.path,
    error: {
      name: error.name,
      message: error.message,
    },
  };

  if (error instanceof AppError) {
    logger.warn({ ...errorContext, code: error.code }, 'Application error');

    res.status(error.statusCode).json({
      success: false,
      error: error.message,
      code: error.code,
      details: error.details,
      requestId,
    });
    return;
  }

  if (error instanceof ZodError) {
    const errors = formatZodIssues(error);
    logger.warn({ ...errorContext, errors }, 'Validation error');

    res.status(HttpStatus.UNPROCESSABLE_ENTITY).json({
      success: false,
      error: 'Validation failed',
      code: ErrorCodes.VALIDATION_ERROR,
      details: errors,
      requestId,
    });
    return;
  }

  logger.error({ ...errorContext, stack: error.stack }, 'Unhandled error');

  res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
    success: false,
    error: 'Internal server error',
    code: ErrorCodes.INTERNAL_SERVER_ERROR,
    requestId,
  });
}

/**
 * Not found handler (404)
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(HttpStatus.NOT_FOUND).json({
    success: false,
    error: `Route ${req.method} ${req.path} not found`,
    code: ErrorCodes.NOT_FOUND,
  });
}

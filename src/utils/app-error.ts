import { ErrorCodes, HttpStatus, type ErrorCode } from './error-codes';

/**
 * Custom application error
 */
export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: ErrorCode,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Missing, invalid or expired credentials. Also used when a token resolves
 * to an inactive or unknown account so the two cases look the same.
 */
export class UnauthenticatedError extends AppError {
  constructor(message = 'Could not validate credentials', code: ErrorCode = ErrorCodes.INVALID_TOKEN) {
    super(HttpStatus.UNAUTHORIZED, code, message);
    this.name = 'UnauthenticatedError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string, code: ErrorCode = ErrorCodes.FORBIDDEN) {
    super(HttpStatus.FORBIDDEN, code, message);
    this.name = 'ForbiddenError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code: ErrorCode) {
    super(HttpStatus.CONFLICT, code, message);
    this.name = 'ConflictError';
  }
}

export class InvalidRequestError extends AppError {
  constructor(message: string, code: ErrorCode, details?: unknown) {
    super(HttpStatus.BAD_REQUEST, code, message, details);
    this.name = 'InvalidRequestError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, code: ErrorCode = ErrorCodes.NOT_FOUND) {
    super(HttpStatus.NOT_FOUND, code, message);
    this.name = 'NotFoundError';
  }
}

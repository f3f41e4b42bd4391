/**
 * Machine-readable error codes returned in the `code` field of error responses
 */
export const ErrorCodes = {
  // Authentication
  UNAUTHORIZED: 'UNAUTHORIZED',
  INVALID_TOKEN: 'INVALID_TOKEN',
  INVALID_CREDENTIALS: 'INVALID_CREDENTIALS',

  // Authorization
  FORBIDDEN: 'FORBIDDEN',
  SUPER_ADMIN_REQUIRED: 'SUPER_ADMIN_REQUIRED',
  CANNOT_DEACTIVATE_SELF: 'CANNOT_DEACTIVATE_SELF',
  CANNOT_DEACTIVATE_SUPER_ADMIN: 'CANNOT_DEACTIVATE_SUPER_ADMIN',

  // Admin accounts
  EMAIL_ALREADY_EXISTS: 'EMAIL_ALREADY_EXISTS',
  ADMIN_NOT_FOUND: 'ADMIN_NOT_FOUND',
  CANNOT_TRANSFER_TO_SELF: 'CANNOT_TRANSFER_TO_SELF',
  TRANSFER_TARGET_INACTIVE: 'TRANSFER_TARGET_INACTIVE',
  SUPER_ADMIN_ALREADY_ACTIVE: 'SUPER_ADMIN_ALREADY_ACTIVE',

  // Password reset
  PASSWORD_MISMATCH: 'PASSWORD_MISMATCH',
  PASSWORD_TOO_SHORT: 'PASSWORD_TOO_SHORT',
  INVALID_RESET_TOKEN: 'INVALID_RESET_TOKEN',
  RESET_TOKEN_EXPIRED: 'RESET_TOKEN_EXPIRED',

  // Volunteers
  INVALID_CATEGORY: 'INVALID_CATEGORY',
  INVALID_MINISTRY_AREA: 'INVALID_MINISTRY_AREA',
  VOLUNTEER_NOT_FOUND: 'VOLUNTEER_NOT_FOUND',

  // Generic
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
  INTERNAL_SERVER_ERROR: 'INTERNAL_SERVER_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export const HttpStatus = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
} as const;

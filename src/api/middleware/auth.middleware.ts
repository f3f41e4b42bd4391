import type { Request, Response, NextFunction } from 'express';
import type { AdminUser } from '../../models/admin-user.model';
import {
  authorizationService,
  type AuthorizationService,
  type Operation,
} from '../../services/auth/authorization.service';
import { UnauthenticatedError } from '../../utils/app-error';
import { ErrorCodes } from '../../utils/error-codes';

export const SESSION_COOKIE = 'admin-session';

/**
 * Extend Express Request to include the resolved admin
 */
export interface AuthenticatedRequest extends Request {
  admin?: AdminUser;
}

/**
 * Bearer header first, session cookie as fallback
 */
export function extractToken(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (header) {
    const [scheme, value] = header.split(' ');
    if (scheme?.toLowerCase() === 'bearer' && value) {
      return value;
    }
  }

  const cookies: Record<string, unknown> | undefined = req.cookies;
  const cookie = cookies?.[SESSION_COOKIE];
  return typeof cookie === 'string' && cookie.length > 0 ? cookie : undefined;
}

/**
 * Gate a route by the access level of the named operation.
 * The account is re-read on every request, so deactivation takes effect immediately.
 */
export function requireAccess(operation: Operation, authorization: AuthorizationService = authorizationService) {
  return async (req: AuthenticatedRequest, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const admin = await authorization.resolve(operation, extractToken(req));
      if (admin) {
        req.admin = admin;
      }
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Caller resolved by `requireAccess`
 * @throws UnauthenticatedError when the route was not gated
 */
export function getAuthenticatedAdmin(req: AuthenticatedRequest): AdminUser {
  if (!req.admin) {
    throw new UnauthenticatedError('Authentication required', ErrorCodes.UNAUTHORIZED);
  }
  return req.admin;
}

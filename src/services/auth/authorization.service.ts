import { logger } from '../../config/logger';
import { adminUserRepository } from '../../repositories/admin-user.repository';
import type { AdminUser, UpdateAdminUser } from '../../models/admin-user.model';
import type { AccessLevel } from '../../types/auth.types';
import { ForbiddenError, UnauthenticatedError } from '../../utils/app-error';
import { ErrorCodes } from '../../utils/error-codes';
import { authService, type AuthService } from './auth.service';

/**
 * Requirement level of every exposed operation
 */
export const OPERATION_ACCESS = {
  login: 'public',
  requestPasswordReset: 'public',
  completePasswordReset: 'public',
  submitSignup: 'public',
  listTaxonomy: 'public',
  logout: 'admin',
  getCurrentAdmin: 'admin',
  listAdmins: 'admin',
  updateAdmin: 'admin',
  // The transfer protocol checks the role itself so self-transfer is reported first
  transferSuperAdmin: 'admin',
  listVolunteers: 'admin',
  updateVolunteer: 'admin',
  createAdmin: 'super_admin',
} as const satisfies Record<string, AccessLevel>;

export type Operation = keyof typeof OPERATION_ACCESS;

/**
 * Rules layered on top of the access level for `updateAdmin`.
 * Must be evaluated against the target as read in the same transaction as the write.
 */
export function assertAdminUpdateAllowed(
  caller: AdminUser,
  target: AdminUser,
  changes: Pick<UpdateAdminUser, 'active'>
): void {
  if (changes.active !== false) return;

  if (target.id === caller.id) {
    throw new ForbiddenError('You cannot deactivate your own account', ErrorCodes.CANNOT_DEACTIVATE_SELF);
  }

  // Checked by flag, not by identity, so it still holds if two super-admins ever exist
  if (target.role === 'super_admin') {
    throw new ForbiddenError(
      'The super admin account cannot be deactivated',
      ErrorCodes.CANNOT_DEACTIVATE_SUPER_ADMIN
    );
  }
}

/**
 * Resolves the caller behind a session token and gates operations by access level
 */
export class AuthorizationService {
  constructor(private readonly tokens: AuthService = authService) {}

  /**
   * Resolve a bearer token to the current, active admin account.
   * Invalid, expired, unknown-account and inactive-account tokens all fail the same way.
   */
  async authenticate(token: string | undefined): Promise<AdminUser> {
    if (!token) {
      throw new UnauthenticatedError('Authentication required', ErrorCodes.UNAUTHORIZED);
    }

    const identity = this.tokens.verifyToken(token);
    if (!identity) {
      throw new UnauthenticatedError();
    }

    const admin = await adminUserRepository.findActiveByEmail(identity.email);
    if (!admin) {
      logger.debug('Token subject does not resolve to an active admin');
      throw new UnauthenticatedError();
    }

    return admin;
  }

  /**
   * Check that an authenticated admin satisfies an access level
   */
  authorize(admin: AdminUser, level: AccessLevel): void {
    if (level === 'super_admin' && admin.role !== 'super_admin') {
      logger.warn({ adminId: admin.id }, 'Super admin access denied');
      throw new ForbiddenError('Super admin access required', ErrorCodes.SUPER_ADMIN_REQUIRED);
    }
  }

  /**
   * Full resolution for one operation: public operations need no token,
   * everything else authenticates and then authorizes.
   * @returns The resolved caller, or null for public operations
   */
  async resolve(operation: Operation, token: string | undefined): Promise<AdminUser | null> {
    const level: AccessLevel = OPERATION_ACCESS[operation];
    if (level === 'public') return null;

    const admin = await this.authenticate(token);
    this.authorize(admin, level);
    return admin;
  }
}

// Singleton instance
export const authorizationService = new AuthorizationService();

import { logger } from '../../config/logger';
import type { AdminUser, UpdateAdminUser } from '../../models/admin-user.model';
import { adminUserRepository } from '../../repositories/admin-user.repository';
import { ConflictError, InvalidRequestError, NotFoundError } from '../../utils/app-error';
import { ErrorCodes } from '../../utils/error-codes';
import { assertAdminUpdateAllowed } from '../auth/authorization.service';
import { MIN_PASSWORD_LENGTH, passwordService } from '../auth/password.service';

export interface CreateAdminInput {
  email: string;
  password: string;
  name?: string | null;
}

export type AdminChanges = Pick<UpdateAdminUser, 'active' | 'displayName'>;

/**
 * Admin account management. Callers are already authorized for the operation;
 * per-target rules are enforced here against freshly read state.
 */
export class AdminDirectoryService {
  async listAdmins(): Promise<AdminUser[]> {
    return adminUserRepository.findAll();
  }

  async getAdmin(id: number): Promise<AdminUser> {
    const admin = await adminUserRepository.findById(id);
    if (!admin) {
      throw new NotFoundError('Admin user not found', ErrorCodes.ADMIN_NOT_FOUND);
    }
    return admin;
  }

  /**
   * Create a regular, active admin
   * @throws ConflictError when the email is taken under case-insensitive comparison
   */
  async createAdmin(caller: AdminUser, input: CreateAdminInput): Promise<AdminUser> {
    if (!passwordService.meetsMinimumLength(input.password)) {
      throw new InvalidRequestError(
        `Password must be at least ${MIN_PASSWORD_LENGTH} characters`,
        ErrorCodes.PASSWORD_TOO_SHORT
      );
    }

    const passwordHash = await passwordService.hash(input.password);
    const admin = await adminUserRepository.create({
      email: input.email,
      passwordHash,
      displayName: input.name ?? null,
    });

    logger.info({ adminId: admin.id, createdBy: caller.id }, 'Admin user created');
    return admin;
  }

  /**
   * Change `active` and/or display name of an account
   * @throws NotFoundError for an unknown id, ForbiddenError when a deactivation rule blocks it,
   * ConflictError when reactivating would leave two active super-admins
   */
  async updateAdmin(caller: AdminUser, targetId: number, changes: AdminChanges): Promise<AdminUser> {
    const updated = adminUserRepository.transaction((accounts) => {
      const target = accounts.findById(targetId);
      if (!target) {
        throw new NotFoundError('Admin user not found', ErrorCodes.ADMIN_NOT_FOUND);
      }

      assertAdminUpdateAllowed(caller, target, changes);

      // Only reachable after manual edits: an inactive row still flagged as super-admin
      if (
        changes.active === true &&
        !target.active &&
        target.role === 'super_admin' &&
        accounts.countActiveSuperAdmins() > 0
      ) {
        throw new ConflictError(
          'Another account already holds the super admin role',
          ErrorCodes.SUPER_ADMIN_ALREADY_ACTIVE
        );
      }

      if (changes.active !== undefined) {
        accounts.setActive(target.id, changes.active);
      }
      if (changes.displayName !== undefined) {
        accounts.setDisplayName(target.id, changes.displayName);
      }

      return accounts.findById(target.id) ?? target;
    });

    if (changes.active !== undefined) {
      logger.info(
        { adminId: updated.id, updatedBy: caller.id },
        changes.active ? 'Admin activated' : 'Admin deactivated'
      );
    }

    return updated;
  }

  /**
   * Number of active super-admins; 0 means the role has no holder and needs manual repair
   */
  async countActiveSuperAdmins(): Promise<number> {
    return adminUserRepository.countActiveSuperAdmins();
  }
}

// Singleton instance
export const adminDirectoryService = new AdminDirectoryService();

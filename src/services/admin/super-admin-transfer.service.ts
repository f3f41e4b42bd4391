import { logger } from '../../config/logger';
import type { AdminUser } from '../../models/admin-user.model';
import { adminUserRepository } from '../../repositories/admin-user.repository';
import { ForbiddenError, InvalidRequestError, NotFoundError } from '../../utils/app-error';
import { ErrorCodes } from '../../utils/error-codes';

export interface TransferResult {
  previous: AdminUser;
  current: AdminUser;
}

/**
 * Hands the single super-admin role from the caller to another active account
 */
export class SuperAdminTransferService {
  /**
   * Preconditions, in order: not a self-transfer, caller holds the role,
   * target exists, target is active. The clear and set commit together.
   */
  async transfer(callerId: number, targetId: number): Promise<TransferResult> {
    if (callerId === targetId) {
      throw new InvalidRequestError(
        'You cannot transfer the super admin role to yourself',
        ErrorCodes.CANNOT_TRANSFER_TO_SELF
      );
    }

    const result = adminUserRepository.transaction((accounts): TransferResult => {
      const caller = accounts.findById(callerId);
      if (!caller || !caller.active || caller.role !== 'super_admin') {
        throw new ForbiddenError(
          'Only the super admin can transfer the super admin role',
          ErrorCodes.SUPER_ADMIN_REQUIRED
        );
      }

      const target = accounts.findById(targetId);
      if (!target) {
        throw new NotFoundError('Admin user not found', ErrorCodes.ADMIN_NOT_FOUND);
      }
      if (!target.active) {
        throw new InvalidRequestError(
          'Cannot transfer the super admin role to an inactive account',
          ErrorCodes.TRANSFER_TARGET_INACTIVE
        );
      }

      // Clear first: the single-super-admin index would reject the opposite order
      accounts.setRole(caller.id, 'admin');
      accounts.setRole(target.id, 'super_admin');

      return {
        previous: { ...caller, role: 'admin' },
        current: { ...target, role: 'super_admin' },
      };
    });

    logger.info(
      { fromAdminId: result.previous.id, toAdminId: result.current.id },
      'Super admin role transferred'
    );

    return result;
  }
}

// Singleton instance
export const superAdminTransferService = new SuperAdminTransferService();

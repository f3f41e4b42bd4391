import type { Response, NextFunction } from 'express';
import { toSafeAdminUser } from '../../models/admin-user.model';
import {
  adminDirectoryService,
  type AdminDirectoryService,
} from '../../services/admin/admin-directory.service';
import {
  superAdminTransferService,
  type SuperAdminTransferService,
} from '../../services/admin/super-admin-transfer.service';
import { HttpStatus } from '../../utils/error-codes';
import { getAuthenticatedAdmin, type AuthenticatedRequest } from '../middleware/auth.middleware';
import {
  idParamsValidator,
  type CreateAdminInput,
  type UpdateAdminInput,
} from '../validators/admin.validators';

export class AdminUsersController {
  constructor(
    private readonly directory: AdminDirectoryService = adminDirectoryService,
    private readonly transfers: SuperAdminTransferService = superAdminTransferService
  ) {}

  /**
   * GET /api/admin/users
   */
  async list(_req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const admins = await this.directory.listAdmins();
      res.status(HttpStatus.OK).json({
        success: true,
        data: { admins: admins.map(toSafeAdminUser), total: admins.length },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/admin/users
   */
  async create(req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = getAuthenticatedAdmin(req);
      const input: CreateAdminInput = req.body;

      const admin = await this.directory.createAdmin(caller, input);
      res.status(HttpStatus.CREATED).json({
        success: true,
        data: { admin: toSafeAdminUser(admin) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PATCH /api/admin/users/:id
   */
  async update(req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = getAuthenticatedAdmin(req);
      const { id } = idParamsValidator.parse(req.params);
      const { isActive, name }: UpdateAdminInput = req.body;

      const admin = await this.directory.updateAdmin(caller, id, {
        active: isActive,
        displayName: name,
      });
      res.status(HttpStatus.OK).json({
        success: true,
        data: { admin: toSafeAdminUser(admin) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/admin/users/:id/transfer-super-admin
   */
  async transferSuperAdmin(req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = getAuthenticatedAdmin(req);
      const { id } = idParamsValidator.parse(req.params);

      const { previous, current } = await this.transfers.transfer(caller.id, id);
      res.status(HttpStatus.OK).json({
        success: true,
        data: {
          message: `Super admin role transferred to ${current.email}`,
          previous: toSafeAdminUser(previous),
          current: toSafeAdminUser(current),
        },
      });
    } catch (error) {
      next(error);
    }
  }
}

export const adminUsersController = new AdminUsersController();

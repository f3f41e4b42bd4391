import type { Request, Response, NextFunction } from 'express';
import { env } from '../../config/environment';
import { logger } from '../../config/logger';
import { toSafeAdminUser } from '../../models/admin-user.model';
import { authService } from '../../services/auth/auth.service';
import { loginService, type LoginService } from '../../services/auth/login.service';
import {
  passwordResetService,
  type PasswordResetService,
} from '../../services/auth/password-reset.service';
import { HttpStatus } from '../../utils/error-codes';
import {
  SESSION_COOKIE,
  getAuthenticatedAdmin,
  type AuthenticatedRequest,
} from '../middleware/auth.middleware';
import type {
  ForgotPasswordInput,
  LoginInput,
  ResetPasswordInput,
} from '../validators/auth.validators';

export class AuthController {
  constructor(
    private readonly logins: LoginService = loginService,
    private readonly resets: PasswordResetService = passwordResetService
  ) {}

  /**
   * Login endpoint
   * POST /api/admin/login
   */
  async login(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { email, password }: LoginInput = req.body;
      const { token, admin } = await this.logins.login(email, password);

      res.cookie(SESSION_COOKIE, token, {
        httpOnly: true,
        secure: env.NODE_ENV === 'production',
        sameSite: 'strict',
        maxAge: authService.tokenLifetimeMs,
      });

      res.status(HttpStatus.OK).json({
        success: true,
        data: {
          accessToken: token,
          tokenType: 'bearer',
          expiresIn: Math.floor(authService.tokenLifetimeMs / 1000),
          admin: toSafeAdminUser(admin),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Logout endpoint
   * POST /api/admin/logout
   * Tokens are stateless; this only clears the session cookie
   */
  async logout(req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const admin = getAuthenticatedAdmin(req);
      res.clearCookie(SESSION_COOKIE);

      logger.info({ adminId: admin.id }, 'Admin logged out');

      res.status(HttpStatus.OK).json({
        success: true,
        data: { message: 'Logout successful' },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Get current admin
   * GET /api/admin/me
   */
  async getCurrentAdmin(req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const admin = getAuthenticatedAdmin(req);
      res.status(HttpStatus.OK).json({
        success: true,
        data: { admin: toSafeAdminUser(admin) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/admin/forgot-password
   */
  async forgotPassword(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { email }: ForgotPasswordInput = req.body;
      const result = await this.resets.requestReset(email);

      res.status(HttpStatus.OK).json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/admin/reset-password
   */
  async resetPassword(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { token, password, confirmPassword }: ResetPasswordInput = req.body;
      const result = await this.resets.completeReset(token, password, confirmPassword);

      res.status(HttpStatus.OK).json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  }
}

export const authController = new AuthController();

import { logger } from '../../config/logger';
import type { AdminUser } from '../../models/admin-user.model';
import { adminUserRepository } from '../../repositories/admin-user.repository';
import { UnauthenticatedError } from '../../utils/app-error';
import { systemClock, type Clock } from '../../utils/clock';
import { ErrorCodes } from '../../utils/error-codes';
import { authService, type AuthService } from './auth.service';
import { passwordService } from './password.service';

export interface LoginResult {
  token: string;
  admin: AdminUser;
}

/**
 * Exchanges admin credentials for a session token
 */
export class LoginService {
  constructor(
    private readonly tokens: AuthService = authService,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Unknown, inactive and wrong-password logins fail with the same error
   */
  async login(email: string, password: string): Promise<LoginResult> {
    const admin = await adminUserRepository.findActiveByEmail(email);

    const isValid = admin ? await passwordService.verify(password, admin.passwordHash) : false;
    if (!admin || !isValid) {
      logger.warn({ email }, 'Failed login attempt');
      throw new UnauthenticatedError('Invalid email or password', ErrorCodes.INVALID_CREDENTIALS);
    }

    const updated = await adminUserRepository.update(admin.id, { lastLoginAt: this.clock.now() });
    const token = this.tokens.generateToken(admin.email);

    logger.info({ adminId: admin.id }, 'Admin logged in');

    return { token, admin: updated ?? admin };
  }
}

// Singleton instance
export const loginService = new LoginService();

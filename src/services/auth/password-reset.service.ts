import { env } from '../../config/environment';
import { logger } from '../../config/logger';
import type { AdminUser } from '../../models/admin-user.model';
import { adminUserRepository } from '../../repositories/admin-user.repository';
import { InvalidRequestError } from '../../utils/app-error';
import { systemClock, type Clock } from '../../utils/clock';
import { ErrorCodes } from '../../utils/error-codes';
import { hashingService } from '../encryption/hashing.service';
import { dispatchInBackground, emailService, type EmailService } from '../notifications/email.service';
import { MIN_PASSWORD_LENGTH, passwordService } from './password.service';

/**
 * Reset state of one account. `expired` is only ever observed lazily,
 * when a completion attempt reads the account.
 */
export type ResetState = 'none' | 'pending' | 'expired';

/**
 * Returned for every reset request so responses never reveal whether an email is registered
 */
export const RESET_REQUESTED_MESSAGE =
  'If an account with that email exists, a password reset link has been sent.';

export const RESET_COMPLETED_MESSAGE = 'Password has been reset successfully';

export function getResetState(admin: Pick<AdminUser, 'pendingReset'>, now: Date): ResetState {
  if (!admin.pendingReset) return 'none';
  return now.getTime() < admin.pendingReset.expiresAt.getTime() ? 'pending' : 'expired';
}

type CompletionOutcome =
  | { status: 'invalid' }
  | { status: 'expired'; adminId: number }
  | { status: 'reset'; adminId: number };

/**
 * One-time password reset tokens: issue, validate, consume, expire
 */
export class PasswordResetService {
  private readonly expiresInMs: number;

  constructor(
    private readonly clock: Clock = systemClock,
    private readonly mailer: EmailService = emailService,
    expiresInMinutes: number = env.PASSWORD_RESET_EXPIRE_MINUTES
  ) {
    this.expiresInMs = expiresInMinutes * 60 * 1000;
  }

  /**
   * Issue a reset token for an active account and email it.
   * Overwrites any outstanding token for the account. The result is identical
   * whether or not the email belongs to an account.
   */
  async requestReset(email: string): Promise<{ message: string }> {
    const token = hashingService.generateToken();
    const tokenHash = hashingService.hashToken(token);
    const expiresAt = new Date(this.clock.now().getTime() + this.expiresInMs);

    const admin = adminUserRepository.transaction((accounts) => {
      const account = accounts.findActiveByEmail(email);
      if (!account) return undefined;

      accounts.setPendingReset(account.id, { tokenHash, expiresAt });
      return account;
    });

    if (admin) {
      logger.info({ adminId: admin.id }, 'Password reset token issued');
      dispatchInBackground(this.mailer.notifyReset(admin.email, token), {
        adminId: admin.id,
        kind: 'password-reset',
      });
    } else {
      logger.info('Password reset requested for an unknown or inactive email');
    }

    return { message: RESET_REQUESTED_MESSAGE };
  }

  /**
   * Set a new password using a reset token. Success and detected expiry both consume the token.
   * @throws InvalidRequestError on mismatch, short password, unknown token or expired token
   */
  async completeReset(
    token: string,
    password: string,
    confirmPassword: string
  ): Promise<{ message: string }> {
    if (password !== confirmPassword) {
      throw new InvalidRequestError('Passwords do not match', ErrorCodes.PASSWORD_MISMATCH);
    }
    if (!passwordService.meetsMinimumLength(password)) {
      throw new InvalidRequestError(
        `Password must be at least ${MIN_PASSWORD_LENGTH} characters`,
        ErrorCodes.PASSWORD_TOO_SHORT
      );
    }

    // Hashing is slow, so do it before taking the write lock
    const passwordHash = await passwordService.hash(password);
    const tokenHash = hashingService.hashToken(token);
    const now = this.clock.now();

    const outcome = adminUserRepository.transaction((accounts): CompletionOutcome => {
      const account = accounts.findActiveByResetTokenHash(tokenHash);
      if (!account) return { status: 'invalid' };

      if (getResetState(account, now) !== 'pending') {
        accounts.clearPendingReset(account.id);
        return { status: 'expired', adminId: account.id };
      }

      accounts.setPasswordHash(account.id, passwordHash);
      return { status: 'reset', adminId: account.id };
    });

    switch (outcome.status) {
      case 'invalid':
        logger.warn('Password reset attempted with an unknown token');
        throw new InvalidRequestError('Invalid or expired reset token', ErrorCodes.INVALID_RESET_TOKEN);
      case 'expired':
        logger.info({ adminId: outcome.adminId }, 'Expired password reset token cleared');
        throw new InvalidRequestError(
          'Reset token has expired. Please request a new one.',
          ErrorCodes.RESET_TOKEN_EXPIRED
        );
      case 'reset':
        logger.info({ adminId: outcome.adminId }, 'Password reset completed');
        return { message: RESET_COMPLETED_MESSAGE };
    }
  }
}

// Singleton instance
export const passwordResetService = new PasswordResetService();

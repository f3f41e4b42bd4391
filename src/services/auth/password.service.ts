import bcrypt from 'bcryptjs';
import { logger } from '../../config/logger';

export const MIN_PASSWORD_LENGTH = 6;

/**
 * bcrypt password hashing service
 * Uses cost factor 10 for balance between security and performance
 */
export class PasswordService {
  constructor(private readonly saltRounds = 10) {}

  /**
   * Hash password with bcrypt. A fresh salt is generated per call.
   * @returns Bcrypt hash (60 characters starting with $2a$)
   */
  async hash(password: string): Promise<string> {
    try {
      return await bcrypt.hash(password, this.saltRounds);
    } catch (error) {
      logger.error({ error }, 'Password hashing failed');
      throw new Error('Failed to hash password');
    }
  }

  /**
   * Verify password against hash.
   * A malformed stored hash counts as a mismatch.
   */
  async verify(password: string, hash: string): Promise<boolean> {
    try {
      return await bcrypt.compare(password, hash);
    } catch (error) {
      logger.error({ error }, 'Password verification failed');
      return false;
    }
  }

  meetsMinimumLength(password: string): boolean {
    return password.length >= MIN_PASSWORD_LENGTH;
  }
}

// Singleton instance
export const passwordService = new PasswordService();

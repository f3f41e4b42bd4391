import jwt, { type Algorithm } from 'jsonwebtoken';
import { env } from '../../config/environment';
import { logger } from '../../config/logger';
import type { SessionIdentity } from '../../types/auth.types';
import { systemClock, type Clock } from '../../utils/clock';

export interface AuthServiceOptions {
  secret?: string;
  algorithm?: Algorithm;
  expiresInMinutes?: number;
}

/**
 * Session token service
 * Issues and verifies self-contained bearer tokens (JWT) that carry the
 * admin email as `sub` and an absolute expiry. Verification does not look
 * the account up; callers must re-resolve it on every request.
 */
export class AuthService {
  private readonly secret: string;
  private readonly algorithm: Algorithm;
  private readonly expiresInSeconds: number;

  constructor(
    private readonly clock: Clock = systemClock,
    options: AuthServiceOptions = {}
  ) {
    this.secret = options.secret ?? env.JWT_SECRET;
    this.algorithm = options.algorithm ?? env.JWT_ALGORITHM;
    this.expiresInSeconds = (options.expiresInMinutes ?? env.ACCESS_TOKEN_EXPIRE_MINUTES) * 60;
  }

  get tokenLifetimeMs(): number {
    return this.expiresInSeconds * 1000;
  }

  /**
   * Generate a signed token for an admin email, expiring `expiresInMinutes` from now
   */
  generateToken(email: string): string {
    try {
      return jwt.sign({ sub: email, iat: this.nowSeconds() }, this.secret, {
        algorithm: this.algorithm,
        expiresIn: this.expiresInSeconds,
      });
    } catch (error) {
      logger.error({ error }, 'Token generation failed');
      throw new Error('Failed to generate token');
    }
  }

  /**
   * Verify signature and expiry
   * @returns Identity carried by the token, or null for any bad signature, shape or expiry
   */
  verifyToken(token: string): SessionIdentity | null {
    try {
      const decoded = jwt.verify(token, this.secret, {
        algorithms: [this.algorithm],
        clockTimestamp: this.nowSeconds(),
      });

      if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || !decoded.sub) {
        logger.debug('Token payload missing subject');
        return null;
      }
      if (typeof decoded.exp !== 'number') {
        logger.debug('Token payload missing expiry');
        return null;
      }

      return { email: decoded.sub, expiresAt: new Date(decoded.exp * 1000) };
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        logger.debug('Token expired');
      } else if (error instanceof jwt.JsonWebTokenError) {
        logger.debug('Invalid token');
      } else {
        logger.error({ error }, 'Token verification failed');
      }
      return null;
    }
  }

  private nowSeconds(): number {
    return Math.floor(this.clock.now().getTime() / 1000);
  }
}

// Singleton instance
export const authService = new AuthService();

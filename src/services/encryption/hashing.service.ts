import crypto from 'crypto';

/**
 * Random token generation and SHA-256 digests for one-time secrets.
 * Reset tokens are emailed in plain form and only their digest is stored.
 */
export class HashingService {
  /**
   * Generate an unguessable URL-safe token
   * @param bytes - Amount of randomness (32 bytes = 256 bits)
   */
  generateToken(bytes = 32): string {
    return crypto.randomBytes(bytes).toString('base64url');
  }

  /**
   * SHA-256 digest of a token (64 hex characters)
   */
  hashToken(token: string): string {
    return crypto.createHash('sha256').update(token).digest('hex');
  }
}

// Singleton instance
export const hashingService = new HashingService();

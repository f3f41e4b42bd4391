/**
 * Identity recovered from a verified session token
 */
export interface SessionIdentity {
  email: string;
  expiresAt: Date;
}

/**
 * Requirement level declared by every administrative operation
 */
export type AccessLevel = 'public' | 'admin' | 'super_admin';

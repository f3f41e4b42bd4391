/**
 * Admin role. At most one active account holds `super_admin` at a time.
 */
export type AdminRole = 'admin' | 'super_admin';

/**
 * Outstanding password reset. Token digest and expiry only ever exist together.
 */
export interface PendingPasswordReset {
  tokenHash: string;
  expiresAt: Date;
}

/**
 * Admin User Model
 * Represents admin users with authentication credentials
 */
export interface AdminUser {
  id: number;
  email: string;
  passwordHash: string;
  displayName: string | null;
  active: boolean;
  role: AdminRole;
  pendingReset: PendingPasswordReset | null;
  createdAt: Date;
  lastLoginAt: Date | null;
}

/**
 * Admin user creation data (without auto-generated fields)
 */
export interface CreateAdminUser {
  email: string;
  passwordHash: string;
  displayName?: string | null;
  // Only the bootstrap seed creates a super-admin directly
  role?: AdminRole;
}

/**
 * Admin user data for updates
 */
export interface UpdateAdminUser {
  active?: boolean;
  displayName?: string | null;
  lastLoginAt?: Date;
}

/**
 * Admin user without sensitive data (for responses)
 */
export interface SafeAdminUser {
  id: number;
  email: string;
  name: string | null;
  isActive: boolean;
  isSuperAdmin: boolean;
  createdAt: Date;
  lastLoginAt: Date | null;
}

export function toSafeAdminUser(user: AdminUser): SafeAdminUser {
  return {
    id: user.id,
    email: user.email,
    name: user.displayName,
    isActive: user.active,
    isSuperAdmin: user.role === 'super_admin',
    createdAt: user.createdAt,
    lastLoginAt: user.lastLoginAt,
  };
}

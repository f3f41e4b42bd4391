import { and, desc, eq, sql } from 'drizzle-orm';
import { db, type AppTransaction } from '../db';
import { adminUsers, type AdminUserRow } from '../db/schema';
import type {
  AdminRole,
  AdminUser,
  CreateAdminUser,
  PendingPasswordReset,
  UpdateAdminUser,
} from '../models/admin-user.model';
import { ConflictError } from '../utils/app-error';
import { ErrorCodes } from '../utils/error-codes';

const lowerEmail = sql<string>`lower(${adminUsers.email})`;

function toAdminUser(row: AdminUserRow): AdminUser {
  const pendingReset: PendingPasswordReset | null =
    row.passwordResetToken && row.passwordResetExpires
      ? { tokenHash: row.passwordResetToken, expiresAt: new Date(row.passwordResetExpires) }
      : null;

  return {
    id: row.id,
    email: row.email,
    passwordHash: row.passwordHash,
    displayName: row.name,
    active: row.isActive,
    role: row.isSuperAdmin ? 'super_admin' : 'admin',
    pendingReset,
    createdAt: new Date(row.createdAt),
    lastLoginAt: row.lastLoginAt ? new Date(row.lastLoginAt) : null,
  };
}

/**
 * Synchronous view of `admin_users` bound to one open transaction.
 * Every read sees the latest committed state plus this transaction's own writes.
 */
export class AdminUserTransaction {
  constructor(private readonly tx: AppTransaction) {}

  findById(id: number): AdminUser | undefined {
    const row = this.tx.select().from(adminUsers).where(eq(adminUsers.id, id)).get();
    return row ? toAdminUser(row) : undefined;
  }

  findActiveByEmail(email: string): AdminUser | undefined {
    const row = this.tx
      .select()
      .from(adminUsers)
      .where(and(eq(lowerEmail, email.toLowerCase()), eq(adminUsers.isActive, true)))
      .get();
    return row ? toAdminUser(row) : undefined;
  }

  findActiveByResetTokenHash(tokenHash: string): AdminUser | undefined {
    const row = this.tx
      .select()
      .from(adminUsers)
      .where(and(eq(adminUsers.passwordResetToken, tokenHash), eq(adminUsers.isActive, true)))
      .get();
    return row ? toAdminUser(row) : undefined;
  }

  countActiveSuperAdmins(): number {
    const row = this.tx
      .select({ count: sql<number>`count(*)` })
      .from(adminUsers)
      .where(and(eq(adminUsers.isSuperAdmin, true), eq(adminUsers.isActive, true)))
      .get();
    return Number(row?.count ?? 0);
  }

  setActive(id: number, active: boolean): void {
    this.tx.update(adminUsers).set({ isActive: active }).where(eq(adminUsers.id, id)).run();
  }

  setDisplayName(id: number, displayName: string | null): void {
    this.tx.update(adminUsers).set({ name: displayName }).where(eq(adminUsers.id, id)).run();
  }

  setRole(id: number, role: AdminRole): void {
    this.tx
      .update(adminUsers)
      .set({ isSuperAdmin: role === 'super_admin' })
      .where(eq(adminUsers.id, id))
      .run();
  }

  setPendingReset(id: number, reset: PendingPasswordReset): void {
    this.tx
      .update(adminUsers)
      .set({
        passwordResetToken: reset.tokenHash,
        passwordResetExpires: reset.expiresAt.toISOString(),
      })
      .where(eq(adminUsers.id, id))
      .run();
  }

  clearPendingReset(id: number): void {
    this.tx
      .update(adminUsers)
      .set({ passwordResetToken: null, passwordResetExpires: null })
      .where(eq(adminUsers.id, id))
      .run();
  }

  /**
   * Replace the password hash and consume any pending reset in the same write
   */
  setPasswordHash(id: number, passwordHash: string): void {
    this.tx
      .update(adminUsers)
      .set({ passwordHash, passwordResetToken: null, passwordResetExpires: null })
      .where(eq(adminUsers.id, id))
      .run();
  }
}

export class AdminUserRepository {
  /**
   * Find admin user by email (case-insensitive)
   */
  async findByEmail(email: string): Promise<AdminUser | undefined> {
    const result = await db
      .select()
      .from(adminUsers)
      .where(eq(lowerEmail, email.toLowerCase()))
      .limit(1);

    return result[0] ? toAdminUser(result[0]) : undefined;
  }

  /**
   * Find active admin user by email (case-insensitive)
   */
  async findActiveByEmail(email: string): Promise<AdminUser | undefined> {
    const result = await db
      .select()
      .from(adminUsers)
      .where(and(eq(lowerEmail, email.toLowerCase()), eq(adminUsers.isActive, true)))
      .limit(1);

    return result[0] ? toAdminUser(result[0]) : undefined;
  }

  /**
   * Find admin user by ID
   */
  async findById(id: number): Promise<AdminUser | undefined> {
    const result = await db.select().from(adminUsers).where(eq(adminUsers.id, id)).limit(1);

    return result[0] ? toAdminUser(result[0]) : undefined;
  }

  /**
   * List all admin users, newest first
   */
  async findAll(): Promise<AdminUser[]> {
    const result = await db
      .select()
      .from(adminUsers)
      .orderBy(desc(adminUsers.createdAt), desc(adminUsers.id));

    return result.map(toAdminUser);
  }

  /**
   * Create new admin user. Email is stored lower-cased and must be unique.
   * @throws ConflictError when an account with the same email exists
   */
  async create(data: CreateAdminUser): Promise<AdminUser> {
    const email = data.email.toLowerCase();

    return db.transaction(
      (tx) => {
        const existing = tx
          .select({ id: adminUsers.id })
          .from(adminUsers)
          .where(eq(lowerEmail, email))
          .get();

        if (existing) {
          throw new ConflictError('An admin with this email already exists', ErrorCodes.EMAIL_ALREADY_EXISTS);
        }

        const row = tx
          .insert(adminUsers)
          .values({
            email,
            passwordHash: data.passwordHash,
            name: data.displayName ?? null,
            isActive: true,
            isSuperAdmin: data.role === 'super_admin',
          })
          .returning()
          .get();

        return toAdminUser(row);
      },
      { behavior: 'immediate' }
    );
  }

  /**
   * Update admin user
   */
  async update(id: number, data: UpdateAdminUser): Promise<AdminUser | undefined> {
    const updateData: Partial<Pick<AdminUserRow, 'isActive' | 'name' | 'lastLoginAt'>> = {};

    if (data.active !== undefined) {
      updateData.isActive = data.active;
    }
    if (data.displayName !== undefined) {
      updateData.name = data.displayName;
    }
    if (data.lastLoginAt) {
      updateData.lastLoginAt = data.lastLoginAt.toISOString();
    }

    if (Object.keys(updateData).length === 0) {
      return this.findById(id);
    }

    const result = await db
      .update(adminUsers)
      .set(updateData)
      .where(eq(adminUsers.id, id))
      .returning();

    return result[0] ? toAdminUser(result[0]) : undefined;
  }

  /**
   * Check if any admin users exist
   */
  async hasAnyUsers(): Promise<boolean> {
    const result = await db.select({ id: adminUsers.id }).from(adminUsers).limit(1);

    return result.length > 0;
  }

  /**
   * Count active accounts holding the super-admin role
   */
  async countActiveSuperAdmins(): Promise<number> {
    const result = await db
      .select({ count: sql<number>`count(*)` })
      .from(adminUsers)
      .where(and(eq(adminUsers.isSuperAdmin, true), eq(adminUsers.isActive, true)));

    return Number(result[0]?.count ?? 0);
  }

  /**
   * Run `work` inside an IMMEDIATE transaction. The write lock is taken up front,
   * so preconditions read through the handle cannot be invalidated before commit.
   * Throwing from `work` rolls back every write made through the handle.
   */
  transaction<T>(work: (accounts: AdminUserTransaction) => T): T {
    return db.transaction((tx) => work(new AdminUserTransaction(tx)), { behavior: 'immediate' });
  }
}

export const adminUserRepository = new AdminUserRepository();

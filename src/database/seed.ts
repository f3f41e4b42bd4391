import { env } from '../config/environment';
import { logger } from '../config/logger';
import type { AdminUser } from '../models/admin-user.model';
import { adminUserRepository } from '../repositories/admin-user.repository';
import { passwordService } from '../services/auth/password.service';

export interface BootstrapAdmin {
  email?: string;
  password?: string;
  name?: string;
}

/**
 * Create the first super-admin. Does nothing once any admin exists.
 * @returns The created account, or null when skipped
 */
export async function seedSuperAdmin(
  bootstrap: BootstrapAdmin = {
    email: env.ADMIN_EMAIL,
    password: env.ADMIN_PASSWORD,
    name: env.ADMIN_NAME,
  }
): Promise<AdminUser | null> {
  if (await adminUserRepository.hasAnyUsers()) {
    logger.info('Admin users already exist, skipping seed');
    return null;
  }

  if (!bootstrap.email || !bootstrap.password) {
    logger.warn('ADMIN_EMAIL and ADMIN_PASSWORD must be set to create the first super admin');
    return null;
  }

  const passwordHash = await passwordService.hash(bootstrap.password);
  const admin = await adminUserRepository.create({
    email: bootstrap.email,
    passwordHash,
    displayName: bootstrap.name ?? null,
    role: 'super_admin',
  });

  logger.info({ adminId: admin.id, email: admin.email }, 'Super admin created');
  return admin;
}

// Run seed if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  seedSuperAdmin()
    .then(() => {
      logger.info('Seed completed');
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error({ error }, 'Seed failed');
      process.exit(1);
    });
}

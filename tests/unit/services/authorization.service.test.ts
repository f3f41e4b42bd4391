import { describe, it, expect, beforeEach } from 'vitest';
import type { AdminUser } from '../../../src/models/admin-user.model';
import { adminUserRepository } from '../../../src/repositories/admin-user.repository';
import { AuthService } from '../../../src/services/auth/auth.service';
import {
  AuthorizationService,
  OPERATION_ACCESS,
  assertAdminUpdateAllowed,
} from '../../../src/services/auth/authorization.service';
import { ForbiddenError, UnauthenticatedError } from '../../../src/utils/app-error';
import { FakeClock } from '../../helpers/clock';
import { createTestAdmin, resetDatabase } from '../../helpers/database';
import { captureError } from '../../helpers/errors';

function buildAdmin(overrides: Partial<AdminUser> = {}): AdminUser {
  return {
    id: 1,
    email: 'admin@example.org',
    passwordHash: 'not-a-real-hash',
    displayName: null,
    active: true,
    role: 'admin',
    pendingReset: null,
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    lastLoginAt: null,
    ...overrides,
  };
}

describe('AuthorizationService', () => {
  let clock: FakeClock;
  let tokens: AuthService;
  let authorization: AuthorizationService;

  beforeEach(() => {
    resetDatabase();
    clock = new FakeClock();
    tokens = new AuthService(clock, { secret: 'test-secret-for-session-tokens-0001' });
    authorization = new AuthorizationService(tokens);
  });

  describe('authenticate', () => {
    it('should fail with UNAUTHORIZED when no token is given', async () => {
      await expect(authorization.authenticate(undefined)).rejects.toMatchObject({
        statusCode: 401,
        code: 'UNAUTHORIZED',
      });
    });

    it('should fail with INVALID_TOKEN for a bad token', async () => {
      await expect(authorization.authenticate('garbage')).rejects.toMatchObject({
        statusCode: 401,
        code: 'INVALID_TOKEN',
      });
    });

    it('should resolve an active account', async () => {
      const admin = await createTestAdmin('helper@example.org');

      const resolved = await authorization.authenticate(tokens.generateToken(admin.email));

      expect(resolved.id).toBe(admin.id);
      expect(resolved.email).toBe('helper@example.org');
    });

    it('should treat a deactivated account exactly like an invalid token', async () => {
      const admin = await createTestAdmin('helper@example.org');
      const token = tokens.generateToken(admin.email);
      await adminUserRepository.update(admin.id, { active: false });

      const deactivated = await authorization.authenticate(token).catch((error: unknown) => error);
      const invalid = await authorization.authenticate('garbage').catch((error: unknown) => error);

      expect(deactivated).toBeInstanceOf(UnauthenticatedError);
      expect(invalid).toBeInstanceOf(UnauthenticatedError);
      expect(deactivated).toMatchObject({ code: 'INVALID_TOKEN', message: 'Could not validate credentials' });
      expect(invalid).toMatchObject({ code: 'INVALID_TOKEN', message: 'Could not validate credentials' });
    });

    it('should reject a valid token whose subject has no account', async () => {
      await expect(
        authorization.authenticate(tokens.generateToken('ghost@example.org'))
      ).rejects.toMatchObject({ code: 'INVALID_TOKEN' });
    });

    it('should reject a token after it expires', async () => {
      const admin = await createTestAdmin('helper@example.org');
      const token = tokens.generateToken(admin.email);
      clock.advanceMinutes(480);

      await expect(authorization.authenticate(token)).rejects.toBeInstanceOf(UnauthenticatedError);
    });
  });

  describe('authorize', () => {
    it('should let any admin through the admin level', () => {
      expect(() => authorization.authorize(buildAdmin(), 'admin')).not.toThrow();
    });

    it('should require the super admin role for super_admin operations', () => {
      expect(() => authorization.authorize(buildAdmin(), 'super_admin')).toThrow(ForbiddenError);
      expect(() =>
        authorization.authorize(buildAdmin({ role: 'super_admin' }), 'super_admin')
      ).not.toThrow();
    });
  });

  describe('resolve', () => {
    it('should not require a token for public operations', async () => {
      expect(await authorization.resolve('submitSignup', undefined)).toBeNull();
      expect(await authorization.resolve('listTaxonomy', undefined)).toBeNull();
      expect(await authorization.resolve('requestPasswordReset', undefined)).toBeNull();
    });

    it('should reject admin operations without a token', async () => {
      await expect(authorization.resolve('listAdmins', undefined)).rejects.toMatchObject({
        statusCode: 401,
      });
    });

    it('should forbid account creation for a regular admin', async () => {
      const admin = await createTestAdmin('helper@example.org');

      await expect(
        authorization.resolve('createAdmin', tokens.generateToken(admin.email))
      ).rejects.toMatchObject({ statusCode: 403, code: 'SUPER_ADMIN_REQUIRED' });
    });

    it('should allow account creation for the super admin', async () => {
      const owner = await createTestAdmin('owner@example.org', { role: 'super_admin' });

      const resolved = await authorization.resolve('createAdmin', tokens.generateToken(owner.email));

      expect(resolved?.id).toBe(owner.id);
    });
  });

  it('should gate operations at their declared levels', () => {
    expect(OPERATION_ACCESS.createAdmin).toBe('super_admin');
    expect(OPERATION_ACCESS.updateAdmin).toBe('admin');
    expect(OPERATION_ACCESS.transferSuperAdmin).toBe('admin');
    expect(OPERATION_ACCESS.login).toBe('public');
    expect(OPERATION_ACCESS.completePasswordReset).toBe('public');
  });
});

describe('assertAdminUpdateAllowed', () => {
  const caller = buildAdmin({ id: 1 });

  it('should forbid deactivating yourself', () => {
    const error = captureError(() => assertAdminUpdateAllowed(caller, caller, { active: false }));

    expect(error).toMatchObject({ code: 'CANNOT_DEACTIVATE_SELF' });
  });

  it('should forbid self-deactivation for the super admin too', () => {
    const owner = buildAdmin({ id: 1, role: 'super_admin' });

    const error = captureError(() => assertAdminUpdateAllowed(owner, owner, { active: false }));

    expect(error).toMatchObject({ code: 'CANNOT_DEACTIVATE_SELF' });
  });

  it('should forbid deactivating the super admin', () => {
    const owner = buildAdmin({ id: 2, role: 'super_admin' });

    const error = captureError(() => assertAdminUpdateAllowed(caller, owner, { active: false }));

    expect(error).toMatchObject({ code: 'CANNOT_DEACTIVATE_SUPER_ADMIN' });
  });

  it('should allow deactivating another regular admin', () => {
    expect(() =>
      assertAdminUpdateAllowed(caller, buildAdmin({ id: 2 }), { active: false })
    ).not.toThrow();
  });

  it('should allow reactivation and renames of yourself', () => {
    expect(() => assertAdminUpdateAllowed(caller, caller, { active: true })).not.toThrow();
    expect(() => assertAdminUpdateAllowed(caller, caller, {})).not.toThrow();
  });
});

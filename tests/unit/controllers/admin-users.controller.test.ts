import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AdminUsersController } from '../../../src/api/controllers/admin-users.controller';
import { ForbiddenError, UnauthenticatedError } from '../../../src/utils/app-error';
import { createTestAdmin, readAdminRow, resetDatabase } from '../../helpers/database';
import { createMockRequest, createMockResponse } from '../../helpers/http';

describe('AdminUsersController', () => {
  const controller = new AdminUsersController();

  beforeEach(() => {
    resetDatabase();
  });

  describe('list', () => {
    it('should list admins without password hashes', async () => {
      const owner = await createTestAdmin('owner@example.org', { role: 'super_admin' });
      await createTestAdmin('helper@example.org');
      const { res, json } = createMockResponse();

      await controller.list(createMockRequest({ admin: owner }), res, vi.fn());

      const body = json.mock.calls[0]?.[0];
      expect(body.data.total).toBe(2);
      expect(body.data.admins.map((admin: { email: string }) => admin.email)).toEqual([
        'helper@example.org',
        'owner@example.org',
      ]);
      expect(body.data.admins[0]).not.toHaveProperty('passwordHash');
    });
  });

  describe('create', () => {
    it('should create a regular admin and answer 201', async () => {
      const owner = await createTestAdmin('owner@example.org', { role: 'super_admin' });
      const { res, status, json } = createMockResponse();

      await controller.create(
        createMockRequest({
          admin: owner,
          body: { email: 'New@Example.org', password: 'secret1', name: 'New Admin' },
        }),
        res,
        vi.fn()
      );

      expect(status).toHaveBeenCalledWith(201);
      expect(json.mock.calls[0]?.[0].data.admin).toMatchObject({
        email: 'new@example.org',
        name: 'New Admin',
        isActive: true,
        isSuperAdmin: false,
      });
    });

    it('should require a resolved caller', async () => {
      const next = vi.fn();

      await controller.create(
        createMockRequest({ body: { email: 'new@example.org', password: 'secret1' } }),
        createMockResponse().res,
        next
      );

      expect(next).toHaveBeenCalledWith(expect.any(UnauthenticatedError));
    });
  });

  describe('update', () => {
    it('should map isActive and name onto the account', async () => {
      const caller = await createTestAdmin('caller@example.org');
      const target = await createTestAdmin('target@example.org');
      const { res, json } = createMockResponse();

      await controller.update(
        createMockRequest({
          admin: caller,
          params: { id: String(target.id) },
          body: { isActive: false, name: 'Target' },
        }),
        res,
        vi.fn()
      );

      expect(json.mock.calls[0]?.[0].data.admin).toMatchObject({
        id: target.id,
        name: 'Target',
        isActive: false,
      });
      expect(readAdminRow(target.id)?.is_active).toBe(0);
    });

    it('should pass a self-deactivation to the error handler', async () => {
      const caller = await createTestAdmin('caller@example.org');
      const next = vi.fn();

      await controller.update(
        createMockRequest({ admin: caller, params: { id: String(caller.id) }, body: { isActive: false } }),
        createMockResponse().res,
        next
      );

      expect(next).toHaveBeenCalledWith(expect.any(ForbiddenError));
    });
  });

  describe('transferSuperAdmin', () => {
    it('should report the new holder', async () => {
      const owner = await createTestAdmin('owner@example.org', { role: 'super_admin' });
      const target = await createTestAdmin('target@example.org');
      const { res, json } = createMockResponse();

      await controller.transferSuperAdmin(
        createMockRequest({ admin: owner, params: { id: String(target.id) } }),
        res,
        vi.fn()
      );

      const body = json.mock.calls[0]?.[0];
      expect(body.data.message).toBe('Super admin role transferred to target@example.org');
      expect(body.data.previous).toMatchObject({ id: owner.id, isSuperAdmin: false });
      expect(body.data.current).toMatchObject({ id: target.id, isSuperAdmin: true });
    });
  });
});

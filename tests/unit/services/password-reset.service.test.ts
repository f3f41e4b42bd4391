import { describe, it, expect, beforeEach, vi } from 'vitest';
import { adminUserRepository } from '../../../src/repositories/admin-user.repository';
import { passwordService } from '../../../src/services/auth/password.service';
import {
  PasswordResetService,
  RESET_COMPLETED_MESSAGE,
  RESET_REQUESTED_MESSAGE,
  getResetState,
} from '../../../src/services/auth/password-reset.service';
import { hashingService } from '../../../src/services/encryption/hashing.service';
import type { EmailService } from '../../../src/services/notifications/email.service';
import { FakeClock } from '../../helpers/clock';
import { createTestAdmin, readAdminRow, resetDatabase } from '../../helpers/database';
import { RecordingTransport, createTestMailer } from '../../helpers/mail';

describe('PasswordResetService', () => {
  let clock: FakeClock;
  let mailer: EmailService;
  let resets: PasswordResetService;

  beforeEach(() => {
    resetDatabase();
    clock = new FakeClock('2024-06-01T12:00:00.000Z');
    mailer = createTestMailer();
    resets = new PasswordResetService(clock, mailer, 60);
  });

  /**
   * Request a reset and return the plain token that was handed to the mailer
   */
  async function issueToken(email: string): Promise<string> {
    const notifyReset = vi.spyOn(mailer, 'notifyReset');
    await resets.requestReset(email);
    const call = notifyReset.mock.calls.at(-1);
    notifyReset.mockRestore();
    if (!call) throw new Error('No reset email was sent');
    return call[1];
  }

  describe('requestReset', () => {
    it('should store the token digest with a one hour expiry', async () => {
      const admin = await createTestAdmin('helper@example.org');

      const token = await issueToken('helper@example.org');

      const row = readAdminRow(admin.id);
      expect(row?.password_reset_token).toBe(hashingService.hashToken(token));
      expect(row?.password_reset_expires).toBe('2024-06-01T13:00:00.000Z');
    });

    it('should email the plain token to the account', async () => {
      await createTestAdmin('helper@example.org');
      const notifyReset = vi.spyOn(mailer, 'notifyReset');

      await resets.requestReset('helper@example.org');

      expect(notifyReset).toHaveBeenCalledWith('helper@example.org', expect.any(String));
    });

    it('should find the account case-insensitively', async () => {
      const admin = await createTestAdmin('helper@example.org');

      await resets.requestReset('HELPER@example.org');

      expect(readAdminRow(admin.id)?.password_reset_token).not.toBeNull();
    });

    it('should answer identically for unknown and known emails', async () => {
      await createTestAdmin('helper@example.org');
      const notifyReset = vi.spyOn(mailer, 'notifyReset');

      const known = await resets.requestReset('helper@example.org');
      const unknown = await resets.requestReset('ghost@example.org');

      expect(known).toEqual({ message: RESET_REQUESTED_MESSAGE });
      expect(unknown).toEqual(known);
      expect(notifyReset).toHaveBeenCalledTimes(1);
    });

    it('should not issue a token for a deactivated account', async () => {
      const admin = await createTestAdmin('helper@example.org');
      await adminUserRepository.update(admin.id, { active: false });

      const result = await resets.requestReset('helper@example.org');

      expect(result).toEqual({ message: RESET_REQUESTED_MESSAGE });
      expect(readAdminRow(admin.id)?.password_reset_token).toBeNull();
    });

    it('should replace an outstanding token', async () => {
      await createTestAdmin('helper@example.org');
      const first = await issueToken('helper@example.org');
      const second = await issueToken('helper@example.org');

      await expect(resets.completeReset(first, 'new-secret', 'new-secret')).rejects.toMatchObject({
        code: 'INVALID_RESET_TOKEN',
      });
      await expect(resets.completeReset(second, 'new-secret', 'new-secret')).resolves.toEqual({
        message: RESET_COMPLETED_MESSAGE,
      });
    });

    it('should succeed when email delivery fails', async () => {
      await createTestAdmin('helper@example.org');
      const failing = new PasswordResetService(
        clock,
        createTestMailer(new RecordingTransport(new Error('smtp down'))),
        60
      );

      await expect(failing.requestReset('helper@example.org')).resolves.toEqual({
        message: RESET_REQUESTED_MESSAGE,
      });
    });
  });

  describe('completeReset', () => {
    it('should set the new password and clear the token', async () => {
      const admin = await createTestAdmin('helper@example.org');
      const token = await issueToken('helper@example.org');

      const result = await resets.completeReset(token, 'new-secret', 'new-secret');

      expect(result).toEqual({ message: RESET_COMPLETED_MESSAGE });
      const row = readAdminRow(admin.id);
      expect(row?.password_reset_token).toBeNull();
      expect(row?.password_reset_expires).toBeNull();
      expect(await passwordService.verify('new-secret', row?.hashed_password ?? '')).toBe(true);
    });

    it('should accept a token up to just before expiry', async () => {
      await createTestAdmin('helper@example.org');
      const token = await issueToken('helper@example.org');
      clock.advanceMinutes(59);

      await expect(resets.completeReset(token, 'new-secret', 'new-secret')).resolves.toEqual({
        message: RESET_COMPLETED_MESSAGE,
      });
    });

    it('should only accept a token once', async () => {
      await createTestAdmin('helper@example.org');
      const token = await issueToken('helper@example.org');
      await resets.completeReset(token, 'new-secret', 'new-secret');

      await expect(resets.completeReset(token, 'other-secret', 'other-secret')).rejects.toMatchObject({
        statusCode: 400,
        code: 'INVALID_RESET_TOKEN',
        message: 'Invalid or expired reset token',
      });
    });

    it('should reject mismatched passwords and keep the token', async () => {
      const admin = await createTestAdmin('helper@example.org');
      const token = await issueToken('helper@example.org');

      await expect(resets.completeReset(token, 'new-secret', 'new-secrex')).rejects.toMatchObject({
        statusCode: 400,
        code: 'PASSWORD_MISMATCH',
        message: 'Passwords do not match',
      });
      expect(readAdminRow(admin.id)?.password_reset_token).toBe(hashingService.hashToken(token));
    });

    it('should reject passwords shorter than six characters', async () => {
      await createTestAdmin('helper@example.org');
      const token = await issueToken('helper@example.org');

      await expect(resets.completeReset(token, '12345', '12345')).rejects.toMatchObject({
        code: 'PASSWORD_TOO_SHORT',
        message: 'Password must be at least 6 characters',
      });
    });

    it('should reject an unknown token', async () => {
      await expect(resets.completeReset('made-up-token', 'new-secret', 'new-secret')).rejects.toMatchObject({
        code: 'INVALID_RESET_TOKEN',
      });
    });

    it('should clear an expired token and report the expiry', async () => {
      const admin = await createTestAdmin('helper@example.org');
      const token = await issueToken('helper@example.org');
      const originalHash = readAdminRow(admin.id)?.hashed_password;
      clock.advanceMinutes(60);

      await expect(resets.completeReset(token, 'new-secret', 'new-secret')).rejects.toMatchObject({
        statusCode: 400,
        code: 'RESET_TOKEN_EXPIRED',
        message: 'Reset token has expired. Please request a new one.',
      });

      const row = readAdminRow(admin.id);
      expect(row?.password_reset_token).toBeNull();
      expect(row?.password_reset_expires).toBeNull();
      expect(row?.hashed_password).toBe(originalHash);
    });

    it('should treat an expired token as unknown once it has been cleared', async () => {
      await createTestAdmin('helper@example.org');
      const token = await issueToken('helper@example.org');
      clock.advanceMinutes(61);
      await resets.completeReset(token, 'new-secret', 'new-secret').catch(() => undefined);

      await expect(resets.completeReset(token, 'new-secret', 'new-secret')).rejects.toMatchObject({
        code: 'INVALID_RESET_TOKEN',
      });
    });

    it('should reject the token of an account deactivated after the request', async () => {
      const admin = await createTestAdmin('helper@example.org');
      const token = await issueToken('helper@example.org');
      await adminUserRepository.update(admin.id, { active: false });

      await expect(resets.completeReset(token, 'new-secret', 'new-secret')).rejects.toMatchObject({
        code: 'INVALID_RESET_TOKEN',
      });
    });
  });
});

describe('getResetState', () => {
  const now = new Date('2024-06-01T12:00:00.000Z');

  it('should be none without a pending reset', () => {
    expect(getResetState({ pendingReset: null }, now)).toBe('none');
  });

  it('should be pending before the expiry', () => {
    const pendingReset = { tokenHash: 'digest', expiresAt: new Date('2024-06-01T12:00:01.000Z') };

    expect(getResetState({ pendingReset }, now)).toBe('pending');
  });

  it('should be expired at or after the expiry', () => {
    expect(getResetState({ pendingReset: { tokenHash: 'digest', expiresAt: now } }, now)).toBe('expired');
  });
});

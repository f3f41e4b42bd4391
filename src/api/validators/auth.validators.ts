import { z } from 'zod';

const emailSchema = z.string().trim().email('Invalid email address').max(254);

/**
 * Login validator
 * Length rules are not applied here, so a short password fails as bad credentials
 */
export const loginValidator = z.object({
  email: emailSchema,
  password: z.string().min(1, 'Password is required'),
});

export const forgotPasswordValidator = z.object({
  email: emailSchema,
});

/**
 * Reset completion validator. Mismatch and minimum length are checked by the
 * reset service so they surface with their own error codes.
 */
export const resetPasswordValidator = z.object({
  token: z.string().min(1, 'Reset token is required'),
  password: z.string().max(128, 'Password must be less than 128 characters'),
  confirmPassword: z.string().max(128, 'Password must be less than 128 characters'),
});

export type LoginInput = z.infer<typeof loginValidator>;
export type ForgotPasswordInput = z.infer<typeof forgotPasswordValidator>;
export type ResetPasswordInput = z.infer<typeof resetPasswordValidator>;

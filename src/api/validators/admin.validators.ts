import { z } from 'zod';

const nameSchema = z.string().trim().max(100, 'Name must be less than 100 characters');

export const createAdminValidator = z.object({
  email: z.string().trim().email('Invalid email address').max(254),
  password: z.string().max(128, 'Password must be less than 128 characters'),
  name: nameSchema.nullish(),
});

export const updateAdminValidator = z
  .object({
    isActive: z.boolean().optional(),
    name: nameSchema.nullable().optional(),
  })
  .refine((data) => data.isActive !== undefined || data.name !== undefined, {
    message: 'At least one of isActive or name is required',
  });

export const idParamsValidator = z.object({
  id: z.coerce.number().int().positive('Invalid ID'),
});

export type CreateAdminInput = z.infer<typeof createAdminValidator>;
export type UpdateAdminInput = z.infer<typeof updateAdminValidator>;

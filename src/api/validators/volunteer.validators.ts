import { z } from 'zod';
import type { MinistrySelection } from '../../models/volunteer.model';

const selectionSchema = z
  .object({
    category: z.string().min(1, 'Category is required'),
    ministryArea: z.string().min(1, 'Ministry area is required'),
  })
  .transform((selection): MinistrySelection => ({
    category: selection.category,
    area: selection.ministryArea,
  }));

/**
 * Signup body; ministry selections are checked against the taxonomy by the service
 */
export const volunteerValidator = z.object({
  name: z.string().trim().min(1, 'Name is required').max(200),
  phone: z.string().trim().min(1, 'Phone is required').max(50),
  email: z.string().trim().email('Invalid email address').max(254),
  ministries: z.array(selectionSchema).max(100).default([]),
});

export const volunteerListQueryValidator = z.object({
  ministryArea: z.string().min(1).optional(),
  category: z.string().min(1).optional(),
  sortBy: z.enum(['name', 'date', 'ministry']).default('date'),
});

export type VolunteerInput = z.infer<typeof volunteerValidator>;
export type VolunteerListQuery = z.infer<typeof volunteerListQueryValidator>;

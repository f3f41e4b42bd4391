import { sql } from 'drizzle-orm';
import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core';

// Admin Users Table
export const adminUsers = sqliteTable(
  'admin_users',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    // Always stored lower-cased
    email: text('email').notNull().unique(),
    passwordHash: text('hashed_password').notNull(),
    name: text('name'),
    isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
    isSuperAdmin: integer('is_super_admin', { mode: 'boolean' }).notNull().default(false),
    // SHA-256 digest of the emailed token; written and cleared together with the expiry
    passwordResetToken: text('password_reset_token'),
    passwordResetExpires: text('password_reset_expires'),
    createdAt: text('created_at')
      .notNull()
      .$defaultFn(() => new Date().toISOString()),
    lastLoginAt: text('last_login_at'),
  },
  (table) => ({
    emailLowerIdx: uniqueIndex('idx_admin_email_lower').on(sql`lower(email)`),
    resetTokenIdx: index('idx_admin_reset_token').on(table.passwordResetToken),
    singleSuperAdminIdx: uniqueIndex('idx_admin_single_super_admin')
      .on(table.isSuperAdmin)
      .where(sql`is_super_admin = 1 AND is_active = 1`),
  })
);

// Volunteers Table
export const volunteers = sqliteTable(
  'volunteers',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    name: text('name').notNull(),
    phone: text('phone').notNull(),
    email: text('email').notNull(),
    signupDate: text('signup_date')
      .notNull()
      .$defaultFn(() => new Date().toISOString()),
    createdAt: text('created_at')
      .notNull()
      .$defaultFn(() => new Date().toISOString()),
    updatedAt: text('updated_at')
      .notNull()
      .$defaultFn(() => new Date().toISOString()),
  },
  (table) => ({
    signupDateIdx: index('idx_volunteer_signup_date').on(table.signupDate),
  })
);

// Volunteer Ministry Selections Table
export const volunteerMinistries = sqliteTable(
  'volunteer_ministries',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    volunteerId: integer('volunteer_id')
      .notNull()
      .references(() => volunteers.id, { onDelete: 'cascade' }),
    category: text('category').notNull(),
    ministryArea: text('ministry_area').notNull(),
  },
  (table) => ({
    volunteerIdx: index('idx_ministry_volunteer').on(table.volunteerId),
    areaIdx: index('idx_ministry_area').on(table.ministryArea),
    categoryIdx: index('idx_ministry_category').on(table.category),
  })
);

// Custom Ministry Areas Table (appended to the built-in taxonomy at startup)
export const customMinistryAreas = sqliteTable('custom_ministry_areas', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  category: text('category').notNull(),
  ministryArea: text('ministry_area').notNull(),
  createdAt: text('created_at')
    .notNull()
    .$defaultFn(() => new Date().toISOString()),
});

// Type inference helpers
export type AdminUserRow = typeof adminUsers.$inferSelect;
export type NewAdminUserRow = typeof adminUsers.$inferInsert;

export type VolunteerRow = typeof volunteers.$inferSelect;
export type NewVolunteerRow = typeof volunteers.$inferInsert;

export type VolunteerMinistryRow = typeof volunteerMinistries.$inferSelect;

export type CustomMinistryAreaRow = typeof customMinistryAreas.$inferSelect;

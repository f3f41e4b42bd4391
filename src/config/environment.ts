/**
 * Environment Configuration and Validation
 *
 * Validates all environment variables using Zod schema and provides
 * type-safe access to configuration values throughout the application.
 *
 * Required variables:
 * - JWT_SECRET: Minimum 32 characters for session token signing
 *
 * @module config/environment
 */

import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const numberFromString = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

// Environment schema validation
const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3000').transform(Number).pipe(z.number().min(1).max(65535)),
  APP_BASE_URL: z.string().url().default('http://localhost:5173'),

  // Database
  DATABASE_PATH: z.string().default('./data/volunteers.db'),

  // Security
  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: numberFromString('480'), // 8 hours
  PASSWORD_RESET_EXPIRE_MINUTES: numberFromString('60'),

  // CORS
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: numberFromString('900000'), // 15 minutes
  RATE_LIMIT_MAX_REQUESTS: numberFromString('100'),
  LOGIN_RATE_LIMIT_MAX: numberFromString('5'),

  // Email
  EMAIL_FROM: z.string().email().default('noreply@example.org'),
  ADMIN_NOTIFICATION_EMAILS: z
    .string()
    .default('')
    .transform((val) =>
      val
        .split(',')
        .map((email) => email.trim())
        .filter((email) => email.length > 0)
    ),

  // Bootstrap super-admin
  ADMIN_EMAIL: z.string().email().optional(),
  ADMIN_PASSWORD: z.string().min(6, 'ADMIN_PASSWORD must be at least 6 characters').optional(),
  ADMIN_NAME: z.string().optional(),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  LOG_PRETTY: z
    .string()
    .default('true')
    .transform((val) => val === 'true'),
});

// Parse and validate environment variables
function validateEnv() {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const missingVars = error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
      console.error('Environment validation failed:');
      missingVars.forEach((msg) => console.error(`  - ${msg}`));
      console.error('\nPlease check your .env file and ensure all required variables are set.');
      process.exit(1);
    }
    throw error;
  }
}

// Export validated environment
export const env = validateEnv();

// Type-safe environment object
export type Environment = z.infer<typeof envSchema>;

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json'],
      exclude: [
        'node_modules/',
        'dist/',
        'tests/',
        '**/*.test.ts',
        '**/types/*.ts',
        'drizzle.config.ts',
        // Entry point
        'src/index.ts',
        // Routes (just route definitions)
        'src/api/routes/**/*.ts',
        // Validators (just Zod schemas)
        'src/api/validators/**/*.ts',
        // Config files
        'src/config/**/*.ts',
        // Database setup, migrations and seed
        'src/database/**/*.ts',
        'src/db/index.ts',
        // Models (just type definitions)
        'src/models/**/*.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
    setupFiles: ['./tests/setup.ts'],
  },
});

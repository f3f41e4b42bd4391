import { mkdirSync, readFileSync, readdirSync } from 'fs';
import { join, resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import Database from 'better-sqlite3';
import { env } from '../config/environment';
import { logger } from '../config/logger';

// Get the directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const MIGRATIONS_DIR = resolve(__dirname, '../../drizzle/migrations');

/**
 * Apply every pending `.sql` file in `migrationsDir` to an open connection.
 * Applied files are tracked by name in `__drizzle_migrations`.
 * @returns Number of migrations applied
 */
export function applyMigrations(
  sqlite: Database.Database,
  migrationsDir: string = MIGRATIONS_DIR
): number {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS __drizzle_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      hash TEXT NOT NULL,
      created_at INTEGER NOT NULL
    )
  `);

  const files = readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();

  logger.debug({ count: files.length }, 'Found migration files');

  const appliedRows: unknown[] = sqlite.prepare('SELECT hash FROM __drizzle_migrations').all();
  const appliedHashes = new Set(
    appliedRows.flatMap((row) =>
      typeof row === 'object' && row !== null && 'hash' in row && typeof row.hash === 'string'
        ? [row.hash]
        : []
    )
  );

  const recordMigration = sqlite.prepare(
    'INSERT INTO __drizzle_migrations (hash, created_at) VALUES (?, ?)'
  );

  let appliedCount = 0;
  for (const file of files) {
    if (appliedHashes.has(file)) {
      logger.debug({ file }, 'Migration already applied, skipping');
      continue;
    }

    // drizzle-kit output separates statements with breakpoint markers that sqlite cannot parse
    const sql = readFileSync(join(migrationsDir, file), 'utf-8').replace(
      /-->\s*statement-breakpoint/g,
      ''
    );

    logger.info({ file }, 'Applying migration');

    const apply = sqlite.transaction(() => {
      sqlite.exec(sql);
      recordMigration.run(file, Date.now());
    });

    try {
      apply();
      appliedCount++;
    } catch (error) {
      logger.error({ error, file }, 'Migration failed');
      throw error;
    }
  }

  return appliedCount;
}

/**
 * Run database migrations against DATABASE_PATH
 */
async function migrate(): Promise<void> {
  logger.info('Starting database migrations...');

  mkdirSync(dirname(env.DATABASE_PATH), { recursive: true });
  const sqlite = new Database(env.DATABASE_PATH);

  try {
    const appliedCount = applyMigrations(sqlite);

    if (appliedCount === 0) {
      logger.info('No pending migrations');
    } else {
      logger.info({ count: appliedCount }, 'Migrations completed successfully');
    }
  } finally {
    sqlite.close();
  }
}

// Run migrations if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  migrate()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error({ error }, 'Migration failed');
      process.exit(1);
    });
}

export { migrate };

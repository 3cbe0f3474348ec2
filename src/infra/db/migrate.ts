import { readdir, readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { loadDatabaseConfig } from '../../config.js';
import { createLogger, type Logger } from '../logger.js';
import { createPool, type DbPool } from './pool.js';

const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

interface Migration {
  filename: string;
  version: number;
}

export function parseMigrationFilenames(files: string[]): Migration[] {
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(pool: DbPool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(pool: DbPool): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(pool: DbPool, logger: Logger, migration: Migration): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [migration.version]);
    await client.query('COMMIT');
    logger.info({ version: migration.version, filename: migration.filename }, 'Applied migration');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Apply every pending migration in version order, each in its own transaction.
 */
export async function migrate(pool: DbPool, logger: Logger): Promise<number> {
  await ensureMigrationsTable(pool);
  const migrations = parseMigrationFilenames(await readdir(MIGRATIONS_DIR));
  const applied = await getAppliedMigrations(pool);

  const pending = migrations.filter((m) => !applied.includes(m.version));
  if (pending.length === 0) {
    logger.info('No pending migrations');
    return 0;
  }

  logger.info({ count: pending.length }, 'Found pending migrations');
  for (const migration of pending) {
    await applyMigration(pool, logger, migration);
  }
  return pending.length;
}

async function main(): Promise<void> {
  let logger = createLogger();
  let pool: DbPool | undefined;
  try {
    const config = loadDatabaseConfig();
    logger = createLogger({ level: config.logLevel });
    pool = createPool(config.databaseUrl, logger);
    await migrate(pool, logger);
    logger.info('All migrations applied');
  } catch (error) {
    logger.fatal({ err: error }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await pool?.end();
  }
}

/**
 * True when `moduleUrl` is the script node was started with.
 */
export function isEntryPoint(moduleUrl: string, entry: string | undefined): boolean {
  return entry !== undefined && fileURLToPath(moduleUrl) === resolve(entry);
}

// Run only when executed as a script, not when imported by tests
if (isEntryPoint(import.meta.url, process.argv[1])) {
  void main();
}

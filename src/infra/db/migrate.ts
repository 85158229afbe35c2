import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { loadDatabaseUrl } from '../../config.js';
import { logger } from '../logger.js';
import { createPool, type DbPool } from './pool.js';

const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

export interface Migration {
  filename: string;
  version: number;
}

/**
 * Order `NNN_name.sql` files by their numeric prefix.
 */
export function parseMigrations(files: string[]): Migration[] {
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

async function applyMigration(pool: DbPool, migration: Migration): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
      migration.version,
    ]);
    await client.query('COMMIT');
    logger.info('Applied migration', {
      version: migration.version,
      filename: migration.filename,
    });
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

export async function migrate(pool: DbPool): Promise<number> {
  await ensureMigrationsTable(pool);
  const migrations = parseMigrations(await readdir(MIGRATIONS_DIR));
  const applied = await getAppliedMigrations(pool);

  const pending = migrations.filter((m) => !applied.includes(m.version));
  if (pending.length === 0) {
    logger.info('No pending migrations');
    return 0;
  }

  logger.info('Found pending migrations', { count: pending.length });
  for (const migration of pending) {
    await applyMigration(pool, migration);
  }
  return pending.length;
}

async function main(): Promise<void> {
  const pool = createPool(loadDatabaseUrl());
  try {
    await migrate(pool);
    logger.info('All migrations applied successfully');
  } catch (error) {
    logger.error('Migration failed', { err: error });
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

// Only run when executed directly, not when imported by tests
if (process.argv[1] && import.meta.url.endsWith(process.argv[1].replace(/\\/g, '/'))) {
  void main();
}

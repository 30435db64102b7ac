import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { initPool, query, closePool, withTransaction } from './pool.js';
import { loadAppConfig } from '../common/config.js';

dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const MIGRATIONS_DIR = path.join(__dirname, 'migrations');

export interface MigrationFile {
  version: number;
  name: string;
  path: string;
}

async function ensureMigrationsTable(): Promise<void> {
  await query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TIMESTAMPTZ DEFAULT now()
    )
  `);
}

async function getAppliedVersions(): Promise<Set<number>> {
  const result = await query<{ version: number }>('SELECT version FROM schema_migrations ORDER BY version');
  return new Set(result.rows.map((r) => r.version));
}

export function getMigrationFiles(dir: string = MIGRATIONS_DIR): MigrationFile[] {
  const files = fs.readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  return files.map((f) => {
    const match = f.match(/^(\d+)[-_](.+)\.sql$/);
    if (!match) {
      throw new Error(`Invalid migration filename: ${f}. Expected format: 001-description.sql`);
    }
    return {
      version: parseInt(match[1], 10),
      name: match[2],
      path: path.join(dir, f),
    };
  });
}

/**
 * Run all pending migrations and return the ones applied.
 * Assumes the database pool is already initialized.
 */
export async function runMigrations(dir: string = MIGRATIONS_DIR): Promise<MigrationFile[]> {
  await ensureMigrationsTable();
  const applied = await getAppliedVersions();
  const pending = getMigrationFiles(dir).filter((m) => !applied.has(m.version));

  if (pending.length === 0) {
    console.log('[migrate] No pending migrations.');
    return [];
  }

  console.log(`[migrate] Running ${pending.length} migration(s)...`);

  for (const migration of pending) {
    const sql = fs.readFileSync(migration.path, 'utf-8');
    console.log(`[migrate]   Applying ${migration.version}-${migration.name}...`);

    await withTransaction(async (client) => {
      await client.query(sql);
      await client.query(
        'INSERT INTO schema_migrations (version, name) VALUES ($1, $2)',
        [migration.version, migration.name],
      );
    });
  }

  console.log('[migrate] All migrations applied.');
  return pending;
}

// Run as a standalone script when executed directly
async function main(): Promise<void> {
  const config = loadAppConfig(process.env);
  initPool(config.databaseUrl, config.databasePoolSize);

  try {
    await runMigrations();
  } finally {
    await closePool();
  }
}

/** True when `scriptPath` (argv[1]) is the module at `moduleUrl`. */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  return scriptPath !== undefined && path.resolve(scriptPath) === fileURLToPath(moduleUrl);
}

// Only run main() when this file is executed directly, not when imported
if (isEntryPoint(process.argv[1], import.meta.url)) {
  main().catch((err) => {
    console.error('Migration failed:', err);
    process.exit(1);
  });
}

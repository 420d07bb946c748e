import pg from 'pg';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger } from './logger.js';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max?: number;
}

export function createPool(config: DatabaseConfig): pg.Pool {
  return new pg.Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.max ?? 10,
  });
}

/**
 * Runs `work` inside BEGIN/COMMIT on a dedicated client. Any throw rolls the
 * transaction back and is rethrown.
 */
export async function withTransaction<T>(
  pool: pg.Pool,
  work: (client: pg.PoolClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

const MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    version TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

/**
 * Applies the `.sql` files in `migrationsDir` that schema_migrations does not
 * list yet, in file-name order, each in its own transaction. Returns the
 * versions applied by this call.
 */
export async function runMigrations(pool: pg.Pool, migrationsDir: string): Promise<string[]> {
  const logger = createLogger('database');
  await pool.query(MIGRATIONS_TABLE);

  const { rows } = await pool.query<{ version: string }>('SELECT version FROM schema_migrations');
  const done = new Set(rows.map((r) => r.version));

  const pending = (await readdir(migrationsDir))
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .map((file) => ({ file, version: file.slice(0, -'.sql'.length) }))
    .filter(({ version }) => !done.has(version));

  for (const { file, version } of pending) {
    const sql = await readFile(join(migrationsDir, file), 'utf-8');
    await withTransaction(pool, async (client) => {
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
    });
    logger.info({ version }, 'migration applied');
  }
  return pending.map((m) => m.version);
}

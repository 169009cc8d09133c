import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { Pool } from 'pg';
import * as schema from '../db/schema';
import { env } from './env';
import { logger } from '../utils/logger.util';

export type Database = NodePgDatabase<typeof schema>;

/** A database handle or an open transaction; repositories accept either. */
export type DbExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

let pool: Pool | null = null;
let dbInstance: Database | null = null;

/** Whether a database URL is configured. */
export function isDatabaseConfigured(): boolean {
  return Boolean(env.DATABASE_URL);
}

/**
 * Returns the Drizzle client, creating the pool on first use.
 * Throws if DATABASE_URL is not set.
 */
export function getDb(): Database {
  if (!env.DATABASE_URL) {
    throw new Error('DATABASE_URL environment variable is not set');
  }
  if (!dbInstance) {
    pool = new Pool({ connectionString: env.DATABASE_URL });
    pool.on('error', (err) => {
      logger.error('Database pool error', err);
    });
    dbInstance = drizzle(pool, { schema });
  }
  return dbInstance;
}

export async function checkDatabaseConnection(): Promise<boolean> {
  try {
    getDb();
    if (!pool) return false;
    await pool.query('SELECT NOW()');
    return true;
  } catch (error) {
    logger.warn('Database connection check failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
  }
  pool = null;
  dbInstance = null;
}

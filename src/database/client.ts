import { sql } from 'drizzle-orm';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { config } from '../config/index.js';
import { toErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ServiceStatus } from '../types/index.js';
import * as schema from './schema.js';

export type Database = NodePgDatabase<typeof schema>;

export const pool = new pg.Pool({
  connectionString: config.database.url,
  max: config.database.poolMax,
});

pool.on('error', (error: Error) => {
  logger.error('Idle database client error', { error: error.message });
});

export const db: Database = drizzle(pool, { schema });

export async function connectDatabase(): Promise<void> {
  try {
    const client = await pool.connect();
    client.release();
    logger.info('Database connected successfully');
  } catch (error) {
    logger.error('Failed to connect to database', { error });
    throw error;
  }
}

export async function disconnectDatabase(): Promise<void> {
  await pool.end();
  logger.info('Database disconnected');
}

export async function checkDatabaseHealth(): Promise<ServiceStatus> {
  const start = Date.now();
  try {
    await db.execute(sql`SELECT 1`);
    return { status: 'connected', latency: Date.now() - start };
  } catch (error) {
    return { status: 'error', error: toErrorMessage(error) };
  }
}

/**
 * Postgres unique_violation, used to detect lost insert races.
 */
export function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}


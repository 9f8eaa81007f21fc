/**
 * Database Client Module
 * 
 * Creates and exports a PostgreSQL connection pool and a transaction helper.
 * Handles connection events and errors for monitoring.
 */

import pg from 'pg';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import type { Database, TransactionClient } from './types.js';

const DATE_OID = 1082;

// DATE columns round-trip as "YYYY-MM-DD" strings so no time-zone shift is applied
pg.types.setTypeParser(DATE_OID, (value: string) => value);

/**
 * PostgreSQL connection pool
 * 
 * Uses connection pooling for efficient database access.
 * Automatically handles reconnection and connection lifecycle.
 */
export const db = new pg.Pool({
  host: cfg.database.host,
  port: cfg.database.port,
  user: cfg.database.user,
  password: cfg.database.password,
  database: cfg.database.database,
  ssl: cfg.database.ssl,
  max: cfg.database.max,
  idleTimeoutMillis: cfg.database.idleTimeoutMillis,
  connectionTimeoutMillis: cfg.database.connectionTimeoutMillis
});

// Log connection events for monitoring
db.on('connect', () => {
  logger.debug('Database client connected');
});

db.on('error', (err: Error) => {
  logger.error({ err }, 'Database pool error');
});

/**
 * Runs the handler inside BEGIN/COMMIT on a dedicated client
 * 
 * Rolls back and rethrows if the handler (or the commit) fails.
 * The client is always returned to the pool.
 */
export async function withTransaction<T>(
  database: Database,
  handler: (client: TransactionClient) => Promise<T>
): Promise<T> {
  const client = await database.connect();
  try {
    await client.query('BEGIN');
    const result = await handler(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      logger.warn({ err: rollbackErr }, 'Rollback failed');
    }
    throw err;
  } finally {
    client.release();
  }
}

/**
 * Gracefully closes all database connections
 */
export async function closeDatabase() {
  await db.end();
  logger.info('Database connections closed');
}

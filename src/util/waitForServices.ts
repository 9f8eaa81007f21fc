/**
 * Wait for Services Utility
 * 
 * Waits for PostgreSQL to accept connections before the runner starts.
 * Prevents a cold database from failing the migration on its first query.
 */

import { logger } from '../core/logger.js';
import { HEALTH_CHECK } from '../core/constants.js';
import { ConnectivityError, toError } from '../errors/index.js';
import type { Database } from '../db/types.js';

export interface WaitOptions {
  maxRetries?: number;
  retryDelayMs?: number;
}

/**
 * Wait for PostgreSQL to be available
 * 
 * @throws ConnectivityError once every attempt has failed
 */
export async function waitForDatabase(database: Database, options: WaitOptions = {}): Promise<void> {
  const maxRetries = options.maxRetries ?? HEALTH_CHECK.MAX_RETRIES;
  const retryDelayMs = options.retryDelayMs ?? HEALTH_CHECK.RETRY_DELAY_MS;

  logger.info('Waiting for PostgreSQL to be ready...');
  
  for (let i = 0; i < maxRetries; i++) {
    try {
      const client = await database.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
      logger.info('✓ PostgreSQL is ready');
      return;
    } catch (err) {
      if (i < maxRetries - 1) {
        logger.debug({ attempt: i + 1, maxRetries }, 'PostgreSQL not ready, retrying...');
        await new Promise(resolve => setTimeout(resolve, retryDelayMs));
      } else {
        const error = toError(err);
        throw new ConnectivityError(
          `PostgreSQL failed to become ready after ${maxRetries} attempts: ${error.message}`,
          maxRetries,
          error
        );
      }
    }
  }
}

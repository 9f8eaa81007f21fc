/**
 * Predictions game_date Migration - Main Entry Point
 * 
 * Adds the game_date column to the predictions table and backfills it from
 * each row's payload document. Run with `status` to inspect progress instead.
 */

import { logger } from './core/logger.js';
import { closeDatabase, db } from './db/client.js';
import { parseCommand, runCommand } from './db/migrate.js';

async function main(): Promise<void> {
  try {
    const command = parseCommand(process.argv[2]);
    await runCommand(command, db);
  } finally {
    await closeDatabase();
  }
}

main()
  .then(() => {
    process.exit(0);
  })
  .catch((err) => {
    logger.error({ err }, 'Migration failed');
    process.exit(1);
  });

/**
 * Database Migration Runner
 * 
 * Command dispatch for the predictions game_date migration:
 * `migrate` applies it, `status` reports progress without writing.
 */

import { logger } from '../core/logger.js';
import { ValidationError } from '../errors/index.js';
import { waitForDatabase, type WaitOptions } from '../util/waitForServices.js';
import {
  getGameDateStatus,
  runGameDateMigration,
  type BackfillOptions,
  type GameDateStatus,
  type MigrationResult
} from '../services/gameDateMigration.js';
import type { Database } from './types.js';

export const COMMANDS = ['migrate', 'status'] as const;

export type Command = (typeof COMMANDS)[number];

export type CommandResult =
  | { command: 'migrate'; result: MigrationResult }
  | { command: 'status'; result: GameDateStatus };

export interface RunOptions extends BackfillOptions {
  wait?: WaitOptions;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * Resolves the command-line argument, defaulting to `migrate`
 * 
 * @throws ValidationError for an unknown command
 */
export function parseCommand(arg: string | undefined): Command {
  if (arg === undefined || arg === '') return 'migrate';
  if (!isCommand(arg)) {
    throw new ValidationError(`Unknown command "${arg}", expected one of: ${COMMANDS.join(', ')}`, 'command');
  }
  return arg;
}

/**
 * Applies the game_date migration once the database is reachable
 */
export async function runMigrations(database: Database, options: RunOptions = {}): Promise<MigrationResult> {
  await waitForDatabase(database, options.wait);
  const result = await runGameDateMigration(database, options);

  if (result.backfill.malformed.length > 0) {
    logger.warn(
      { count: result.backfill.malformed.length, ids: result.backfill.malformed.map(row => row.id) },
      'Some rows carry a payload game_date that is not a calendar date and were left null'
    );
  }
  logger.info('All database migrations completed successfully');
  return result;
}

/**
 * Logs the current game_date status once the database is reachable
 */
export async function reportStatus(database: Database, options: RunOptions = {}): Promise<GameDateStatus> {
  await waitForDatabase(database, options.wait);
  const status = await getGameDateStatus(database);
  logger.info(status, 'game_date status');
  return status;
}

/**
 * Runs a parsed command against the given database
 */
export async function runCommand(
  command: Command,
  database: Database,
  options: RunOptions = {}
): Promise<CommandResult> {
  switch (command) {
    case 'migrate':
      return { command, result: await runMigrations(database, options) };
    case 'status':
      return { command, result: await reportStatus(database, options) };
  }
}

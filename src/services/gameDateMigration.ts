/**
 * Game Date Migration Service
 *
 * Adds predictions.game_date and backfills it from payload.game_date.
 * Both phases are safe to re-run: the column is only added when missing,
 * and the backfill only touches rows whose game_date is still null.
 */

import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { PREDICTIONS } from '../core/constants.js';
import { SchemaError } from '../errors/index.js';
import { withTransaction } from '../db/client.js';
import {
  addGameDateColumn,
  countGameDates,
  listPredictionColumns,
  selectBackfillBatch,
  setGameDate
} from '../db/repositories/predictions.js';
import { parsePayloadGameDate, type GameDateRejection } from '../util/validation.js';
import type { Database, PredictionId, Queryable } from '../db/types.js';

export interface EnsureColumnResult {
  added: boolean;
}

export interface MalformedRow {
  id: PredictionId;
  rawValue: unknown;
  reason: GameDateRejection;
}

export interface BackfillReport {
  batches: number;
  scanned: number;
  updated: number;
  malformed: MalformedRow[];
}

export interface BackfillOptions {
  batchSize?: number;
}

export interface MigrationResult {
  columnAdded: boolean;
  backfill: BackfillReport;
}

export interface GameDateStatus {
  columnExists: boolean;
  total: number;
  populated: number;
  pending: number;
}

/**
 * Reads the predictions columns and checks the input contract
 *
 * @throws SchemaError if the table or its payload column is missing
 */
async function inspectPredictionsTable(db: Queryable): Promise<Set<string>> {
  const columns = await listPredictionColumns(db);

  if (columns.size === 0) {
    throw new SchemaError(`Table "${PREDICTIONS.TABLE}" does not exist`, PREDICTIONS.TABLE);
  }
  if (!columns.has(PREDICTIONS.PAYLOAD_COLUMN)) {
    throw new SchemaError(
      `Table "${PREDICTIONS.TABLE}" has no "${PREDICTIONS.PAYLOAD_COLUMN}" column`,
      PREDICTIONS.TABLE,
      PREDICTIONS.PAYLOAD_COLUMN
    );
  }
  return columns;
}

/**
 * Adds the game_date column unless it already exists
 */
export async function ensureGameDateColumn(db: Queryable): Promise<EnsureColumnResult> {
  const columns = await inspectPredictionsTable(db);

  if (columns.has(PREDICTIONS.GAME_DATE_COLUMN)) {
    logger.info({ table: PREDICTIONS.TABLE, column: PREDICTIONS.GAME_DATE_COLUMN }, 'Column already present');
    return { added: false };
  }

  const added = await addGameDateColumn(db);
  if (added) {
    logger.info({ table: PREDICTIONS.TABLE, column: PREDICTIONS.GAME_DATE_COLUMN }, 'Column added');
  }
  return { added };
}

/**
 * Fills game_date from payload.game_date for every row where it is still null
 *
 * Each batch is locked, parsed and written in its own transaction. Values that
 * do not parse as a calendar date are left null and reported, never thrown.
 * A store failure rolls back the current batch and propagates.
 */
export async function backfillGameDates(
  db: Database,
  options: BackfillOptions = {}
): Promise<BackfillReport> {
  const batchSize = options.batchSize ?? cfg.migration.batchSize;
  const report: BackfillReport = { batches: 0, scanned: 0, updated: 0, malformed: [] };
  let cursor: PredictionId | undefined;

  logger.info({ batchSize }, 'Backfilling game_date from payload');

  for (;;) {
    const batch = await withTransaction(db, async (client) => {
      const rows = await selectBackfillBatch(client, batchSize, cursor);
      let updated = 0;
      const malformed: MalformedRow[] = [];

      for (const row of rows) {
        const parsed = parsePayloadGameDate(row.raw_game_date);
        if (!parsed.ok) {
          malformed.push({ id: row.id, rawValue: row.raw_game_date, reason: parsed.reason });
          continue;
        }
        if (await setGameDate(client, row.id, parsed.value)) {
          updated++;
        }
      }

      return { rows, updated, malformed };
    });

    if (batch.rows.length === 0) break;

    report.batches++;
    report.scanned += batch.rows.length;
    report.updated += batch.updated;
    report.malformed.push(...batch.malformed);

    for (const row of batch.malformed) {
      logger.warn({ id: row.id, rawValue: row.rawValue, reason: row.reason }, 'Skipping unparseable payload game_date');
    }
    logger.debug({ batch: report.batches, scanned: batch.rows.length, updated: batch.updated }, 'Batch committed');

    cursor = batch.rows[batch.rows.length - 1].id;
    if (batch.rows.length < batchSize) break;
  }

  logger.info(
    { batches: report.batches, scanned: report.scanned, updated: report.updated, malformed: report.malformed.length },
    'Backfill finished'
  );
  return report;
}

/**
 * Runs both phases in order: ensure the column, then backfill
 */
export async function runGameDateMigration(
  db: Database,
  options: BackfillOptions = {}
): Promise<MigrationResult> {
  logger.info({ table: PREDICTIONS.TABLE }, 'Starting game_date migration');

  const { added } = await ensureGameDateColumn(db);
  const backfill = await backfillGameDates(db, options);

  logger.info({ columnAdded: added, updated: backfill.updated, malformed: backfill.malformed.length }, 'game_date migration complete');
  return { columnAdded: added, backfill };
}

/**
 * Reports how far the table is from its migrated state without changing it
 */
export async function getGameDateStatus(db: Queryable): Promise<GameDateStatus> {
  const columns = await inspectPredictionsTable(db);
  const columnExists = columns.has(PREDICTIONS.GAME_DATE_COLUMN);
  const counts = await countGameDates(db, columnExists);
  return { columnExists, ...counts };
}

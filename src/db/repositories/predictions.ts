/**
 * Prediction Repository
 *
 * Schema introspection, the game_date DDL, and the batch queries used to
 * backfill game_date from the payload document.
 */

import { logger } from '../../core/logger.js';
import { PREDICTIONS, PG_ERROR_CODES } from '../../core/constants.js';
import { DatabaseError, toError } from '../../errors/index.js';
import type { BackfillCandidateRow, PredictionId, Queryable } from '../types.js';

const { TABLE, PAYLOAD_COLUMN, GAME_DATE_COLUMN, PAYLOAD_GAME_DATE_KEY } = PREDICTIONS;

const ELIGIBLE = `${GAME_DATE_COLUMN} IS NULL AND ${PAYLOAD_COLUMN} ->> '${PAYLOAD_GAME_DATE_KEY}' IS NOT NULL`;

/**
 * Statement texts, exported so in-process fakes can recognise them
 */
export const PREDICTION_SQL = {
  listColumns: `
    SELECT column_name FROM information_schema.columns
    WHERE table_schema = current_schema() AND table_name = $1
  `,
  addGameDateColumn: `ALTER TABLE ${TABLE} ADD COLUMN IF NOT EXISTS ${GAME_DATE_COLUMN} DATE`,
  selectFirstBatch: `
    SELECT id, ${PAYLOAD_COLUMN} -> '${PAYLOAD_GAME_DATE_KEY}' AS raw_game_date
    FROM ${TABLE}
    WHERE ${ELIGIBLE}
    ORDER BY id
    LIMIT $1
    FOR UPDATE SKIP LOCKED
  `,
  selectNextBatch: `
    SELECT id, ${PAYLOAD_COLUMN} -> '${PAYLOAD_GAME_DATE_KEY}' AS raw_game_date
    FROM ${TABLE}
    WHERE ${ELIGIBLE} AND id > $2
    ORDER BY id
    LIMIT $1
    FOR UPDATE SKIP LOCKED
  `,
  setGameDate: `
    UPDATE ${TABLE} SET ${GAME_DATE_COLUMN} = $2::date
    WHERE id = $1 AND ${GAME_DATE_COLUMN} IS NULL
  `,
  countStatus: `
    SELECT count(*)::int AS total,
           count(${GAME_DATE_COLUMN})::int AS populated,
           (count(*) FILTER (WHERE ${ELIGIBLE}))::int AS pending
    FROM ${TABLE}
  `,
  countPayloadDates: `
    SELECT count(*)::int AS total,
           0 AS populated,
           (count(*) FILTER (WHERE ${PAYLOAD_COLUMN} ->> '${PAYLOAD_GAME_DATE_KEY}' IS NOT NULL))::int AS pending
    FROM ${TABLE}
  `
} as const;

export interface GameDateCounts {
  total: number;
  populated: number;
  pending: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isPredictionId(value: unknown): value is PredictionId {
  return typeof value === 'string' || typeof value === 'number';
}

function hasErrorCode(err: unknown, code: string): boolean {
  return isRecord(err) && err.code === code;
}

/**
 * Runs a statement, wrapping driver failures in a DatabaseError
 */
async function run(db: Queryable, operation: string, text: string, values?: unknown[]) {
  try {
    return await db.query(text, values);
  } catch (err) {
    const error = toError(err);
    logger.error({ err, operation }, 'Prediction query failed');
    throw new DatabaseError(`Failed to ${operation}: ${error.message}`, operation, error);
  }
}

/**
 * Lists the column names of the predictions table in the current schema
 *
 * An empty set means the table is not visible to this connection.
 */
export async function listPredictionColumns(db: Queryable): Promise<Set<string>> {
  const result = await run(db, 'list prediction columns', PREDICTION_SQL.listColumns, [TABLE]);
  const columns = new Set<string>();
  for (const row of result.rows) {
    if (isRecord(row) && typeof row.column_name === 'string') {
      columns.add(row.column_name);
    }
  }
  return columns;
}

/**
 * Adds the nullable game_date column
 *
 * @returns true if this call issued the DDL, false if another session added the column first
 */
export async function addGameDateColumn(db: Queryable): Promise<boolean> {
  try {
    await db.query(PREDICTION_SQL.addGameDateColumn);
    return true;
  } catch (err) {
    if (hasErrorCode(err, PG_ERROR_CODES.DUPLICATE_COLUMN)) {
      logger.debug({ table: TABLE, column: GAME_DATE_COLUMN }, 'Column added concurrently, nothing to do');
      return false;
    }
    const error = toError(err);
    logger.error({ err, operation: 'add game_date column' }, 'Prediction query failed');
    throw new DatabaseError(`Failed to add game_date column: ${error.message}`, 'add game_date column', error);
  }
}

/**
 * Locks and returns the next batch of rows eligible for backfill
 *
 * Rows are ordered by id; pass the last id of the previous batch to continue after it.
 * Rows locked by another session are skipped.
 */
export async function selectBackfillBatch(
  db: Queryable,
  limit: number,
  afterId?: PredictionId
): Promise<BackfillCandidateRow[]> {
  const result = afterId === undefined
    ? await run(db, 'select backfill batch', PREDICTION_SQL.selectFirstBatch, [limit])
    : await run(db, 'select backfill batch', PREDICTION_SQL.selectNextBatch, [limit, afterId]);

  const rows: BackfillCandidateRow[] = [];
  for (const row of result.rows) {
    if (isRecord(row) && isPredictionId(row.id)) {
      rows.push({ id: row.id, raw_game_date: row.raw_game_date });
    }
  }
  return rows;
}

/**
 * Writes game_date for one row, only if it is still null
 *
 * @returns true if the row was updated
 */
export async function setGameDate(db: Queryable, id: PredictionId, gameDate: string): Promise<boolean> {
  const result = await run(db, 'set game_date', PREDICTION_SQL.setGameDate, [id, gameDate]);
  return (result.rowCount ?? 0) > 0;
}

/**
 * Counts rows by game_date state
 *
 * @param columnExists - whether game_date exists yet; without it every row with a payload date is pending
 */
export async function countGameDates(db: Queryable, columnExists: boolean): Promise<GameDateCounts> {
  const text = columnExists ? PREDICTION_SQL.countStatus : PREDICTION_SQL.countPayloadDates;
  const result = await run(db, 'count game_date status', text);
  const row = result.rows[0];

  if (!isRecord(row)) {
    return { total: 0, populated: 0, pending: 0 };
  }
  return {
    total: Number(row.total ?? 0),
    populated: Number(row.populated ?? 0),
    pending: Number(row.pending ?? 0)
  };
}

/**
 * Database Entity Types
 * 
 * TypeScript interfaces matching database schema, and the narrow
 * connection contract the repositories are written against.
 */

/** Primary key of a prediction row (integer keys may arrive as number or, for bigint, as string) */
export type PredictionId = string | number;

/** A row selected for backfill: its key and the raw JSON value under payload.game_date */
export interface BackfillCandidateRow {
  id: PredictionId;
  raw_game_date: unknown;
}

export interface QueryResultLike {
  rows: unknown[];
  rowCount: number | null;
}

/**
 * Anything that can run a parameterized statement (a pool or a checked-out client)
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
}

export interface TransactionClient extends Queryable {
  release(err?: Error | boolean): void;
}

/**
 * Connection source used by the runner; `pg.Pool` satisfies it
 */
export interface Database extends Queryable {
  connect(): Promise<TransactionClient>;
}

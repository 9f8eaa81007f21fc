/**
 * In-process stand-in for the predictions table
 *
 * Implements the same Database contract as pg.Pool and answers the statements
 * the runner issues, over rows held in memory. BEGIN/COMMIT/ROLLBACK snapshot
 * and restore the table so rollback behaviour can be asserted.
 */

import { PREDICTION_SQL } from '../../src/db/repositories/predictions.js';
import type { Database, QueryResultLike, TransactionClient } from '../../src/db/types.js';

export interface FakeRow {
  id: number;
  payload: unknown;
  game_date?: string | null;
}

interface TableState {
  columns: Set<string>;
  rows: FakeRow[];
}

export class PgError extends Error {
  constructor(message: string, public code: string) {
    super(message);
  }
}

function clone(state: TableState): TableState {
  return {
    columns: new Set(state.columns),
    rows: state.rows.map(row => ({ ...row }))
  };
}

function result(rows: unknown[], rowCount: number | null = rows.length): QueryResultLike {
  return { rows, rowCount };
}

function payloadGameDate(payload: unknown): unknown {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) return undefined;
  return Object.entries(payload).find(([key]) => key === 'game_date')?.[1];
}

export class FakeDatabase implements Database {
  private state: TableState | null;
  private snapshot: TableState | null = null;
  private failures: Array<{ text: string; error: Error }> = [];

  /** Every statement received, in order */
  readonly statements: string[] = [];
  connectFailures = 0;
  connects = 0;
  releases = 0;
  /** Simulates another session adding game_date between introspection and ALTER */
  addColumnRace = false;

  constructor(rows: FakeRow[] | null, options: { withGameDate?: boolean; columns?: string[] } = {}) {
    if (rows === null) {
      this.state = null;
      return;
    }
    const columns = new Set(options.columns ?? ['id', 'payload']);
    if (options.withGameDate) columns.add('game_date');
    this.state = {
      columns,
      rows: rows.map(row => ({ ...row, game_date: row.game_date ?? null }))
    };
  }

  /** Makes the next statement with this exact text throw */
  failOn(text: string, error: Error = new PgError('connection terminated unexpectedly', '08006')): void {
    this.failures.push({ text, error });
  }

  hasColumn(name: string): boolean {
    return this.state?.columns.has(name) ?? false;
  }

  row(id: number): FakeRow | undefined {
    return this.state?.rows.find(row => row.id === id);
  }

  gameDate(id: number): string | null | undefined {
    return this.row(id)?.game_date;
  }

  count(text: string): number {
    return this.statements.filter(statement => statement === text).length;
  }

  async connect(): Promise<TransactionClient> {
    if (this.connectFailures > 0) {
      this.connectFailures--;
      throw new PgError('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED');
    }
    this.connects++;
    return {
      query: (text: string, values?: unknown[]) => this.query(text, values),
      release: () => {
        this.releases++;
      }
    };
  }

  async query(text: string, values: unknown[] = []): Promise<QueryResultLike> {
    this.statements.push(text);

    const failure = this.failures.findIndex(f => f.text === text);
    if (failure !== -1) {
      const [{ error }] = this.failures.splice(failure, 1);
      throw error;
    }

    switch (text) {
      case 'SELECT 1':
        return result([{ '?column?': 1 }]);
      case 'BEGIN':
        this.snapshot = this.state ? clone(this.state) : null;
        return result([], null);
      case 'COMMIT':
        this.snapshot = null;
        return result([], null);
      case 'ROLLBACK':
        this.state = this.snapshot;
        this.snapshot = null;
        return result([], null);
      case PREDICTION_SQL.listColumns:
        return result(this.state ? [...this.state.columns].map(column_name => ({ column_name })) : []);
      case PREDICTION_SQL.addGameDateColumn:
        return this.addColumn();
      case PREDICTION_SQL.selectFirstBatch:
        return this.selectBatch(Number(values[0]));
      case PREDICTION_SQL.selectNextBatch:
        return this.selectBatch(Number(values[0]), Number(values[1]));
      case PREDICTION_SQL.setGameDate:
        return this.setGameDate(values[0], values[1]);
      case PREDICTION_SQL.countStatus:
        return this.countStatus(true);
      case PREDICTION_SQL.countPayloadDates:
        return this.countStatus(false);
      default:
        throw new Error(`FakeDatabase does not understand: ${text}`);
    }
  }

  private table(): TableState {
    if (!this.state) throw new PgError('relation "predictions" does not exist', '42P01');
    return this.state;
  }

  private tableWithGameDate(): TableState {
    const table = this.table();
    if (!table.columns.has('game_date')) throw new PgError('column "game_date" does not exist', '42703');
    return table;
  }

  private addColumn(): QueryResultLike {
    const table = this.table();
    if (this.addColumnRace) {
      table.columns.add('game_date');
      throw new PgError('column "game_date" of relation "predictions" already exists', '42701');
    }
    table.columns.add('game_date');
    return result([], null);
  }

  private eligible(row: FakeRow): boolean {
    const raw = payloadGameDate(row.payload);
    return row.game_date === null && raw !== undefined && raw !== null;
  }

  private selectBatch(limit: number, afterId?: number): QueryResultLike {
    const rows = this.tableWithGameDate().rows
      .filter(row => this.eligible(row) && (afterId === undefined || row.id > afterId))
      .sort((a, b) => a.id - b.id)
      .slice(0, limit)
      .map(row => ({ id: row.id, raw_game_date: payloadGameDate(row.payload) }));
    return result(rows);
  }

  private setGameDate(id: unknown, gameDate: unknown): QueryResultLike {
    const row = this.tableWithGameDate().rows.find(r => r.id === id && r.game_date === null);
    if (!row || typeof gameDate !== 'string') return result([], 0);
    row.game_date = gameDate;
    return result([], 1);
  }

  private countStatus(withGameDate: boolean): QueryResultLike {
    const table = withGameDate ? this.tableWithGameDate() : this.table();
    const rows = table.rows;
    return result([{
      total: rows.length,
      populated: withGameDate ? rows.filter(row => row.game_date !== null).length : 0,
      pending: withGameDate
        ? rows.filter(row => this.eligible(row)).length
        : rows.filter(row => {
          const raw = payloadGameDate(row.payload);
          return raw !== undefined && raw !== null;
        }).length
    }]);
  }
}

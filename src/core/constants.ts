/**
 * Application Constants
 * 
 * Centralized location for table identity and retry settings.
 * Table and column names are fixed; they are not read from the environment.
 */

/**
 * Schema identifiers for the predictions store
 */
export const PREDICTIONS = {
  /** Table holding one row per published prediction */
  TABLE: 'predictions',

  /** Document column written by the prediction engine */
  PAYLOAD_COLUMN: 'payload',

  /** Date column derived from the payload */
  GAME_DATE_COLUMN: 'game_date',

  /** Key inside the payload document that carries the game date */
  PAYLOAD_GAME_DATE_KEY: 'game_date',
} as const;

/**
 * PostgreSQL error codes the runner reacts to
 */
export const PG_ERROR_CODES = {
  /** Raised by ADD COLUMN when another session added it first */
  DUPLICATE_COLUMN: '42701',
} as const;

/**
 * Service health check configuration
 */
export const HEALTH_CHECK = {
  /** Maximum retries for the database health check */
  MAX_RETRIES: 30,
  
  /** Delay between retries (2 seconds) */
  RETRY_DELAY_MS: 2000,
} as const;

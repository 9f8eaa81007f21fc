/**
 * Validation Utilities
 * 
 * Functions for validating external inputs to prevent invalid data
 * from propagating through the system.
 */

/**
 * Validates a date string in ISO format (YYYY-MM-DD)
 * 
 * @param dateISO - Date string to validate
 * @returns True if valid, false otherwise
 */
export function isValidDateISO(dateISO: string): boolean {
  const regex = /^\d{4}-\d{2}-\d{2}$/;
  if (!regex.test(dateISO)) {
    return false;
  }
  
  const [year, month, day] = dateISO.split('-').map(Number);
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return false;
  }

  // Proleptic Gregorian calendar, so years 1-99 are taken literally
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  const daysInMonth = [31, leap ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
  return day <= daysInMonth[month - 1];
}

/**
 * Why a payload game_date could not be turned into a calendar date
 */
export type GameDateRejection = 'missing' | 'wrong_type' | 'invalid_format' | 'invalid_date';

export type GameDateParseResult =
  | { ok: true; value: string }
  | { ok: false; reason: GameDateRejection };

// Date, optionally followed by an ISO-8601 time of day and zone designator
const PAYLOAD_DATE = /^(\d{4}-\d{2}-\d{2})(?:[T ](?:[01]\d|2[0-3]):[0-5]\d(?::[0-5]\d(?:\.\d+)?)?(?:Z|[+-](?:[01]\d|2[0-3])(?::?[0-5]\d)?)?)?$/;

/**
 * Extracts the calendar date from a raw payload game_date value
 * 
 * Accepts "YYYY-MM-DD" or a full ISO timestamp whose date part is used as-is.
 * Anything else is rejected with a reason rather than thrown.
 * 
 * @example
 * parsePayloadGameDate('2025-01-15T00:00:00.000Z') // { ok: true, value: '2025-01-15' }
 * parsePayloadGameDate('not-a-date')               // { ok: false, reason: 'invalid_format' }
 */
export function parsePayloadGameDate(raw: unknown): GameDateParseResult {
  if (raw === null || raw === undefined) {
    return { ok: false, reason: 'missing' };
  }
  if (typeof raw !== 'string') {
    return { ok: false, reason: 'wrong_type' };
  }

  const match = PAYLOAD_DATE.exec(raw.trim());
  if (!match) {
    return { ok: false, reason: 'invalid_format' };
  }

  const dateISO = match[1];
  if (!isValidDateISO(dateISO)) {
    return { ok: false, reason: 'invalid_date' };
  }
  return { ok: true, value: dateISO };
}

/**
 * Configuration Module
 * 
 * Centralizes all application configuration from environment variables.
 * Loads .env file automatically via dotenv/config import.
 */

import 'dotenv/config';
import { ValidationError } from '../errors/index.js';

/**
 * Reads a positive integer from the environment
 * 
 * @param name - Environment variable name
 * @param fallback - Value used when the variable is unset or empty
 * @throws ValidationError if the variable is set but is not a positive integer
 */
export function positiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got "${raw}"`, name);
  }
  return value;
}

/**
 * Application configuration object
 * 
 * All configuration values are read from environment variables with sensible defaults.
 */
export const cfg = {
  // Database configuration
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: positiveInt('DB_PORT', 5432),
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    database: process.env.DB_NAME || 'predictions',
    ssl: process.env.DB_SSL === 'true' ? { rejectUnauthorized: false } : false,
    max: positiveInt('DB_POOL_SIZE', 4), // The runner uses one connection at a time
    idleTimeoutMillis: positiveInt('DB_IDLE_TIMEOUT_MS', 30000),
    connectionTimeoutMillis: positiveInt('DB_CONNECTION_TIMEOUT_MS', 5000)
  },
  // Backfill configuration
  migration: {
    batchSize: positiveInt('MIGRATION_BATCH_SIZE', 500) // Rows locked and updated per transaction
  },
  // Logging configuration
  logLevel: process.env.LOG_LEVEL || 'info' // Log level (trace, debug, info, warn, error, fatal, silent)
};

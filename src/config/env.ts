// Environment Configuration
// Purpose: Centralized environment variable management with validation

import dotenv from 'dotenv';
import cron from 'node-cron';

// Load .env file in development
dotenv.config();

export type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: LogLevelSetting[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(value: string | undefined): LogLevelSetting {
  const match = LOG_LEVELS.find(level => level === value);
  return match ?? 'info';
}

// Environment configuration with defaults
export const config = {
  // Server settings
  PORT: parseInt(process.env.PORT || '5000', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',
  LOG_LEVEL: parseLogLevel(process.env.LOG_LEVEL),

  // SQLite database file (':memory:' for an in-process database)
  DATABASE_PATH: process.env.DATABASE_PATH || './data/timeclock.sqlite',
  DB_SYNCHRONIZE: process.env.DB_SYNCHRONIZE !== 'false',

  // JWT settings (required - must be set via environment variable)
  JWT_SECRET: process.env.JWT_SECRET || '',
  JWT_EXPIRES_IN: process.env.JWT_EXPIRES_IN || '7d',

  // Business rules
  TIMEZONE: process.env.TIMEZONE || 'UTC', // default zone for day/month windows
  WORKDAY_HOURS: parseInt(process.env.WORKDAY_HOURS || '8', 10), // expected hours per weekday

  // Sweep that closes sessions left open, midnight by default
  DISQUALIFY_CRON: process.env.DISQUALIFY_CRON || '0 0 * * *',
};

/**
 * Check that a string names a time zone the runtime knows
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate required environment variables
 * Call this at startup to fail fast if config is missing
 */
export function validateEnv(): void {
  const required = ['JWT_SECRET'];
  const missing = required.filter(key => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}. Please set them before starting the server.`);
  }

  if (config.JWT_SECRET.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters');
  }

  if (!isValidTimeZone(config.TIMEZONE)) {
    throw new Error(`TIMEZONE "${config.TIMEZONE}" is not a known IANA time zone`);
  }

  if (!cron.validate(config.DISQUALIFY_CRON)) {
    throw new Error(`DISQUALIFY_CRON "${config.DISQUALIFY_CRON}" is not a valid cron expression`);
  }

  if (!Number.isInteger(config.WORKDAY_HOURS) || config.WORKDAY_HOURS < 0 || config.WORKDAY_HOURS > 24) {
    throw new Error('WORKDAY_HOURS must be an integer between 0 and 24');
  }
}

export default config;

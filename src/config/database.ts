// Database Configuration
// Purpose: TypeORM data source over SQLite for the attendance tables

import 'reflect-metadata';
import fs from 'fs';
import path from 'path';
import { DataSource, Logger as TypeOrmLogger } from 'typeorm';
import { Mutex } from 'async-mutex';
import config from './env';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { User } from '../entities/User';
import { UserState } from '../entities/UserState';
import { Entry } from '../entities/Entry';

const SLOW_QUERY_MS = 100;

/**
 * Routes TypeORM's own logging into the structured logger
 */
class QueryLogger implements TypeOrmLogger {
  logQuery(query: string, parameters?: unknown[]): void {
    logger.debug('Query', { query, parameters });
  }

  logQueryError(error: string | Error, query: string, parameters?: unknown[]): void {
    logger.error('Query failed', {
      error: error instanceof Error ? error.message : error,
      query,
      parameters,
    });
  }

  logQuerySlow(time: number, query: string, parameters?: unknown[]): void {
    logger.warn('Slow query detected', { query, parameters, duration: `${time}ms` });
  }

  logSchemaBuild(message: string): void {
    logger.debug(message);
  }

  logMigration(message: string): void {
    logger.info(message);
  }

  log(level: 'log' | 'info' | 'warn', message: unknown): void {
    if (level === 'warn') {
      logger.warn(String(message));
    } else {
      logger.debug(String(message));
    }
  }
}

export const AppDataSource = new DataSource({
  type: 'better-sqlite3',
  database: config.DATABASE_PATH,
  entities: [User, UserState, Entry],
  synchronize: config.DB_SYNCHRONIZE,
  logging: ['query', 'error', 'warn', 'schema'],
  logger: new QueryLogger(),
  maxQueryExecutionTime: SLOW_QUERY_MS,
});

// The better-sqlite3 driver hands every caller the same query runner, so one
// transaction at a time can be open on it. Every write queues here.
const writeMutex = new Mutex();

/**
 * Run `work` once no other write is in flight. Not reentrant.
 */
export function withWriteLock<T>(work: () => Promise<T>): Promise<T> {
  return writeMutex.runExclusive(work);
}

/**
 * Open the data source once
 */
export async function initializeDatabase(): Promise<DataSource> {
  if (!AppDataSource.isInitialized) {
    // better-sqlite3 creates the file but not its directory
    if (config.DATABASE_PATH !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(config.DATABASE_PATH)), { recursive: true });
    }
    await AppDataSource.initialize();
    logger.info('Database initialized', { database: config.DATABASE_PATH });
  }
  return AppDataSource;
}

/**
 * Check database connection health
 */
export async function checkConnection(): Promise<boolean> {
  try {
    await AppDataSource.query('SELECT 1');
    return true;
  } catch (error) {
    logger.error('Database connection check failed', { error: errorMessage(error) });
    return false;
  }
}

/**
 * Graceful shutdown
 */
export async function closeDatabase(): Promise<void> {
  if (AppDataSource.isInitialized) {
    await AppDataSource.destroy();
    logger.info('Database connection closed');
  }
}

export default { AppDataSource, withWriteLock, initializeDatabase, checkConnection, closeDatabase };

import { Kysely, PostgresDialect } from 'kysely';
import { Pool } from 'pg';
import { config } from '../config/env.js';
import logger from '../utils/logger.js';
import type { Database } from './types.js';

/**
 * Create and configure the database connection pool
 */
const createPool = () => {
  return new Pool({
    connectionString: config.DATABASE_URL,
    max: config.DATABASE_POOL_SIZE,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });
};

/**
 * Initialize Kysely database instance with PostgreSQL dialect
 */
const createDatabase = (): Kysely<Database> => {
  return new Kysely<Database>({
    dialect: new PostgresDialect({
      pool: createPool(),
    }),
    log(event) {
      if (config.LOG_LEVEL === 'verbose' && event.level === 'query') {
        logger.verbose('Query executed', {
          sql: event.query.sql,
          parameters: event.query.parameters,
          durationMs: event.queryDurationMillis,
        });
      }
    },
  });
};

/**
 * Global database instance
 * A single connection pool is shared across the application
 */
export const db = createDatabase();

export type { Database } from './types.js';
export * from './types.js';

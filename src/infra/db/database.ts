/**
 * Database Module
 * Builds the knex instance repositories run on.
 */
import knex, { type Knex } from 'knex';
import config from '../../config/env.js';
import logger from '../logger/logger.js';

export interface DatabaseOptions {
  client?: string;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  pool?: { min: number; max: number };
}

/**
 * knex configuration from DB_* settings, with explicit options taking precedence
 */
export function buildKnexConfig(options: DatabaseOptions = {}): Knex.Config {
  return {
    client: options.client ?? config.DB_CLIENT,
    connection: {
      host: options.host ?? config.DB_HOST,
      port: options.port ?? config.DB_PORT,
      user: options.user ?? config.DB_USERNAME,
      password: options.password ?? config.DB_PASSWORD,
      database: options.database ?? config.DB_NAME,
    },
    pool: options.pool ?? {
      min: config.DB_POOL_MIN,
      max: config.DB_POOL_MAX,
    },
  };
}

/**
 * Create a knex instance. Connections are opened lazily on first query.
 */
export function createDatabase(options: DatabaseOptions = {}): Knex {
  const knexConfig = buildKnexConfig(options);
  const db = knex(knexConfig);

  logger.info(
    { client: knexConfig.client, host: options.host ?? config.DB_HOST, database: options.database ?? config.DB_NAME },
    'Database configured'
  );

  return db;
}

/**
 * Close database connection
 */
export async function closeDatabase(db: Knex): Promise<void> {
  await db.destroy();
  logger.info('Database connection closed');
}

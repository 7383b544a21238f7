import knex, { Knex } from 'knex';
import { logger } from '../utils/logger';
import type { DatabaseConfig } from './index';

export function createDatabase(config: DatabaseConfig): Knex {
  logger.info('DB Connection attempt:', {
    host: config.connectionString ? '[DATABASE_URL]' : config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password ? '[HIDDEN]' : 'NO PASSWORD SET'
  });

  return knex({
    client: 'pg',
    connection: config.connectionString ?? {
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
    },
    pool: {
      min: 2,
      max: 10,
      createTimeoutMillis: 3000,
      acquireTimeoutMillis: 30000,
      idleTimeoutMillis: 30000,
      reapIntervalMillis: 1000,
      createRetryIntervalMillis: 100,
    },
  });
}

export async function testConnection(db: Knex): Promise<boolean> {
  try {
    await db.raw('SELECT 1');
    logger.info('Database connection successful');
    return true;
  } catch (error) {
    logger.error('Database connection failed:', error);
    return false;
  }
}

export async function closeConnection(db: Knex): Promise<void> {
  await db.destroy();
  logger.info('Database connection closed');
}

import { fileURLToPath } from 'node:url';
import postgres from 'postgres';
import type { AppConfig } from '../config';
import { logger } from './logger';

/**
 * PostgreSQL connection pool.
 *
 * Used by:
 * - Tenant lookup (API key authentication)
 * - Document metadata
 * - Query and audit logs
 */

export type Sql = postgres.Sql;

export function createSql(config: AppConfig['database']): Sql {
  return postgres({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: 10, // Maximum pool size
    idle_timeout: 20,
    connect_timeout: 10,
  });
}

const SCHEMA_PATH = fileURLToPath(new URL('../../sql/schema.sql', import.meta.url));

/**
 * Apply the schema. Every statement is idempotent.
 */
export async function initDatabase(sql: Sql): Promise<void> {
  logger.info({ schema: SCHEMA_PATH }, 'Applying database schema');
  await sql.file(SCHEMA_PATH).simple();
  logger.info('Database schema applied');
}

/**
 * Health check: verify database connectivity.
 */
export async function checkDatabaseHealth(sql: Sql): Promise<boolean> {
  try {
    await sql`SELECT 1`;
    return true;
  } catch (error) {
    logger.warn({ error }, 'Database health check failed');
    return false;
  }
}

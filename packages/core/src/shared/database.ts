import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';
import type { LogEvent } from 'kysely';
import type { Logger } from 'pino';
import type { EavDatabase } from '../schema/index.js';

// int8 (OID 20) arrives as a string by default; millisecond timestamps fit in a double
pg.types.setTypeParser(20, (val: string) => Number(val));

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max?: number;
}

export function createPool(config: DatabaseConfig): pg.Pool {
  return new pg.Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.max ?? 10,
  });
}

/** Route Kysely's query events to the service logger. */
export function createQueryLog(logger: Logger): (event: LogEvent) => void {
  return (event) => {
    if (event.level === 'error') {
      logger.error(
        { err: event.error, sql: event.query.sql, duration_ms: event.queryDurationMillis },
        'query failed',
      );
      return;
    }
    logger.debug(
      {
        sql: event.query.sql,
        parameters: event.query.parameters,
        duration_ms: event.queryDurationMillis,
      },
      'query executed',
    );
  };
}

export function createEavDatabase(pool: pg.Pool, logger: Logger): Kysely<EavDatabase> {
  return new Kysely<EavDatabase>({
    dialect: new PostgresDialect({ pool }),
    log: createQueryLog(logger),
  });
}

const UNIQUE_VIOLATION_CODES = new Set([
  '23505', // postgres unique_violation
  'SQLITE_CONSTRAINT_PRIMARYKEY',
  'SQLITE_CONSTRAINT_UNIQUE',
]);

export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    UNIQUE_VIOLATION_CODES.has(error.code)
  );
}

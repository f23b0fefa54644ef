import type pg from 'pg';
import type { Kysely } from 'kysely';
import { EavStoreService } from './ent-store/index.js';
import { createEavSchema } from './schema/index.js';
import type { EavDatabase, EavSchema } from './schema/index.js';
import { createEavDatabase, createPool } from './shared/database.js';
import { createLogger } from './shared/logger.js';
import type { Logger } from './shared/logger.js';
import type { StoreConfig } from './shared/config.js';

export interface EavStoreHandle {
  store: EavStoreService;
  schema: EavSchema;
  db: Kysely<EavDatabase>;
  pool: pg.Pool;
  logger: Logger;
  close(): Promise<void>;
}

/**
 * Wire a PostgreSQL-backed store from configuration. Nothing connects until
 * the first statement runs.
 */
export function openEavStore(config: StoreConfig, logger?: Logger): EavStoreHandle {
  const log = logger ?? createLogger({ level: config.logLevel });
  const pool = createPool(config.database);
  const db = createEavDatabase(pool, log);
  const schema = createEavSchema(db);
  const store = new EavStoreService(schema, { logger: log });

  return {
    store,
    schema,
    db,
    pool,
    logger: log,
    // ends the pool once Kysely has used it; an unused pool holds no connections
    close: () => db.destroy(),
  };
}

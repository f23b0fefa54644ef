import type { DatabaseConfig } from './database.js';

export interface StoreConfig {
  database: DatabaseConfig;
  logLevel: string;
}

export function loadStoreConfig(env: NodeJS.ProcessEnv = process.env): StoreConfig {
  return {
    database: {
      host: env.DB_HOST ?? 'localhost',
      port: Number(env.DB_PORT ?? 5432),
      database: env.DB_NAME ?? 'eavstore',
      user: env.DB_USER ?? 'eavstore',
      password: env.DB_PASSWORD ?? 'eavstore',
      max: env.DB_POOL_MAX ? Number(env.DB_POOL_MAX) : undefined,
    },
    logLevel: env.LOG_LEVEL ?? 'info',
  };
}

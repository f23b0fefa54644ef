import { randomUUID } from 'node:crypto';
import type { Kysely } from 'kysely';
import { EAV_TABLES } from './types.js';
import type { EavDatabase, EavSchema } from './types.js';

export function generateKey(): string {
  return randomUUID();
}

export function currentTimestamp(): number {
  return Date.now();
}

async function createAll(db: Kysely<EavDatabase>): Promise<void> {
  await db.schema
    .createTable(EAV_TABLES.ents)
    .ifNotExists()
    .addColumn('key', 'varchar(255)', (col) => col.primaryKey())
    .addColumn('created', 'bigint', (col) => col.notNull())
    .addColumn('modified', 'bigint', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable(EAV_TABLES.attrs)
    .ifNotExists()
    .addColumn('key', 'varchar(255)', (col) => col.primaryKey())
    .addColumn('ent_key', 'varchar(255)', (col) =>
      col.notNull().references(`${EAV_TABLES.ents}.key`),
    )
    .addColumn('attr', 'varchar(1024)', (col) => col.notNull())
    .addColumn('value', 'text')
    .addColumn('type', 'varchar(16)')
    .addColumn('modified', 'bigint', (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex('attrs_ent_key_idx')
    .ifNotExists()
    .on(EAV_TABLES.attrs)
    .column('ent_key')
    .execute();

  await db.schema
    .createIndex('attrs_attr_idx')
    .ifNotExists()
    .on(EAV_TABLES.attrs)
    .column('attr')
    .execute();
}

async function dropAll(db: Kysely<EavDatabase>): Promise<void> {
  // attrs references ents
  await db.schema.dropTable(EAV_TABLES.attrs).ifExists().execute();
  await db.schema.dropTable(EAV_TABLES.ents).ifExists().execute();
}

/**
 * Bundle the table definitions with a create/drop lifecycle bound to one
 * database. Built once per store and handed to the store service.
 */
export function createEavSchema(db: Kysely<EavDatabase>): EavSchema {
  return {
    db,
    tables: EAV_TABLES,
    createAll: () => createAll(db),
    dropAll: () => dropAll(db),
  };
}

import type { Kysely, Transaction } from 'kysely';

export interface EntsTable {
  key: string;
  created: number;
  modified: number;
}

export interface AttrsTable {
  key: string;
  ent_key: string;
  attr: string;
  value: string | null;
  type: string | null;
  modified: number;
}

export interface EavDatabase {
  ents: EntsTable;
  attrs: AttrsTable;
}

/** Anything statements can run through: the root instance or an open transaction. */
export type EavExecutor = Kysely<EavDatabase> | Transaction<EavDatabase>;

export const EAV_TABLES = {
  ents: 'ents',
  attrs: 'attrs',
} as const;

export interface EavSchema {
  readonly db: Kysely<EavDatabase>;
  readonly tables: typeof EAV_TABLES;
  createAll(): Promise<void>;
  dropAll(): Promise<void>;
}

import { sql } from 'kysely';
import type { Kysely, QueryResult } from 'kysely';
import { serializeValue } from '../codec/index.js';
import type { AttrMap } from '../codec/index.js';
import { traceStoreOperation } from '../observability/index.js';
import { bindNamedParams, getEntsQueryStatement, rowsToEnts } from '../query/index.js';
import type { Ent, EntQuery } from '../query/index.js';
import { currentTimestamp, generateKey } from '../schema/index.js';
import type { AttrsTable, EavDatabase, EavExecutor, EavSchema } from '../schema/index.js';
import { isUniqueViolation } from '../shared/database.js';
import {
  EntityNotFoundError,
  StaleEntityError,
  UniquenessViolationError,
} from '../shared/errors.js';
import { silentLogger } from '../shared/logger.js';
import type { Logger } from '../shared/logger.js';
import type {
  CreateEntInput,
  EavStoreOptions,
  SqlMode,
  UpdateEntInput,
  UpsertEntInput,
} from './types.js';

export class EavStoreService {
  private readonly db: Kysely<EavDatabase>;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly schema: EavSchema,
    options: EavStoreOptions = {},
  ) {
    this.db = schema.db;
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? currentTimestamp;
  }

  async createTables(): Promise<void> {
    await this.schema.createAll();
  }

  async dropTables(): Promise<void> {
    await this.schema.dropAll();
  }

  async createEnt(input: CreateEntInput = {}): Promise<Ent> {
    const key = input.key ?? generateKey();
    const timestamp = this.now();
    const attrRows = this.buildAttrRows(key, input.attrs ?? {}, timestamp);

    return traceStoreOperation('create_ent', { 'eav.ent_key': key }, () =>
      this.db.transaction().execute(async (trx) => {
        try {
          await trx
            .insertInto('ents')
            .values({ key, created: timestamp, modified: timestamp })
            .execute();
        } catch (error) {
          if (isUniqueViolation(error)) {
            throw new UniquenessViolationError('ents', key, error);
          }
          throw error;
        }

        if (attrRows.length > 0) {
          await trx.insertInto('attrs').values(attrRows).execute();
        }

        const ent = await this.getEnt(key, trx);
        if (!ent) {
          throw new EntityNotFoundError(key);
        }
        this.logger.debug({ ent_key: key, attrs: attrRows.length }, 'entity created');
        return ent;
      }),
    );
  }

  /**
   * Replace the named attributes of an entity in one transaction. Names in
   * `deletions` are removed even when they also appear in `patches`.
   */
  async updateEnt(input: UpdateEntInput): Promise<void> {
    const { key, patches = {}, deletions = [], expected_modified } = input;
    const timestamp = this.now();
    const toDelete = [...new Set([...Object.keys(patches), ...deletions])];
    const toInsert = this.buildAttrRows(
      key,
      Object.fromEntries(Object.entries(patches).filter(([name]) => !deletions.includes(name))),
      timestamp,
    );

    await traceStoreOperation('update_ent', { 'eav.ent_key': key }, () =>
      this.db.transaction().execute(async (trx) => {
        // with a version check, the gated update is the entity's only advance
        if (expected_modified !== undefined) {
          await this.validateAndAdvanceModified(trx, key, expected_modified, timestamp);
        }

        if (toDelete.length > 0) {
          await trx
            .deleteFrom('attrs')
            .where('ent_key', '=', key)
            .where('attr', 'in', toDelete)
            .execute();
        }
        if (toInsert.length > 0) {
          await trx.insertInto('attrs').values(toInsert).execute();
        }

        if (expected_modified === undefined) {
          const result = await trx
            .updateTable('ents')
            .set({ modified: this.advancedModified(timestamp) })
            .where('key', '=', key)
            .executeTakeFirst();
          if (result.numUpdatedRows === 0n) {
            throw new EntityNotFoundError(key);
          }
        }

        this.logger.debug(
          { ent_key: key, deleted: toDelete.length, inserted: toInsert.length },
          'entity updated',
        );
      }),
    );
  }

  /**
   * Create the entity, or apply the patches and deletions as an update when
   * the key is already taken. Returns the entity only when it was created.
   */
  async upsertEnt(input: UpsertEntInput): Promise<Ent | undefined> {
    const { key, patches = {}, deletions = [] } = input;
    const attrs = Object.fromEntries(
      Object.entries(patches).filter(([name]) => !deletions.includes(name)),
    );

    return traceStoreOperation('upsert_ent', { 'eav.ent_key': key }, async (span) => {
      try {
        return await this.createEnt({ key, attrs });
      } catch (error) {
        if (!(error instanceof UniquenessViolationError)) {
          throw error;
        }
        this.logger.debug({ ent_key: key }, 'entity exists, upsert falls back to update');
        span.addEvent('eav.upsert_fallback');
      }

      await this.updateEnt({ key, patches, deletions });
      return undefined;
    });
  }

  async queryEnts(query: EntQuery = {}, executor?: EavExecutor): Promise<Record<string, Ent>> {
    // compiled before any connection is used, so bad filters never reach the store
    const statement = getEntsQueryStatement(query);
    const conn = executor ?? this.db;

    return traceStoreOperation('query_ents', {}, async (span) => {
      const { rows } = await statement.execute(conn);
      const ents = rowsToEnts(rows);
      span.setAttributes({ 'eav.rows': rows.length, 'eav.ents': Object.keys(ents).length });
      return ents;
    });
  }

  async getEnt(key: string, executor?: EavExecutor): Promise<Ent | null> {
    const ents = await this.queryEnts(
      { ent_filters: [{ col: 'key', op: '=', arg: key }] },
      executor,
    );
    return ents[key] ?? null;
  }

  /**
   * Run hand-written SQL with `:name` parameters in its own transaction.
   * Only `write` mode commits; every other mode rolls back.
   *
   * Resolves to the rows, or to undefined when the driver reports affected
   * rows and returns none. Which statements report affected rows depends on
   * the dialect: the PostgreSQL driver does so only for INSERT, UPDATE,
   * DELETE and MERGE (DDL and SET resolve to `[]`, an unmatched
   * `UPDATE ... RETURNING` to undefined); the SQLite driver does so for every
   * statement that yields no result set (DDL resolves to undefined, an
   * unmatched `UPDATE ... RETURNING` to `[]`).
   */
  async executeSql(
    text: string,
    params: Record<string, unknown> = {},
    mode: SqlMode = 'read',
  ): Promise<Record<string, unknown>[] | undefined> {
    const statement = bindNamedParams(text, params);

    return traceStoreOperation('execute_sql', { 'eav.sql_mode': mode }, async () => {
      const trx = await this.db.startTransaction().execute();

      let result: QueryResult<Record<string, unknown>>;
      try {
        result = await statement.execute(trx);
      } catch (error) {
        await trx.rollback().execute();
        throw error;
      }

      if (mode === 'write') {
        await trx.commit().execute();
      } else {
        await trx.rollback().execute();
      }

      if (result.rows.length === 0 && result.numAffectedRows !== undefined) {
        return undefined;
      }
      return result.rows;
    });
  }

  private async validateAndAdvanceModified(
    trx: EavExecutor,
    key: string,
    expected: number,
    timestamp: number,
  ): Promise<void> {
    const result = await trx
      .updateTable('ents')
      .set({ modified: this.advancedModified(timestamp) })
      .where('key', '=', key)
      .where('modified', '=', expected)
      .executeTakeFirst();

    if (result.numUpdatedRows !== 1n) {
      const current = await trx
        .selectFrom('ents')
        .select('modified')
        .where('key', '=', key)
        .executeTakeFirst();
      const actual = current ? Number(current.modified) : null;
      this.logger.warn({ ent_key: key, expected, actual }, 'stale entity update rejected');
      throw new StaleEntityError(key, expected, actual);
    }
  }

  /** `timestamp`, or one past the stored value when the clock has not moved beyond it. */
  private advancedModified(timestamp: number) {
    const modified = sql.ref('modified');
    return sql<number>`case when ${modified} >= ${timestamp} then ${modified} + 1 else ${timestamp} end`;
  }

  private buildAttrRows(entKey: string, attrs: AttrMap, timestamp: number): AttrsTable[] {
    return Object.entries(attrs).map(([attr, value]) => ({
      key: generateKey(),
      ent_key: entKey,
      attr,
      ...serializeValue(value),
      modified: timestamp,
    }));
  }
}

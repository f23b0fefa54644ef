import { sql } from 'kysely';
import type { RawBuilder } from 'kysely';
import { EAV_TABLES } from '../schema/index.js';
import { buildEntsQueryComponents, queryExpressions } from './query-components.js';
import type { QueryComponents } from './query-components.js';
import type { EntAttrRow, EntQuery } from './types.js';

const COLUMNS = [
  sql.ref('outer_attrs.attr').as('attr'),
  sql.ref('outer_attrs.value').as('value'),
  sql.ref('outer_attrs.type').as('type'),
  sql.ref('outer_ents.key').as('ent_key'),
  sql.ref('outer_ents.created').as('ent_created'),
  sql.ref('outer_ents.modified').as('ent_modified'),
];

/**
 * Turn accumulated components into one parameterized statement:
 *
 *   select ... from ents outer_ents
 *   (left|inner) join attrs outer_attrs on outer_attrs.ent_key = outer_ents.key
 *   inner join (select ent_key from attrs where ...) attr_filter_N on ...
 *   where <predicates joined by and>
 */
export function compileEntsQuery(components: QueryComponents): RawBuilder<EntAttrRow> {
  const attrJoin = components.attrJoin === 'left' ? sql`left join` : sql`inner join`;

  const filterJoins =
    components.joins.length > 0
      ? sql` ${sql.join(
          components.joins.map(
            (join) =>
              sql`inner join ${join.source} on ${sql.ref(`${join.alias}.ent_key`)} = ${sql.ref('outer_ents.key')}`,
          ),
          sql` `,
        )}`
      : sql``;

  const where =
    components.wheres.length > 0
      ? sql` where ${queryExpressions.and([...components.wheres])}`
      : sql``;

  return sql<EntAttrRow>`select ${sql.join(COLUMNS)} from ${sql.table(EAV_TABLES.ents)} as ${sql.id('outer_ents')} ${attrJoin} ${sql.table(EAV_TABLES.attrs)} as ${sql.id('outer_attrs')} on ${sql.ref('outer_attrs.ent_key')} = ${sql.ref('outer_ents.key')}${filterJoins}${where} order by ${sql.ref('outer_ents.created')}, ${sql.ref('outer_ents.key')}`;
}

export function getEntsQueryStatement(query: EntQuery = {}): RawBuilder<EntAttrRow> {
  return compileEntsQuery(buildEntsQueryComponents(query));
}

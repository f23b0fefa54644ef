import { expressionBuilder, sql } from 'kysely';
import type { AliasedExpression, Expression, SqlBool } from 'kysely';
import { serializeValue } from '../codec/index.js';
import { UnknownFilterTypeError, ValidationError } from '../shared/errors.js';
import type { AttrsTable, EavDatabase, EntsTable } from '../schema/index.js';
import { getFilterType, isBinaryOp, isEntColumn, parseOp } from './filters.js';
import type { AttrFilter, BinaryOp, EntColumn, EntFilter, EntQuery } from './types.js';

/** The two base relations as they are aliased in the entities query. */
export interface EntsQueryDatabase extends EavDatabase {
  outer_ents: EntsTable;
  outer_attrs: AttrsTable;
}

export type OuterTables = 'outer_ents' | 'outer_attrs';

export interface FilterJoin {
  alias: string;
  source: AliasedExpression<{ ent_key: string }, string>;
}

/**
 * Immutable builder state. Every step returns a new value; nothing is shared
 * between the states of two different queries.
 */
export interface QueryComponents {
  /** left until the first attribute filter, inner afterwards */
  readonly attrJoin: 'left' | 'inner';
  readonly joins: readonly FilterJoin[];
  readonly wheres: readonly Expression<SqlBool>[];
}

type KyselyComparison = '=' | '<' | '>' | '<=' | '>=' | 'like';

const COMPARISONS: Record<BinaryOp, KyselyComparison> = {
  '=': '=',
  '<': '<',
  '>': '>',
  '<=': '<=',
  '>=': '>=',
  LIKE: 'like',
};

const ENT_COLUMN_REFS = {
  key: 'outer_ents.key',
  created: 'outer_ents.created',
  modified: 'outer_ents.modified',
} as const satisfies Record<EntColumn, string>;

export const queryExpressions = expressionBuilder<EntsQueryDatabase, OuterTables>();

function negate(expr: Expression<SqlBool>, negated: boolean): Expression<SqlBool> {
  return negated ? sql<SqlBool>`not (${expr})` : expr;
}

function binaryOp(filter: AttrFilter | EntFilter): { negated: boolean; comparison: KyselyComparison } {
  const { negated, op } = parseOp(filter.op);
  if (!isBinaryOp(op)) throw new UnknownFilterTypeError(filter);
  return { negated, comparison: COMPARISONS[op] };
}

/** Attribute values are compared in their stored text form. */
function storedText(arg: unknown): string {
  return serializeValue(arg).value;
}

export function baseComponents(): QueryComponents {
  return { attrJoin: 'left', joins: [], wheres: [] };
}

export function selectAttrs(components: QueryComponents, attrs: readonly string[]): QueryComponents {
  return {
    ...components,
    wheres: [...components.wheres, queryExpressions('outer_attrs.attr', 'in', [...attrs])],
  };
}

export function applyAttrBinaryFilter(
  components: QueryComponents,
  filter: AttrFilter,
): QueryComponents {
  const { negated, comparison } = binaryOp(filter);
  const alias = `attr_filter_${components.joins.length}`;
  const source = queryExpressions
    .selectFrom('attrs as filter_attrs')
    .select('filter_attrs.ent_key')
    .where('filter_attrs.attr', '=', filter.attr)
    .where((eb) =>
      negate(eb('filter_attrs.value', comparison, storedText(filter.arg)), negated),
    )
    .as(alias);

  return {
    ...components,
    attrJoin: 'inner',
    joins: [...components.joins, { alias, source }],
  };
}

export function applyAttrExistenceFilter(
  components: QueryComponents,
  filter: AttrFilter,
): QueryComponents {
  const { negated } = parseOp(filter.op);
  const exists = queryExpressions.exists(
    queryExpressions
      .selectFrom('attrs as exists_attrs')
      .select('exists_attrs.ent_key')
      .where('exists_attrs.attr', '=', filter.attr)
      .whereRef('exists_attrs.ent_key', '=', 'outer_ents.key'),
  );

  return {
    ...components,
    attrJoin: 'inner',
    wheres: [...components.wheres, negate(exists, negated)],
  };
}

export function applyAttrFilter(components: QueryComponents, filter: AttrFilter): QueryComponents {
  switch (getFilterType(filter)) {
    case 'binary':
      return applyAttrBinaryFilter(components, filter);
    case 'existence':
      return applyAttrExistenceFilter(components, filter);
  }
}

function entColumnComparison(filter: EntFilter): Expression<SqlBool> {
  const { comparison } = binaryOp(filter);
  const { col, arg } = filter;

  if (!isEntColumn(col)) {
    throw new ValidationError(`Unknown entity column: ${col}`, 'col', { filter });
  }
  if (col === 'key') {
    if (typeof arg !== 'string') {
      throw new ValidationError('Filter on key needs a string arg', 'arg', { filter });
    }
    return queryExpressions(ENT_COLUMN_REFS.key, comparison, arg);
  }
  if (typeof arg !== 'number') {
    throw new ValidationError(`Filter on ${col} needs a number arg`, 'arg', { filter });
  }
  return queryExpressions(ENT_COLUMN_REFS[col], comparison, arg);
}

export function applyEntFilter(components: QueryComponents, filter: EntFilter): QueryComponents {
  if (getFilterType(filter) === 'existence') {
    throw new ValidationError('Existence filters only apply to attributes', 'op', { filter });
  }
  const { negated } = parseOp(filter.op);

  return {
    ...components,
    wheres: [...components.wheres, negate(entColumnComparison(filter), negated)],
  };
}

export function buildEntsQueryComponents(query: EntQuery = {}): QueryComponents {
  let components = baseComponents();

  if (query.attrs_to_select && query.attrs_to_select.length > 0) {
    components = selectAttrs(components, query.attrs_to_select);
  }
  for (const filter of query.attr_filters ?? []) {
    components = applyAttrFilter(components, filter);
  }
  for (const filter of query.ent_filters ?? []) {
    components = applyEntFilter(components, filter);
  }

  return components;
}

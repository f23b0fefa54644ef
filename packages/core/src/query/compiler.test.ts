import { describe, it, expect } from 'vitest';
import {
  DummyDriver,
  Kysely,
  SqliteAdapter,
  SqliteIntrospector,
  SqliteQueryCompiler,
} from 'kysely';
import type { EavDatabase } from '../schema/index.js';
import { UnknownFilterTypeError, ValidationError } from '../shared/errors.js';
import { compileEntsQuery, getEntsQueryStatement } from './compiler.js';
import {
  applyAttrFilter,
  baseComponents,
  buildEntsQueryComponents,
} from './query-components.js';
import type { EntQuery } from './types.js';

const db = new Kysely<EavDatabase>({
  dialect: {
    createAdapter: () => new SqliteAdapter(),
    createDriver: () => new DummyDriver(),
    createIntrospector: (kysely) => new SqliteIntrospector(kysely),
    createQueryCompiler: () => new SqliteQueryCompiler(),
  },
});

const SELECT =
  'select "outer_attrs"."attr" as "attr", "outer_attrs"."value" as "value", ' +
  '"outer_attrs"."type" as "type", "outer_ents"."key" as "ent_key", ' +
  '"outer_ents"."created" as "ent_created", "outer_ents"."modified" as "ent_modified"';
const ORDER = ' order by "outer_ents"."created", "outer_ents"."key"';
const ON_OUTER = ' on "outer_attrs"."ent_key" = "outer_ents"."key"';

function compile(query: EntQuery) {
  return getEntsQueryStatement(query).compile(db);
}

describe('compileEntsQuery', () => {
  it('should outer join attributes when nothing filters them', () => {
    const { sql, parameters } = compile({});

    expect(sql).toBe(
      `${SELECT} from "ents" as "outer_ents" left join "attrs" as "outer_attrs"${ON_OUTER}${ORDER}`,
    );
    expect(parameters).toEqual([]);
  });

  it('should restrict the selected attributes', () => {
    const { sql, parameters } = compile({ attrs_to_select: ['name', 'age'] });

    expect(sql).toContain('left join "attrs" as "outer_attrs"');
    expect(sql).toContain(' where "outer_attrs"."attr" in (?, ?) order by');
    expect(parameters).toEqual(['name', 'age']);
  });

  it('should ignore an empty attribute selection', () => {
    expect(compile({ attrs_to_select: [] }).sql).not.toContain(' where ');
  });

  it('should join an aliased subquery per binary filter', () => {
    const { sql, parameters } = compile({
      attr_filters: [
        { attr: 'age', op: '>=', arg: 30 },
        { attr: 'name', op: 'LIKE', arg: 'a%' },
      ],
    });

    expect(sql).toBe(
      `${SELECT} from "ents" as "outer_ents" inner join "attrs" as "outer_attrs"${ON_OUTER}` +
        ' inner join (select "filter_attrs"."ent_key" from "attrs" as "filter_attrs"' +
        ' where "filter_attrs"."attr" = ? and "filter_attrs"."value" >= ?) as "attr_filter_0"' +
        ' on "attr_filter_0"."ent_key" = "outer_ents"."key"' +
        ' inner join (select "filter_attrs"."ent_key" from "attrs" as "filter_attrs"' +
        ' where "filter_attrs"."attr" = ? and "filter_attrs"."value" like ?) as "attr_filter_1"' +
        ' on "attr_filter_1"."ent_key" = "outer_ents"."key"' +
        ORDER,
    );
    expect(parameters).toEqual(['age', '30', 'name', 'a%']);
  });

  it('should negate a binary comparison inside its subquery', () => {
    const { sql, parameters } = compile({
      attr_filters: [{ attr: 'status', op: '! =', arg: 'done' }],
    });

    expect(sql).toContain(
      'where "filter_attrs"."attr" = ? and not ("filter_attrs"."value" = ?)) as "attr_filter_0"',
    );
    expect(parameters).toEqual(['status', 'done']);
  });

  it('should compare non-string args in their stored form', () => {
    const { parameters } = compile({
      attr_filters: [{ attr: 'meta', op: '=', arg: { a: [1, true] } }],
    });

    expect(parameters).toEqual(['meta', '{"a":[1,true]}']);
  });

  it('should add a correlated existence check', () => {
    const { sql, parameters } = compile({ attr_filters: [{ attr: 'email', op: 'EXISTS' }] });

    expect(sql).toBe(
      `${SELECT} from "ents" as "outer_ents" inner join "attrs" as "outer_attrs"${ON_OUTER}` +
        ' where exists (select "exists_attrs"."ent_key" from "attrs" as "exists_attrs"' +
        ' where "exists_attrs"."attr" = ? and "exists_attrs"."ent_key" = "outer_ents"."key")' +
        ORDER,
    );
    expect(parameters).toEqual(['email']);
  });

  it('should negate an existence check', () => {
    const { sql } = compile({ attr_filters: [{ attr: 'email', op: '! EXISTS' }] });

    expect(sql).toContain(' where not (exists (select "exists_attrs"."ent_key"');
  });

  it('should combine predicates with and', () => {
    const { sql, parameters } = compile({
      attrs_to_select: ['name'],
      attr_filters: [{ attr: 'email', op: 'EXISTS' }],
      ent_filters: [
        { col: 'created', op: '>=', arg: 1000 },
        { col: 'key', op: '! =', arg: 'ent-9' },
      ],
    });

    expect(sql).toContain(
      ' where ("outer_attrs"."attr" in (?) and exists (select "exists_attrs"."ent_key" from "attrs" as "exists_attrs"' +
        ' where "exists_attrs"."attr" = ? and "exists_attrs"."ent_key" = "outer_ents"."key")' +
        ' and "outer_ents"."created" >= ? and not ("outer_ents"."key" = ?))' +
        ORDER,
    );
    expect(parameters).toEqual(['name', 'email', 1000, 'ent-9']);
  });

  it('should keep the outer join for entity filters alone', () => {
    const { sql } = compile({ ent_filters: [{ col: 'modified', op: '<', arg: 5 }] });

    expect(sql).toContain('left join "attrs" as "outer_attrs"');
    expect(sql).toContain(' where "outer_ents"."modified" < ?');
  });

  it('should reject unknown operators before compiling', () => {
    expect(() => compile({ attr_filters: [{ attr: 'a', op: 'IN', arg: [1] }] })).toThrow(
      UnknownFilterTypeError,
    );
    expect(() => compile({ ent_filters: [{ col: 'key', op: '~', arg: 'x' }] })).toThrow(
      UnknownFilterTypeError,
    );
  });

  it('should validate entity filters', () => {
    expect(() => compile({ ent_filters: [{ col: 'key', op: '=', arg: 1 }] })).toThrow(
      ValidationError,
    );
    expect(() => compile({ ent_filters: [{ col: 'created', op: '=', arg: '1' }] })).toThrow(
      'Filter on created needs a number arg',
    );
    expect(() => compile({ ent_filters: [{ col: 'owner', op: '=', arg: 'x' }] })).toThrow(
      'Unknown entity column: owner',
    );
    expect(() => compile({ ent_filters: [{ col: 'key', op: 'EXISTS' }] })).toThrow(
      'Existence filters only apply to attributes',
    );
  });
});

describe('QueryComponents', () => {
  it('should leave earlier states untouched', () => {
    const base = baseComponents();
    const filtered = applyAttrFilter(base, { attr: 'age', op: '=', arg: 1 });

    expect(base).toEqual({ attrJoin: 'left', joins: [], wheres: [] });
    expect(filtered.attrJoin).toBe('inner');
    expect(filtered.joins).toHaveLength(1);
    expect(filtered.joins[0].alias).toBe('attr_filter_0');
  });

  it('should compile identical queries to identical statements', () => {
    const query: EntQuery = { attr_filters: [{ attr: 'a', op: '<', arg: 2 }] };
    const first = compileEntsQuery(buildEntsQueryComponents(query)).compile(db);
    const second = compileEntsQuery(buildEntsQueryComponents(query)).compile(db);

    expect(first.sql).toBe(second.sql);
    expect(first.parameters).toEqual(second.parameters);
  });
});

import { sql } from 'kysely';
import type { RawBuilder } from 'kysely';
import { ValidationError } from '../shared/errors.js';

// `:name`, but not the second colon of a `::type` cast or a time literal like 12:30
const NAMED_PARAM = /(?<![:\w]):([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Bind `:name` placeholders in hand-written SQL as statement parameters.
 * Every placeholder needs an entry in `params`; unused entries are ignored.
 */
export function bindNamedParams(
  text: string,
  params: Record<string, unknown> = {},
): RawBuilder<Record<string, unknown>> {
  const parts: RawBuilder<unknown>[] = [];
  let cursor = 0;

  for (const match of text.matchAll(NAMED_PARAM)) {
    const name = match[1];
    const start = match.index ?? cursor;
    if (!Object.hasOwn(params, name)) {
      throw new ValidationError(`No value given for SQL parameter :${name}`, name);
    }
    parts.push(sql.raw(text.slice(cursor, start)), sql`${params[name]}`);
    cursor = start + match[0].length;
  }
  parts.push(sql.raw(text.slice(cursor)));

  return sql<Record<string, unknown>>`${sql.join(parts, sql``)}`;
}

import { deserializeValue } from '../codec/index.js';
import type { AttrValue } from '../codec/index.js';
import type { Ent, EntAttrRow } from './types.js';

interface EntDraft {
  key: string;
  created: number;
  modified: number;
  attrs: Map<string, AttrValue>;
}

/**
 * Fold the flat attribute stream into entities keyed by entity key. The first
 * row seen for a key fixes its timestamps. A row with a null attr comes from
 * the outer join and only registers the entity.
 */
export function rowsToEnts(rows: readonly EntAttrRow[]): Record<string, Ent> {
  const drafts = new Map<string, EntDraft>();

  for (const row of rows) {
    let draft = drafts.get(row.ent_key);
    if (!draft) {
      draft = {
        key: row.ent_key,
        created: Number(row.ent_created),
        modified: Number(row.ent_modified),
        attrs: new Map(),
      };
      drafts.set(row.ent_key, draft);
    }
    if (row.attr !== null) {
      draft.attrs.set(row.attr, deserializeValue(row.value, row.type));
    }
  }

  return Object.fromEntries(
    [...drafts].map(([key, draft]) => [
      key,
      { ...draft, attrs: Object.fromEntries(draft.attrs) },
    ]),
  );
}

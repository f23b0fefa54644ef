import type { AttrMap } from '../codec/index.js';

export const BINARY_OPS = ['=', '<', '>', '<=', '>=', 'LIKE'] as const;
export type BinaryOp = (typeof BINARY_OPS)[number];

export const EXISTENCE_OP = 'EXISTS';
export const NEGATION_PREFIX = '! ';

export type FilterType = 'binary' | 'existence';

export const ENT_COLUMNS = ['key', 'created', 'modified'] as const;
export type EntColumn = (typeof ENT_COLUMNS)[number];

/**
 * `op` is one of BINARY_OPS or EXISTS, optionally prefixed with "! ".
 * It stays a plain string because queries also arrive as JSON.
 */
export interface AttrFilter {
  attr: string;
  op: string;
  arg?: unknown;
}

export interface EntFilter {
  col: string;
  op: string;
  arg?: unknown;
}

export interface EntQuery {
  attrs_to_select?: string[];
  attr_filters?: AttrFilter[];
  ent_filters?: EntFilter[];
}

/** One row of the flat stream produced by the compiled entities query. */
export interface EntAttrRow {
  attr: string | null;
  value: string | null;
  type: string | null;
  ent_key: string;
  ent_created: number | string;
  ent_modified: number | string;
}

export interface Ent {
  key: string;
  created: number;
  modified: number;
  attrs: AttrMap;
}

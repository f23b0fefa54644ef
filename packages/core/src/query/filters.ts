import { UnknownFilterTypeError } from '../shared/errors.js';
import { BINARY_OPS, ENT_COLUMNS, EXISTENCE_OP, NEGATION_PREFIX } from './types.js';
import type { AttrFilter, BinaryOp, EntColumn, EntFilter, FilterType } from './types.js';

export interface ParsedOp {
  negated: boolean;
  op: string;
}

export function parseOp(op: string): ParsedOp {
  if (op.startsWith(NEGATION_PREFIX)) {
    return { negated: true, op: op.slice(NEGATION_PREFIX.length) };
  }
  return { negated: false, op };
}

export function isBinaryOp(op: string): op is BinaryOp {
  return BINARY_OPS.some((candidate) => candidate === op);
}

export function isEntColumn(col: string): col is EntColumn {
  return ENT_COLUMNS.some((candidate) => candidate === col);
}

export function getFilterType(filter: AttrFilter | EntFilter): FilterType {
  const { op } = parseOp(filter.op);
  if (isBinaryOp(op)) return 'binary';
  if (op === EXISTENCE_OP) return 'existence';
  throw new UnknownFilterTypeError(filter);
}

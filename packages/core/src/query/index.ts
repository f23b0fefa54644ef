export { parseOp, getFilterType, isBinaryOp, isEntColumn } from './filters.js';
export type { ParsedOp } from './filters.js';
export {
  baseComponents,
  selectAttrs,
  applyAttrFilter,
  applyAttrBinaryFilter,
  applyAttrExistenceFilter,
  applyEntFilter,
  buildEntsQueryComponents,
} from './query-components.js';
export type { QueryComponents, FilterJoin, EntsQueryDatabase } from './query-components.js';
export { compileEntsQuery, getEntsQueryStatement } from './compiler.js';
export { rowsToEnts } from './reconstruct.js';
export { bindNamedParams } from './raw-sql.js';
export { BINARY_OPS, EXISTENCE_OP, NEGATION_PREFIX, ENT_COLUMNS } from './types.js';
export type {
  AttrFilter,
  EntFilter,
  EntQuery,
  EntAttrRow,
  Ent,
  BinaryOp,
  EntColumn,
  FilterType,
} from './types.js';

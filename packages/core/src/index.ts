// Shared
export {
  ValidationError,
  UniquenessViolationError,
  StaleEntityError,
  UnknownFilterTypeError,
  SerializationError,
  EntityNotFoundError,
} from './shared/errors.js';
export { createPool, createEavDatabase, createQueryLog, isUniqueViolation } from './shared/database.js';
export type { DatabaseConfig } from './shared/database.js';
export { loadStoreConfig } from './shared/config.js';
export type { StoreConfig } from './shared/config.js';
export { createLogger, silentLogger } from './shared/logger.js';
export type { Logger, LoggerOptions } from './shared/logger.js';

// Schema
export { createEavSchema, generateKey, currentTimestamp, EAV_TABLES } from './schema/index.js';
export type { EavDatabase, EavExecutor, EavSchema, EntsTable, AttrsTable } from './schema/index.js';

// Value codec
export { serializeValue, deserializeValue, kindOf, isAttrValue } from './codec/index.js';
export type { AttrValue, AttrMap, AttrValueKind, SerializedValue } from './codec/index.js';

// Query compiler
export {
  parseOp,
  getFilterType,
  isBinaryOp,
  isEntColumn,
  buildEntsQueryComponents,
  compileEntsQuery,
  getEntsQueryStatement,
  rowsToEnts,
  bindNamedParams,
  BINARY_OPS,
  EXISTENCE_OP,
  NEGATION_PREFIX,
  ENT_COLUMNS,
} from './query/index.js';
export type {
  AttrFilter,
  EntFilter,
  EntQuery,
  EntAttrRow,
  Ent,
  BinaryOp,
  EntColumn,
  FilterType,
  QueryComponents,
} from './query/index.js';

// Entity store
export { EavStoreService } from './ent-store/index.js';
export type {
  CreateEntInput,
  UpdateEntInput,
  UpsertEntInput,
  SqlMode,
  EavStoreOptions,
} from './ent-store/index.js';
export { openEavStore } from './bootstrap.js';
export type { EavStoreHandle } from './bootstrap.js';

// Observability
export { getStoreTracer, finishSpan, traceStoreOperation } from './observability/index.js';
export type { StoreOperation } from './observability/index.js';

export { createEavSchema, generateKey, currentTimestamp } from './schema.js';
export { EAV_TABLES } from './types.js';
export type { EavDatabase, EavExecutor, EavSchema, EntsTable, AttrsTable } from './types.js';

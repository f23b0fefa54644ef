export { EavStoreService } from './ent-store.service.js';
export type {
  CreateEntInput,
  UpdateEntInput,
  UpsertEntInput,
  SqlMode,
  EavStoreOptions,
} from './types.js';

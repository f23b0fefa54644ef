import type { AttrMap } from '../codec/index.js';
import type { Logger } from '../shared/logger.js';

export interface CreateEntInput {
  key?: string;
  attrs?: AttrMap;
}

export interface UpdateEntInput {
  key: string;
  patches?: AttrMap;
  deletions?: string[];
  /** when set, the update only applies if the entity's modified still equals it */
  expected_modified?: number;
}

export interface UpsertEntInput {
  key: string;
  patches?: AttrMap;
  deletions?: string[];
}

export type SqlMode = 'read' | 'write';

export interface EavStoreOptions {
  logger?: Logger;
  /** millisecond clock, defaults to Date.now */
  now?: () => number;
}

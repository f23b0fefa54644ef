import type { Ent, UpdateEntInput, UpsertEntInput } from '@eavstore/core';

export const ACTION_TYPES = ['update_ent', 'upsert_ent'] as const;
export type ActionType = (typeof ACTION_TYPES)[number];

export type Action =
  | { type: 'update_ent'; params: UpdateEntInput }
  | { type: 'upsert_ent'; params: UpsertEntInput };

/** update_ent yields nothing; upsert_ent yields the entity when it created one. */
export type ActionResult = Ent | undefined;

export interface ActionTarget {
  updateEnt(input: UpdateEntInput): Promise<void>;
  upsertEnt(input: UpsertEntInput): Promise<Ent | undefined>;
}

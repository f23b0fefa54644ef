import { isAttrValue, ValidationError } from '@eavstore/core';
import type { AttrMap, UpdateEntInput } from '@eavstore/core';
import { InvalidActionError } from './errors.js';
import { ACTION_TYPES } from './types.js';
import type { Action, ActionType } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isActionType(value: unknown): value is ActionType {
  return ACTION_TYPES.some((type) => type === value);
}

function readPatches(params: Record<string, unknown>): AttrMap | undefined {
  const { patches } = params;
  if (patches === undefined || patches === null) return undefined;
  if (!isRecord(patches)) {
    throw new ValidationError('patches must be an object', 'patches');
  }
  const attrs: AttrMap = {};
  for (const [name, value] of Object.entries(patches)) {
    if (!isAttrValue(value)) {
      throw new ValidationError(`patches.${name} has no stored representation`, `patches.${name}`);
    }
    attrs[name] = value;
  }
  return attrs;
}

function readDeletions(params: Record<string, unknown>): string[] | undefined {
  const { deletions } = params;
  if (deletions === undefined || deletions === null) return undefined;
  const names = Array.isArray(deletions)
    ? deletions.filter((name): name is string => typeof name === 'string')
    : [];
  if (!Array.isArray(deletions) || names.length !== deletions.length) {
    throw new ValidationError('deletions must be a list of attribute names', 'deletions');
  }
  return names;
}

function readUpdateParams(params: Record<string, unknown>): UpdateEntInput {
  if (typeof params.key !== 'string' || params.key === '') {
    throw new ValidationError('key is required', 'key');
  }
  const input: UpdateEntInput = {
    key: params.key,
    patches: readPatches(params),
    deletions: readDeletions(params),
  };
  const expected = params.expected_modified;
  if (expected !== undefined && expected !== null) {
    if (typeof expected !== 'number') {
      throw new ValidationError('expected_modified must be a number', 'expected_modified');
    }
    input.expected_modified = expected;
  }
  return input;
}

/**
 * Check a decoded action record and narrow it to a dispatchable Action.
 * An unrecognised type raises InvalidActionError; malformed params raise
 * ValidationError.
 */
export function validateAction(value: unknown): Action {
  if (!isRecord(value) || !isActionType(value.type)) {
    throw new InvalidActionError(value);
  }
  const params = value.params ?? {};
  if (!isRecord(params)) {
    throw new ValidationError('params must be an object', 'params');
  }

  const input = readUpdateParams(params);
  if (value.type === 'update_ent') {
    return { type: 'update_ent', params: input };
  }
  if (input.expected_modified !== undefined) {
    throw new ValidationError('upsert_ent does not take expected_modified', 'expected_modified');
  }
  return {
    type: 'upsert_ent',
    params: { key: input.key, patches: input.patches, deletions: input.deletions },
  };
}

import { silentLogger } from '@eavstore/core';
import type { Logger } from '@eavstore/core';
import { readActionFile } from './action-log.js';
import { validateAction } from './validate-action.js';
import type { Action, ActionResult, ActionTarget } from './types.js';

/**
 * Replays recorded actions against a store, one at a time and in order. A
 * batch is validated as a whole before its first action runs.
 */
export class ActionProcessor {
  constructor(
    private readonly store: ActionTarget,
    private readonly logger: Logger = silentLogger(),
  ) {}

  async processActionFiles(files: readonly string[]): Promise<ActionResult[][]> {
    const results: ActionResult[][] = [];
    for (const file of files) {
      results.push(await this.processActionFile(file));
    }
    return results;
  }

  async processActionFile(file: string): Promise<ActionResult[]> {
    const records = await readActionFile(file);
    this.logger.info({ file, actions: records.length }, 'replaying action file');
    return this.processActions(records);
  }

  async processActions(records: readonly unknown[]): Promise<ActionResult[]> {
    const actions = records.map(validateAction);
    const results: ActionResult[] = [];
    for (const action of actions) {
      results.push(await this.executeAction(action));
    }
    return results;
  }

  async executeAction(action: Action): Promise<ActionResult> {
    this.logger.debug({ type: action.type, ent_key: action.params.key }, 'executing action');
    switch (action.type) {
      case 'update_ent':
        await this.store.updateEnt(action.params);
        return undefined;
      case 'upsert_ent':
        return this.store.upsertEnt(action.params);
    }
  }
}

export function processActions(
  records: readonly unknown[],
  store: ActionTarget,
): Promise<ActionResult[]> {
  return new ActionProcessor(store).processActions(records);
}

export function processActionFiles(
  files: readonly string[],
  store: ActionTarget,
): Promise<ActionResult[][]> {
  return new ActionProcessor(store).processActionFiles(files);
}

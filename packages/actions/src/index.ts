export { ActionProcessor, processActions, processActionFiles } from './action-processor.js';
export { formatActionLog, writeActionFile, parseActionLog, readActionFile } from './action-log.js';
export { validateAction } from './validate-action.js';
export { InvalidActionError } from './errors.js';
export { ACTION_TYPES } from './types.js';
export type { Action, ActionType, ActionResult, ActionTarget } from './types.js';

import { describe, it, expect, vi } from 'vitest';
import { StaleEntityError, ValidationError } from '@eavstore/core';
import type { Ent } from '@eavstore/core';
import { ActionProcessor, processActions } from './action-processor.js';
import { InvalidActionError } from './errors.js';
import type { ActionTarget } from './types.js';

function createStore() {
  const created: Ent = { key: 'ent-1', created: 1, modified: 1, attrs: { a: 1 } };
  const updateEnt = vi.fn<ActionTarget['updateEnt']>().mockResolvedValue(undefined);
  const upsertEnt = vi.fn<ActionTarget['upsertEnt']>().mockResolvedValue(created);
  return { store: { updateEnt, upsertEnt }, created };
}

describe('ActionProcessor', () => {
  it('should dispatch each action to the matching store operation in order', async () => {
    const { store, created } = createStore();
    const processor = new ActionProcessor(store);

    const results = await processor.processActions([
      { type: 'upsert_ent', params: { key: 'ent-1', patches: { a: 1 } } },
      { type: 'update_ent', params: { key: 'ent-1', patches: { a: 2 }, expected_modified: 1 } },
    ]);

    expect(results).toEqual([created, undefined]);
    expect(store.upsertEnt).toHaveBeenCalledWith({ key: 'ent-1', patches: { a: 1 } });
    expect(store.updateEnt).toHaveBeenCalledWith({
      key: 'ent-1',
      patches: { a: 2 },
      expected_modified: 1,
    });
    expect(store.upsertEnt.mock.invocationCallOrder[0]).toBeLessThan(
      store.updateEnt.mock.invocationCallOrder[0],
    );
  });

  it('should validate the whole batch before running any action', async () => {
    const { store } = createStore();

    await expect(
      processActions(
        [
          { type: 'upsert_ent', params: { key: 'ent-1' } },
          { type: 'rename_ent', params: { key: 'ent-1' } },
        ],
        store,
      ),
    ).rejects.toBeInstanceOf(InvalidActionError);
    expect(store.upsertEnt).not.toHaveBeenCalled();

    await expect(processActions([{ type: 'update_ent', params: {} }], store)).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it('should stop at the first failing action', async () => {
    const { store } = createStore();
    store.updateEnt.mockRejectedValueOnce(new StaleEntityError('ent-1', 1, 5));

    await expect(
      processActions(
        [
          { type: 'update_ent', params: { key: 'ent-1', expected_modified: 1 } },
          { type: 'upsert_ent', params: { key: 'ent-2' } },
        ],
        store,
      ),
    ).rejects.toBeInstanceOf(StaleEntityError);
    expect(store.upsertEnt).not.toHaveBeenCalled();
  });
});

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryEntityManager } from '../../src/infra/db/managers/InMemoryEntityManager.js';
import { createItemModel, type Item, type ItemFields } from '../helpers/testModel.js';
import type { ModelDescriptor } from '../../src/domain/models/ModelDescriptor.js';

describe('InMemoryEntityManager', () => {
  let model: ModelDescriptor<Item, ItemFields>;
  let manager: InMemoryEntityManager<Item, ItemFields>;

  beforeEach(() => {
    model = createItemModel();
    manager = new InMemoryEntityManager(model);
  });

  it('should fill defaults on create', async () => {
    const created = await manager.createInstance({ name: 'alpha' });

    expect(created?.id).toBe(1);
    expect(created?.toFields()).toEqual({ name: 'alpha', status: 'active', score: 0, apiKey: null });
  });

  it('should hand out independent copies', async () => {
    const created = await manager.createInstance({ name: 'alpha' });
    created?.applyFields({ name: 'changed' });

    expect((await manager.getById(1))?.name).toBe('alpha');
  });

  it('should order ranges by id', async () => {
    for (const name of ['a', 'b', 'c', 'd']) {
      await manager.createInstance({ name });
    }
    await manager.bulkDeleteInstances({ ids: [2] });

    expect((await manager.getAll({ limit: 2, offset: 1 })).map((item) => item.id)).toEqual([3, 4]);
    expect((await manager.filterBy({ status: 'active' }).first())?.id).toBe(1);
  });

  it('should roll back every change when the unit of work throws', async () => {
    await manager.createInstance({ name: 'kept' });

    await expect(
      manager.transaction(async (tx) => {
        await tx.createInstance({ name: 'discarded' });
        const kept = await tx.getById(1);
        if (kept) {
          kept.applyFields({ score: 7 });
          await tx.saveInstance(kept, ['score']);
        }
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    expect(await manager.count()).toBe(1);
    expect((await manager.getById(1))?.score).toBe(0);
    expect((await manager.createInstance({ name: 'next' }))?.id).toBe(3);
  });

  it('should keep rows written by other units of work when one fails', async () => {
    await manager.createInstance({ name: 'a' });
    await manager.createInstance({ name: 'b' });

    const rename = manager.transaction(async (tx) => {
      const a = await tx.getById(1);
      if (!a) throw new Error('missing');
      a.applyFields({ name: 'a2' });
      await tx.saveInstance(a, ['name']);
      return a;
    });
    const failing = manager.transaction(async (tx) => {
      const b = await tx.getById(2);
      if (!b) throw new Error('missing');
      b.applyFields({ score: 5 });
      await tx.saveInstance(b, ['score']);
      await rename;
      throw new Error('abort');
    });

    const results = await Promise.allSettled([rename, failing]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
    expect((await manager.getById(1))?.name).toBe('a2');
    expect((await manager.getById(2))?.score).toBe(0);
  });

  it('should run nested units of work inside the outer one', async () => {
    await expect(
      manager.transaction(async (tx) => {
        await tx.transaction((inner) => inner.createInstance({ name: 'inner' }));
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    expect(await manager.count()).toBe(0);
  });

  it('should reject invalid values on save and leave the row alone', async () => {
    const created = await manager.createInstance({ name: 'alpha' });
    if (!created) throw new Error('not created');
    created.applyFields({ name: '' });

    await expect(manager.saveInstance(created, ['name'])).rejects.toThrow();
    expect((await manager.getById(1))?.name).toBe('alpha');
  });

  it('should reject unknown field names on save', async () => {
    const created = await manager.createInstance({ name: 'alpha' });
    if (!created) throw new Error('not created');

    await expect(manager.saveInstance(created, ['missing'])).rejects.toThrow(
      "Unknown field 'missing' for Model"
    );
  });
});

import { describe, it, expect, beforeEach } from 'vitest';
import { CacheKeyGenerator } from '../../src/infra/cache/cacheKeyGenerator.js';
import { MemoryCacheStore } from '../../src/infra/cache/MemoryCacheStore.js';
import { CacheManager } from '../../src/infra/cache/CacheManager.js';

describe('CacheKeyGenerator', () => {
  const scope = CacheKeyGenerator.scope('Model', 'app');

  it('should lowercase the entity name and default the namespace', () => {
    expect(scope).toEqual({ namespace: 'app', entity: 'model' });
    expect(CacheKeyGenerator.scope('Submission')).toEqual({
      namespace: 'default',
      entity: 'submission',
    });
  });

  it('should build deterministic entity keys', () => {
    expect(CacheKeyGenerator.forEntity(scope, 123)).toBe('app.model.123');
    expect(CacheKeyGenerator.forEntity(scope, 123)).toBe(CacheKeyGenerator.forEntity(scope, 123));
    expect(CacheKeyGenerator.forEntity(scope, 124)).not.toBe(CacheKeyGenerator.forEntity(scope, 123));
    expect(CacheKeyGenerator.forEntity(scope, 5, 'detail')).toBe('app.model.5.detail');
  });

  it('should build list keys from the range', () => {
    expect(CacheKeyGenerator.forList(scope, undefined, 0)).toBe('app.model.all');
    expect(CacheKeyGenerator.forList(scope, 10, 0)).toBe('app.model.all.limit_10.offset_0');
    expect(CacheKeyGenerator.forList(scope, undefined, 30)).toBe('app.model.all.limit_none.offset_30');
  });

  it('should build count keys with sorted filters', () => {
    expect(CacheKeyGenerator.forCount(scope, {})).toBe('app.model.count_all');
    expect(CacheKeyGenerator.forCount(scope, { status: 'active', score: 3 })).toBe(
      'app.model.count_26f4dd22b24b5515'
    );
    expect(CacheKeyGenerator.forCount(scope, { score: 3, status: 'active' })).toBe(
      'app.model.count_26f4dd22b24b5515'
    );
    expect(CacheKeyGenerator.forCount(scope, { status: null, score: undefined })).toBe(
      'app.model.count_439c42a1330d9878'
    );
  });

  it('should keep count keys apart when values run into the separators', () => {
    const joined = CacheKeyGenerator.forCount(scope, { name: 'x_status_active' });
    const split = CacheKeyGenerator.forCount(scope, { name: 'x', status: 'active' });

    expect(joined).not.toBe(split);
  });

  it('should keep count keys apart for values of different types', () => {
    expect(CacheKeyGenerator.forCount(scope, { score: 1 })).not.toBe(
      CacheKeyGenerator.forCount(scope, { score: '1' })
    );
    expect(CacheKeyGenerator.forCount(scope, { name: 'null' })).not.toBe(
      CacheKeyGenerator.forCount(scope, { name: null })
    );
  });

  it('should hash values of sensitive count filters', () => {
    expect(CacheKeyGenerator.forCount(scope, { apiKey: 'test-secret' })).toBe(
      'app.model.count_be39e65accceb38a'
    );
  });

  it('should list the collection families and their patterns', () => {
    expect(CacheKeyGenerator.collectionKeys(scope)).toEqual([
      'app.model.all',
      'app.model.count',
      'app.model.paginated',
    ]);
    expect(CacheKeyGenerator.invalidationPatterns(scope)).toEqual([
      'app.model.all*',
      'app.model.count*',
      'app.model.paginated*',
    ]);
  });
});

describe('MemoryCacheStore', () => {
  let now: number;
  let store: MemoryCacheStore;

  beforeEach(() => {
    now = 1_000_000;
    store = new MemoryCacheStore(() => now);
  });

  it('should expire entries after their ttl', async () => {
    await store.set('k', 'v', 10);

    now += 9_999;
    expect(await store.get('k')).toBe('v');

    now += 1;
    expect(await store.get('k')).toBeNull();
    expect(store.size).toBe(0);
  });

  it('should hand out copies', async () => {
    const value = { tags: ['a'] };
    await store.set('k', value, 60);
    value.tags.push('b');

    const first = await store.get('k');
    expect(first).toEqual({ tags: ['a'] });
    expect(first).not.toBe(await store.get('k'));
  });

  it('should only fill a free key in getOrSet', async () => {
    expect(await store.getOrSet('k', 1, 60)).toBe(1);
    expect(await store.getOrSet('k', 2, 60)).toBe(1);

    now += 60_000;
    expect(await store.getOrSet('k', 3, 60)).toBe(3);
  });

  it('should delete keys matching a glob', async () => {
    await store.set('app.model.all', 1, 60);
    await store.set('app.model.all.limit_10.offset_0', 2, 60);
    await store.set('app.model.count_all', 3, 60);
    await store.set('app.model.1', 4, 60);

    expect(await store.deletePattern('app.model.all*')).toBe(2);
    expect(await store.get('app.model.count_all')).toBe(3);
    expect(await store.get('app.model.1')).toBe(4);
    expect(store.size).toBe(2);
  });

  it('should treat dots in patterns literally', async () => {
    await store.set('appXmodel.all', 1, 60);
    expect(await store.deletePattern('app.model.*')).toBe(0);
  });
});

describe('CacheManager', () => {
  it('should apply its default timeout when none is given', async () => {
    let now = 0;
    const store = new MemoryCacheStore(() => now);
    const cache = new CacheManager(store, 900);

    await cache.set('entity', 'x');
    await cache.set('collection', 'y', 600);

    now = 600_000;
    expect(await cache.get('entity')).toBe('x');
    expect(await cache.get('collection')).toBeNull();

    now = 900_000;
    expect(await cache.get('entity')).toBeNull();
  });
});

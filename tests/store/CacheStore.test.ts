import { describe, expect, it } from 'vitest';
import { CacheStore } from '@/store/CacheStore';

describe('CacheStore', () => {
  it('should return null for missing keys', () => {
    const store = new CacheStore<string, number>(1000);
    expect(store.get('missing')).toBeNull();
    expect(store.getEntry('missing')).toBeNull();
    expect(store.isFresh('missing', 0)).toBe(false);
  });

  it('should be fresh strictly before the ttl elapses', () => {
    const store = new CacheStore<string, number>(1000);
    store.set('a', 1, 5000);

    expect(store.isFresh('a', 5999)).toBe(true);
    expect(store.isFresh('a', 6000)).toBe(false);
  });

  it('should keep stale values readable', () => {
    const store = new CacheStore<string, number>(1000);
    store.set('a', 1, 0);

    expect(store.isFresh('a', 10_000)).toBe(false);
    expect(store.get('a')).toBe(1);
  });

  it('should replace entries wholesale', () => {
    const store = new CacheStore<string, number>(1000);
    store.set('a', 1, 0);
    store.set('a', 2, 500);

    expect(store.getEntry('a')).toEqual({ key: 'a', value: 2, fetchedAt: 500 });
    expect(store.size).toBe(1);
  });

  it('should mark entries stale even with an infinite ttl', () => {
    const store = new CacheStore<string, number>(Number.POSITIVE_INFINITY);
    store.set('a', 1, 0);
    expect(store.isFresh('a', 1e12)).toBe(true);

    expect(store.markStale('a')).toBe(true);
    expect(store.isFresh('a', 0)).toBe(false);
    expect(store.get('a')).toBe(1);
    expect(store.markStale('b')).toBe(false);
  });

  it('should keep numeric and string keys apart', () => {
    const store = new CacheStore<string | number, string>(1000);
    store.set(1, 'number', 0);
    store.set('1', 'string', 0);

    expect(store.get(1)).toBe('number');
    expect(store.get('1')).toBe('string');
    expect(store.keys()).toEqual([1, '1']);
  });

  it('should delete and clear', () => {
    const store = new CacheStore<string, number>(1000);
    store.set('a', 1, 0);
    store.set('b', 2, 0);

    expect(store.delete('a')).toBe(true);
    expect(store.delete('a')).toBe(false);
    store.clear();
    expect(store.size).toBe(0);
    expect(store.has('b')).toBe(false);
  });
});

import { afterEach, describe, expect, it, vi } from 'vitest';
import { MemoryCacheStore, ResponseCache, createEntry, isExpired } from '../cache';

describe('MemoryCacheStore', () => {
  it('evicts the least recently used entry beyond maxSize', async () => {
    const onEvict = vi.fn();
    const store = new MemoryCacheStore({ maxSize: 2, onEvict });

    await store.set('a', createEntry(1, 1_000));
    await store.set('b', createEntry(2, 1_000));
    await store.get('a');
    await store.set('c', createEntry(3, 1_000));

    expect(await store.get('b')).toBeUndefined();
    expect((await store.get('a'))?.value).toBe(1);
    expect((await store.get('c'))?.value).toBe(3);
    expect(onEvict).toHaveBeenCalledTimes(1);
    expect(onEvict).toHaveBeenCalledWith('b', expect.objectContaining({ value: 2 }));
  });

  it('replaces an existing key without evicting', async () => {
    const store = new MemoryCacheStore({ maxSize: 1 });

    await store.set('a', createEntry(1, 1_000));
    await store.set('a', createEntry(2, 1_000));

    expect(await store.size()).toBe(1);
    expect((await store.get('a'))?.value).toBe(2);
  });

  it('rejects a non-positive maxSize', () => {
    expect(() => new MemoryCacheStore({ maxSize: 0 })).toThrow('maxSize must be a positive integer');
  });
});

describe('isExpired', () => {
  it('treats the expiry instant as expired', () => {
    const entry = createEntry('v', 100, 1_000);
    expect(entry).toEqual({ value: 'v', storedAt: 1_000, expiresAt: 1_100 });
    expect(isExpired(entry, 1_099)).toBe(false);
    expect(isExpired(entry, 1_100)).toBe(true);
  });
});

describe('ResponseCache', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('serves entries until their TTL elapses', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const cache = new ResponseCache({ logger });

    await cache.put('key', { id: 1 }, 5_000);
    vi.advanceTimersByTime(4_999);
    expect((await cache.get('key'))?.value).toEqual({ id: 1 });

    vi.advanceTimersByTime(1);
    expect(await cache.get('key')).toBeUndefined();
    expect(await cache.size()).toBe(0);
    expect(logger.debug).toHaveBeenCalledWith('rest.cache.expired', { fingerprint: 'key' });
  });

  it('hides but keeps entries while disabled', async () => {
    const cache = new ResponseCache();
    await cache.put('key', 'kept', 60_000);

    cache.setEnabled(false);
    expect(await cache.get('key')).toBeUndefined();
    await cache.put('other', 'ignored', 60_000);
    expect(await cache.size()).toBe(1);

    cache.setEnabled(true);
    expect((await cache.get('key'))?.value).toBe('kept');
    expect(await cache.get('other')).toBeUndefined();
  });

  it('does not store values with a non-positive TTL', async () => {
    const cache = new ResponseCache();
    await cache.put('key', 'value', 0);
    expect(await cache.size()).toBe(0);
  });

  it('clears all entries', async () => {
    const cache = new ResponseCache();
    await cache.put('a', 1, 60_000);
    await cache.put('b', 2, 60_000);

    await cache.clear();

    expect(await cache.size()).toBe(0);
    expect(await cache.get('a')).toBeUndefined();
  });

  it('applies maxSize to the default store', async () => {
    const cache = new ResponseCache({ maxSize: 1 });
    await cache.put('a', 1, 60_000);
    await cache.put('b', 2, 60_000);

    expect(await cache.get('a')).toBeUndefined();
    expect((await cache.get('b'))?.value).toBe(2);
  });
});

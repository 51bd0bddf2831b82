import type { Logger } from './types';

export interface CacheEntry<T = unknown> {
  value: T;
  /** Epoch millis when the entry was written. */
  storedAt: number;
  /** Epoch millis; the entry is served only while `Date.now() < expiresAt`. */
  expiresAt: number;
}

/**
 * Backing storage for ResponseCache. `set` must replace the whole entry for
 * a key at once; readers never see a partially written entry.
 */
export interface CacheStore {
  get<T = unknown>(key: string): Promise<CacheEntry<T> | undefined>;
  set<T = unknown>(key: string, entry: CacheEntry<T>): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
  size(): Promise<number>;
}

export interface MemoryCacheStoreOptions {
  /** Maximum number of entries; the least recently used entry is evicted beyond it. */
  maxSize?: number;
  onEvict?: (key: string, entry: CacheEntry) => void;
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxSize: number;

  constructor(private readonly options: MemoryCacheStoreOptions = {}) {
    const { maxSize } = options;
    if (maxSize !== undefined && (!Number.isInteger(maxSize) || maxSize <= 0)) {
      throw new Error('maxSize must be a positive integer');
    }
    this.maxSize = maxSize ?? 1000;
  }

  async get<T = unknown>(key: string): Promise<CacheEntry<T> | undefined> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    // Re-insert to mark as most recently used; Map iterates in insertion order.
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry as CacheEntry<T>;
  }

  async set<T = unknown>(key: string, entry: CacheEntry<T>): Promise<void> {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    }
    while (this.entries.size >= this.maxSize) {
      this.evictLeastRecentlyUsed();
    }
    this.entries.set(key, entry);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  async size(): Promise<number> {
    return this.entries.size;
  }

  private evictLeastRecentlyUsed(): void {
    const oldest = this.entries.entries().next();
    if (oldest.done) return;
    const [key, entry] = oldest.value;
    this.entries.delete(key);
    this.options.onEvict?.(key, entry);
  }
}

export function isExpired(entry: CacheEntry, now = Date.now()): boolean {
  return now >= entry.expiresAt;
}

export function createEntry<T>(value: T, ttlMs: number, now = Date.now()): CacheEntry<T> {
  return {
    value,
    storedAt: now,
    expiresAt: now + ttlMs,
  };
}

export interface ResponseCacheOptions {
  store?: CacheStore;
  /** Entry limit for the default in-memory store. Ignored when `store` is given. */
  maxSize?: number;
  enabled?: boolean;
  logger?: Logger;
}

/**
 * TTL cache of fingerprint -> response value.
 *
 * Disabling the cache hides its contents without deleting them, so
 * re-enabling restores the previous state. Callers must treat returned
 * values as read-only.
 */
export class ResponseCache {
  private readonly store: CacheStore;
  private readonly logger?: Logger;
  private enabled: boolean;

  constructor(options: ResponseCacheOptions = {}) {
    this.logger = options.logger;
    this.enabled = options.enabled ?? true;
    this.store =
      options.store ??
      new MemoryCacheStore({
        maxSize: options.maxSize,
        onEvict: (key) => this.logger?.debug('rest.cache.evicted', { fingerprint: key }),
      });
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  /** Returns the live entry for `fingerprint`, or undefined when absent, expired or disabled. */
  async get<T = unknown>(fingerprint: string): Promise<CacheEntry<T> | undefined> {
    if (!this.enabled) return undefined;
    const entry = await this.store.get<T>(fingerprint);
    if (!entry) return undefined;
    if (isExpired(entry)) {
      await this.store.delete(fingerprint);
      this.logger?.debug('rest.cache.expired', { fingerprint });
      return undefined;
    }
    return entry;
  }

  async put<T>(fingerprint: string, value: T, ttlMs: number): Promise<void> {
    if (!this.enabled || ttlMs <= 0) return;
    await this.store.set(fingerprint, createEntry(value, ttlMs));
  }

  async delete(fingerprint: string): Promise<void> {
    await this.store.delete(fingerprint);
  }

  async clear(): Promise<void> {
    await this.store.clear();
  }

  size(): Promise<number> {
    return this.store.size();
  }
}

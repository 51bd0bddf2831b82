import { describe, expect, it, vi } from 'vitest';
import { loadRestClientSettingsFromEnv, parseRestClientSettings } from '../config';
import { ConfigurationError } from '../errors';
import { createRequestDescriptor } from '../fingerprint';
import { RestClient } from '../RestClient';
import { success } from '../RestAction';
import { TokenGuard, createToken } from '../tokenGuard';

describe('parseRestClientSettings', () => {
  it('fills defaults', () => {
    expect(parseRestClientSettings()).toEqual({
      useCache: true,
      cacheTtlMs: 60_000,
      cacheLimit: 200,
      retryWhenRateLimited: true,
      maxRetryAttempts: 5,
      baseBackoffMs: 1_000,
      maxBackoffMs: 60_000,
      refreshTokenAutomatically: true,
      tokenExpiryMarginMs: 5_000,
      requestTimeoutMs: 30_000,
    });
  });

  it('reports every invalid field', () => {
    let error: unknown;
    try {
      parseRestClientSettings({ cacheTtlMs: -1, maxRetryAttempts: 0 });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      category: 'config',
      issues: ['cacheTtlMs: cacheTtlMs must be positive', 'maxRetryAttempts: maxRetryAttempts must be at least 1'],
    });
  });
});

describe('backoff bounds', () => {
  it('rejects a maxBackoffMs beyond the longest timer delay', () => {
    expect(() => parseRestClientSettings({ maxBackoffMs: 90 * 24 * 60 * 60 * 1_000 })).toThrow(
      'Invalid rest client settings: maxBackoffMs: maxBackoffMs exceeds the longest timer delay',
    );
  });
});

describe('loadRestClientSettingsFromEnv', () => {
  it('reads REST_ACTION_* variables and ignores unparseable values', () => {
    const settings = loadRestClientSettingsFromEnv({
      REST_ACTION_BASE_URL: 'https://api.example.test',
      REST_ACTION_CACHE_TTL_MS: '1000',
      REST_ACTION_USE_CACHE: 'no',
      REST_ACTION_MAX_RETRY_ATTEMPTS: 'several',
      REST_ACTION_REFRESH_TOKEN_AUTOMATICALLY: 'maybe',
    });

    expect(settings).toMatchObject({
      baseUrl: 'https://api.example.test',
      cacheTtlMs: 1_000,
      useCache: false,
      maxRetryAttempts: 5,
      refreshTokenAutomatically: true,
    });
  });

  it('lets explicit overrides win', () => {
    const settings = loadRestClientSettingsFromEnv({ REST_ACTION_CACHE_LIMIT: '10' }, { cacheLimit: 20 });
    expect(settings.cacheLimit).toBe(20);
  });
});

describe('RestClient', () => {
  const descriptor = createRequestDescriptor({ method: 'GET', url: 'https://api.example.test/items' });

  it('rejects invalid settings at construction', () => {
    expect(() => new RestClient({ settings: { baseUrl: 'not a url' } })).toThrow(ConfigurationError);
  });

  it('builds a token guard from the initial token', () => {
    const client = new RestClient({
      settings: { tokenExpiryMarginMs: 0 },
      token: createToken({ accessToken: 'test-token', expiresIn: 1 }),
    });

    expect(client.tokenGuard?.isExpired()).toBe(false);
    expect(new RestClient().tokenGuard).toBeUndefined();
  });

  it('prefers an explicit token guard', () => {
    const guard = new TokenGuard({ token: createToken({ accessToken: 'test-token', expiresIn: 60 }) });
    expect(new RestClient({ tokenGuard: guard, token: createToken({ accessToken: 'other', expiresIn: 60 }) }).tokenGuard).toBe(guard);
  });

  it('toggles caching at runtime without losing entries', async () => {
    const client = new RestClient();
    const produce = vi.fn().mockResolvedValue(success('value'));
    const action = client.action({ produce }, { descriptor });

    await action.complete();
    client.setUseCache(false);
    await action.complete();
    expect(client.getSettings().useCache).toBe(false);
    expect(produce).toHaveBeenCalledTimes(2);

    client.setUseCache(true);
    await action.complete();
    expect(produce).toHaveBeenCalledTimes(2);
  });

  it('applies cacheLimit to the default store', async () => {
    const client = new RestClient({ settings: { cacheLimit: 1 } });
    const first = client.action({ produce: vi.fn().mockResolvedValue(success(1)) }, { descriptor });
    const second = client.action(
      { produce: vi.fn().mockResolvedValue(success(2)) },
      { descriptor: createRequestDescriptor({ method: 'GET', url: 'https://api.example.test/other' }) },
    );

    await first.complete();
    await second.complete();

    expect(await client.cache.size()).toBe(1);
  });

  it('updates the refresh toggle', () => {
    const client = new RestClient();
    client.setRefreshTokenAutomatically(false);
    expect(client.getSettings().refreshTokenAutomatically).toBe(false);
  });
});

import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger, createDefaultRestClient } from '../factories';
import { fetchTransport } from '../transport/fetchTransport';

describe('createDefaultRestClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('merges environment settings under explicit ones', () => {
    const client = createDefaultRestClient(
      { clientName: 'catalog', settings: { cacheTtlMs: 1_000 } },
      { REST_ACTION_CACHE_TTL_MS: '5000', REST_ACTION_USE_CACHE: 'false' },
    );

    expect(client.clientName).toBe('catalog');
    expect(client.getSettings()).toMatchObject({ cacheTtlMs: 1_000, useCache: false });
    expect(client.cache.isEnabled()).toBe(false);
    expect(client.transport).toBe(fetchTransport);
    expect(client.logger).toBeInstanceOf(ConsoleLogger);
  });

  it('prefixes console output with the client name', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    new ConsoleLogger('catalog').info('auth.token.refreshed', { expiresAt: 1 });

    expect(info).toHaveBeenCalledWith('[catalog] auth.token.refreshed', { expiresAt: 1 });
  });
});

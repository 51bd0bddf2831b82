import { afterEach, describe, expect, it, vi } from 'vitest';
import { createAxiosTransport, type AxiosInstanceLike } from '../transport/axiosTransport';
import { fetchTransport } from '../transport/fetchTransport';

describe('fetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns status, lower-cased headers and body bytes', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response('{"ok":true}', { status: 429, headers: { 'Retry-After': '2', 'Content-Type': 'application/json' } }),
    );
    vi.stubGlobal('fetch', fetchMock);
    const signal = new AbortController().signal;

    const response = await fetchTransport(
      { method: 'POST', url: 'https://api.example.test/items', headers: { accept: 'application/json' }, body: '{}' },
      signal,
    );

    expect(fetchMock).toHaveBeenCalledWith('https://api.example.test/items', {
      method: 'POST',
      headers: { accept: 'application/json' },
      body: '{}',
      signal,
    });
    expect(response.status).toBe(429);
    expect(response.headers['retry-after']).toBe('2');
    expect(new TextDecoder().decode(response.body)).toBe('{"ok":true}');
  });
});

describe('createAxiosTransport', () => {
  it('resolves every status and normalizes headers', async () => {
    const data = new ArrayBuffer(0);
    const instance: AxiosInstanceLike = {
      request: vi.fn().mockResolvedValue({
        status: 401,
        headers: { 'WWW-Authenticate': 'Bearer', 'set-cookie': ['a=1', 'b=2'], 'x-missing': undefined },
        data,
      }),
    };
    const signal = new AbortController().signal;

    const response = await createAxiosTransport(instance)(
      { method: 'GET', url: 'https://api.example.test/me', headers: { authorization: 'Bearer test-token' } },
      signal,
    );

    expect(instance.request).toHaveBeenCalledWith(
      expect.objectContaining({
        url: 'https://api.example.test/me',
        method: 'GET',
        responseType: 'arraybuffer',
        signal,
        validateStatus: expect.any(Function),
      }),
    );
    expect(response).toEqual({
      status: 401,
      headers: { 'www-authenticate': 'Bearer', 'set-cookie': 'a=1, b=2' },
      body: data,
    });
  });
});

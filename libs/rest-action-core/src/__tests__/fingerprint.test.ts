import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors';
import { createRequestDescriptor, fingerprint, normalizeMethod, stableStringify } from '../fingerprint';

describe('fingerprint', () => {
  it('is equal for equal descriptors', () => {
    const a = createRequestDescriptor({ method: 'GET', url: 'https://api.example.test/items?limit=10' });
    const b = createRequestDescriptor({ method: 'GET', url: 'https://api.example.test/items?limit=10' });

    expect(fingerprint(a)).toBe(fingerprint(b));
    expect(fingerprint(a)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('changes with method, url, content type or body', () => {
    const base = { method: 'POST' as const, url: 'https://api.example.test/items', body: '{"a":1}', contentType: 'application/json' };
    const reference = fingerprint(createRequestDescriptor(base));

    expect(fingerprint(createRequestDescriptor({ ...base, method: 'PUT' }))).not.toBe(reference);
    expect(fingerprint(createRequestDescriptor({ ...base, url: 'https://api.example.test/other' }))).not.toBe(reference);
    expect(fingerprint(createRequestDescriptor({ ...base, contentType: 'text/plain' }))).not.toBe(reference);
    expect(fingerprint(createRequestDescriptor({ ...base, body: '{"a":2}' }))).not.toBe(reference);
  });

  it('keeps field boundaries distinct', () => {
    const left = createRequestDescriptor({ method: 'POST', url: 'https://api.example.test/a', body: 'bc' });
    const right = createRequestDescriptor({ method: 'POST', url: 'https://api.example.test/ab', body: 'c' });

    expect(fingerprint(left)).not.toBe(fingerprint(right));
  });

  it('normalizes the method to upper case', () => {
    const lower = createRequestDescriptor({ method: 'get', url: 'https://api.example.test/items' });

    expect(lower.method).toBe('GET');
    expect(fingerprint(lower)).toBe(fingerprint(createRequestDescriptor({ method: 'GET', url: 'https://api.example.test/items' })));
  });

  it('rejects unsupported methods', () => {
    expect(normalizeMethod('patch')).toBe('PATCH');
    expect(() => normalizeMethod('TRACE')).toThrow(ConfigurationError);
  });

  it('freezes descriptors', () => {
    expect(Object.isFrozen(createRequestDescriptor({ method: 'GET', url: 'https://api.example.test' }))).toBe(true);
  });
});

describe('stableStringify', () => {
  it('sorts keys and drops undefined values', () => {
    expect(stableStringify({ b: 1, a: { d: undefined, c: [1, 'x'] } })).toBe('{"a":{"c":[1,"x"]},"b":1}');
  });

  it('serializes primitives like JSON.stringify', () => {
    expect(stableStringify('x')).toBe('"x"');
    expect(stableStringify(null)).toBe('null');
    expect(stableStringify(undefined)).toBe('null');
  });
});

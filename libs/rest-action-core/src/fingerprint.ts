import { createHash } from 'node:crypto';
import { ConfigurationError } from './errors';
import type { HttpMethod, RequestDescriptor } from './types';

const HTTP_METHODS: ReadonlySet<string> = new Set<HttpMethod>(['GET', 'HEAD', 'OPTIONS', 'POST', 'PUT', 'PATCH', 'DELETE']);

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.has(value);
}

/** Upper-cases `method` and checks it is a supported verb. */
export function normalizeMethod(method: string): HttpMethod {
  const upper = method.toUpperCase();
  if (!isHttpMethod(upper)) {
    throw new ConfigurationError('Unsupported HTTP method', [method]);
  }
  return upper;
}

export interface RequestDescriptorInit {
  method: HttpMethod | Lowercase<HttpMethod>;
  url: string;
  body?: string;
  contentType?: string;
}

/** Builds a frozen descriptor; the method is normalized to upper case. */
export function createRequestDescriptor(init: RequestDescriptorInit): RequestDescriptor {
  const descriptor: RequestDescriptor = {
    method: normalizeMethod(init.method),
    url: init.url,
    body: init.body,
    contentType: init.contentType,
  };
  return Object.freeze(descriptor);
}

/**
 * Derives the cache key for a request. Equal descriptors always produce
 * equal fingerprints.
 */
export function fingerprint(descriptor: RequestDescriptor): string {
  // Fields are NUL-separated so that ("a", "bc") and ("ab", "c") differ.
  return createHash('sha256')
    .update(descriptor.method)
    .update('\0')
    .update(descriptor.url)
    .update('\0')
    .update(descriptor.contentType ?? '')
    .update('\0')
    .update(descriptor.body ?? '')
    .digest('hex');
}

/** JSON serialization with object keys sorted, so equal payloads serialize identically. */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, val]) => val !== undefined)
    .sort((a, b) => a[0].localeCompare(b[0]));

  return `{${entries
    .map(([key, val]) => `${JSON.stringify(key)}:${stableStringify(val)}`)
    .join(',')}}`;
}

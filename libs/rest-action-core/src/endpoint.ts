import { ConfigurationError, RemoteError, TransportError, errorMessage } from './errors';
import { createRequestDescriptor, stableStringify } from './fingerprint';
import { failure, success, type RestAction } from './RestAction';
import type { RestClient } from './RestClient';
import type { HttpHeaders, HttpMethod, ProduceResult, QueryParams, RawHttpResponse, Token, TransportRequest } from './types';

/** Turns a parsed JSON body into the caller's result type, e.g. a zod schema's `parse`. */
export type Decoder<T> = (value: unknown) => T;

/** Passes the parsed body through untyped. */
export const asUnknown: Decoder<unknown> = (value) => value;

/**
 * Builds `path?key=value&...`. Keys whose value is null or undefined are
 * left out, so optional parameters can be chained unconditionally.
 *
 * @example
 * ```typescript
 * new EndpointBuilder('/v1/search').with('q', query).with('limit', limit).toString();
 * ```
 */
export class EndpointBuilder {
  private readonly params: Array<[string, string]> = [];

  constructor(private readonly path: string) {}

  with(key: string, value: string | number | boolean | null | undefined): this {
    if (value !== undefined && value !== null) {
      this.params.push([key, String(value)]);
    }
    return this;
  }

  withAll(query: QueryParams = {}): this {
    for (const [key, value] of Object.entries(query)) {
      this.with(key, value);
    }
    return this;
  }

  toString(): string {
    if (this.params.length === 0) return this.path;
    const query = this.params
      .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
      .join('&');
    return `${this.path}${this.path.includes('?') ? '&' : '?'}${query}`;
  }
}

const textDecoder = new TextDecoder();

type JsonParse = { ok: true; value: unknown } | { ok: false; text: string };

function parseJson(raw: RawHttpResponse): JsonParse {
  const text = textDecoder.decode(raw.body);
  if (raw.status === 204 || text.trim() === '') {
    return { ok: true, value: undefined };
  }
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false, text };
  }
}

export function headerValue(headers: HttpHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

/** Extracts a human-readable message from common JSON error shapes. */
export function readErrorMessage(body: unknown): string | undefined {
  if (typeof body === 'string') return body || undefined;
  if (typeof body !== 'object' || body === null) return undefined;
  if ('error' in body) {
    const { error } = body;
    if (typeof error === 'string') return error;
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
  }
  if ('message' in body && typeof body.message === 'string') return body.message;
  return undefined;
}

/**
 * Maps a raw response onto the producer contract. Only 2xx bodies go
 * through `decode`; a 2xx body that is not JSON is a RemoteError.
 */
export function classifyResponse<T>(raw: RawHttpResponse, decode: Decoder<T>): ProduceResult<T> {
  const parsed = parseJson(raw);
  const body = parsed.ok ? parsed.value : parsed.text;

  if (raw.status >= 200 && raw.status < 300) {
    if (!parsed.ok) {
      throw new RemoteError('Response body is not valid JSON', { status: raw.status, body: parsed.text });
    }
    return success(decode(parsed.value));
  }

  switch (raw.status) {
    case 429:
      return failure({ type: 'rateLimited', retryAfter: headerValue(raw.headers, 'retry-after') });
    case 401:
      return failure({ type: 'unauthorized', body });
    case 400:
      return failure({ type: 'badRequest', detail: readErrorMessage(body) ?? 'HTTP 400', body });
    default:
      return failure({ type: 'other', status: raw.status, body });
  }
}

export interface EndpointRequestOptions {
  query?: QueryParams;
  /** Strings are sent as-is; anything else is sent as JSON. */
  body?: unknown;
  headers?: HttpHeaders;
  /** Cache lifetime for GET responses; defaults to the client's cacheTtlMs. */
  cacheTtlMs?: number;
  operation?: string;
}

/**
 * Base class for API call sites. Each verb returns a lazy RestAction whose
 * producer performs exactly one HTTP exchange per attempt.
 *
 * @example
 * ```typescript
 * class UsersApi extends RestEndpoint {
 *   getUser(id: string) {
 *     return this.get(`/users/${id}`, (body) => userSchema.parse(body));
 *   }
 * }
 * ```
 */
export class RestEndpoint {
  constructor(protected readonly client: RestClient) {}

  protected get<T>(path: string, decode: Decoder<T>, options?: EndpointRequestOptions): RestAction<T> {
    return this.request('GET', path, decode, options);
  }

  protected post<T>(path: string, decode: Decoder<T>, options?: EndpointRequestOptions): RestAction<T> {
    return this.request('POST', path, decode, options);
  }

  protected put<T>(path: string, decode: Decoder<T>, options?: EndpointRequestOptions): RestAction<T> {
    return this.request('PUT', path, decode, options);
  }

  protected patch<T>(path: string, decode: Decoder<T>, options?: EndpointRequestOptions): RestAction<T> {
    return this.request('PATCH', path, decode, options);
  }

  protected delete<T>(path: string, decode: Decoder<T>, options?: EndpointRequestOptions): RestAction<T> {
    return this.request('DELETE', path, decode, options);
  }

  protected request<T>(
    method: HttpMethod,
    path: string,
    decode: Decoder<T>,
    options: EndpointRequestOptions = {},
  ): RestAction<T> {
    const url = this.resolveUrl(new EndpointBuilder(path).withAll(options.query).toString());
    const body =
      options.body === undefined ? undefined : typeof options.body === 'string' ? options.body : stableStringify(options.body);
    const contentType =
      options.body === undefined ? undefined : typeof options.body === 'string' ? 'text/plain;charset=UTF-8' : 'application/json';

    return this.client.action(
      {
        produce: async ({ token }) => {
          const raw = await this.send({ method, url, headers: this.buildHeaders(token, contentType, options.headers), body });
          return classifyResponse(raw, decode);
        },
      },
      {
        descriptor: method === 'GET' ? createRequestDescriptor({ method, url }) : undefined,
        cacheTtlMs: options.cacheTtlMs,
        operation: options.operation ?? `${method} ${path}`,
      },
    );
  }

  protected resolveUrl(path: string): string {
    if (/^https?:\/\//i.test(path)) return path;
    const { baseUrl } = this.client.getSettings();
    if (!baseUrl) {
      throw new ConfigurationError('Cannot resolve relative path without a baseUrl', [path]);
    }
    return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
  }

  private buildHeaders(token: Token | undefined, contentType: string | undefined, extra: HttpHeaders = {}): HttpHeaders {
    const headers: HttpHeaders = { accept: 'application/json', ...extra };
    if (token) {
      headers.authorization = `${token.tokenType} ${token.accessToken}`;
    }
    if (contentType) {
      headers['content-type'] = contentType;
    }
    return headers;
  }

  private async send(req: TransportRequest): Promise<RawHttpResponse> {
    const timeoutMs = this.client.getSettings().requestTimeoutMs;
    const signal = AbortSignal.timeout(timeoutMs);
    try {
      return await this.client.transport(req, signal);
    } catch (error) {
      const reason = signal.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(error);
      throw new TransportError(`${req.method} ${req.url} failed: ${reason}`, { cause: error });
    }
  }
}

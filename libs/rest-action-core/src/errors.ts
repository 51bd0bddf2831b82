import type { ErrorCategory } from './types';

export const statusToCategory = (status: number): ErrorCategory => {
  if (status === 401 || status === 403) return 'auth';
  if (status === 404) return 'not_found';
  if (status === 400 || status === 422) return 'validation';
  if (status === 429) return 'rate_limit';
  if (status >= 500) return 'transient';
  if (status === 0) return 'network';
  return 'unknown';
};

export class RestActionError extends Error {
  readonly category: ErrorCategory;

  constructor(message: string, category: ErrorCategory, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RestActionError';
    this.category = category;
  }
}

/** Connectivity-level failure (DNS, reset, abort). Never retried by the engine. */
export class TransportError extends RestActionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'network', options);
    this.name = 'TransportError';
  }
}

/** Token refresh failed or no usable credential exists. */
export class AuthenticationError extends RestActionError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, 'auth', { cause: options?.cause });
    this.name = 'AuthenticationError';
    this.status = options?.status;
  }
}

export class RateLimitedError extends RestActionError {
  readonly attempts: number;
  readonly retryAfterMs?: number;

  constructor(message: string, options: { attempts: number; retryAfterMs?: number }) {
    super(message, 'rate_limit');
    this.name = 'RateLimitedError';
    this.attempts = options.attempts;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/** Non-2xx response unrelated to rate limiting, passed through from the producer. */
export class RemoteError extends RestActionError {
  readonly status: number;
  readonly body: unknown;

  constructor(message: string, options: { status: number; body?: unknown }) {
    super(message, statusToCategory(options.status));
    this.name = 'RemoteError';
    this.status = options.status;
    this.body = options.body;
  }
}

export class BadRequestError extends RemoteError {
  readonly detail: string;

  constructor(detail: string, body?: unknown) {
    super(`Bad request: ${detail}`, { status: 400, body });
    this.name = 'BadRequestError';
    this.detail = detail;
  }
}

export class ConfigurationError extends RestActionError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message, 'config');
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

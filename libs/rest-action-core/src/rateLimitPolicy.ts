import { DEFAULT_BASE_BACKOFF_MS, DEFAULT_MAX_BACKOFF_MS, DEFAULT_MAX_RETRY_ATTEMPTS } from './config';
import type { RateLimitDecision, RateLimitInput } from './types';

export const RATE_LIMIT_STATUS = 429;

export interface RateLimitPolicyOptions {
  /** Ceiling on total producer attempts per completion. */
  maxAttempts?: number;
  /** Fallback delay for the first retry when no usable Retry-After is present. */
  baseBackoffMs?: number;
  /** Upper bound for any computed or server-suggested delay. */
  maxBackoffMs?: number;
}

/**
 * Parses a Retry-After header value (delta-seconds or HTTP-date) into millis.
 * Returns undefined for missing, malformed, negative or past values.
 */
export const parseRetryAfter = (value?: string | null, now = Date.now()): number | undefined => {
  if (value === undefined || value === null) return undefined;
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  const seconds = Number(trimmed);
  if (!Number.isNaN(seconds)) {
    return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
  }
  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    const diff = date - now;
    return diff > 0 ? diff : undefined;
  }
  return undefined;
};

/**
 * Decides whether a failed attempt is retried after a delay or surfaced.
 * Only 429 responses are this policy's concern; every other status passes
 * through untouched.
 */
export class RateLimitPolicy {
  readonly maxAttempts: number;
  readonly baseBackoffMs: number;
  readonly maxBackoffMs: number;

  constructor(options: RateLimitPolicyOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_RETRY_ATTEMPTS;
    this.baseBackoffMs = options.baseBackoffMs ?? DEFAULT_BASE_BACKOFF_MS;
    this.maxBackoffMs = options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
  }

  decide(input: RateLimitInput): RateLimitDecision {
    if (input.status !== RATE_LIMIT_STATUS) {
      return { kind: 'pass' };
    }
    if (!input.retryEnabled) {
      return { kind: 'fail', reason: 'rate limited' };
    }
    if (input.attempt >= this.maxAttempts) {
      return { kind: 'fail', reason: 'rate limited' };
    }
    const suggested = parseRetryAfter(input.retryAfter);
    const delayMs = suggested ?? this.fallbackDelay(input.attempt);
    return { kind: 'retry', delayMs: Math.min(delayMs, this.maxBackoffMs) };
  }

  /** Exponential fallback: base, 2x base, 4x base, ... */
  fallbackDelay(attempt: number): number {
    const exponent = Math.max(0, attempt - 1);
    return Math.min(this.baseBackoffMs * 2 ** exponent, this.maxBackoffMs);
  }
}

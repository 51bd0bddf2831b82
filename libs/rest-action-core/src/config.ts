import { z } from 'zod';
import { ConfigurationError } from './errors';
import { MAX_TIMER_DELAY_MS } from './scheduler';

export const DEFAULT_CACHE_TTL_MS = 60_000;
export const DEFAULT_CACHE_LIMIT = 200;
export const DEFAULT_MAX_RETRY_ATTEMPTS = 5;
export const DEFAULT_BASE_BACKOFF_MS = 1_000;
export const DEFAULT_MAX_BACKOFF_MS = 60_000;
export const DEFAULT_TOKEN_EXPIRY_MARGIN_MS = 5_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export const restClientSettingsSchema = z.object({
  baseUrl: z.string().url('baseUrl must be an absolute URL').optional(),
  useCache: z.boolean().default(true),
  cacheTtlMs: z.number().int().positive('cacheTtlMs must be positive').default(DEFAULT_CACHE_TTL_MS),
  cacheLimit: z.number().int().positive('cacheLimit must be positive').default(DEFAULT_CACHE_LIMIT),
  retryWhenRateLimited: z.boolean().default(true),
  maxRetryAttempts: z.number().int().min(1, 'maxRetryAttempts must be at least 1').default(DEFAULT_MAX_RETRY_ATTEMPTS),
  baseBackoffMs: z
    .number()
    .int()
    .nonnegative()
    .max(MAX_TIMER_DELAY_MS, 'baseBackoffMs exceeds the longest timer delay')
    .default(DEFAULT_BASE_BACKOFF_MS),
  maxBackoffMs: z
    .number()
    .int()
    .nonnegative()
    .max(MAX_TIMER_DELAY_MS, 'maxBackoffMs exceeds the longest timer delay')
    .default(DEFAULT_MAX_BACKOFF_MS),
  refreshTokenAutomatically: z.boolean().default(true),
  tokenExpiryMarginMs: z.number().int().nonnegative().default(DEFAULT_TOKEN_EXPIRY_MARGIN_MS),
  requestTimeoutMs: z.number().int().positive('requestTimeoutMs must be positive').default(DEFAULT_REQUEST_TIMEOUT_MS),
});

/** Settings after defaults have been applied. */
export type RestClientSettings = z.infer<typeof restClientSettingsSchema>;

/** Settings as accepted from callers; every field is optional. */
export type RestClientSettingsInput = z.input<typeof restClientSettingsSchema>;

export function parseRestClientSettings(input: RestClientSettingsInput = {}): RestClientSettings {
  const result = restClientSettingsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid rest client settings',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Reads settings from `REST_ACTION_*` environment variables.
 * Unset or unparseable values fall back to the schema defaults.
 *
 * | Variable | Setting |
 * |---|---|
 * | REST_ACTION_BASE_URL | baseUrl |
 * | REST_ACTION_USE_CACHE | useCache |
 * | REST_ACTION_CACHE_TTL_MS | cacheTtlMs |
 * | REST_ACTION_CACHE_LIMIT | cacheLimit |
 * | REST_ACTION_RETRY_WHEN_RATE_LIMITED | retryWhenRateLimited |
 * | REST_ACTION_MAX_RETRY_ATTEMPTS | maxRetryAttempts |
 * | REST_ACTION_BASE_BACKOFF_MS | baseBackoffMs |
 * | REST_ACTION_MAX_BACKOFF_MS | maxBackoffMs |
 * | REST_ACTION_REFRESH_TOKEN_AUTOMATICALLY | refreshTokenAutomatically |
 * | REST_ACTION_TOKEN_EXPIRY_MARGIN_MS | tokenExpiryMarginMs |
 * | REST_ACTION_REQUEST_TIMEOUT_MS | requestTimeoutMs |
 */
export function loadRestClientSettingsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: RestClientSettingsInput = {},
): RestClientSettings {
  return parseRestClientSettings({
    baseUrl: env.REST_ACTION_BASE_URL || undefined,
    useCache: parseBooleanOrDefault(env.REST_ACTION_USE_CACHE, undefined),
    cacheTtlMs: parseNumberOrDefault(env.REST_ACTION_CACHE_TTL_MS, undefined),
    cacheLimit: parseNumberOrDefault(env.REST_ACTION_CACHE_LIMIT, undefined),
    retryWhenRateLimited: parseBooleanOrDefault(env.REST_ACTION_RETRY_WHEN_RATE_LIMITED, undefined),
    maxRetryAttempts: parseNumberOrDefault(env.REST_ACTION_MAX_RETRY_ATTEMPTS, undefined),
    baseBackoffMs: parseNumberOrDefault(env.REST_ACTION_BASE_BACKOFF_MS, undefined),
    maxBackoffMs: parseNumberOrDefault(env.REST_ACTION_MAX_BACKOFF_MS, undefined),
    refreshTokenAutomatically: parseBooleanOrDefault(env.REST_ACTION_REFRESH_TOKEN_AUTOMATICALLY, undefined),
    tokenExpiryMarginMs: parseNumberOrDefault(env.REST_ACTION_TOKEN_EXPIRY_MARGIN_MS, undefined),
    requestTimeoutMs: parseNumberOrDefault(env.REST_ACTION_REQUEST_TIMEOUT_MS, undefined),
    ...overrides,
  });
}

function parseNumberOrDefault<D extends number | undefined>(value: string | undefined, fallback: D): number | D {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBooleanOrDefault<D extends boolean | undefined>(value: string | undefined, fallback: D): boolean | D {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
  if (normalized === 'false' || normalized === '0' || normalized === 'no') return false;
  return fallback;
}

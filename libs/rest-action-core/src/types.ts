export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type QueryParams = Record<string, string | number | boolean | null | undefined>;

/**
 * Immutable description of a single HTTP request.
 * Used as the input to fingerprinting; never mutated after construction.
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  /** Fully resolved URL, including query string. */
  readonly url: string;
  /** Serialized request body, if any. */
  readonly body?: string;
  readonly contentType?: string;
}

// ============================================================================
// Tokens
// ============================================================================

export interface Token {
  readonly accessToken: string;
  readonly refreshToken?: string;
  readonly tokenType: string;
  readonly scopes: ReadonlySet<string>;
  /** Epoch millis. */
  readonly expiresAt: number;
}

/**
 * Exchanges the current refresh material for a new token.
 * Implementations must reject with an AuthenticationError when the
 * credential is invalid or revoked.
 */
export interface CredentialRefresher {
  refresh(current: Token): Promise<Token>;
}

// ============================================================================
// Producer contract
// ============================================================================

export type ProducerFailure =
  | { type: 'rateLimited'; retryAfter?: string }
  | { type: 'unauthorized'; body?: unknown }
  | { type: 'badRequest'; detail: string; body?: unknown }
  | { type: 'other'; status: number; body?: unknown };

export type ProduceResult<T> =
  | { kind: 'success'; value: T }
  | { kind: 'failure'; failure: ProducerFailure };

export interface ProduceContext {
  /** 1-based attempt number within the current completion. */
  attempt: number;
  /** Token snapshot for this attempt, when the client carries credentials. */
  token?: Token;
}

/**
 * A "perform this one logical request" operation. Endpoint call sites
 * implement this; the engine never looks at what it does.
 */
export interface RestProducer<T> {
  produce(ctx: ProduceContext): Promise<ProduceResult<T>>;
}

// ============================================================================
// Transport
// ============================================================================

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  /** Serialized request body. */
  body?: string;
}

export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: ArrayBuffer;
}

export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

// ============================================================================
// Rate limiting
// ============================================================================

export type RateLimitDecision =
  | { kind: 'retry'; delayMs: number }
  | { kind: 'fail'; reason: string }
  | { kind: 'pass' };

export interface RateLimitInput {
  attempt: number;
  status: number;
  retryAfter?: string | null;
  retryEnabled: boolean;
}

// ============================================================================
// Scheduling
// ============================================================================

export interface Scheduler {
  after(delayMs: number, callback: () => void): void;
}

// ============================================================================
// Observability
// ============================================================================

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Error category classification.
 *
 * - 'none': No error
 * - 'auth': Authentication/authorization failure (401, 403, failed refresh)
 * - 'validation': Client input validation error (400, 422)
 * - 'not_found': 404
 * - 'rate_limit': Rate limit exceeded (429)
 * - 'transient': Temporary server error (5xx)
 * - 'network': Transport-level error (connection failed, DNS, etc.)
 * - 'config': Invalid client configuration
 * - 'unknown': Unclassified error
 */
export type ErrorCategory =
  | 'none'
  | 'auth'
  | 'validation'
  | 'not_found'
  | 'rate_limit'
  | 'transient'
  | 'network'
  | 'config'
  | 'unknown';

export interface ActionOutcome {
  ok: boolean;
  category: ErrorCategory;
  attempts: number;
  cacheHit: boolean;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  errorMessage?: string;
}

export interface ActionMetricsInfo {
  operation?: string;
  method?: HttpMethod;
  url?: string;
  fingerprint?: string;
  outcome: ActionOutcome;
}

export interface MetricsSink {
  recordAction?(info: ActionMetricsInfo): void | Promise<void>;
}

import type { ResponseCache } from './cache';
import type { RestClientSettings } from './config';
import { BadRequestError, RateLimitedError, RemoteError, RestActionError, errorMessage } from './errors';
import { fingerprint as computeFingerprint } from './fingerprint';
import { parseRetryAfter, RATE_LIMIT_STATUS, type RateLimitPolicy } from './rateLimitPolicy';
import { delay } from './scheduler';
import type { TokenGuard } from './tokenGuard';
import type {
  ActionOutcome,
  Logger,
  MetricsSink,
  ProduceContext,
  ProduceResult,
  ProducerFailure,
  RequestDescriptor,
  RestProducer,
  Scheduler,
  Token,
} from './types';

/**
 * Everything an action needs from its owning client. RestClient implements
 * this; tests may supply their own.
 */
export interface RestActionContext {
  readonly cache: ResponseCache;
  readonly tokenGuard?: TokenGuard;
  readonly rateLimitPolicy: RateLimitPolicy;
  readonly scheduler: Scheduler;
  readonly logger?: Logger;
  readonly metrics?: MetricsSink;
  getSettings(): Readonly<RestClientSettings>;
}

export interface RestActionOptions {
  /** Request identity; enables response caching when present. */
  descriptor?: RequestDescriptor;
  /** Overrides the client's cacheTtlMs for this action. */
  cacheTtlMs?: number;
  /** Label used in logs and metrics. */
  operation?: string;
}

export type ResultCallback<T> = (value: T) => void;
export type ErrorCallback = (error: unknown) => void;

interface CompletionStats {
  attempts: number;
  cacheHit: boolean;
}

export const success = <T>(value: T): ProduceResult<T> => ({ kind: 'success', value });

export const failure = <T = never>(reason: ProducerFailure): ProduceResult<T> => ({ kind: 'failure', failure: reason });

/** Wraps a function as a RestProducer. */
export function producer<T>(fn: (ctx: ProduceContext) => Promise<ProduceResult<T>>): RestProducer<T> {
  return { produce: fn };
}

/**
 * Wraps a value-returning function as a producer that always succeeds;
 * anything it throws propagates unchanged. Useful for composing actions.
 */
export function producerOf<T>(fn: (ctx: ProduceContext) => Promise<T>): RestProducer<T> {
  return { produce: async (ctx) => success(await fn(ctx)) };
}

/**
 * A lazy, cold, reusable unit of work wrapping a producer.
 *
 * Nothing happens until the action is completed. Every completion runs the
 * full pipeline: cache lookup, token check, producer invocation,
 * rate-limit retry and cache store. Results are never memoized on the
 * action itself.
 *
 * @example
 * ```typescript
 * const action = client.action(producer(async ({ token }) => success(await load(token))));
 *
 * const value = await action.complete();
 * action.queue((value) => render(value), (error) => report(error));
 * const promise = action.toFuture();
 * ```
 */
export class RestAction<T> {
  private runFlag = false;
  private completedFlag = false;
  private cachedFingerprint?: string;

  constructor(
    protected readonly context: RestActionContext,
    private readonly source: RestProducer<T>,
    protected readonly options: RestActionOptions = {},
  ) {}

  /** True once any completion has started. */
  hasRun(): boolean {
    return this.runFlag;
  }

  /** True once any completion has succeeded. */
  hasCompleted(): boolean {
    return this.completedFlag;
  }

  /** Cache key of this action, or undefined when it carries no descriptor. */
  get fingerprint(): string | undefined {
    if (!this.options.descriptor) return undefined;
    this.cachedFingerprint ??= computeFingerprint(this.options.descriptor);
    return this.cachedFingerprint;
  }

  /**
   * Runs the pipeline in the caller's async flow and resolves with the
   * result. The error of a failed run is the rejection reason.
   */
  async complete(): Promise<T> {
    this.runFlag = true;
    const startedAt = Date.now();
    const stats: CompletionStats = { attempts: 0, cacheHit: false };
    try {
      const value = await this.run(stats);
      this.completedFlag = true;
      await this.recordMetrics(startedAt, stats);
      return value;
    } catch (error) {
      await this.recordMetrics(startedAt, stats, { error });
      throw error;
    }
  }

  /**
   * Starts the pipeline on the scheduler and returns immediately. Exactly
   * one of the callbacks fires, always after this call has returned.
   */
  queue(onResult: ResultCallback<T>, onError?: ErrorCallback): void {
    this.queueAfter(0, onResult, onError);
  }

  /** Like {@link queue}, but the pipeline starts no earlier than `delayMs` from now. */
  queueAfter(delayMs: number, onResult: ResultCallback<T>, onError?: ErrorCallback): void {
    this.context.scheduler.after(delayMs, () => {
      void this.complete()
        .then(onResult, (error: unknown) => this.dispatchError(error, onError))
        .catch((callbackError: unknown) => {
          this.context.logger?.error('rest.action.callback.failed', {
            ...this.logMeta(),
            error: errorMessage(callbackError),
          });
        });
    });
  }

  /** Adapts {@link queue} into a promise. */
  toFuture(): Promise<T> {
    return new Promise<T>((resolve, reject) => this.queue(resolve, reject));
  }

  private dispatchError(error: unknown, onError?: ErrorCallback): void {
    if (onError) {
      onError(error);
      return;
    }
    this.context.logger?.error('rest.action.unhandled', { ...this.logMeta(), error: errorMessage(error) });
  }

  private async run(stats: CompletionStats): Promise<T> {
    const { cache, logger } = this.context;
    const key = this.fingerprint;

    if (key && cache.isEnabled()) {
      const cached = await this.readCache(key);
      if (cached) {
        stats.cacheHit = true;
        logger?.debug('rest.cache.hit', this.logMeta());
        return cached.value;
      }
    }

    let refreshedAfterUnauthorized = false;
    // 401 retries do not count against the rate-limit ceiling.
    let rateLimitedAttempts = 0;
    for (let attempt = 1; ; attempt += 1) {
      stats.attempts = attempt;
      const settings = this.context.getSettings();
      const token = await this.resolveToken(settings);
      logger?.debug('rest.action.attempt', { ...this.logMeta(), attempt });

      const result = await this.source.produce({ attempt, token });
      if (result.kind === 'success') {
        if (key && cache.isEnabled()) {
          await this.writeCache(key, result.value, this.options.cacheTtlMs ?? settings.cacheTtlMs);
        }
        return result.value;
      }

      const reason = result.failure;
      switch (reason.type) {
        case 'rateLimited': {
          rateLimitedAttempts += 1;
          const decision = this.context.rateLimitPolicy.decide({
            attempt: rateLimitedAttempts,
            status: RATE_LIMIT_STATUS,
            retryAfter: reason.retryAfter,
            retryEnabled: settings.retryWhenRateLimited,
          });
          if (decision.kind === 'retry') {
            logger?.warn('rest.ratelimit.retry', {
              ...this.logMeta(),
              attempt: rateLimitedAttempts,
              delayMs: decision.delayMs,
            });
            await delay(this.context.scheduler, decision.delayMs);
            continue;
          }
          logger?.error('rest.ratelimit.exhausted', { ...this.logMeta(), attempt: rateLimitedAttempts });
          throw new RateLimitedError(`Rate limited after ${rateLimitedAttempts} attempt(s)`, {
            attempts: rateLimitedAttempts,
            retryAfterMs: parseRetryAfter(reason.retryAfter),
          });
        }
        case 'unauthorized': {
          const guard = this.context.tokenGuard;
          if (guard && settings.refreshTokenAutomatically && !refreshedAfterUnauthorized) {
            refreshedAfterUnauthorized = true;
            logger?.warn('rest.action.unauthorized.refresh', { ...this.logMeta(), attempt });
            if (token) guard.forceExpiry(token);
            continue;
          }
          throw new RemoteError('Unauthorized', { status: 401, body: reason.body });
        }
        case 'badRequest':
          throw new BadRequestError(reason.detail, reason.body);
        case 'other':
          throw new RemoteError(`HTTP ${reason.status}`, { status: reason.status, body: reason.body });
      }
    }
  }

  private async resolveToken(settings: Readonly<RestClientSettings>): Promise<Token | undefined> {
    const guard = this.context.tokenGuard;
    if (!guard) return undefined;
    return settings.refreshTokenAutomatically ? guard.ensureValid() : guard.current();
  }

  private async readCache(key: string) {
    try {
      return await this.context.cache.get<T>(key);
    } catch (error) {
      this.context.logger?.warn('rest.cache.get.error', { ...this.logMeta(), error: errorMessage(error) });
      return undefined;
    }
  }

  private async writeCache(key: string, value: T, ttlMs: number): Promise<void> {
    try {
      await this.context.cache.put(key, value, ttlMs);
    } catch (error) {
      this.context.logger?.warn('rest.cache.set.error', { ...this.logMeta(), error: errorMessage(error) });
    }
  }

  private async recordMetrics(startedAt: number, stats: CompletionStats, failed?: { error: unknown }): Promise<void> {
    const sink = this.context.metrics;
    if (!sink?.recordAction) return;
    const finishedAt = Date.now();
    const outcome: ActionOutcome = {
      ok: !failed,
      category: !failed ? 'none' : failed.error instanceof RestActionError ? failed.error.category : 'unknown',
      attempts: stats.attempts,
      cacheHit: stats.cacheHit,
      startedAt: new Date(startedAt),
      finishedAt: new Date(finishedAt),
      durationMs: finishedAt - startedAt,
      errorMessage: failed ? errorMessage(failed.error) : undefined,
    };
    try {
      await sink.recordAction({
        operation: this.options.operation,
        method: this.options.descriptor?.method,
        url: this.options.descriptor?.url,
        fingerprint: this.fingerprint,
        outcome,
      });
    } catch (metricsError) {
      this.context.logger?.warn('rest.metrics.error', { ...this.logMeta(), error: errorMessage(metricsError) });
    }
  }

  private logMeta() {
    return {
      operation: this.options.operation,
      method: this.options.descriptor?.method,
      url: this.options.descriptor?.url,
    };
  }
}

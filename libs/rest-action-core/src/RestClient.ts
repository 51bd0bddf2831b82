import { ResponseCache, type CacheStore } from './cache';
import { parseRestClientSettings, type RestClientSettings, type RestClientSettingsInput } from './config';
import { RateLimitPolicy } from './rateLimitPolicy';
import { RestAction, type RestActionContext, type RestActionOptions } from './RestAction';
import { defaultScheduler } from './scheduler';
import { TokenGuard } from './tokenGuard';
import { fetchTransport } from './transport/fetchTransport';
import type { CredentialRefresher, HttpTransport, Logger, MetricsSink, RestProducer, Scheduler, Token } from './types';

export interface RestClientConfig {
  clientName?: string;
  settings?: RestClientSettingsInput;
  /** Initial credential. Ignored when `tokenGuard` is given. */
  token?: Token;
  refresher?: CredentialRefresher;
  tokenGuard?: TokenGuard;
  transport?: HttpTransport;
  cacheStore?: CacheStore;
  scheduler?: Scheduler;
  logger?: Logger;
  metrics?: MetricsSink;
}

/**
 * Client context shared by every action it creates: settings, response
 * cache, token guard, retry policy, scheduler and transport. Independent
 * clients share no state.
 */
export class RestClient implements RestActionContext {
  readonly clientName: string;
  readonly cache: ResponseCache;
  readonly tokenGuard?: TokenGuard;
  readonly rateLimitPolicy: RateLimitPolicy;
  readonly scheduler: Scheduler;
  readonly transport: HttpTransport;
  readonly logger?: Logger;
  readonly metrics?: MetricsSink;
  private settings: RestClientSettings;

  constructor(config: RestClientConfig = {}) {
    this.settings = parseRestClientSettings(config.settings);
    this.clientName = config.clientName ?? 'rest-client';
    this.logger = config.logger;
    this.metrics = config.metrics;
    this.scheduler = config.scheduler ?? defaultScheduler;
    this.transport = config.transport ?? fetchTransport;
    this.cache = new ResponseCache({
      store: config.cacheStore,
      maxSize: this.settings.cacheLimit,
      enabled: this.settings.useCache,
      logger: this.logger,
    });
    this.rateLimitPolicy = new RateLimitPolicy({
      maxAttempts: this.settings.maxRetryAttempts,
      baseBackoffMs: this.settings.baseBackoffMs,
      maxBackoffMs: this.settings.maxBackoffMs,
    });
    this.tokenGuard =
      config.tokenGuard ??
      (config.token
        ? new TokenGuard({
            token: config.token,
            refresher: config.refresher,
            marginMs: this.settings.tokenExpiryMarginMs,
            logger: this.logger,
          })
        : undefined);
  }

  getSettings(): Readonly<RestClientSettings> {
    return this.settings;
  }

  action<T>(producer: RestProducer<T>, options?: RestActionOptions): RestAction<T> {
    return new RestAction(this, producer, options);
  }

  setUseCache(useCache: boolean): void {
    this.settings = { ...this.settings, useCache };
    this.cache.setEnabled(useCache);
  }

  setRetryWhenRateLimited(retryWhenRateLimited: boolean): void {
    this.settings = { ...this.settings, retryWhenRateLimited };
  }

  setRefreshTokenAutomatically(refreshTokenAutomatically: boolean): void {
    this.settings = { ...this.settings, refreshTokenAutomatically };
  }

  clearCache(): Promise<void> {
    this.logger?.debug('rest.cache.cleared', { client: this.clientName });
    return this.cache.clear();
  }
}

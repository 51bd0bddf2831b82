import { DEFAULT_TOKEN_EXPIRY_MARGIN_MS } from './config';
import { AuthenticationError, errorMessage } from './errors';
import type { CredentialRefresher, Logger, Token } from './types';

export interface TokenInit {
  accessToken: string;
  refreshToken?: string;
  tokenType?: string;
  scopes?: Iterable<string> | string;
  /** Lifetime in seconds, as returned by OAuth token endpoints. */
  expiresIn: number;
}

/** Builds a Token whose expiry is `expiresIn` seconds from `now`. */
export function createToken(init: TokenInit, now = Date.now()): Token {
  const scopes = typeof init.scopes === 'string' ? init.scopes.split(' ').filter(Boolean) : init.scopes ?? [];
  return Object.freeze({
    accessToken: init.accessToken,
    refreshToken: init.refreshToken,
    tokenType: init.tokenType ?? 'Bearer',
    scopes: new Set(scopes),
    expiresAt: now + init.expiresIn * 1000,
  });
}

export function hasScopes(token: Token, ...scopes: string[]): boolean {
  return scopes.every((scope) => token.scopes.has(scope));
}

export interface TokenGuardOptions {
  token: Token;
  refresher?: CredentialRefresher;
  /** Tokens expiring within this window are treated as already expired. */
  marginMs?: number;
  logger?: Logger;
}

type RefreshListener = (token: Token) => void;

/**
 * Owns the current access token. `ensureValid` hands out a non-expired
 * token, refreshing at most once no matter how many callers are waiting.
 */
export class TokenGuard {
  private token: Token;
  private readonly refresher?: CredentialRefresher;
  private readonly marginMs: number;
  private readonly logger?: Logger;
  private readonly listeners = new Set<RefreshListener>();
  private pendingRefresh?: Promise<Token>;
  private failure?: AuthenticationError;

  constructor(options: TokenGuardOptions) {
    this.token = options.token;
    this.refresher = options.refresher;
    this.marginMs = options.marginMs ?? DEFAULT_TOKEN_EXPIRY_MARGIN_MS;
    this.logger = options.logger;
  }

  /** Snapshot of the current token. May be expired. */
  current(): Token {
    return this.token;
  }

  isExpired(now = Date.now()): boolean {
    return this.token.expiresAt - this.marginMs <= now;
  }

  /** Installs a new token and clears any recorded refresh failure. */
  setToken(token: Token): void {
    this.token = token;
    this.failure = undefined;
  }

  /**
   * Marks the current token as expired so the next `ensureValid` refreshes.
   * When `stale` is given, does nothing unless it is still the current
   * token, so a late rejection of an already-replaced token cannot discard
   * its replacement.
   */
  forceExpiry(stale?: Token): void {
    if (stale && stale.accessToken !== this.token.accessToken) {
      this.logger?.debug('auth.token.expiry.skipped', { reason: 'token already replaced' });
      return;
    }
    this.token = Object.freeze({ ...this.token, expiresAt: 0 });
  }

  onRefresh(listener: RefreshListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async ensureValid(): Promise<Token> {
    if (this.failure) {
      throw this.failure;
    }
    if (!this.isExpired()) {
      return this.token;
    }
    if (!this.pendingRefresh) {
      this.pendingRefresh = this.refresh().finally(() => {
        this.pendingRefresh = undefined;
      });
    }
    return this.pendingRefresh;
  }

  private async refresh(): Promise<Token> {
    if (!this.refresher) {
      throw new AuthenticationError('Access token expired and no credential refresher is configured');
    }
    const previous = this.token;
    this.logger?.debug('auth.token.refresh', { expiresAt: previous.expiresAt });
    let next: Token;
    try {
      next = await this.refresher.refresh(previous);
    } catch (error) {
      const failure =
        error instanceof AuthenticationError
          ? error
          : new AuthenticationError(`Token refresh failed: ${errorMessage(error)}`, { cause: error });
      this.failure = failure;
      this.logger?.error('auth.token.refresh.failed', { error: failure.message });
      throw failure;
    }
    this.token = next;
    this.logger?.info('auth.token.refreshed', { expiresAt: next.expiresAt });
    for (const listener of this.listeners) {
      try {
        listener(next);
      } catch (error) {
        this.logger?.warn('auth.token.listener.failed', { error: errorMessage(error) });
      }
    }
    return next;
  }
}

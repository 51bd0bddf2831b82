import { loadRestClientSettingsFromEnv } from './config';
import { RestClient, type RestClientConfig } from './RestClient';
import { fetchTransport } from './transport/fetchTransport';
import type { Logger, LoggerMeta } from './types';

/**
 * Console logger implementation for use with createDefaultRestClient.
 * Logs to console.debug, console.info, console.warn, and console.error.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly prefix?: string) {}

  debug(message: string, meta?: LoggerMeta): void {
    console.debug(this.format(message), meta ?? '');
  }
  info(message: string, meta?: LoggerMeta): void {
    console.info(this.format(message), meta ?? '');
  }
  warn(message: string, meta?: LoggerMeta): void {
    console.warn(this.format(message), meta ?? '');
  }
  error(message: string, meta?: LoggerMeta): void {
    console.error(this.format(message), meta ?? '');
  }

  private format(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }
}

/**
 * Creates a RestClient with settings read from `REST_ACTION_*` environment
 * variables, the fetch transport and a console logger. Explicit settings
 * override the environment.
 *
 * @example
 * ```typescript
 * const client = createDefaultRestClient({
 *   clientName: 'catalog',
 *   settings: { baseUrl: 'https://api.example.com/v1' },
 *   token: createToken({ accessToken, refreshToken, expiresIn: 3600 }),
 *   refresher: createRefreshTokenGrant({ tokenUrl, clientId, clientSecret, transport: fetchTransport }),
 * });
 * ```
 */
export function createDefaultRestClient(
  config: RestClientConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): RestClient {
  const clientName = config.clientName ?? 'rest-client';
  return new RestClient({
    ...config,
    clientName,
    settings: loadRestClientSettingsFromEnv(env, config.settings),
    transport: config.transport ?? fetchTransport,
    logger: config.logger ?? new ConsoleLogger(clientName),
  });
}

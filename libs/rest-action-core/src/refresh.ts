import { z } from 'zod';
import { AuthenticationError, errorMessage } from './errors';
import { readErrorMessage } from './endpoint';
import { createToken } from './tokenGuard';
import type { CredentialRefresher, HttpTransport, Token } from './types';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

export interface RefreshTokenGrantOptions {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  transport: HttpTransport;
  /** Defaults to 30 seconds. */
  timeoutMs?: number;
}

/**
 * OAuth2 `refresh_token` grant with HTTP Basic client authentication.
 * The previous refresh token is kept when the server does not rotate it.
 */
export function createRefreshTokenGrant(options: RefreshTokenGrantOptions): CredentialRefresher {
  const credentials = Buffer.from(`${options.clientId}:${options.clientSecret}`).toString('base64');
  const timeoutMs = options.timeoutMs ?? 30_000;

  return {
    async refresh(current: Token): Promise<Token> {
      if (!current.refreshToken) {
        throw new AuthenticationError('Token has no refresh token');
      }

      const form = new URLSearchParams({ grant_type: 'refresh_token', refresh_token: current.refreshToken });

      let status: number;
      let text: string;
      try {
        const response = await options.transport(
          {
            method: 'POST',
            url: options.tokenUrl,
            headers: {
              authorization: `Basic ${credentials}`,
              'content-type': 'application/x-www-form-urlencoded',
              accept: 'application/json',
            },
            body: form.toString(),
          },
          AbortSignal.timeout(timeoutMs),
        );
        status = response.status;
        text = new TextDecoder().decode(response.body);
      } catch (error) {
        throw new AuthenticationError(`Token request failed: ${errorMessage(error)}`, { cause: error });
      }

      let body: unknown = text;
      let isJson = true;
      try {
        body = JSON.parse(text);
      } catch {
        isJson = false;
      }

      if (status < 200 || status >= 300) {
        const detail = readErrorMessage(body) ?? 'no detail';
        throw new AuthenticationError(`Token request failed with status ${status}: ${detail}`, { status });
      }
      if (!isJson) {
        throw new AuthenticationError(`Token endpoint returned a non-JSON body (status ${status})`, { status });
      }

      const parsed = tokenResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new AuthenticationError(`Malformed token response: ${parsed.error.issues.map((i) => i.message).join('; ')}`, {
          status,
        });
      }

      return createToken({
        accessToken: parsed.data.access_token,
        refreshToken: parsed.data.refresh_token ?? current.refreshToken,
        tokenType: parsed.data.token_type,
        scopes: parsed.data.scope ?? current.scopes,
        expiresIn: parsed.data.expires_in,
      });
    },
  };
}

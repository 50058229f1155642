import { z } from 'zod';
import { AuthStrategy, FetchLike } from '../../types/http';
import { ApiError, TransientResponseError } from '../../utils/errors';
import { parseJsonSafe } from '../../utils/json';
import { logger } from '../../utils/logger';

export class BearerAuth implements AuthStrategy {
  readonly kind = 'bearer';

  constructor(private token: string) {}

  async headers(): Promise<Record<string, string>> {
    return { Authorization: `Bearer ${this.token}` };
  }
}

/** Sends the key verbatim in `header`, e.g. `X-API-KEY` or a raw `Authorization`. */
export class ApiKeyAuth implements AuthStrategy {
  readonly kind = 'api-key';

  constructor(
    private header: string,
    private key: string
  ) {}

  async headers(): Promise<Record<string, string>> {
    return { [this.header]: this.key };
  }
}

export type TokenState = 'no-token' | 'valid' | 'expired';

export interface ExchangeTokenOptions {
  service: string;
  baseUrl: string;
  apiKey: string;
  accessTokenPath?: string;
  refreshTokenPath?: string;
  /** Lifetime assumed for an access token. */
  ttlMs?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
  now?: () => number;
}

const tokenResponseSchema = z.object({
  idToken: z.string().min(1),
  refreshToken: z.string().min(1),
});

// ~58 minutes, just under the one hour the token is issued for.
export const DEFAULT_TOKEN_TTL_MS = 3_500_000;

/**
 * Exchanges a long-lived API key for a short-lived access token and keeps it
 * fresh: an expired token is refreshed, and a failed refresh falls back to a
 * new exchange.
 */
export class ExchangeTokenAuth implements AuthStrategy {
  readonly kind = 'exchange';

  private accessToken: string | null = null;
  private refreshToken: string | null = null;
  private expiresAt = 0;
  private fetchImpl: FetchLike;
  private now: () => number;

  constructor(private options: ExchangeTokenOptions) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.now = options.now ?? Date.now;
  }

  state(): TokenState {
    if (!this.accessToken) {
      return 'no-token';
    }
    return this.now() >= this.expiresAt ? 'expired' : 'valid';
  }

  async headers(): Promise<Record<string, string>> {
    const token = await this.ensureToken();
    return { Authorization: `Bearer ${token}` };
  }

  invalidate(): boolean {
    this.accessToken = null;
    this.refreshToken = null;
    this.expiresAt = 0;
    return true;
  }

  private async ensureToken(): Promise<string> {
    const state = this.state();

    if (state === 'valid' && this.accessToken) {
      return this.accessToken;
    }

    if (state === 'expired' && this.refreshToken) {
      try {
        return await this.exchange(this.options.refreshTokenPath ?? '/auth/refresh-token', {
          refreshToken: this.refreshToken,
        });
      } catch (error: unknown) {
        logger.warn('Token refresh failed, re-authenticating', {
          service: this.options.service,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return this.exchange(this.options.accessTokenPath ?? '/auth/access-token', {
      apiKey: this.options.apiKey,
    });
  }

  private async exchange(path: string, body: Record<string, string>): Promise<string> {
    const res = await this.fetchImpl(`${this.options.baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 30_000),
    });
    const text = await res.text();

    if (res.status === 429 || res.status >= 500) {
      throw new TransientResponseError(
        this.options.service,
        res.status,
        parseJsonSafe(text) ?? text,
        res.status === 429 ? res.headers.get('retry-after') : null
      );
    }
    if (res.status < 200 || res.status >= 300) {
      throw new ApiError(this.options.service, res.status, `Authentication failed: ${text}`);
    }

    const parsed = tokenResponseSchema.safeParse(parseJsonSafe(text));
    if (!parsed.success) {
      throw new ApiError(this.options.service, res.status, 'Authentication failed: token missing from response');
    }

    this.accessToken = parsed.data.idToken;
    this.refreshToken = parsed.data.refreshToken;
    this.expiresAt = this.now() + (this.options.ttlMs ?? DEFAULT_TOKEN_TTL_MS);

    logger.debug('Access token obtained', { service: this.options.service, path });
    return parsed.data.idToken;
  }
}

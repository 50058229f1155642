import { env } from '../../config/env';
import {
  AuthStrategy,
  ErrorMapper,
  FetchInit,
  FetchLike,
  FetchResponse,
  HttpMethod,
  JsonObject,
  PaginateOptions,
  QueryParams,
  RequestOptions,
  RetryOptions,
  Sleep,
} from '../../types/http';
import {
  ApiError,
  RateLimitError,
  RetryExhaustedError,
  TransientResponseError,
  ValidationError,
} from '../../utils/errors';
import { isJsonObject, parseJsonSafe } from '../../utils/json';
import { logger } from '../../utils/logger';
import { BackoffPolicy } from './backoff.policy';
import { defaultErrorMapper } from './error.mapper';

export interface HttpClientOptions {
  /** Vendor name used in errors and logs, e.g. "HubSpot". */
  service: string;
  baseUrl: string;
  auth: AuthStrategy;
  errorMapper?: ErrorMapper;
  timeoutMs?: number;
  retry?: Partial<RetryOptions>;
  defaultHeaders?: Record<string, string>;
  /** Minimum spacing between requests from this client. */
  minRequestIntervalMs?: number;
  fetch?: FetchLike;
  sleep?: Sleep;
  now?: () => number;
  random?: () => number;
}

export const SUCCESS_RESULT = { status: 'success' } as const;
export const NO_CONTENT_RESULT = { status: 'success', message: 'No content' } as const;

const DEFAULT_RESULT_KEYS = ['channels', 'members', 'messages', 'files', 'items'];
const DEFAULT_PAGE_DELAY_MS = 200;
const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

function isTimeoutError(error: Error): boolean {
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

function errorCode(value: unknown): string | undefined {
  if (value instanceof Error && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

// fetch reports connection failures as TypeError('fetch failed') with the socket error as cause.
function isNetworkError(error: unknown): error is Error {
  if (!(error instanceof Error)) {
    return false;
  }
  if (isTimeoutError(error)) {
    return true;
  }
  const code = errorCode(error) ?? errorCode(error.cause);
  if (code && NETWORK_ERROR_CODES.has(code)) {
    return true;
  }
  return error instanceof TypeError && error.message === 'fetch failed';
}

/** Reads `response_metadata.next_cursor`, Slack's cursor location. */
export function slackNextCursor(page: JsonObject): string | undefined {
  const meta = page.response_metadata;
  if (isJsonObject(meta) && typeof meta.next_cursor === 'string') {
    return meta.next_cursor;
  }
  return undefined;
}

/**
 * Authenticated JSON client for one vendor API. Absorbs 429, 5xx and network
 * failures with exponential backoff; every other failure surfaces at once.
 */
export class HttpClient {
  readonly service: string;
  readonly baseUrl: string;
  readonly backoff: BackoffPolicy;

  private auth: AuthStrategy;
  private errorMapper: ErrorMapper;
  private timeoutMs: number;
  private defaultHeaders: Record<string, string>;
  private minRequestIntervalMs: number;
  private fetchImpl: FetchLike;
  private sleep: Sleep;
  private now: () => number;
  private lastRequestAt: number | null = null;

  constructor(options: HttpClientOptions) {
    this.service = options.service;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.auth = options.auth;
    this.errorMapper = options.errorMapper ?? defaultErrorMapper;
    this.timeoutMs = options.timeoutMs ?? env.NEXUS_HTTP_TIMEOUT_MS;
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.minRequestIntervalMs = options.minRequestIntervalMs ?? 0;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.backoff = new BackoffPolicy(
      { maxRetries: env.NEXUS_MAX_RETRIES, ...options.retry },
      options.random,
      this.now
    );
  }

  get<T = JsonObject>(endpoint: string, params?: QueryParams): Promise<T> {
    return this.execute<T>('GET', endpoint, { params });
  }

  post<T = JsonObject>(endpoint: string, body?: unknown, params?: QueryParams): Promise<T> {
    return this.execute<T>('POST', endpoint, { body, params });
  }

  put<T = JsonObject>(endpoint: string, body?: unknown): Promise<T> {
    return this.execute<T>('PUT', endpoint, { body });
  }

  patch<T = JsonObject>(endpoint: string, body?: unknown): Promise<T> {
    return this.execute<T>('PATCH', endpoint, { body });
  }

  delete<T = JsonObject>(endpoint: string, params?: QueryParams): Promise<T> {
    return this.execute<T>('DELETE', endpoint, { params });
  }

  async execute<T = JsonObject>(
    method: HttpMethod,
    endpoint: string,
    options: RequestOptions = {}
  ): Promise<T> {
    const url = this.buildUrl(endpoint, options.params);
    const body = this.serializeBody(options.body);
    const { maxRetries } = this.backoff.options;
    let reauthenticated = false;
    let lastStatus = 0;
    let lastBody: unknown = null;
    let lastError: Error | undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      let res: FetchResponse;

      try {
        await this.throttle();
        res = await this.send(method, url, body, options.headers);
      } catch (error: unknown) {
        if (error instanceof TransientResponseError) {
          lastError = error;
          lastStatus = error.statusCode;
          lastBody = error.body;

          if (attempt < maxRetries) {
            await this.backOff(attempt, error.retryAfter, {
              method,
              endpoint,
              status: error.statusCode,
              reason: 'authentication',
            });
          }
          continue;
        }

        if (!isNetworkError(error)) {
          throw error;
        }

        lastError = error;
        lastStatus = isTimeoutError(error) ? 408 : 503;
        lastBody = isTimeoutError(error)
          ? 'Request timeout'
          : `Cannot connect to ${this.service} API: ${error.message}`;

        if (attempt < maxRetries) {
          await this.backOff(attempt, null, { method, endpoint, reason: error.message });
        }
        continue;
      }

      if (res.status === 429 || res.status >= 500) {
        lastError = undefined;
        lastStatus = res.status;
        lastBody = await this.readBody(res);

        if (attempt < maxRetries) {
          const retryAfter = res.status === 429 ? res.headers.get('retry-after') : null;
          await this.backOff(attempt, retryAfter, { method, endpoint, status: res.status });
        }
        continue;
      }

      if (res.status === 401 && !reauthenticated && attempt < maxRetries && this.auth.invalidate?.()) {
        reauthenticated = true;
        logger.warn('Credential rejected, re-authenticating', {
          service: this.service,
          method,
          endpoint,
        });
        continue;
      }

      return this.handleResponse<T>(res, method, endpoint);
    }

    const attempts = maxRetries + 1;
    logger.error('API retries exhausted', {
      service: this.service,
      method,
      endpoint,
      status: lastStatus,
      attempts,
    });

    if (lastStatus === 429) {
      throw new RateLimitError(this.service, lastBody, attempts);
    }
    throw new RetryExhaustedError(this.service, lastStatus, lastBody, attempts, lastError);
  }

  /**
   * Follows a cursor across pages, accumulating the items of each page until
   * the cursor comes back empty or `limit` items are collected.
   */
  async paginate<T = JsonObject>(endpoint: string, options: PaginateOptions = {}): Promise<T[]> {
    const method = options.method ?? 'GET';
    const cursorParam = options.cursorParam ?? 'cursor';
    const nextCursor = options.nextCursor ?? slackNextCursor;
    const pageDelayMs = options.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS;
    const results: T[] = [];
    let cursor: string | undefined;

    while (true) {
      const cursorField = cursor ? { [cursorParam]: cursor } : {};
      const page =
        method === 'GET'
          ? await this.execute<JsonObject>('GET', endpoint, {
              params: { ...options.params, ...cursorField },
            })
          : await this.execute<JsonObject>('POST', endpoint, {
              params: options.params,
              body: { ...options.body, ...cursorField },
            });

      results.push(...this.pageItems(page, options.resultKey));

      if (options.limit !== undefined && results.length >= options.limit) {
        return results.slice(0, options.limit);
      }

      cursor = nextCursor(page) || undefined;
      if (!cursor) {
        return results;
      }

      await this.sleep(pageDelayMs);
    }
  }

  private pageItems(page: JsonObject, resultKey?: string) {
    const keys = resultKey ? [resultKey] : DEFAULT_RESULT_KEYS;
    for (const key of keys) {
      const value = page[key];
      if (Array.isArray(value)) {
        return value;
      }
    }
    return [];
  }

  private buildUrl(endpoint: string, params?: QueryParams): string {
    const path = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
    const search = new URLSearchParams();

    for (const [key, value] of Object.entries(params ?? {})) {
      if (value === undefined || value === null) {
        continue;
      }
      if (Array.isArray(value)) {
        value.forEach((item) => search.append(key, String(item)));
      } else {
        search.append(key, String(value));
      }
    }

    const query = search.toString();
    return query ? `${this.baseUrl}${path}?${query}` : `${this.baseUrl}${path}`;
  }

  private serializeBody(body: unknown): string | undefined {
    if (body === undefined) {
      return undefined;
    }
    try {
      return JSON.stringify(body);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ValidationError(`Request body for ${this.service} is not valid JSON: ${reason}`);
    }
  }

  private async send(
    method: HttpMethod,
    url: string,
    body: string | undefined,
    headers?: Record<string, string>
  ): Promise<FetchResponse> {
    const init: FetchInit = {
      method,
      headers: {
        'Content-Type': 'application/json',
        ...this.defaultHeaders,
        ...headers,
        ...(await this.auth.headers()),
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    };

    if (body !== undefined) {
      init.body = body;
    }

    return this.fetchImpl(url, init);
  }

  private async throttle(): Promise<void> {
    if (this.minRequestIntervalMs <= 0) {
      return;
    }

    if (this.lastRequestAt !== null) {
      const elapsed = this.now() - this.lastRequestAt;
      if (elapsed < this.minRequestIntervalMs) {
        await this.sleep(this.minRequestIntervalMs - elapsed);
      }
    }
    this.lastRequestAt = this.now();
  }

  private async backOff(
    attempt: number,
    retryAfter: string | null,
    context: Record<string, unknown>
  ): Promise<void> {
    const delayMs = this.backoff.delayFor(attempt, retryAfter);
    logger.warn(`${this.service} request failed, backing off`, {
      service: this.service,
      attempt: attempt + 1,
      maxRetries: this.backoff.options.maxRetries,
      delayMs,
      retryAfter: retryAfter ?? undefined,
      ...context,
    });
    await this.sleep(delayMs);
  }

  private async readBody(res: FetchResponse): Promise<unknown> {
    const text = await res.text();
    return parseJsonSafe(text) ?? text;
  }

  private async handleResponse<T>(res: FetchResponse, method: HttpMethod, endpoint: string): Promise<T> {
    const text = await res.text();
    const payload = parseJsonSafe(text);

    if (res.status < 200 || res.status >= 300) {
      const mapped = this.errorMapper.fromResponse(res.status, payload, text);
      logger.debug('API request rejected', {
        service: this.service,
        method,
        endpoint,
        status: res.status,
        message: mapped.message,
      });
      throw new ApiError(this.service, res.status, mapped.message, {
        code: mapped.code,
        details: mapped.details ?? payload ?? text,
      });
    }

    const failure = this.errorMapper.fromBody?.(payload) ?? null;
    if (failure) {
      throw new ApiError(this.service, res.status, failure.message, {
        code: failure.code,
        details: failure.details,
      });
    }

    logger.debug('API request succeeded', { service: this.service, method, endpoint, status: res.status });

    const result: unknown =
      res.status === 204 ? { ...NO_CONTENT_RESULT } : payload ?? { ...SUCCESS_RESULT };
    return result as T;
  }
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type JsonObject = Record<string, unknown>;

export type QueryValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | Array<string | number | boolean>;

export type QueryParams = Record<string, QueryValue>;

export interface RequestOptions {
  params?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
}

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

/** The slice of the WHATWG Response the client reads. */
export interface FetchResponse {
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

export type Sleep = (ms: number) => Promise<void>;

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the computed delay added or removed at random. */
  jitter: number;
}

export interface AuthStrategy {
  readonly kind: 'bearer' | 'api-key' | 'exchange';
  headers(): Promise<Record<string, string>>;
  /**
   * Drops cached credentials after a 401. Returns true when the next call
   * will obtain fresh ones, which earns the request one immediate retry.
   */
  invalidate?(): boolean;
}

export interface ApiErrorDetails {
  message: string;
  code?: string;
  details?: unknown;
}

export interface ErrorMapper {
  /** Maps a non-2xx response. `payload` is undefined when the body is not JSON. */
  fromResponse(status: number, payload: unknown, rawText: string): ApiErrorDetails;
  /** Inspects a 2xx body; returning details turns it into an ApiError. */
  fromBody?(payload: unknown): ApiErrorDetails | null;
}

export interface PaginateOptions {
  method?: 'GET' | 'POST';
  params?: QueryParams;
  body?: JsonObject;
  /** Array key holding the page's items. Defaults to the first of the common keys present. */
  resultKey?: string;
  /** Name of the query param or body field carrying the cursor. */
  cursorParam?: string;
  nextCursor?: (page: JsonObject) => string | null | undefined;
  limit?: number;
  pageDelayMs?: number;
}

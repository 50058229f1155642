export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    this.name = 'AppError';
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

/**
 * Missing or invalid local configuration. Raised before any network call and
 * never retried.
 */
export class ConfigurationError extends Error {
  public isOperational = true;

  constructor(
    message: string,
    public missing: string[] = [],
    public hint?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export interface ApiErrorOptions {
  code?: string;
  details?: unknown;
  hint?: string;
}

/**
 * Non-retryable API failure: a 4xx other than 429, or a 2xx body that the
 * vendor uses to report failure (Slack `ok: false`, GraphQL `errors`).
 */
export class ApiError extends AppError {
  public code?: string;
  public details?: unknown;
  public hint?: string;

  constructor(
    public service: string,
    statusCode: number,
    message: string,
    options: ApiErrorOptions = {}
  ) {
    super(statusCode, `${service} API error (${statusCode}): ${message}`, true);
    this.name = 'ApiError';
    this.code = options.code;
    this.details = options.details;
    this.hint = options.hint ?? hintForStatus(statusCode);
    Object.setPrototypeOf(this, ApiError.prototype);
  }
}

/**
 * Transient failure (429, 5xx, timeout, connection error) that outlived the
 * retry budget. `statusCode` is the last HTTP status seen, or 408 / 503 when
 * the last attempt never got a response.
 */
export class RetryExhaustedError extends ApiError {
  constructor(
    service: string,
    statusCode: number,
    public body: unknown,
    public attempts: number,
    public cause?: Error
  ) {
    super(service, statusCode, `gave up after ${attempts} attempts`, { details: body });
    this.name = 'RetryExhaustedError';
    Object.setPrototypeOf(this, RetryExhaustedError.prototype);
  }
}

export class RateLimitError extends RetryExhaustedError {
  constructor(service: string, body: unknown, attempts: number) {
    super(service, 429, body, attempts);
    this.name = 'RateLimitError';
    this.hint = 'Rate limit still active, wait a minute and retry';
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

/**
 * A 429 or 5xx answered outside the main request, such as a token exchange.
 * HttpClient treats it like a transient response and backs off.
 */
export class TransientResponseError extends AppError {
  constructor(
    public service: string,
    statusCode: number,
    public body: unknown,
    public retryAfter: string | null = null
  ) {
    super(statusCode, `${service} API error (${statusCode}): temporarily unavailable`, true);
    this.name = 'TransientResponseError';
    Object.setPrototypeOf(this, TransientResponseError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export function hintForStatus(statusCode: number): string | undefined {
  switch (statusCode) {
    case 401:
      return 'Credential rejected, check the token in .env or re-run setup';
    case 403:
      return 'Token lacks permission for this resource';
    case 404:
      return 'Resource not found, check the ID';
    case 409:
      return 'Object may already exist';
    default:
      return undefined;
  }
}

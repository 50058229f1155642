import { RetryOptions } from '../../types/http';
import { ConfigurationError } from '../../utils/errors';

export const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  jitter: 0.1,
};

// Above a third, a jittered delay could come out shorter than the previous attempt's.
export const MAX_JITTER = 1 / 3;

/**
 * Parses a Retry-After header, either delta-seconds or an HTTP date, into
 * milliseconds. Returns null when absent or unparseable.
 */
export function parseRetryAfter(
  value: string | null | undefined,
  now: number = Date.now()
): number | null {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed === '') {
    return null;
  }

  const seconds = Number(trimmed);
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? Math.round(seconds * 1000) : null;
  }

  const date = Date.parse(trimmed);
  return Number.isNaN(date) ? null : Math.max(0, date - now);
}

export class BackoffPolicy {
  readonly options: RetryOptions;

  constructor(
    options: Partial<RetryOptions> = {},
    private random: () => number = Math.random,
    private now: () => number = Date.now
  ) {
    this.options = {
      maxRetries: options.maxRetries ?? DEFAULT_RETRY.maxRetries,
      baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY.baseDelayMs,
      maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY.maxDelayMs,
      jitter: options.jitter ?? DEFAULT_RETRY.jitter,
    };

    const { maxRetries, baseDelayMs, maxDelayMs, jitter } = this.options;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new ConfigurationError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
    }
    if (baseDelayMs < 0 || maxDelayMs < baseDelayMs) {
      throw new ConfigurationError(
        `Invalid backoff bounds: baseDelayMs=${baseDelayMs}, maxDelayMs=${maxDelayMs}`
      );
    }
    if (jitter < 0 || jitter > MAX_JITTER) {
      throw new ConfigurationError(`jitter must be between 0 and ${MAX_JITTER.toFixed(2)}, got ${jitter}`);
    }
  }

  /**
   * Delay before retrying after `attempt` (0-based). A Retry-After value wins
   * outright and is not capped.
   */
  delayFor(attempt: number, retryAfter?: string | null): number {
    const fromHeader = parseRetryAfter(retryAfter, this.now());
    if (fromHeader !== null) {
      return fromHeader;
    }

    const { baseDelayMs, maxDelayMs, jitter } = this.options;
    const delay = baseDelayMs * Math.pow(2, attempt);
    const spread = delay * jitter;
    const jittered = delay + (this.random() * 2 - 1) * spread;

    return Math.round(Math.min(Math.max(0, jittered), maxDelayMs));
  }
}

import { ApiError, AppError, ConfigurationError, ValidationError } from './errors';
import { isJsonObject } from './json';

export const EXIT_CODES = {
  SUCCESS: 0,
  RUNTIME_ERROR: 1,
  CONFIG_ERROR: 2,
} as const;

export interface ErrorPayload {
  error: true;
  message: string;
  status_code: number | null;
  code?: string;
  hint?: string;
  missing?: string[];
}

/** JSON shape emitted in `--json` mode so a calling agent can branch on it. */
export function toErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof ConfigurationError) {
    return {
      error: true,
      message: err.message,
      status_code: null,
      hint: err.hint,
      missing: err.missing,
    };
  }

  if (err instanceof ApiError) {
    const payload: ErrorPayload = {
      error: true,
      message: err.message,
      status_code: err.statusCode,
    };
    if (err.code) payload.code = err.code;
    if (err.hint) payload.hint = err.hint;
    return payload;
  }

  if (err instanceof AppError) {
    return { error: true, message: err.message, status_code: err.statusCode };
  }

  return {
    error: true,
    message: err instanceof Error ? err.message : String(err),
    status_code: null,
  };
}

export function formatErrorLine(err: unknown): string {
  const payload = toErrorPayload(err);
  const line = `[ERROR] ${payload.message}`;
  return payload.hint ? `${line}\n        Hint: ${payload.hint}` : line;
}

export function exitCodeFor(err: unknown): number {
  if (err === undefined || err === null) {
    return EXIT_CODES.SUCCESS;
  }
  return err instanceof ConfigurationError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.RUNTIME_ERROR;
}

/** Parses a user-supplied JSON object argument such as `--data`. */
export function parseJsonInput(raw: string, label = 'data'): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid JSON in --${label}: ${reason}`);
  }

  if (!isJsonObject(parsed)) {
    throw new ValidationError(`--${label} must be a JSON object`);
  }
  return parsed;
}

export function maskSecret(value: string | undefined): string {
  if (!value || value.length < 8) {
    return '***';
  }
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}

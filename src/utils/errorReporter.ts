import * as Sentry from '@sentry/node';
import { env } from '../config/env';
import { AppError, ConfigurationError } from './errors';
import { logger } from './logger';

let initialized = false;

export function initErrorReporting(dsn: string | undefined = env.SENTRY_DSN): boolean {
  if (!dsn || initialized) {
    return initialized;
  }

  Sentry.init({
    dsn,
    environment: env.NODE_ENV,
    tracesSampleRate: 0,
  });
  initialized = true;
  logger.debug('Error reporting enabled');
  return true;
}

export function isOperationalError(err: unknown): boolean {
  return (
    (err instanceof AppError && err.isOperational) ||
    (err instanceof ConfigurationError && err.isOperational)
  );
}

/**
 * Sends unexpected failures to Sentry. Configuration and API errors are
 * expected outcomes and are only logged.
 */
export async function reportError(err: unknown): Promise<void> {
  if (isOperationalError(err)) {
    return;
  }

  logger.error('Unexpected error', {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });

  if (!initialized) {
    return;
  }

  Sentry.captureException(err);
  await Sentry.flush(2000);
}

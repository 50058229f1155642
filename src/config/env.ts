import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import { loadEnvFile } from './credentials';
import { resolveEnvFilePath } from './workspace';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().min(1).optional());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(['error', 'warn', 'info', 'debug']).optional()),
  NEXUS_HTTP_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(60_000)
  ),
  NEXUS_MAX_RETRIES: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(0).max(10).default(3)
  ),
  SENTRY_DSN: optionalString,
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const fieldErrors = Object.entries(parsed.error.flatten().fieldErrors);
    throw new ConfigurationError(
      `Invalid environment variables: ${fieldErrors
        .map(([key, messages]) => `${key} (${(messages ?? []).join(', ')})`)
        .join('; ')}`,
      fieldErrors.map(([key]) => key),
      'Fix the listed values in .env'
    );
  }

  return parsed.data;
}

/**
 * Reads settings from the workspace `.env` and the process environment, which
 * wins. `process.env` itself is never modified.
 */
export function loadAmbientEnv(
  envFile: string = resolveEnvFilePath(),
  source: NodeJS.ProcessEnv = process.env
): Env {
  return parseEnv({ ...loadEnvFile(envFile), ...source });
}

export const env = loadAmbientEnv();

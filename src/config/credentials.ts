import fs from 'fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import { resolveEnvFilePath } from './workspace';

const required = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1)
);

export const CREDENTIAL_SCHEMAS = {
  beam: z.object({ BEAM_API_KEY: required, BEAM_WORKSPACE_ID: required }),
  hubspot: z.object({ HUBSPOT_ACCESS_TOKEN: required }),
  slack: z.object({ SLACK_USER_TOKEN: required }),
  heyreach: z.object({ HEYREACH_API_KEY: required }),
  fathom: z.object({ FATHOM_API_KEY: required }),
  airtable: z.object({ AIRTABLE_API_KEY: required }),
  notion: z.object({ NOTION_API_KEY: required }),
  linear: z.object({ LINEAR_API_KEY: required }),
};

export type IntegrationName = keyof typeof CREDENTIAL_SCHEMAS;

export type CredentialsFor<N extends IntegrationName> = Readonly<
  z.infer<(typeof CREDENTIAL_SCHEMAS)[N]>
>;

export const INTEGRATION_NAMES: readonly IntegrationName[] = [
  'beam',
  'hubspot',
  'slack',
  'heyreach',
  'fathom',
  'airtable',
  'notion',
  'linear',
];

export interface CredentialSource {
  /** Path to a `.env` file. Defaults to the workspace `.env`. */
  envFile?: string;
  /** Fallback variables. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

const SETUP_HINTS: Record<IntegrationName, string> = {
  beam: 'Add BEAM_API_KEY and BEAM_WORKSPACE_ID to .env (Beam settings > API keys)',
  hubspot: 'Add HUBSPOT_ACCESS_TOKEN to .env (HubSpot private app token)',
  slack: 'Add SLACK_USER_TOKEN (xoxp-...) to .env by running the Slack OAuth setup',
  heyreach: 'Add HEYREACH_API_KEY to .env (HeyReach settings > Integrations)',
  fathom: 'Add FATHOM_API_KEY to .env (Fathom settings > API access)',
  airtable: 'Add AIRTABLE_API_KEY to .env (Airtable personal access token)',
  notion: 'Add NOTION_API_KEY to .env and share the target pages with the integration',
  linear: 'Add LINEAR_API_KEY to .env (Linear settings > API)',
};

/**
 * Reads `KEY=value` pairs from a `.env` file. A missing file yields an empty
 * record; the file is never written.
 */
export function loadEnvFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  return dotenv.parse(fs.readFileSync(filePath));
}

/**
 * Resolves the credentials an integration needs. Values from the `.env` file
 * take precedence over the process environment. Throws ConfigurationError
 * listing every missing key.
 */
export function resolveCredentials<N extends IntegrationName>(
  integration: N,
  source: CredentialSource = {}
): CredentialsFor<N> {
  return validateCredentials(integration, CREDENTIAL_SCHEMAS[integration], source);
}

function validateCredentials<S extends z.AnyZodObject>(
  integration: IntegrationName,
  schema: S,
  source: CredentialSource
): Readonly<z.infer<S>> {
  const fileValues = loadEnvFile(source.envFile ?? resolveEnvFilePath());
  const processEnv = source.env ?? process.env;

  const merged: Record<string, string | undefined> = {};
  for (const key of Object.keys(schema.shape)) {
    const fromFile = fileValues[key];
    merged[key] = fromFile && fromFile.trim() !== '' ? fromFile : processEnv[key];
  }

  const parsed = schema.safeParse(merged);
  if (!parsed.success) {
    const missing = Object.keys(parsed.error.flatten().fieldErrors);
    throw new ConfigurationError(
      `${missing.join(', ')} not found in .env or environment`,
      missing,
      SETUP_HINTS[integration]
    );
  }

  return Object.freeze(parsed.data);
}

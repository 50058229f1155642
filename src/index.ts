export {
  CREDENTIAL_SCHEMAS,
  INTEGRATION_NAMES,
  loadEnvFile,
  resolveCredentials,
} from './config/credentials';
export type { CredentialSource, CredentialsFor, IntegrationName } from './config/credentials';
export { findWorkspaceRoot, resolveEnvFilePath } from './config/workspace';
export { loadAmbientEnv, parseEnv } from './config/env';

export { HttpClient, NO_CONTENT_RESULT, SUCCESS_RESULT, slackNextCursor } from './services/http/http.client';
export type { HttpClientOptions } from './services/http/http.client';
export { BackoffPolicy, DEFAULT_RETRY, parseRetryAfter } from './services/http/backoff.policy';
export { ApiKeyAuth, BearerAuth, ExchangeTokenAuth } from './services/http/auth.strategy';
export type { TokenState } from './services/http/auth.strategy';
export {
  defaultErrorMapper,
  explainSlackError,
  graphqlErrorMapper,
  hubspotErrorMapper,
  slackErrorMapper,
} from './services/http/error.mapper';

export { AirtableClient } from './services/integrations/airtable.client';
export { BeamClient } from './services/integrations/beam.client';
export { FathomClient } from './services/integrations/fathom.client';
export { HeyReachClient } from './services/integrations/heyreach.client';
export { HubSpotClient } from './services/integrations/hubspot.client';
export { LinearClient } from './services/integrations/linear.client';
export { NotionClient } from './services/integrations/notion.client';
export { SlackClient } from './services/integrations/slack.client';
export { IntegrationFactory } from './services/integrations/integration.factory';
export type { IntegrationClient, IntegrationClients } from './services/integrations/integration.factory';
export { BaseCacheService } from './services/baseCache.service';
export type { AirtableBaseCache } from './services/baseCache.service';

export {
  ApiError,
  AppError,
  ConfigurationError,
  RateLimitError,
  RetryExhaustedError,
  TransientResponseError,
  ValidationError,
} from './utils/errors';
export {
  EXIT_CODES,
  exitCodeFor,
  formatErrorLine,
  maskSecret,
  parseJsonInput,
  toErrorPayload,
} from './utils/output';
export { initErrorReporting, reportError } from './utils/errorReporter';
export { logger } from './utils/logger';

export type * from './types/http';
export type * from './types/integrations';

import {
  CredentialSource,
  INTEGRATION_NAMES,
  IntegrationName,
  resolveCredentials,
} from '../../config/credentials';
import { TransportOptions } from '../../types/integrations';
import { ConfigurationError } from '../../utils/errors';
import { AirtableClient } from './airtable.client';
import { BeamClient } from './beam.client';
import { FathomClient } from './fathom.client';
import { HeyReachClient } from './heyreach.client';
import { HubSpotClient } from './hubspot.client';
import { LinearClient } from './linear.client';
import { NotionClient } from './notion.client';
import { SlackClient } from './slack.client';

export interface IntegrationClients {
  beam: BeamClient;
  hubspot: HubSpotClient;
  slack: SlackClient;
  heyreach: HeyReachClient;
  fathom: FathomClient;
  airtable: AirtableClient;
  notion: NotionClient;
  linear: LinearClient;
}

export type IntegrationClient = IntegrationClients[IntegrationName];

export interface IntegrationFactoryOptions {
  source?: CredentialSource;
  transport?: TransportOptions;
}

type Builder<N extends IntegrationName> = (
  source: CredentialSource,
  transport: TransportOptions
) => IntegrationClients[N];

const BUILDERS: { [N in IntegrationName]: Builder<N> } = {
  beam: (source, transport) => new BeamClient(resolveCredentials('beam', source), transport),
  hubspot: (source, transport) => new HubSpotClient(resolveCredentials('hubspot', source), transport),
  slack: (source, transport) => new SlackClient(resolveCredentials('slack', source), transport),
  heyreach: (source, transport) => new HeyReachClient(resolveCredentials('heyreach', source), transport),
  fathom: (source, transport) => new FathomClient(resolveCredentials('fathom', source), transport),
  airtable: (source, transport) => new AirtableClient(resolveCredentials('airtable', source), transport),
  notion: (source, transport) => new NotionClient(resolveCredentials('notion', source), transport),
  linear: (source, transport) => new LinearClient(resolveCredentials('linear', source), transport),
};

export class IntegrationFactory {
  static isSupported(name: string): name is IntegrationName {
    return INTEGRATION_NAMES.some((known) => known === name);
  }

  /** Resolves credentials and builds the client; throws ConfigurationError before any request. */
  static create<N extends IntegrationName>(
    name: N,
    options: IntegrationFactoryOptions = {}
  ): IntegrationClients[N] {
    const build: Builder<N> = BUILDERS[name];
    return build(options.source ?? {}, options.transport ?? {});
  }

  static fromName(name: string, options: IntegrationFactoryOptions = {}): IntegrationClient {
    const normalized = name.trim().toLowerCase();
    if (!IntegrationFactory.isSupported(normalized)) {
      throw new ConfigurationError(
        `Unsupported integration: ${name}`,
        [],
        `Supported integrations: ${INTEGRATION_NAMES.join(', ')}`
      );
    }
    return IntegrationFactory.create(normalized, options);
  }
}

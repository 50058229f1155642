import { CredentialsFor, resolveCredentials } from '../../config/credentials';
import { JsonObject } from '../../types/http';
import {
  HubSpotObject,
  HubSpotObjectType,
  HubSpotSearchRequest,
  TransportOptions,
} from '../../types/integrations';
import { isJsonObject } from '../../utils/json';
import { logger } from '../../utils/logger';
import { BearerAuth } from '../http/auth.strategy';
import { hubspotErrorMapper } from '../http/error.mapper';
import { HttpClient } from '../http/http.client';

export const HUBSPOT_BASE_URL = 'https://api.hubapi.com';

export interface HubSpotPage {
  results: HubSpotObject[];
  paging?: { next?: { after: string } };
}

function hubspotNextCursor(page: JsonObject): string | undefined {
  const paging = page.paging;
  if (!isJsonObject(paging) || !isJsonObject(paging.next)) {
    return undefined;
  }
  const after = paging.next.after;
  return typeof after === 'string' ? after : undefined;
}

export class HubSpotClient {
  readonly http: HttpClient;

  constructor(
    credentials: CredentialsFor<'hubspot'> = resolveCredentials('hubspot'),
    options: TransportOptions = {}
  ) {
    this.http = new HttpClient({
      ...options,
      service: 'HubSpot',
      baseUrl: HUBSPOT_BASE_URL,
      auth: new BearerAuth(credentials.HUBSPOT_ACCESS_TOKEN),
      errorMapper: hubspotErrorMapper,
    });
  }

  listObjects(
    objectType: HubSpotObjectType,
    options: { properties?: string[]; limit?: number; after?: string } = {}
  ): Promise<HubSpotPage> {
    return this.http.get<HubSpotPage>(`/crm/v3/objects/${objectType}`, {
      limit: options.limit ?? 10,
      properties: options.properties?.join(','),
      after: options.after,
    });
  }

  /** Walks every page of an object list, following `paging.next.after`. */
  listAllObjects(
    objectType: HubSpotObjectType,
    options: { properties?: string[]; limit?: number } = {}
  ): Promise<HubSpotObject[]> {
    return this.http.paginate<HubSpotObject>(`/crm/v3/objects/${objectType}`, {
      params: { limit: 100, properties: options.properties?.join(',') },
      resultKey: 'results',
      cursorParam: 'after',
      nextCursor: hubspotNextCursor,
      limit: options.limit,
    });
  }

  getObject(objectType: HubSpotObjectType, id: string, properties?: string[]): Promise<HubSpotObject> {
    return this.http.get<HubSpotObject>(`/crm/v3/objects/${objectType}/${encodeURIComponent(id)}`, {
      properties: properties?.join(','),
    });
  }

  searchObjects(objectType: HubSpotObjectType, request: HubSpotSearchRequest): Promise<HubSpotPage> {
    const body: JsonObject = { limit: request.limit ?? 10 };
    if (request.query) body.query = request.query;
    if (request.filters && request.filters.length > 0) {
      body.filterGroups = [{ filters: request.filters }];
    }
    if (request.properties) body.properties = request.properties;
    if (request.after) body.after = request.after;

    return this.http.post<HubSpotPage>(`/crm/v3/objects/${objectType}/search`, body);
  }

  async createObject(objectType: HubSpotObjectType, properties: Record<string, string>): Promise<HubSpotObject> {
    logger.info('HubSpot creating object', { objectType });
    const result = await this.http.post<HubSpotObject>(`/crm/v3/objects/${objectType}`, { properties });
    logger.info('HubSpot object created', { objectType, id: result.id });
    return result;
  }

  updateObject(
    objectType: HubSpotObjectType,
    id: string,
    properties: Record<string, string>
  ): Promise<HubSpotObject> {
    return this.http.patch<HubSpotObject>(`/crm/v3/objects/${objectType}/${encodeURIComponent(id)}`, {
      properties,
    });
  }

  getAssociations(fromType: HubSpotObjectType, id: string, toType: HubSpotObjectType): Promise<JsonObject> {
    return this.http.get(
      `/crm/v4/objects/${fromType}/${encodeURIComponent(id)}/associations/${toType}`
    );
  }

  searchContactsByEmail(email: string): Promise<HubSpotPage> {
    return this.searchObjects('contacts', {
      filters: [{ propertyName: 'email', operator: 'EQ', value: email }],
      properties: ['email', 'firstname', 'lastname', 'company'],
    });
  }
}

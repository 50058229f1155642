import { CredentialsFor, resolveCredentials } from '../../config/credentials';
import { JsonObject } from '../../types/http';
import { HeyReachLead, TransportOptions } from '../../types/integrations';
import { ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { ApiKeyAuth } from '../http/auth.strategy';
import { HttpClient } from '../http/http.client';

export const HEYREACH_BASE_URL = 'https://api.heyreach.io/api/public';

export type CampaignToggle = 'PAUSED' | 'ACTIVE';

// HeyReach allows 300 requests per minute; list endpoints are POSTs with offset/limit.
export class HeyReachClient {
  readonly http: HttpClient;

  constructor(
    credentials: CredentialsFor<'heyreach'> = resolveCredentials('heyreach'),
    options: TransportOptions = {}
  ) {
    this.http = new HttpClient({
      ...options,
      service: 'HeyReach',
      baseUrl: HEYREACH_BASE_URL,
      auth: new ApiKeyAuth('X-API-KEY', credentials.HEYREACH_API_KEY),
    });
  }

  listCampaigns(offset = 0, limit = 50): Promise<JsonObject> {
    return this.http.post('/campaign/GetAll', { offset, limit });
  }

  getCampaign(campaignId: number): Promise<JsonObject> {
    return this.http.post('/campaign/GetById', { campaignId });
  }

  async setCampaignStatus(campaignId: number, status: CampaignToggle): Promise<JsonObject> {
    const action = status === 'PAUSED' ? 'Pause' : 'Resume';
    logger.info('HeyReach toggling campaign', { campaignId, action });
    return this.http.post(`/campaign/${action}`, { campaignId });
  }

  getCampaignLeads(campaignId: number, offset = 0, limit = 100): Promise<JsonObject> {
    return this.http.post('/campaign/GetLeads', { campaignId, offset, limit });
  }

  addLeadsToCampaign(campaignId: number, leads: Array<string | HeyReachLead>): Promise<JsonObject> {
    const formatted = leads.map((lead) =>
      typeof lead === 'string'
        ? { profileUrl: lead }
        : {
            profileUrl: lead.profileUrl,
            firstName: lead.firstName ?? '',
            lastName: lead.lastName ?? '',
            email: lead.email ?? '',
          }
    );

    if (formatted.some((lead) => lead.profileUrl.trim() === '')) {
      throw new ValidationError('Every lead needs a LinkedIn profile URL');
    }

    return this.http.post('/campaign/AddLeadsToCampaign', { campaignId, leads: formatted });
  }

  listLists(offset = 0, limit = 50): Promise<JsonObject> {
    return this.http.post('/list/GetAll', { offset, limit });
  }

  createList(name: string, type?: string): Promise<JsonObject> {
    const body: JsonObject = { name };
    if (type) body.type = type;
    return this.http.post('/list/CreateEmpty', body);
  }

  listAccounts(): Promise<JsonObject> {
    return this.http.post('/li_account/GetAll', {});
  }

  getOverallStats(): Promise<JsonObject> {
    return this.http.post('/analytics/GetOverallStats', {});
  }

  getCampaignStats(campaignId: number): Promise<JsonObject> {
    return this.http.post('/analytics/GetCampaignStats', { campaignId });
  }
}

import { CredentialsFor, resolveCredentials } from '../../config/credentials';
import { JsonObject } from '../../types/http';
import { BeamOutputRating, BeamTaskInput, BeamTaskQuery, TransportOptions } from '../../types/integrations';
import { objectList } from '../../utils/json';
import { logger } from '../../utils/logger';
import { ExchangeTokenAuth } from '../http/auth.strategy';
import { HttpClient } from '../http/http.client';

export const BEAM_BASE_URL = 'https://api.beamstudio.ai';

/**
 * Beam API client. Requests carry a short-lived access token exchanged from
 * the API key, plus the workspace header every Beam endpoint requires.
 */
export class BeamClient {
  readonly http: HttpClient;
  readonly auth: ExchangeTokenAuth;

  constructor(
    credentials: CredentialsFor<'beam'> = resolveCredentials('beam'),
    options: TransportOptions = {}
  ) {
    this.auth = new ExchangeTokenAuth({
      service: 'Beam',
      baseUrl: BEAM_BASE_URL,
      apiKey: credentials.BEAM_API_KEY,
      timeoutMs: 30_000,
      fetch: options.fetch,
      now: options.now,
    });

    this.http = new HttpClient({
      ...options,
      service: 'Beam',
      baseUrl: BEAM_BASE_URL,
      auth: this.auth,
      defaultHeaders: {
        ...options.defaultHeaders,
        'current-workspace-id': credentials.BEAM_WORKSPACE_ID,
      },
    });
  }

  getCurrentUser(): Promise<JsonObject> {
    return this.http.get('/v2/user/me');
  }

  async listAgents(): Promise<JsonObject[]> {
    return objectList(await this.http.get<unknown>('/agent'));
  }

  listTasks(query: BeamTaskQuery = {}): Promise<JsonObject> {
    return this.http.get('/agent-tasks', {
      pageNum: query.pageNum ?? 1,
      pageSize: query.pageSize ?? 20,
      ordering: query.ordering ?? 'createdAt:desc',
      agentId: query.agentId,
      statuses: query.statuses,
      searchQuery: query.searchQuery,
      startDate: query.startDate,
      endDate: query.endDate,
    });
  }

  getTask(taskId: string): Promise<JsonObject> {
    return this.http.get(`/agent-tasks/${encodeURIComponent(taskId)}`);
  }

  async createTask(input: BeamTaskInput): Promise<JsonObject> {
    logger.info('Beam creating task', { agentId: input.agentId });
    const body: JsonObject = { agentId: input.agentId, taskQuery: input.taskQuery };
    if (input.parsingUrls && input.parsingUrls.length > 0) {
      body.parsingUrls = input.parsingUrls.map((url) => url.trim());
    }
    return this.http.post('/agent-tasks', body);
  }

  retryTask(taskId: string): Promise<JsonObject> {
    return this.http.post('/agent-tasks/retry', { taskId });
  }

  approveTask(taskId: string): Promise<JsonObject> {
    return this.http.post(`/agent-tasks/execution/${encodeURIComponent(taskId)}/user-consent`);
  }

  rejectTask(taskId: string, reason?: string): Promise<JsonObject> {
    return this.http.post(
      `/agent-tasks/execution/${encodeURIComponent(taskId)}/rejection`,
      reason ? { reason } : {}
    );
  }

  rateTaskOutput(taskId: string, rating: BeamOutputRating): Promise<JsonObject> {
    return this.http.patch(`/agent-tasks/execution/${encodeURIComponent(taskId)}/output-rating`, rating);
  }

  getAnalytics(agentId: string, startDate: string, endDate: string): Promise<JsonObject> {
    return this.http.get('/agent-tasks/analytics', { agentId, startDate, endDate });
  }

  getAgentGraph(agentId: string, graphId?: string): Promise<JsonObject> {
    return this.http.get(`/agent-graphs/${encodeURIComponent(agentId)}`, { graphId });
  }
}

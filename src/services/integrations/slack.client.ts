import { CredentialsFor, resolveCredentials } from '../../config/credentials';
import { JsonObject } from '../../types/http';
import { TransportOptions } from '../../types/integrations';
import { BearerAuth } from '../http/auth.strategy';
import { explainSlackError, slackErrorMapper } from '../http/error.mapper';
import { HttpClient } from '../http/http.client';

export const SLACK_BASE_URL = 'https://slack.com/api';

export { explainSlackError };

/**
 * Slack Web API client using a user token (xoxp-). Every method name maps to
 * `https://slack.com/api/<method>`; `ok: false` bodies raise ApiError.
 */
export class SlackClient {
  readonly http: HttpClient;

  constructor(
    credentials: CredentialsFor<'slack'> = resolveCredentials('slack'),
    options: TransportOptions = {}
  ) {
    this.http = new HttpClient({
      timeoutMs: 30_000,
      ...options,
      service: 'Slack',
      baseUrl: SLACK_BASE_URL,
      auth: new BearerAuth(credentials.SLACK_USER_TOKEN),
      errorMapper: slackErrorMapper,
      defaultHeaders: { 'Content-Type': 'application/json; charset=utf-8', ...options.defaultHeaders },
    });
  }

  call(method: string, params?: JsonObject): Promise<JsonObject> {
    return this.http.get(`/${method}`, toQuery(params));
  }

  send(method: string, body?: JsonObject): Promise<JsonObject> {
    return this.http.post(`/${method}`, body ?? {});
  }

  listChannels(options: { types?: string; excludeArchived?: boolean; limit?: number } = {}) {
    return this.http.paginate<JsonObject>('/conversations.list', {
      params: {
        types: options.types ?? 'public_channel,private_channel',
        exclude_archived: options.excludeArchived ?? true,
        limit: 200,
      },
      resultKey: 'channels',
      limit: options.limit,
    });
  }

  listUsers(limit?: number) {
    return this.http.paginate<JsonObject>('/users.list', {
      params: { limit: 200 },
      resultKey: 'members',
      limit,
    });
  }

  channelHistory(channel: string, options: { limit?: number; oldest?: string; latest?: string } = {}) {
    return this.http.paginate<JsonObject>('/conversations.history', {
      params: { channel, oldest: options.oldest, latest: options.latest, limit: 200 },
      resultKey: 'messages',
      limit: options.limit ?? 100,
    });
  }

  postMessage(channel: string, text: string, threadTs?: string): Promise<JsonObject> {
    const body: JsonObject = { channel, text };
    if (threadTs) body.thread_ts = threadTs;
    return this.send('chat.postMessage', body);
  }

  updateMessage(channel: string, ts: string, text: string): Promise<JsonObject> {
    return this.send('chat.update', { channel, ts, text });
  }

  deleteMessage(channel: string, ts: string): Promise<JsonObject> {
    return this.send('chat.delete', { channel, ts });
  }

  addReaction(channel: string, timestamp: string, name: string): Promise<JsonObject> {
    return this.send('reactions.add', { channel, timestamp, name: name.replace(/:/g, '') });
  }

  userInfo(user: string): Promise<JsonObject> {
    return this.call('users.info', { user });
  }
}

type Scalar = string | number | boolean;

function isScalar(value: unknown): value is Scalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

// Slack takes lists as comma-separated values and structured arguments as JSON strings.
function toQuery(params?: JsonObject) {
  const query: Record<string, Scalar> = {};
  for (const [key, value] of Object.entries(params ?? {})) {
    if (value === undefined || value === null) {
      continue;
    }
    if (isScalar(value)) {
      query[key] = value;
    } else if (Array.isArray(value) && value.every(isScalar)) {
      query[key] = value.join(',');
    } else {
      query[key] = JSON.stringify(value);
    }
  }
  return query;
}

import { AirtableClient } from '../../src/services/integrations/airtable.client';
import { BeamClient } from '../../src/services/integrations/beam.client';
import { FathomClient } from '../../src/services/integrations/fathom.client';
import { HeyReachClient } from '../../src/services/integrations/heyreach.client';
import { HubSpotClient } from '../../src/services/integrations/hubspot.client';
import { IntegrationFactory } from '../../src/services/integrations/integration.factory';
import { LinearClient } from '../../src/services/integrations/linear.client';
import { NotionClient } from '../../src/services/integrations/notion.client';
import { SlackClient } from '../../src/services/integrations/slack.client';
import { ApiError, ConfigurationError, RateLimitError, ValidationError } from '../../src/utils/errors';
import { captureError, createFetchMock, createSleepMock, fakeResponse, requestBody } from '../helpers/fakeFetch';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

function transport() {
  const fetchMock = createFetchMock();
  const sleep = createSleepMock();
  return { fetchMock, sleep, options: { fetch: fetchMock, sleep, random: () => 0.5 } };
}

describe('IntegrationFactory', () => {
  const source = { envFile: '/nonexistent/.env', env: { SLACK_USER_TOKEN: 'xoxp-test' } };

  it('should create a client for a supported integration', () => {
    expect(IntegrationFactory.create('slack', { source })).toBeInstanceOf(SlackClient);
  });

  it('should resolve names case-insensitively', () => {
    expect(IntegrationFactory.fromName(' Slack ', { source })).toBeInstanceOf(SlackClient);
  });

  it('should reject unsupported integrations', () => {
    expect(() => IntegrationFactory.fromName('Salesforce')).toThrow(ConfigurationError);
    expect(() => IntegrationFactory.fromName('Salesforce')).toThrow('Unsupported integration: Salesforce');
  });

  it('should report supported names', () => {
    expect(IntegrationFactory.isSupported('notion')).toBe(true);
    expect(IntegrationFactory.isSupported('gmail')).toBe(false);
  });
});

describe('BeamClient', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should exchange the key and send the workspace header', async () => {
    const { fetchMock, options } = transport();
    fetchMock
      .mockResolvedValueOnce(fakeResponse(201, { idToken: 'id-1', refreshToken: 'r-1' }))
      .mockResolvedValueOnce(fakeResponse(201, { id: 'task-1', status: 'QUEUED' }));
    const client = new BeamClient({ BEAM_API_KEY: 'test-key', BEAM_WORKSPACE_ID: 'ws-test' }, options);

    const task = await client.createTask({
      agentId: 'agent-1',
      taskQuery: 'Summarize the inbox',
      parsingUrls: [' https://example.com/doc '],
    });

    expect(task).toEqual({ id: 'task-1', status: 'QUEUED' });
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.beamstudio.ai/auth/access-token');
    const [url, init] = fetchMock.mock.calls[1];
    expect(url).toBe('https://api.beamstudio.ai/agent-tasks');
    expect(init.headers.Authorization).toBe('Bearer id-1');
    expect(init.headers['current-workspace-id']).toBe('ws-test');
    expect(requestBody(init)).toEqual({
      agentId: 'agent-1',
      taskQuery: 'Summarize the inbox',
      parsingUrls: ['https://example.com/doc'],
    });
  });

  it('should re-authenticate once after a 401', async () => {
    const { fetchMock, sleep, options } = transport();
    fetchMock
      .mockResolvedValueOnce(fakeResponse(201, { idToken: 'id-1', refreshToken: 'r-1' }))
      .mockResolvedValueOnce(fakeResponse(401, { message: 'Token expired' }))
      .mockResolvedValueOnce(fakeResponse(201, { idToken: 'id-2', refreshToken: 'r-2' }))
      .mockResolvedValueOnce(fakeResponse(200, { id: 'user-1' }));
    const client = new BeamClient({ BEAM_API_KEY: 'test-key', BEAM_WORKSPACE_ID: 'ws-test' }, options);

    await expect(client.getCurrentUser()).resolves.toEqual({ id: 'user-1' });
    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(fetchMock.mock.calls[3][1].headers.Authorization).toBe('Bearer id-2');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should wait out a rate-limited token exchange', async () => {
    const { fetchMock, sleep, options } = transport();
    fetchMock
      .mockResolvedValueOnce(fakeResponse(429, 'Too Many Requests', { 'Retry-After': '1' }))
      .mockResolvedValueOnce(fakeResponse(201, { idToken: 'id-1', refreshToken: 'r-1' }))
      .mockResolvedValueOnce(fakeResponse(200, { id: 'user-1' }));
    const client = new BeamClient({ BEAM_API_KEY: 'test-key', BEAM_WORKSPACE_ID: 'ws-test' }, options);

    await expect(client.getCurrentUser()).resolves.toEqual({ id: 'user-1' });
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      'https://api.beamstudio.ai/auth/access-token',
      'https://api.beamstudio.ai/auth/access-token',
      'https://api.beamstudio.ai/v2/user/me',
    ]);
    expect(sleep.mock.calls).toEqual([[1000]]);
  });

  it('should back off when the token endpoint fails with a 5xx', async () => {
    const { fetchMock, sleep, options } = transport();
    fetchMock
      .mockResolvedValueOnce(fakeResponse(503, 'down'))
      .mockResolvedValueOnce(fakeResponse(201, { idToken: 'id-1', refreshToken: 'r-1' }))
      .mockResolvedValueOnce(fakeResponse(200, { id: 'user-1' }));
    const client = new BeamClient({ BEAM_API_KEY: 'test-key', BEAM_WORKSPACE_ID: 'ws-test' }, options);

    await expect(client.getCurrentUser()).resolves.toEqual({ id: 'user-1' });
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(fetchMock.mock.calls[2][1].headers.Authorization).toBe('Bearer id-1');
    expect(sleep.mock.calls).toEqual([[1000]]);
  });

  it('should report an exhausted rate limit on the token endpoint', async () => {
    const { fetchMock, options } = transport();
    fetchMock.mockResolvedValue(fakeResponse(429, 'Too Many Requests'));
    const client = new BeamClient(
      { BEAM_API_KEY: 'test-key', BEAM_WORKSPACE_ID: 'ws-test' },
      { ...options, retry: { maxRetries: 1 } }
    );

    const error = await captureError(client.getCurrentUser());

    expect(error).toBeInstanceOf(RateLimitError);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should return an empty agent list for an empty body', async () => {
    const { fetchMock, options } = transport();
    fetchMock
      .mockResolvedValueOnce(fakeResponse(201, { idToken: 'id-1', refreshToken: 'r-1' }))
      .mockResolvedValueOnce(fakeResponse(200, ''))
      .mockResolvedValueOnce(fakeResponse(200, [{ id: 'agent-1' }, 'noise']));
    const client = new BeamClient({ BEAM_API_KEY: 'test-key', BEAM_WORKSPACE_ID: 'ws-test' }, options);

    await expect(client.listAgents()).resolves.toEqual([]);
    await expect(client.listAgents()).resolves.toEqual([{ id: 'agent-1' }]);
  });

  it('should list tasks with default paging', async () => {
    const { fetchMock, options } = transport();
    fetchMock
      .mockResolvedValueOnce(fakeResponse(201, { idToken: 'id-1', refreshToken: 'r-1' }))
      .mockResolvedValueOnce(fakeResponse(200, { data: [], count: 0 }));
    const client = new BeamClient({ BEAM_API_KEY: 'test-key', BEAM_WORKSPACE_ID: 'ws-test' }, options);

    await client.listTasks({ agentId: 'agent-1' });

    const query = new URL(fetchMock.mock.calls[1][0]).searchParams;
    expect(query.get('pageNum')).toBe('1');
    expect(query.get('pageSize')).toBe('20');
    expect(query.get('ordering')).toBe('createdAt:desc');
    expect(query.get('agentId')).toBe('agent-1');
  });
});

describe('HubSpotClient', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should search contacts by email', async () => {
    const { fetchMock, options } = transport();
    fetchMock.mockResolvedValueOnce(
      fakeResponse(200, { total: 1, results: [{ id: '101', properties: { email: 'jane@example.com' } }] })
    );
    const client = new HubSpotClient({ HUBSPOT_ACCESS_TOKEN: 'test-token' }, options);

    const page = await client.searchContactsByEmail('jane@example.com');

    expect(page.results[0].id).toBe('101');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.hubapi.com/crm/v3/objects/contacts/search');
    expect(init.headers.Authorization).toBe('Bearer test-token');
    expect(requestBody(init)).toEqual({
      limit: 10,
      filterGroups: [{ filters: [{ propertyName: 'email', operator: 'EQ', value: 'jane@example.com' }] }],
      properties: ['email', 'firstname', 'lastname', 'company'],
    });
  });

  it('should surface conflicts with the HubSpot category', async () => {
    const { fetchMock, sleep, options } = transport();
    fetchMock.mockResolvedValueOnce(
      fakeResponse(409, { status: 'error', message: 'Contact already exists', category: 'CONFLICT' })
    );
    const client = new HubSpotClient({ HUBSPOT_ACCESS_TOKEN: 'test-token' }, options);

    const error = await captureError(client.createObject('contacts', { email: 'jane@example.com' }));

    expect(error).toBeInstanceOf(ApiError);
    expect(sleep).not.toHaveBeenCalled();
    if (error instanceof ApiError) {
      expect(error.statusCode).toBe(409);
      expect(error.code).toBe('CONFLICT');
      expect(error.hint).toBe('Object may already exist');
    }
  });

  it('should follow paging.next.after across pages', async () => {
    const { fetchMock, options } = transport();
    fetchMock
      .mockResolvedValueOnce(
        fakeResponse(200, { results: [{ id: '1', properties: {} }], paging: { next: { after: '2' } } })
      )
      .mockResolvedValueOnce(fakeResponse(200, { results: [{ id: '2', properties: {} }] }));
    const client = new HubSpotClient({ HUBSPOT_ACCESS_TOKEN: 'test-token' }, options);

    const objects = await client.listAllObjects('deals');

    expect(objects.map((object) => object.id)).toEqual(['1', '2']);
    expect(fetchMock.mock.calls[1][0]).toBe('https://api.hubapi.com/crm/v3/objects/deals?limit=100&after=2');
  });
});

describe('SlackClient', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should raise ApiError for ok:false responses', async () => {
    const { fetchMock, sleep, options } = transport();
    fetchMock.mockResolvedValueOnce(fakeResponse(200, { ok: false, error: 'channel_not_found' }));
    const client = new SlackClient({ SLACK_USER_TOKEN: 'xoxp-test' }, options);

    const error = await captureError(client.postMessage('C404', 'hello'));

    expect(error).toBeInstanceOf(ApiError);
    expect(sleep).not.toHaveBeenCalled();
    if (error instanceof ApiError) {
      expect(error.statusCode).toBe(200);
      expect(error.code).toBe('channel_not_found');
      expect(error.message).toBe(
        'Slack API error (200): channel_not_found: Channel does not exist or you lack access'
      );
    }
  });

  it('should post messages as JSON with a thread', async () => {
    const { fetchMock, options } = transport();
    fetchMock.mockResolvedValueOnce(fakeResponse(200, { ok: true, ts: '1700000000.000200' }));
    const client = new SlackClient({ SLACK_USER_TOKEN: 'xoxp-test' }, options);

    await client.postMessage('C1', 'hello', '1700000000.000100');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://slack.com/api/chat.postMessage');
    expect(init.headers['Content-Type']).toBe('application/json; charset=utf-8');
    expect(init.headers.Authorization).toBe('Bearer xoxp-test');
    expect(requestBody(init)).toEqual({ channel: 'C1', text: 'hello', thread_ts: '1700000000.000100' });
  });

  it('should strip colons from reaction names', async () => {
    const { fetchMock, options } = transport();
    fetchMock.mockResolvedValueOnce(fakeResponse(200, { ok: true }));
    const client = new SlackClient({ SLACK_USER_TOKEN: 'xoxp-test' }, options);

    await client.addReaction('C1', '1700000000.000100', ':thumbsup:');

    expect(requestBody(fetchMock.mock.calls[0][1])).toEqual({
      channel: 'C1',
      timestamp: '1700000000.000100',
      name: 'thumbsup',
    });
  });

  it('should serialize list and structured arguments for GET methods', async () => {
    const { fetchMock, options } = transport();
    fetchMock.mockResolvedValueOnce(fakeResponse(200, { ok: true }));
    const client = new SlackClient({ SLACK_USER_TOKEN: 'xoxp-test' }, options);

    await client.call('conversations.list', {
      types: ['public_channel', 'im'],
      limit: 5,
      metadata: { source: 'nexus' },
      cursor: null,
    });

    const query = new URL(fetchMock.mock.calls[0][0]).searchParams;
    expect(query.get('types')).toBe('public_channel,im');
    expect(query.get('limit')).toBe('5');
    expect(query.get('metadata')).toBe('{"source":"nexus"}');
    expect(query.has('cursor')).toBe(false);
  });

  it('should list channels across cursor pages', async () => {
    const { fetchMock, options } = transport();
    fetchMock
      .mockResolvedValueOnce(
        fakeResponse(200, { ok: true, channels: [{ id: 'C1' }], response_metadata: { next_cursor: 'dXNlcjpVMDYx' } })
      )
      .mockResolvedValueOnce(fakeResponse(200, { ok: true, channels: [{ id: 'C2' }] }));
    const client = new SlackClient({ SLACK_USER_TOKEN: 'xoxp-test' }, options);

    const channels = await client.listChannels();

    expect(channels).toEqual([{ id: 'C1' }, { id: 'C2' }]);
    const query = new URL(fetchMock.mock.calls[1][0]).searchParams;
    expect(query.get('types')).toBe('public_channel,private_channel');
    expect(query.get('exclude_archived')).toBe('true');
    expect(query.get('cursor')).toBe('dXNlcjpVMDYx');
  });
});

describe('HeyReachClient', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should pause a campaign with the API key header', async () => {
    const { fetchMock, options } = transport();
    fetchMock.mockResolvedValueOnce(fakeResponse(200, ''));
    const client = new HeyReachClient({ HEYREACH_API_KEY: 'test-key' }, options);

    await expect(client.setCampaignStatus(42, 'PAUSED')).resolves.toEqual({ status: 'success' });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.heyreach.io/api/public/campaign/Pause');
    expect(init.headers['X-API-KEY']).toBe('test-key');
    expect(requestBody(init)).toEqual({ campaignId: 42 });
  });

  it('should normalize leads before adding them', async () => {
    const { fetchMock, options } = transport();
    fetchMock.mockResolvedValueOnce(fakeResponse(200, { addedLeadsCount: 2 }));
    const client = new HeyReachClient({ HEYREACH_API_KEY: 'test-key' }, options);

    await client.addLeadsToCampaign(7, [
      'https://www.linkedin.com/in/jane-doe',
      { profileUrl: 'https://www.linkedin.com/in/john-roe', firstName: 'John' },
    ]);

    expect(requestBody(fetchMock.mock.calls[0][1])).toEqual({
      campaignId: 7,
      leads: [
        { profileUrl: 'https://www.linkedin.com/in/jane-doe' },
        { profileUrl: 'https://www.linkedin.com/in/john-roe', firstName: 'John', lastName: '', email: '' },
      ],
    });
  });

  it('should reject leads without a profile URL', () => {
    const { fetchMock, options } = transport();
    const client = new HeyReachClient({ HEYREACH_API_KEY: 'test-key' }, options);

    expect(() => client.addLeadsToCampaign(7, [' '])).toThrow(ValidationError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('FathomClient', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should send meeting filters as query parameters', async () => {
    const { fetchMock, options } = transport();
    fetchMock.mockResolvedValueOnce(fakeResponse(200, { items: [] }));
    const client = new FathomClient({ FATHOM_API_KEY: 'test-key' }, options);

    await client.listMeetings({ domain: 'example.com', includeActionItems: false });

    const [url, init] = fetchMock.mock.calls[0];
    const query = new URL(url).searchParams;
    expect(init.headers['X-Api-Key']).toBe('test-key');
    expect(query.get('include_summary')).toBe('true');
    expect(query.get('include_action_items')).toBe('false');
    expect(query.get('limit')).toBe('50');
    expect(query.get('calendar_invitees_domains[]')).toBe('example.com');
  });

  it('should return the transcript when recording metadata fails', async () => {
    const { fetchMock, options } = transport();
    fetchMock
      .mockResolvedValueOnce(fakeResponse(200, { transcript: [{ speaker: 'Jane', text: 'Hi' }] }))
      .mockResolvedValueOnce(fakeResponse(404, { message: 'Recording not found' }));
    const client = new FathomClient({ FATHOM_API_KEY: 'test-key' }, options);

    const result = await client.getTranscriptWithRecording('rec-1');

    expect(result).toEqual({
      transcript: { transcript: [{ speaker: 'Jane', text: 'Hi' }] },
      recording: null,
    });
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.fathom.ai/external/v1/recordings/rec-1/transcript');
  });
});

describe('AirtableClient', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should map bases with defaults for missing fields', async () => {
    const { fetchMock, options } = transport();
    fetchMock.mockResolvedValueOnce(
      fakeResponse(200, { bases: [{ id: 'app1', name: 'CRM', permissionLevel: 'create' }, { id: 'app2' }] })
    );
    const client = new AirtableClient({ AIRTABLE_API_KEY: 'test-key' }, options);

    await expect(client.listBases()).resolves.toEqual([
      { id: 'app1', name: 'CRM', permission_level: 'create' },
      { id: 'app2', name: 'Unnamed', permission_level: 'unknown' },
    ]);
  });

  it('should map table schemas to snake case with choices', async () => {
    const { fetchMock, options } = transport();
    fetchMock.mockResolvedValueOnce(
      fakeResponse(200, {
        tables: [
          {
            id: 'tbl1',
            name: 'Leads',
            primaryFieldId: 'fld1',
            fields: [
              { id: 'fld1', name: 'Name', type: 'singleLineText' },
              {
                id: 'fld2',
                name: 'Stage',
                type: 'singleSelect',
                options: { choices: [{ id: 'sel1', name: 'New' }, { id: 'sel2', name: 'Won' }] },
              },
            ],
          },
        ],
      })
    );
    const client = new AirtableClient({ AIRTABLE_API_KEY: 'test-key' }, options);

    await expect(client.getBaseSchema('app1')).resolves.toEqual([
      {
        id: 'tbl1',
        name: 'Leads',
        primary_field_id: 'fld1',
        fields: [
          { id: 'fld1', name: 'Name', type: 'singleLineText' },
          { id: 'fld2', name: 'Stage', type: 'singleSelect', choices: ['New', 'Won'] },
        ],
      },
    ]);
  });

  it('should write records in batches of ten', async () => {
    const { fetchMock, options } = transport();
    const records = Array.from({ length: 12 }, (_, i) => ({ Name: `Lead ${i}` }));
    const echo = (offset: number, count: number) => ({
      records: Array.from({ length: count }, (_, i) => ({ id: `rec${offset + i}`, fields: {} })),
    });
    fetchMock
      .mockResolvedValueOnce(fakeResponse(200, echo(0, 10)))
      .mockResolvedValueOnce(fakeResponse(200, echo(10, 2)));
    const client = new AirtableClient({ AIRTABLE_API_KEY: 'test-key' }, options);

    const created = await client.createRecords('app1', 'Leads', records);

    expect(created).toHaveLength(12);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.airtable.com/v0/app1/Leads');
    expect(requestBody(fetchMock.mock.calls[0][1])).toEqual({
      records: records.slice(0, 10).map((fields) => ({ fields })),
      typecast: false,
    });
    expect(requestBody(fetchMock.mock.calls[1][1])).toEqual({
      records: records.slice(10).map((fields) => ({ fields })),
      typecast: false,
    });
  });

  it('should follow the offset cursor when listing records', async () => {
    const { fetchMock, options } = transport();
    fetchMock
      .mockResolvedValueOnce(fakeResponse(200, { records: [{ id: 'rec1', fields: {} }], offset: 'itr1' }))
      .mockResolvedValueOnce(fakeResponse(200, { records: [{ id: 'rec2', fields: {} }] }));
    const client = new AirtableClient({ AIRTABLE_API_KEY: 'test-key' }, options);

    const records = await client.listRecords('app1', 'Leads', { view: 'Grid view' });

    expect(records.map((record) => record.id)).toEqual(['rec1', 'rec2']);
    const query = new URL(fetchMock.mock.calls[1][0]).searchParams;
    expect(query.get('offset')).toBe('itr1');
    expect(query.get('view')).toBe('Grid view');
    expect(query.get('pageSize')).toBe('100');
  });

  it('should delete records by repeated ids', async () => {
    const { fetchMock, options } = transport();
    fetchMock.mockResolvedValueOnce(fakeResponse(200, { records: [] }));
    const client = new AirtableClient({ AIRTABLE_API_KEY: 'test-key' }, options);

    await expect(client.deleteRecords('app1', 'Leads', ['rec1', 'rec2'])).resolves.toEqual(['rec1', 'rec2']);
    expect(new URL(fetchMock.mock.calls[0][0]).searchParams.getAll('records[]')).toEqual(['rec1', 'rec2']);
  });
});

describe('NotionClient', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should send the Notion version header', async () => {
    const { fetchMock, options } = transport();
    fetchMock.mockResolvedValueOnce(fakeResponse(200, { object: 'user', id: 'bot-1' }));
    const client = new NotionClient({ NOTION_API_KEY: 'test-secret' }, options);

    await client.getCurrentUser();

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.notion.com/v1/users/me');
    expect(init.headers['Notion-Version']).toBe('2022-06-28');
    expect(init.headers.Authorization).toBe('Bearer test-secret');
  });

  it('should page through a database query while has_more is set', async () => {
    const { fetchMock, sleep, options } = transport();
    fetchMock
      .mockResolvedValueOnce(fakeResponse(200, { results: [{ id: 'p1' }], has_more: true, next_cursor: 'c1' }))
      .mockResolvedValueOnce(fakeResponse(200, { results: [{ id: 'p2' }], has_more: false, next_cursor: null }));
    const client = new NotionClient({ NOTION_API_KEY: 'test-secret' }, { ...options, now: () => 0 });

    const pages = await client.queryDatabase('db1');

    expect(pages).toEqual([{ id: 'p1' }, { id: 'p2' }]);
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.notion.com/v1/databases/db1/query');
    expect(requestBody(fetchMock.mock.calls[1][1])).toEqual({ page_size: 100, start_cursor: 'c1' });
    expect(sleep.mock.calls).toEqual([[200], [350]]);
  });
});

describe('LinearClient', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should send the API key without a Bearer prefix', async () => {
    const { fetchMock, options } = transport();
    fetchMock.mockResolvedValueOnce(fakeResponse(200, { data: { viewer: { id: 'u1', name: 'Jane' } } }));
    const client = new LinearClient({ LINEAR_API_KEY: 'lin_api_test' }, options);

    await expect(client.getViewer()).resolves.toEqual({ id: 'u1', name: 'Jane' });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.linear.app/graphql');
    expect(init.headers.Authorization).toBe('lin_api_test');
  });

  it('should filter issues by project and state', async () => {
    const { fetchMock, options } = transport();
    fetchMock.mockResolvedValueOnce(
      fakeResponse(200, { data: { issues: { nodes: [{ id: 'i1', identifier: 'ENG-1' }] } } })
    );
    const client = new LinearClient({ LINEAR_API_KEY: 'lin_api_test' }, options);

    const issues = await client.listIssues({ projectName: 'Launch', states: ['Todo'] });

    expect(issues).toEqual([{ id: 'i1', identifier: 'ENG-1' }]);
    const body = requestBody(fetchMock.mock.calls[0][1]);
    expect(body).toMatchObject({
      variables: {
        filter: { project: { name: { eq: 'Launch' } }, state: { name: { in: ['Todo'] } } },
        first: 50,
      },
    });
  });

  it('should raise GraphQL errors returned with HTTP 200', async () => {
    const { fetchMock, sleep, options } = transport();
    fetchMock.mockResolvedValueOnce(
      fakeResponse(200, { data: null, errors: [{ message: 'Entity not found', extensions: { code: 'NOT_FOUND' } }] })
    );
    const client = new LinearClient({ LINEAR_API_KEY: 'lin_api_test' }, options);

    const error = await captureError(client.addComment('i404', 'ping'));

    expect(error).toBeInstanceOf(ApiError);
    expect(sleep).not.toHaveBeenCalled();
    if (error instanceof ApiError) {
      expect(error.code).toBe('NOT_FOUND');
      expect(error.message).toBe('Linear API error (200): Entity not found');
    }
  });

  it('should refuse an empty update', async () => {
    const { fetchMock, options } = transport();
    const client = new LinearClient({ LINEAR_API_KEY: 'lin_api_test' }, options);

    await expect(client.updateIssue('i1', {})).rejects.toThrow('At least one field must be specified for update');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

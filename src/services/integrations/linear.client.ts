import { CredentialsFor, resolveCredentials } from '../../config/credentials';
import { JsonObject } from '../../types/http';
import { LinearIssueInput, LinearIssueUpdate, TransportOptions } from '../../types/integrations';
import { ValidationError } from '../../utils/errors';
import { isJsonObject, objectList, readPath } from '../../utils/json';
import { ApiKeyAuth } from '../http/auth.strategy';
import { graphqlErrorMapper } from '../http/error.mapper';
import { HttpClient } from '../http/http.client';

export const LINEAR_BASE_URL = 'https://api.linear.app';

const ISSUE_FIELDS = `
  id
  identifier
  title
  state { id name }
  assignee { name }
  priority
  description
  createdAt
  updatedAt
`;

const VIEWER_QUERY = `
  query Viewer {
    viewer { id name email }
  }
`;

const ISSUES_QUERY = `
  query Issues($filter: IssueFilter, $first: Int) {
    issues(filter: $filter, first: $first) {
      nodes { ${ISSUE_FIELDS} }
    }
  }
`;

const CREATE_ISSUE_MUTATION = `
  mutation CreateIssue($input: IssueCreateInput!) {
    issueCreate(input: $input) {
      success
      issue { id identifier title state { name } }
    }
  }
`;

const UPDATE_ISSUE_MUTATION = `
  mutation UpdateIssue($id: String!, $input: IssueUpdateInput!) {
    issueUpdate(id: $id, input: $input) {
      success
      issue { id identifier title state { name } }
    }
  }
`;

const ADD_COMMENT_MUTATION = `
  mutation AddComment($issueId: String!, $body: String!) {
    commentCreate(input: { issueId: $issueId, body: $body }) {
      success
      comment { id body }
    }
  }
`;

function objectAt(source: unknown, ...keys: string[]): JsonObject {
  const value = readPath(source, ...keys);
  return isJsonObject(value) ? value : {};
}

/** Linear GraphQL client. The API key goes in `Authorization` as-is, without "Bearer". */
export class LinearClient {
  readonly http: HttpClient;

  constructor(
    credentials: CredentialsFor<'linear'> = resolveCredentials('linear'),
    options: TransportOptions = {}
  ) {
    this.http = new HttpClient({
      ...options,
      service: 'Linear',
      baseUrl: LINEAR_BASE_URL,
      auth: new ApiKeyAuth('Authorization', credentials.LINEAR_API_KEY),
      errorMapper: graphqlErrorMapper,
    });
  }

  /** Runs a query or mutation and returns its `data`. */
  async request(document: string, variables?: JsonObject): Promise<JsonObject> {
    const payload: JsonObject = { query: document };
    if (variables) payload.variables = variables;

    const response = await this.http.post('/graphql', payload);
    return objectAt(response, 'data');
  }

  async getViewer(): Promise<JsonObject> {
    return objectAt(await this.request(VIEWER_QUERY), 'viewer');
  }

  async listIssues(options: { projectName?: string; states?: string[]; limit?: number } = {}) {
    const filter: JsonObject = {};
    if (options.projectName) filter.project = { name: { eq: options.projectName } };
    if (options.states && options.states.length > 0) filter.state = { name: { in: options.states } };

    const data = await this.request(ISSUES_QUERY, {
      filter: Object.keys(filter).length > 0 ? filter : null,
      first: options.limit ?? 50,
    });
    return objectList(readPath(data, 'issues', 'nodes'));
  }

  async createIssue(input: LinearIssueInput): Promise<JsonObject> {
    const data = await this.request(CREATE_ISSUE_MUTATION, { input: { ...input } });
    return objectAt(data, 'issueCreate');
  }

  async updateIssue(issueId: string, update: LinearIssueUpdate): Promise<JsonObject> {
    const input: JsonObject = {};
    if (update.stateId) input.stateId = update.stateId;
    if (update.priority !== undefined) input.priority = update.priority;
    if (update.assigneeId) input.assigneeId = update.assigneeId;

    if (Object.keys(input).length === 0) {
      throw new ValidationError('At least one field must be specified for update');
    }

    const data = await this.request(UPDATE_ISSUE_MUTATION, { id: issueId, input });
    return objectAt(data, 'issueUpdate');
  }

  async addComment(issueId: string, body: string): Promise<JsonObject> {
    const data = await this.request(ADD_COMMENT_MUTATION, { issueId, body });
    return objectAt(data, 'commentCreate');
  }
}

import { CredentialsFor, resolveCredentials } from '../../config/credentials';
import { JsonObject } from '../../types/http';
import { TransportOptions } from '../../types/integrations';
import { readString } from '../../utils/json';
import { BearerAuth } from '../http/auth.strategy';
import { HttpClient } from '../http/http.client';

export const NOTION_BASE_URL = 'https://api.notion.com/v1';
export const NOTION_VERSION = '2022-06-28';
// Notion averages 3 requests per second.
export const NOTION_MIN_INTERVAL_MS = 350;

function notionNextCursor(page: JsonObject): string | undefined {
  return page.has_more === true ? readString(page, 'next_cursor') : undefined;
}

export type NotionParent = { database_id: string } | { page_id: string };

export class NotionClient {
  readonly http: HttpClient;

  constructor(
    credentials: CredentialsFor<'notion'> = resolveCredentials('notion'),
    options: TransportOptions = {}
  ) {
    this.http = new HttpClient({
      minRequestIntervalMs: NOTION_MIN_INTERVAL_MS,
      timeoutMs: 30_000,
      ...options,
      service: 'Notion',
      baseUrl: NOTION_BASE_URL,
      auth: new BearerAuth(credentials.NOTION_API_KEY),
      defaultHeaders: { 'Notion-Version': NOTION_VERSION, ...options.defaultHeaders },
    });
  }

  getCurrentUser(): Promise<JsonObject> {
    return this.http.get('/users/me');
  }

  search(query = '', options: { filter?: 'page' | 'database'; limit?: number } = {}) {
    const body: JsonObject = { page_size: 100 };
    if (query) body.query = query;
    if (options.filter) body.filter = { property: 'object', value: options.filter };

    return this.http.paginate<JsonObject>('/search', {
      method: 'POST',
      body,
      resultKey: 'results',
      cursorParam: 'start_cursor',
      nextCursor: notionNextCursor,
      limit: options.limit,
    });
  }

  getDatabase(databaseId: string): Promise<JsonObject> {
    return this.http.get(`/databases/${encodeURIComponent(databaseId)}`);
  }

  queryDatabase(
    databaseId: string,
    options: { filter?: JsonObject; sorts?: JsonObject[]; limit?: number } = {}
  ) {
    const body: JsonObject = { page_size: 100 };
    if (options.filter) body.filter = options.filter;
    if (options.sorts) body.sorts = options.sorts;

    return this.http.paginate<JsonObject>(`/databases/${encodeURIComponent(databaseId)}/query`, {
      method: 'POST',
      body,
      resultKey: 'results',
      cursorParam: 'start_cursor',
      nextCursor: notionNextCursor,
      limit: options.limit,
    });
  }

  getPage(pageId: string): Promise<JsonObject> {
    return this.http.get(`/pages/${encodeURIComponent(pageId)}`);
  }

  createPage(parent: NotionParent, properties: JsonObject, children?: JsonObject[]): Promise<JsonObject> {
    const body: JsonObject = { parent, properties };
    if (children && children.length > 0) body.children = children;
    return this.http.post('/pages', body);
  }

  updatePage(pageId: string, properties: JsonObject, archived?: boolean): Promise<JsonObject> {
    const body: JsonObject = { properties };
    if (archived !== undefined) body.archived = archived;
    return this.http.patch(`/pages/${encodeURIComponent(pageId)}`, body);
  }

  listBlockChildren(blockId: string, limit?: number) {
    return this.http.paginate<JsonObject>(`/blocks/${encodeURIComponent(blockId)}/children`, {
      params: { page_size: 100 },
      resultKey: 'results',
      cursorParam: 'start_cursor',
      nextCursor: notionNextCursor,
      limit,
    });
  }

  appendBlockChildren(blockId: string, children: JsonObject[]): Promise<JsonObject> {
    return this.http.patch(`/blocks/${encodeURIComponent(blockId)}/children`, { children });
  }
}

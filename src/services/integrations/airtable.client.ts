import { z } from 'zod';
import { CredentialsFor, resolveCredentials } from '../../config/credentials';
import { JsonObject, QueryParams } from '../../types/http';
import {
  AirtableBase,
  AirtableRecord,
  AirtableRecordQuery,
  AirtableTable,
  TransportOptions,
} from '../../types/integrations';
import { ApiError } from '../../utils/errors';
import { readString } from '../../utils/json';
import { logger } from '../../utils/logger';
import { BearerAuth } from '../http/auth.strategy';
import { HttpClient } from '../http/http.client';

export const AIRTABLE_BASE_URL = 'https://api.airtable.com/v0';

// Airtable accepts at most 10 records per write request.
export const AIRTABLE_BATCH_SIZE = 10;

const baseSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  permissionLevel: z.string().optional(),
});

const tableSchema = z.object({
  id: z.string(),
  name: z.string(),
  primaryFieldId: z.string().optional(),
  fields: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      type: z.string(),
      options: z
        .object({ choices: z.array(z.object({ name: z.string() })).optional() })
        .passthrough()
        .optional(),
    })
  ),
});

const recordSchema = z
  .object({ id: z.string(), fields: z.record(z.unknown()) })
  .passthrough();

function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

function offsetCursor(page: JsonObject): string | undefined {
  return readString(page, 'offset');
}

export class AirtableClient {
  readonly http: HttpClient;

  constructor(
    credentials: CredentialsFor<'airtable'> = resolveCredentials('airtable'),
    options: TransportOptions = {}
  ) {
    this.http = new HttpClient({
      timeoutMs: 30_000,
      ...options,
      service: 'Airtable',
      baseUrl: AIRTABLE_BASE_URL,
      auth: new BearerAuth(credentials.AIRTABLE_API_KEY),
    });
  }

  async listBases(): Promise<AirtableBase[]> {
    const items = await this.http.paginate<unknown>('/meta/bases', {
      resultKey: 'bases',
      cursorParam: 'offset',
      nextCursor: offsetCursor,
    });
    const parsed = z.array(baseSchema).safeParse(items);
    if (!parsed.success) {
      throw new ApiError('Airtable', 200, 'Unexpected base list shape', { details: parsed.error.issues });
    }

    return parsed.data.map((base) => ({
      id: base.id,
      name: base.name ?? 'Unnamed',
      permission_level: base.permissionLevel ?? 'unknown',
    }));
  }

  async getBaseSchema(baseId: string): Promise<AirtableTable[]> {
    const response = await this.http.get(`/meta/bases/${encodeURIComponent(baseId)}/tables`);
    const parsed = z.object({ tables: z.array(tableSchema) }).safeParse(response);
    if (!parsed.success) {
      throw new ApiError('Airtable', 200, 'Unexpected table schema shape', { details: parsed.error.issues });
    }

    return parsed.data.tables.map((table) => ({
      id: table.id,
      name: table.name,
      primary_field_id: table.primaryFieldId ?? null,
      fields: table.fields.map((field) => {
        const choices = field.options?.choices?.map((choice) => choice.name);
        return choices
          ? { id: field.id, name: field.name, type: field.type, choices }
          : { id: field.id, name: field.name, type: field.type };
      }),
    }));
  }

  async listRecords(baseId: string, table: string, query: AirtableRecordQuery = {}): Promise<AirtableRecord[]> {
    const params: QueryParams = {
      filterByFormula: query.filterByFormula,
      view: query.view,
      'fields[]': query.fields,
      pageSize: 100,
    };
    (query.sort ?? []).forEach((sort, index) => {
      params[`sort[${index}][field]`] = sort.field;
      params[`sort[${index}][direction]`] = sort.direction;
    });

    const items = await this.http.paginate<unknown>(this.tablePath(baseId, table), {
      params,
      resultKey: 'records',
      cursorParam: 'offset',
      nextCursor: offsetCursor,
      limit: query.limit,
    });
    return this.parseRecords(items);
  }

  async createRecords(
    baseId: string,
    table: string,
    records: JsonObject[],
    typecast = false
  ): Promise<AirtableRecord[]> {
    const created: AirtableRecord[] = [];
    for (const batch of chunk(records, AIRTABLE_BATCH_SIZE)) {
      const response = await this.http.post(this.tablePath(baseId, table), {
        records: batch.map((fields) => ({ fields })),
        typecast,
      });
      created.push(...this.parseRecords(response.records));
    }
    logger.info('Airtable records created', { baseId, table, count: created.length });
    return created;
  }

  async updateRecords(
    baseId: string,
    table: string,
    updates: Array<{ id: string; fields: JsonObject }>,
    typecast = false
  ): Promise<AirtableRecord[]> {
    const updated: AirtableRecord[] = [];
    for (const batch of chunk(updates, AIRTABLE_BATCH_SIZE)) {
      const response = await this.http.patch(this.tablePath(baseId, table), { records: batch, typecast });
      updated.push(...this.parseRecords(response.records));
    }
    return updated;
  }

  async deleteRecords(baseId: string, table: string, ids: string[]): Promise<string[]> {
    const deleted: string[] = [];
    for (const batch of chunk(ids, AIRTABLE_BATCH_SIZE)) {
      await this.http.delete(this.tablePath(baseId, table), { 'records[]': batch });
      deleted.push(...batch);
    }
    return deleted;
  }

  private tablePath(baseId: string, table: string): string {
    return `/${encodeURIComponent(baseId)}/${encodeURIComponent(table)}`;
  }

  private parseRecords(value: unknown): AirtableRecord[] {
    const parsed = z.array(recordSchema).safeParse(value ?? []);
    if (!parsed.success) {
      throw new ApiError('Airtable', 200, 'Unexpected record shape', { details: parsed.error.issues });
    }
    return parsed.data;
  }
}

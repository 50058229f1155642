import fs from 'fs';
import path from 'path';
import { DateTime } from 'luxon';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { findWorkspaceRoot } from '../config/workspace';
import { AirtableBase, AirtableTable } from '../types/integrations';
import { logger } from '../utils/logger';
import { AirtableClient } from './integrations/airtable.client';

export const BASE_CACHE_PATH = path.join('01-memory', 'integrations', 'airtable-bases.yaml');
const DEFAULT_MAX_AGE_HOURS = 24;

const fieldSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string(),
  choices: z.array(z.string()).optional(),
});

const tableSchema = z.object({
  id: z.string(),
  name: z.string(),
  primary_field_id: z.string().nullable(),
  fields: z.array(fieldSchema),
});

const cacheSchema = z.object({
  discovered_at: z.string(),
  total_bases: z.number().int().nonnegative(),
  includes_schema: z.boolean().default(false),
  bases: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      permission_level: z.string(),
      tables: z.array(tableSchema).optional(),
    })
  ),
});

export type AirtableBaseCache = z.infer<typeof cacheSchema>;

export interface DiscoverOptions {
  refresh?: boolean;
  withSchema?: boolean;
  maxAgeHours?: number;
}

export interface BaseCacheOptions {
  root?: string;
  filePath?: string;
  clock?: () => DateTime;
}

export class BaseCacheService {
  readonly filePath: string;
  private clock: () => DateTime;

  constructor(
    private client: Pick<AirtableClient, 'listBases' | 'getBaseSchema'>,
    options: BaseCacheOptions = {}
  ) {
    this.filePath =
      options.filePath ?? path.join(options.root ?? findWorkspaceRoot(), BASE_CACHE_PATH);
    this.clock = options.clock ?? (() => DateTime.now());
  }

  load(): AirtableBaseCache | null {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }

    let document: unknown;
    try {
      document = parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error: unknown) {
      logger.warn('Ignoring unreadable Airtable base cache', {
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    const parsed = cacheSchema.safeParse(document);
    if (!parsed.success) {
      logger.warn('Ignoring malformed Airtable base cache', {
        filePath: this.filePath,
        issues: parsed.error.issues.length,
      });
      return null;
    }
    return parsed.data;
  }

  save(bases: AirtableBase[], withSchema: boolean): AirtableBaseCache {
    const discoveredAt = this.clock().toISO();
    if (!discoveredAt) {
      throw new Error('Clock returned an invalid timestamp');
    }

    const cache: AirtableBaseCache = {
      discovered_at: discoveredAt,
      total_bases: bases.length,
      includes_schema: withSchema,
      bases,
    };

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, stringify(cache), 'utf-8');
    logger.info('Airtable base cache saved', { filePath: this.filePath, totalBases: bases.length });
    return cache;
  }

  isStale(cache: AirtableBaseCache, maxAgeHours: number = DEFAULT_MAX_AGE_HOURS): boolean {
    const discoveredAt = DateTime.fromISO(cache.discovered_at);
    if (!discoveredAt.isValid) {
      return true;
    }
    return this.clock().diff(discoveredAt, 'hours').hours >= maxAgeHours;
  }

  /**
   * Returns the cached base list, rediscovering when the cache is missing,
   * stale, lacks requested schemas, or `refresh` is set.
   */
  async discover(options: DiscoverOptions = {}): Promise<AirtableBaseCache> {
    const withSchema = options.withSchema ?? false;
    const cached = options.refresh ? null : this.load();

    if (
      cached &&
      !this.isStale(cached, options.maxAgeHours) &&
      (!withSchema || cached.includes_schema)
    ) {
      logger.debug('Using cached Airtable bases', { totalBases: cached.total_bases });
      return cached;
    }

    const bases = await this.client.listBases();
    if (withSchema) {
      for (const base of bases) {
        const tables = await this.schemaFor(base.id);
        if (tables) {
          base.tables = tables;
        }
      }
    }

    return this.save(bases, withSchema);
  }

  private async schemaFor(baseId: string): Promise<AirtableTable[] | null> {
    try {
      return await this.client.getBaseSchema(baseId);
    } catch (error: unknown) {
      logger.warn('Airtable schema unavailable for base', {
        baseId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}

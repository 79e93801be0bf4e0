import { CacheWriteError, getLogger, type Logger } from '@orgscout/common';
import type { Pool, PoolClient } from 'pg';
import { z } from 'zod';

import type { EntityCacheConfig } from './config.js';
import type { EntityCacheStore, LookupWrite } from './entity-cache-store.js';
import type { CacheStats, EntityMetadata, LookupCacheEntry, ProfileCacheEntry } from './types.js';

const IDENTIFIER_PATTERN = /^[a-z_][a-z0-9_]*$/i;

const metadataSchema = z
  .object({
    industry: z.string().optional(),
    size: z.string().optional(),
    employeeCount: z.number().optional(),
    location: z.string().optional(),
    website: z.string().optional(),
    description: z.string().optional(),
    matchedName: z.string().optional()
  })
  .partial();

const lookupRowSchema = z.object({
  normalized_key: z.string(),
  stable_id: z.string().nullable(),
  confidence: z.coerce.number().nullable(),
  lookup_tier: z.enum(['name', 'website', 'fuzzy']).nullable().catch(null),
  metadata: metadataSchema.nullable().catch(null),
  hit_count: z.coerce.number().nullable(),
  last_accessed_at: z.coerce.date().nullable(),
  created_at: z.coerce.date().nullable(),
  updated_at: z.coerce.date().nullable()
});

const profileRowSchema = z.object({
  stable_id: z.string(),
  payload: z.record(z.unknown()),
  last_fetched_at: z.coerce.date()
});

const statsRowSchema = z.object({
  total: z.coerce.number(),
  positive: z.coerce.number(),
  negative: z.coerce.number(),
  profiles: z.coerce.number()
});

function toMetadata(value: z.infer<typeof metadataSchema> | null): EntityMetadata | null {
  return value ? { ...value } : null;
}

export class PgEntityCacheStore implements EntityCacheStore {
  private readonly logger: Logger;
  private readonly lookupTable: string;
  private readonly profileTable: string;
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly config: EntityCacheConfig,
    logger?: Logger
  ) {
    for (const identifier of [config.schema, config.lookupTable, config.profileTable]) {
      if (!IDENTIFIER_PATTERN.test(identifier)) {
        throw new Error(`Invalid cache table identifier: ${identifier}`);
      }
    }
    this.logger = logger ?? getLogger({ module: 'pg-entity-cache-store' });
    this.lookupTable = `${config.schema}.${config.lookupTable}`;
    this.profileTable = `${config.schema}.${config.profileTable}`;
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    if (this.config.enableAutoMigrate) {
      await this.withClient((client) => this.ensureSchema(client));
    }

    this.initialized = true;
  }

  /** Ends the underlying pool; the store is unusable afterwards. */
  async close(): Promise<void> {
    await this.pool.end();
    this.logger.info('Entity cache pool closed.');
  }

  async getLookup(normalizedKey: string): Promise<LookupCacheEntry | null> {
    await this.initialize();
    const result = await this.pool.query(
      `SELECT normalized_key, stable_id, confidence, lookup_tier, metadata, hit_count,
              last_accessed_at, created_at, updated_at
         FROM ${this.lookupTable}
        WHERE normalized_key = $1`,
      [normalizedKey]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }

    const parsed = lookupRowSchema.safeParse(row);
    if (!parsed.success) {
      this.logger.warn({ normalizedKey, issues: parsed.error.issues }, 'Discarding malformed lookup cache row.');
      return null;
    }

    return {
      normalizedKey: parsed.data.normalized_key,
      stableId: parsed.data.stable_id,
      confidence: parsed.data.confidence,
      lookupTier: parsed.data.lookup_tier,
      metadata: toMetadata(parsed.data.metadata),
      hitCount: parsed.data.hit_count ?? 0,
      lastAccessedAt: parsed.data.last_accessed_at,
      createdAt: parsed.data.created_at,
      resolvedAt: parsed.data.updated_at
    };
  }

  async upsertLookup(entry: LookupWrite): Promise<void> {
    await this.runWrite('lookup', { normalizedKey: entry.normalizedKey }, async () => {
      await this.pool.query(
        `INSERT INTO ${this.lookupTable}
           (normalized_key, stable_id, confidence, lookup_tier, metadata, hit_count, last_accessed_at, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5::jsonb, 0, $6, $6, $6)
         ON CONFLICT (normalized_key) DO UPDATE SET
           stable_id = EXCLUDED.stable_id,
           confidence = EXCLUDED.confidence,
           lookup_tier = EXCLUDED.lookup_tier,
           metadata = EXCLUDED.metadata,
           last_accessed_at = EXCLUDED.last_accessed_at,
           updated_at = EXCLUDED.updated_at`,
        [
          entry.normalizedKey,
          entry.stableId,
          entry.confidence,
          entry.lookupTier,
          entry.metadata ? JSON.stringify(entry.metadata) : null,
          entry.resolvedAt
        ]
      );
    });
  }

  async recordLookupHit(normalizedKey: string, accessedAt: Date): Promise<void> {
    await this.runWrite('lookup_hit', { normalizedKey }, async () => {
      await this.pool.query(
        `UPDATE ${this.lookupTable}
            SET hit_count = COALESCE(hit_count, 0) + 1,
                last_accessed_at = $2
          WHERE normalized_key = $1`,
        [normalizedKey, accessedAt]
      );
    });
  }

  async getProfile(stableId: string): Promise<ProfileCacheEntry | null> {
    await this.initialize();
    const result = await this.pool.query(
      `SELECT stable_id, payload, last_fetched_at FROM ${this.profileTable} WHERE stable_id = $1`,
      [stableId]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }

    const parsed = profileRowSchema.safeParse(row);
    if (!parsed.success) {
      this.logger.warn({ stableId, issues: parsed.error.issues }, 'Discarding malformed profile cache row.');
      return null;
    }

    return {
      stableId: parsed.data.stable_id,
      payload: parsed.data.payload,
      lastFetchedAt: parsed.data.last_fetched_at
    };
  }

  async upsertProfile(entry: ProfileCacheEntry): Promise<void> {
    await this.runWrite('profile', { stableId: entry.stableId }, async () => {
      await this.pool.query(
        `INSERT INTO ${this.profileTable} (stable_id, payload, last_fetched_at)
         VALUES ($1, $2::jsonb, $3)
         ON CONFLICT (stable_id) DO UPDATE SET
           payload = EXCLUDED.payload,
           last_fetched_at = EXCLUDED.last_fetched_at`,
        [entry.stableId, JSON.stringify(entry.payload), entry.lastFetchedAt]
      );
    });
  }

  async getStats(): Promise<CacheStats> {
    await this.initialize();
    const result = await this.pool.query(
      `SELECT
         (SELECT COUNT(*) FROM ${this.lookupTable}) AS total,
         (SELECT COUNT(*) FROM ${this.lookupTable} WHERE stable_id IS NOT NULL) AS positive,
         (SELECT COUNT(*) FROM ${this.lookupTable} WHERE stable_id IS NULL) AS negative,
         (SELECT COUNT(*) FROM ${this.profileTable}) AS profiles`
    );

    const stats = statsRowSchema.parse(result.rows[0] ?? { total: 0, positive: 0, negative: 0, profiles: 0 });
    return {
      totalEntries: stats.total,
      positiveEntries: stats.positive,
      negativeEntries: stats.negative,
      profileEntries: stats.profiles
    };
  }

  private async runWrite(kind: string, details: Record<string, unknown>, write: () => Promise<void>): Promise<void> {
    try {
      await this.initialize();
      await write();
    } catch (error) {
      this.logger.error({ error, kind, ...details }, 'Entity cache write failed.');
      throw new CacheWriteError(`Failed to write ${kind} cache entry.`, { details: { kind, ...details }, cause: error });
    }
  }

  private async ensureSchema(client: PoolClient): Promise<void> {
    await client.query(`CREATE SCHEMA IF NOT EXISTS ${this.config.schema}`);

    await client.query(`
      CREATE TABLE IF NOT EXISTS ${this.lookupTable} (
        normalized_key TEXT PRIMARY KEY,
        stable_id TEXT,
        confidence REAL,
        lookup_tier TEXT,
        metadata JSONB,
        hit_count INTEGER DEFAULT 0,
        last_accessed_at TIMESTAMPTZ,
        created_at TIMESTAMPTZ DEFAULT timezone('utc', now()),
        updated_at TIMESTAMPTZ DEFAULT timezone('utc', now())
      );
    `);

    await client.query(`
      CREATE TABLE IF NOT EXISTS ${this.profileTable} (
        stable_id TEXT PRIMARY KEY,
        payload JSONB NOT NULL,
        last_fetched_at TIMESTAMPTZ NOT NULL DEFAULT timezone('utc', now())
      );
    `);

    await client.query(
      `CREATE INDEX IF NOT EXISTS ${this.config.lookupTable}_stable_id_idx ON ${this.lookupTable} (stable_id)`
    );

    this.logger.info({ lookupTable: this.lookupTable, profileTable: this.profileTable }, 'Entity cache schema ensured.');
  }

  private async withClient<T>(handler: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await handler(client);
    } finally {
      client.release();
    }
  }
}

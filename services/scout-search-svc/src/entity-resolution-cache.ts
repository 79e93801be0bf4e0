import {
  RequestCoalescer,
  ServiceError,
  ValidationError,
  getLogger,
  internalError,
  type Logger
} from '@orgscout/common';
import pLimit from 'p-limit';

import type { EntityResolver, LookupMatch } from './company-lookup.js';
import type { EntityCacheStore } from './entity-cache-store.js';
import { normalizeEntityName } from './entity-name.js';
import type {
  CacheMetrics,
  CacheStats,
  LookupCacheEntry,
  ProfilePayload,
  ResolutionHints,
  ResolutionResult
} from './types.js';

export interface ProfileSource {
  collectCompany(stableId: string): Promise<ProfilePayload>;
}

export interface EntityResolutionCacheOptions {
  lookupTtlMs: number;
  negativeTtlMs: number;
  profileTtlMs: number;
  cacheFailedLookups: boolean;
  now?: () => Date;
  logger?: Logger;
}

export interface ResolveManyItem {
  name: string;
  hints?: ResolutionHints;
}

export interface ResolveManyResult {
  results: Map<string, ResolutionResult>;
  success: number;
  notFound: number;
  failed: number;
  invalid: number;
}

export type ProfileFetchOutcome =
  | { stableId: string; status: 'fetched'; payload: ProfilePayload }
  | { stableId: string; status: 'failed'; error: ServiceError };

function emptyMetrics(): CacheMetrics {
  return {
    hits: 0,
    misses: 0,
    errors: 0,
    negativeHits: 0,
    negativeWrites: 0,
    cacheWriteErrors: 0,
    coalesced: 0,
    profileHits: 0,
    profileMisses: 0,
    profileErrors: 0
  };
}

function toServiceError(error: unknown): ServiceError {
  if (error instanceof ServiceError) {
    return error;
  }
  return internalError(error instanceof Error ? error.message : String(error));
}

/**
 * Two-tier cache in front of the paid lookup and profile APIs.
 * Tier 1 maps a normalized name to a stable id (or a cached negative);
 * Tier 2 maps a stable id to its full profile. Concurrent work for one
 * key shares a single in-flight call.
 */
export class EntityResolutionCache {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly lookups = new RequestCoalescer<ResolutionResult>();
  private readonly profiles = new RequestCoalescer<ProfilePayload>();
  private metrics: CacheMetrics = emptyMetrics();

  constructor(
    private readonly store: EntityCacheStore,
    private readonly resolver: EntityResolver,
    private readonly profileSource: ProfileSource,
    private readonly options: EntityResolutionCacheOptions
  ) {
    this.logger = options.logger ?? getLogger({ module: 'entity-resolution-cache' });
    this.now = options.now ?? (() => new Date());
  }

  async resolve(name: string, hints?: ResolutionHints): Promise<ResolutionResult> {
    const normalizedKey = normalizeEntityName(name);
    if (!normalizedKey) {
      throw new ValidationError('Organization name must not be empty.', { name });
    }

    return this.lookups.getOrFetch(normalizedKey, () => this.resolveKey(normalizedKey, name, hints));
  }

  async resolveMany(items: ResolveManyItem[], concurrency = 8, signal?: AbortSignal): Promise<ResolveManyResult> {
    const limit = pLimit(Math.max(1, concurrency));
    const outcome: ResolveManyResult = { results: new Map(), success: 0, notFound: 0, failed: 0, invalid: 0 };

    await Promise.all(
      items.map((item) =>
        limit(async () => {
          if (signal?.aborted) {
            return;
          }
          try {
            const result = await this.resolve(item.name, item.hints);
            outcome.results.set(item.name, result);
            if (result.status === 'resolved') {
              outcome.success += 1;
            } else if (result.status === 'not_found') {
              outcome.notFound += 1;
            } else {
              outcome.failed += 1;
            }
          } catch (error) {
            if (error instanceof ValidationError) {
              outcome.invalid += 1;
              return;
            }
            throw error;
          }
        })
      )
    );

    return outcome;
  }

  async fetchProfile(stableId: string): Promise<ProfilePayload> {
    const id = stableId.trim();
    if (!id) {
      throw new ValidationError('Stable id must not be empty.');
    }

    return this.profiles.getOrFetch(id, () => this.fetchProfileFresh(id));
  }

  async fetchProfiles(stableIds: string[]): Promise<ProfileFetchOutcome[]> {
    const settled = await Promise.allSettled(stableIds.map((stableId) => this.fetchProfile(stableId)));
    return settled.map((result, index): ProfileFetchOutcome => {
      const stableId = stableIds[index] ?? '';
      return result.status === 'fulfilled'
        ? { stableId, status: 'fetched', payload: result.value }
        : { stableId, status: 'failed', error: toServiceError(result.reason) };
    });
  }

  getMetrics(): CacheMetrics {
    return {
      ...this.metrics,
      coalesced: this.lookups.coalescedCount + this.profiles.coalescedCount
    };
  }

  getStats(): Promise<CacheStats> {
    return this.store.getStats();
  }

  private async resolveKey(normalizedKey: string, name: string, hints?: ResolutionHints): Promise<ResolutionResult> {
    const cached = await this.readLookup(normalizedKey);
    if (cached && !this.isLookupExpired(cached)) {
      this.metrics.hits += 1;
      if (cached.stableId === null) {
        this.metrics.negativeHits += 1;
      }
      await this.safeWrite(() => this.store.recordLookupHit(normalizedKey, this.now()));
      return {
        stableId: cached.stableId,
        confidence: cached.confidence,
        fromCache: true,
        status: cached.stableId ? 'resolved' : 'not_found',
        lookupTier: cached.lookupTier,
        metadata: cached.metadata ?? {}
      };
    }

    this.metrics.misses += 1;

    let found: LookupMatch | null;
    try {
      found = await this.resolver.lookup(name, hints);
    } catch (error) {
      this.metrics.errors += 1;
      const failure = toServiceError(error);
      this.logger.warn({ normalizedKey, code: failure.code, err: failure.message }, 'Entity resolution failed.');
      if (this.options.cacheFailedLookups) {
        await this.writeNegative(normalizedKey);
      }
      return { stableId: null, confidence: null, fromCache: false, status: 'failed', lookupTier: null, metadata: {} };
    }

    if (!found) {
      await this.writeNegative(normalizedKey);
      return { stableId: null, confidence: null, fromCache: false, status: 'not_found', lookupTier: null, metadata: {} };
    }

    const match = found;
    await this.safeWrite(() =>
      this.store.upsertLookup({
        normalizedKey,
        stableId: match.stableId,
        confidence: match.confidence,
        lookupTier: match.tier,
        metadata: match.metadata,
        resolvedAt: this.now()
      })
    );

    return {
      stableId: match.stableId,
      confidence: match.confidence,
      fromCache: false,
      status: 'resolved',
      lookupTier: match.tier,
      metadata: match.metadata
    };
  }

  private async fetchProfileFresh(stableId: string): Promise<ProfilePayload> {
    try {
      const cached = await this.store.getProfile(stableId);
      if (cached && this.now().getTime() - cached.lastFetchedAt.getTime() < this.options.profileTtlMs) {
        this.metrics.profileHits += 1;
        return cached.payload;
      }
    } catch (error) {
      this.metrics.errors += 1;
      this.logger.warn({ stableId, error }, 'Profile cache read failed; fetching from source.');
    }

    this.metrics.profileMisses += 1;

    let payload: ProfilePayload;
    try {
      payload = await this.profileSource.collectCompany(stableId);
    } catch (error) {
      this.metrics.profileErrors += 1;
      throw toServiceError(error);
    }

    await this.safeWrite(() => this.store.upsertProfile({ stableId, payload, lastFetchedAt: this.now() }));
    return payload;
  }

  private async readLookup(normalizedKey: string): Promise<LookupCacheEntry | null> {
    try {
      return await this.store.getLookup(normalizedKey);
    } catch (error) {
      this.metrics.errors += 1;
      this.logger.warn({ normalizedKey, error }, 'Lookup cache read failed; treating as miss.');
      return null;
    }
  }

  private isLookupExpired(entry: LookupCacheEntry): boolean {
    const writtenAt = entry.resolvedAt ?? entry.createdAt;
    if (!writtenAt) {
      return true;
    }
    const ttl = entry.stableId ? this.options.lookupTtlMs : this.options.negativeTtlMs;
    return this.now().getTime() - writtenAt.getTime() >= ttl;
  }

  private async writeNegative(normalizedKey: string): Promise<void> {
    const written = await this.safeWrite(() =>
      this.store.upsertLookup({
        normalizedKey,
        stableId: null,
        confidence: null,
        lookupTier: null,
        metadata: null,
        resolvedAt: this.now()
      })
    );
    if (written) {
      this.metrics.negativeWrites += 1;
    }
  }

  /** Cache writes never fail the caller; they are counted and logged. */
  private async safeWrite(write: () => Promise<void>): Promise<boolean> {
    try {
      await write();
      return true;
    } catch (error) {
      this.metrics.cacheWriteErrors += 1;
      this.logger.warn({ error }, 'Continuing without caching entry.');
      return false;
    }
  }
}

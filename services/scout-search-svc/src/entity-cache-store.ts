import type { CacheStats, EntityMetadata, LookupCacheEntry, LookupTier, ProfileCacheEntry } from './types.js';

export interface LookupWrite {
  normalizedKey: string;
  stableId: string | null;
  confidence: number | null;
  lookupTier: LookupTier | null;
  metadata: EntityMetadata | null;
  resolvedAt: Date;
}

/**
 * Persistence for both cache tiers. Only `normalizedKey` (Tier 1) and
 * `stableId` (Tier 2) are constrained; every other column may be null.
 */
export interface EntityCacheStore {
  getLookup(normalizedKey: string): Promise<LookupCacheEntry | null>;
  upsertLookup(entry: LookupWrite): Promise<void>;
  recordLookupHit(normalizedKey: string, accessedAt: Date): Promise<void>;
  getProfile(stableId: string): Promise<ProfileCacheEntry | null>;
  upsertProfile(entry: ProfileCacheEntry): Promise<void>;
  getStats(): Promise<CacheStats>;
}

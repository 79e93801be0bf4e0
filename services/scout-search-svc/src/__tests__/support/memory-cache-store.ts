import type { EntityCacheStore, LookupWrite } from '../../entity-cache-store.js';
import type { CacheStats, LookupCacheEntry, ProfileCacheEntry } from '../../types.js';

/** Map-backed store with the same upsert semantics as the Postgres tables. */
export class InMemoryEntityCacheStore implements EntityCacheStore {
  readonly lookups = new Map<string, LookupCacheEntry>();
  readonly profiles = new Map<string, ProfileCacheEntry>();
  lookupWrites = 0;
  failLookupWrites = false;

  async getLookup(normalizedKey: string): Promise<LookupCacheEntry | null> {
    const entry = this.lookups.get(normalizedKey);
    return entry ? { ...entry } : null;
  }

  async upsertLookup(entry: LookupWrite): Promise<void> {
    if (this.failLookupWrites) {
      throw new Error('write rejected');
    }
    this.lookupWrites += 1;
    const existing = this.lookups.get(entry.normalizedKey);
    this.lookups.set(entry.normalizedKey, {
      normalizedKey: entry.normalizedKey,
      stableId: entry.stableId,
      confidence: entry.confidence,
      lookupTier: entry.lookupTier,
      metadata: entry.metadata,
      hitCount: existing?.hitCount ?? 0,
      lastAccessedAt: existing?.lastAccessedAt ?? null,
      createdAt: existing?.createdAt ?? entry.resolvedAt,
      resolvedAt: entry.resolvedAt
    });
  }

  async recordLookupHit(normalizedKey: string, accessedAt: Date): Promise<void> {
    const entry = this.lookups.get(normalizedKey);
    if (entry) {
      entry.hitCount += 1;
      entry.lastAccessedAt = accessedAt;
    }
  }

  async getProfile(stableId: string): Promise<ProfileCacheEntry | null> {
    return this.profiles.get(stableId) ?? null;
  }

  async upsertProfile(entry: ProfileCacheEntry): Promise<void> {
    this.profiles.set(entry.stableId, entry);
  }

  async getStats(): Promise<CacheStats> {
    const entries = Array.from(this.lookups.values());
    const positive = entries.filter((entry) => entry.stableId !== null).length;
    return {
      totalEntries: entries.length,
      positiveEntries: positive,
      negativeEntries: entries.length - positive,
      profileEntries: this.profiles.size
    };
  }
}

import { ValidationError } from '@orgscout/common';
import pino from 'pino';
import { describe, expect, it, vi } from 'vitest';

import { EntityResolutionCache, type EntityResolutionCacheOptions, type ProfileSource } from '../entity-resolution-cache.js';
import type { LookupMatch } from '../company-lookup.js';
import { InMemoryEntityCacheStore } from './support/memory-cache-store.js';
import { TableResolver, deferred } from './support/fake-backends.js';

const DAY_MS = 86_400_000;
const logger = pino({ level: 'silent' });

function createClock(start = Date.parse('2026-03-01T00:00:00.000Z')) {
  let current = start;
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    }
  };
}

function buildCache(
  resolver: TableResolver,
  overrides: Partial<EntityResolutionCacheOptions> = {},
  profileSource: ProfileSource = { collectCompany: async (stableId) => ({ id: stableId }) }
) {
  const store = new InMemoryEntityCacheStore();
  const cache = new EntityResolutionCache(store, resolver, profileSource, {
    lookupTtlMs: 180 * DAY_MS,
    negativeTtlMs: 7 * DAY_MS,
    profileTtlMs: 90 * DAY_MS,
    cacheFailedLookups: false,
    logger,
    ...overrides
  });
  return { store, cache };
}

describe('EntityResolutionCache.resolve', () => {
  it('rejects empty names before touching the store', async () => {
    const resolver = new TableResolver(new Map());
    const { store, cache } = buildCache(resolver);

    await expect(cache.resolve('   ')).rejects.toBeInstanceOf(ValidationError);
    await expect(cache.resolve('...')).rejects.toBeInstanceOf(ValidationError);
    expect(store.lookups.size).toBe(0);
    expect(resolver.calls).toEqual([]);
  });

  it('keeps one entry per normalized key under concurrent variants', async () => {
    const resolver = new TableResolver(new Map([['Acme Corp', 'c-1']]));
    const { store, cache } = buildCache(resolver);

    const results = await Promise.all([cache.resolve('Acme Corp'), cache.resolve('  acme corp '), cache.resolve('ACME, Inc.')]);

    expect(results.map((result) => result.stableId)).toEqual(['c-1', 'c-1', 'c-1']);
    expect(resolver.calls).toEqual(['Acme Corp']);
    expect(Array.from(store.lookups.keys())).toEqual(['acme']);
    expect(cache.getMetrics().coalesced).toBe(2);
  });

  it('serves a second lookup from Tier 1 and counts the hit', async () => {
    const resolver = new TableResolver(new Map([['Globex', 'g-9']]));
    const { store, cache } = buildCache(resolver);

    const first = await cache.resolve('Globex');
    const second = await cache.resolve('Globex');

    expect(first).toMatchObject({ stableId: 'g-9', fromCache: false, status: 'resolved', lookupTier: 'name' });
    expect(second).toMatchObject({ stableId: 'g-9', fromCache: true, status: 'resolved', confidence: 0.9 });
    expect(resolver.calls).toHaveLength(1);
    expect(store.lookups.get('globex')?.hitCount).toBe(1);
    expect(cache.getMetrics()).toMatchObject({ hits: 1, misses: 1, errors: 0 });
  });

  it('honours the negative TTL for cached misses', async () => {
    const clock = createClock();
    const resolver = new TableResolver(new Map());
    const { store, cache } = buildCache(resolver, { now: clock.now });

    await expect(cache.resolve('Initech')).resolves.toMatchObject({ stableId: null, status: 'not_found', fromCache: false });
    expect(store.lookups.get('initech')?.stableId).toBeNull();

    clock.advance(6 * DAY_MS);
    await expect(cache.resolve('Initech')).resolves.toMatchObject({ stableId: null, status: 'not_found', fromCache: true });
    expect(resolver.calls).toHaveLength(1);

    clock.advance(2 * DAY_MS);
    await cache.resolve('Initech');
    expect(resolver.calls).toHaveLength(2);
    expect(cache.getMetrics()).toMatchObject({ hits: 1, negativeHits: 1, misses: 2, negativeWrites: 2 });
  });

  it('expires positive entries after the lookup TTL', async () => {
    const clock = createClock();
    const resolver = new TableResolver(new Map([['Umbrella', 'u-1']]));
    const { cache } = buildCache(resolver, { now: clock.now });

    await cache.resolve('Umbrella');
    clock.advance(179 * DAY_MS);
    await expect(cache.resolve('Umbrella')).resolves.toMatchObject({ fromCache: true });
    clock.advance(2 * DAY_MS);
    await expect(cache.resolve('Umbrella')).resolves.toMatchObject({ fromCache: false });
    expect(resolver.calls).toHaveLength(2);
  });

  it('resolves 464 names with two failures and leaves the failures uncached', async () => {
    const names = Array.from({ length: 464 }, (_, index) => `Company ${index + 1}`);
    const failing = new Set(['Company 17', 'Company 301']);
    const resolver = new TableResolver(new Map(names.map((name, index) => [name, `id-${index + 1}`])), failing);
    const { store, cache } = buildCache(resolver);

    const outcome = await cache.resolveMany(names.map((name) => ({ name })));

    expect(outcome).toMatchObject({ success: 462, failed: 2, notFound: 0, invalid: 0 });
    expect(store.lookups.size).toBe(462);
    expect(store.lookups.has('company 17')).toBe(false);
    expect(outcome.results.get('Company 301')?.status).toBe('failed');
    expect(cache.getMetrics().errors).toBe(2);
  });

  it('writes failed lookups as negatives when configured to', async () => {
    const names = Array.from({ length: 464 }, (_, index) => `Company ${index + 1}`);
    const failing = new Set(['Company 17', 'Company 301']);
    const resolver = new TableResolver(new Map(names.map((name, index) => [name, `id-${index + 1}`])), failing);
    const { store, cache } = buildCache(resolver, { cacheFailedLookups: true });

    const outcome = await cache.resolveMany(names.map((name) => ({ name })));
    const stats = await store.getStats();

    expect(outcome).toMatchObject({ success: 462, failed: 2 });
    expect(stats).toEqual({ totalEntries: 464, positiveEntries: 462, negativeEntries: 2, profileEntries: 0 });
  });

  it('counts invalid names in resolveMany instead of failing the batch', async () => {
    const resolver = new TableResolver(new Map([['Hooli', 'h-1']]));
    const { cache } = buildCache(resolver);

    const outcome = await cache.resolveMany([{ name: 'Hooli' }, { name: '  ' }]);
    expect(outcome).toMatchObject({ success: 1, invalid: 1 });
  });

  it('continues when the cache write is rejected', async () => {
    const resolver = new TableResolver(new Map([['Vandelay', 'v-1']]));
    const { store, cache } = buildCache(resolver);
    store.failLookupWrites = true;

    await expect(cache.resolve('Vandelay')).resolves.toMatchObject({ stableId: 'v-1', status: 'resolved' });
    expect(cache.getMetrics().cacheWriteErrors).toBe(1);
    expect(store.lookups.size).toBe(0);
  });

  it('makes one resolver call for two concurrent runs asking for the same new name', async () => {
    const pending = deferred<LookupMatch | null>();
    const lookup = vi.fn(() => pending.promise);
    const store = new InMemoryEntityCacheStore();
    const cache = new EntityResolutionCache(
      store,
      { lookup },
      { collectCompany: async () => ({}) },
      { lookupTtlMs: DAY_MS, negativeTtlMs: DAY_MS, profileTtlMs: DAY_MS, cacheFailedLookups: true, logger }
    );

    const runA = cache.resolve('Acme Corp');
    const runB = cache.resolve('Acme Corp');
    await vi.waitFor(() => expect(lookup).toHaveBeenCalledTimes(1));
    pending.resolve({ stableId: 'acme-1', confidence: 1, tier: 'name', metadata: {} });

    const [a, b] = await Promise.all([runA, runB]);
    expect(a.stableId).toBe('acme-1');
    expect(b.stableId).toBe('acme-1');
    expect(lookup).toHaveBeenCalledTimes(1);

    await expect(cache.resolve('Acme Corp')).resolves.toMatchObject({ stableId: 'acme-1', fromCache: true });
    expect(lookup).toHaveBeenCalledTimes(1);
  });
});

describe('EntityResolutionCache.fetchProfile', () => {
  it('fetches a repeated stable id exactly once', async () => {
    const collectCompany = vi.fn(async (stableId: string) => ({ id: stableId, name: 'Acme' }));
    const { store, cache } = buildCache(new TableResolver(new Map()), {}, { collectCompany });

    const outcomes = await cache.fetchProfiles(['c-1', 'c-1', 'c-1', 'c-1']);

    expect(collectCompany).toHaveBeenCalledTimes(1);
    expect(outcomes.map((outcome) => outcome.status)).toEqual(['fetched', 'fetched', 'fetched', 'fetched']);
    expect(store.profiles.get('c-1')?.payload).toEqual({ id: 'c-1', name: 'Acme' });
  });

  it('refetches once the profile is older than the profile TTL', async () => {
    const clock = createClock();
    const collectCompany = vi.fn(async (stableId: string) => ({ id: stableId }));
    const { cache } = buildCache(new TableResolver(new Map()), { now: clock.now }, { collectCompany });

    await cache.fetchProfile('c-2');
    clock.advance(89 * DAY_MS);
    await cache.fetchProfile('c-2');
    expect(collectCompany).toHaveBeenCalledTimes(1);

    clock.advance(2 * DAY_MS);
    await cache.fetchProfile('c-2');
    expect(collectCompany).toHaveBeenCalledTimes(2);
    expect(cache.getMetrics()).toMatchObject({ profileHits: 1, profileMisses: 2 });
  });

  it('surfaces a persistent profile failure as a fetch error', async () => {
    const collectCompany = vi.fn(async () => {
      throw new Error('profile API down');
    });
    const { cache } = buildCache(new TableResolver(new Map()), {}, { collectCompany });

    const [outcome] = await cache.fetchProfiles(['c-3']);
    expect(outcome?.status).toBe('failed');
    await expect(cache.fetchProfile('c-3')).rejects.toThrow('profile API down');
    expect(cache.getMetrics().profileErrors).toBe(2);
  });
});

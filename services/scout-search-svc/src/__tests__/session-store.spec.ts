import { ExternalTransientError } from '@orgscout/common';
import { Redis } from 'ioredis';
import pino from 'pino';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { compileQuery } from '../query-compiler.js';
import { RedisSessionStore } from '../session-store.js';
import type { SearchSession } from '../types.js';

const redisState = vi.hoisted(() => ({
  data: new Map<string, string>(),
  ttls: new Map<string, number>()
}));

vi.mock('ioredis', () => {
  class Redis {
    async get(key: string): Promise<string | null> {
      return redisState.data.get(key) ?? null;
    }

    async setex(key: string, ttl: number, value: string): Promise<'OK'> {
      redisState.data.set(key, value);
      redisState.ttls.set(key, ttl);
      return 'OK';
    }

    async del(key: string): Promise<number> {
      return redisState.data.delete(key) ? 1 : 0;
    }
  }
  return { __esModule: true, Redis, default: Redis };
});

const logger = pino({ level: 'silent' });

function makeSession(): SearchSession {
  return {
    sessionId: 's-1',
    batches: [
      {
        compiledQuery: compileQuery({ requiredStableIds: ['c-1'], keyword: 'ml', location: 'Berlin' }),
        queryHash: 'abc123',
        cursor: 2,
        totalEstimate: 87,
        fetchedItems: 40,
        exhausted: false
      }
    ],
    batchIndex: 0,
    seenRecordIds: ['1', '2', '3'],
    pendingRecords: [
      {
        recordId: '3',
        fullName: 'Person 3',
        headline: null,
        currentTitle: null,
        currentOrganization: null,
        location: 'Berlin',
        profileUrl: null,
        raw: { id: 3 }
      }
    ],
    createdAt: '2026-05-01T09:00:00.000Z',
    ttlHours: 24,
    status: 'has_more',
    totalEstimate: 87,
    returnedCount: 2,
    lastFetchedAt: '2026-05-01T09:00:04.000Z',
    bypassPageCache: true
  };
}

describe('RedisSessionStore', () => {
  let client: Redis;
  let store: RedisSessionStore;

  beforeEach(() => {
    redisState.data.clear();
    redisState.ttls.clear();
    client = new Redis();
    store = new RedisSessionStore(client, { keyPrefix: 'scout:session', logger });
  });

  it('stores sessions under the prefix with a rounded-up TTL and reads them back', async () => {
    const session = makeSession();
    await store.save(session, 3_599.2);

    expect(redisState.ttls.get('scout:session:s-1')).toBe(3_600);
    await expect(store.get('s-1')).resolves.toEqual(session);
  });

  it('deletes instead of writing when no lifetime remains', async () => {
    redisState.data.set('scout:session:s-1', JSON.stringify(makeSession()));
    await store.save(makeSession(), 0);
    expect(redisState.data.has('scout:session:s-1')).toBe(false);
  });

  it('returns null for missing, malformed or invalid sessions', async () => {
    await expect(store.get('missing')).resolves.toBeNull();

    redisState.data.set('scout:session:broken', '{not json');
    await expect(store.get('broken')).resolves.toBeNull();

    redisState.data.set('scout:session:odd', JSON.stringify({ ...makeSession(), batchIndex: -1 }));
    await expect(store.get('odd')).resolves.toBeNull();
  });

  it('raises a transient error when the session cannot be read', async () => {
    vi.spyOn(client, 'get').mockRejectedValueOnce(new Error('connection reset'));
    await expect(store.get('s-1')).rejects.toBeInstanceOf(ExternalTransientError);
  });

  it('caches pages by query hash and page number', async () => {
    const page = { items: [{ id: 1 }], totalEstimate: 10 };
    await store.setPage('abc123', 2, page, 60);

    expect(redisState.ttls.get('scout:session:page:abc123:2')).toBe(60);
    await expect(store.getPage('abc123', 2)).resolves.toEqual(page);
    await expect(store.getPage('abc123', 3)).resolves.toBeNull();
  });

  it('treats page cache failures as misses', async () => {
    vi.spyOn(client, 'get').mockRejectedValueOnce(new Error('timeout'));
    await expect(store.getPage('abc123', 1)).resolves.toBeNull();
  });
});

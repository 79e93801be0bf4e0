import { ExternalTransientError, getLogger, type Logger } from '@orgscout/common';
import type { Redis } from 'ioredis';

import { cachedPageSchema, searchSessionSchema } from './schemas.js';
import type { SearchPage, SearchSession } from './types.js';

export type RawPage = SearchPage<Record<string, unknown>>;

/** Sessions keyed by id, plus a page cache keyed by query hash and page number. */
export interface SessionStore {
  get(sessionId: string): Promise<SearchSession | null>;
  save(session: SearchSession, ttlSeconds: number): Promise<void>;
  delete(sessionId: string): Promise<void>;
  getPage(queryHash: string, page: number): Promise<RawPage | null>;
  setPage(queryHash: string, page: number, data: RawPage, ttlSeconds: number): Promise<void>;
}

export interface RedisSessionStoreOptions {
  keyPrefix: string;
  logger?: Logger;
}

export class RedisSessionStore implements SessionStore {
  private readonly logger: Logger;

  constructor(
    private readonly client: Redis,
    private readonly options: RedisSessionStoreOptions
  ) {
    this.logger = options.logger ?? getLogger({ module: 'session-store' });
  }

  async get(sessionId: string): Promise<SearchSession | null> {
    let raw: string | null;
    try {
      raw = await this.client.get(this.sessionKey(sessionId));
    } catch (error) {
      throw new ExternalTransientError('Session store is unavailable.', { code: 'session_store_unavailable', cause: error });
    }

    if (!raw) {
      return null;
    }

    const parsed = searchSessionSchema.safeParse(this.decode(raw));
    if (!parsed.success) {
      this.logger.warn({ sessionId, issues: parsed.error.issues.slice(0, 5) }, 'Discarding malformed search session.');
      return null;
    }
    return parsed.data;
  }

  async save(session: SearchSession, ttlSeconds: number): Promise<void> {
    const ttl = Math.ceil(ttlSeconds);
    if (ttl <= 0) {
      await this.delete(session.sessionId);
      return;
    }

    try {
      await this.client.setex(this.sessionKey(session.sessionId), ttl, JSON.stringify(session));
    } catch (error) {
      throw new ExternalTransientError('Failed to persist search session.', {
        code: 'session_store_unavailable',
        details: { sessionId: session.sessionId },
        cause: error
      });
    }
  }

  async delete(sessionId: string): Promise<void> {
    try {
      await this.client.del(this.sessionKey(sessionId));
    } catch (error) {
      this.logger.warn({ error, sessionId }, 'Failed to delete search session.');
    }
  }

  async getPage(queryHash: string, page: number): Promise<RawPage | null> {
    try {
      const raw = await this.client.get(this.pageKey(queryHash, page));
      if (!raw) {
        return null;
      }
      const parsed = cachedPageSchema.safeParse(this.decode(raw));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      this.logger.warn({ error, queryHash, page }, 'Page cache read failed.');
      return null;
    }
  }

  async setPage(queryHash: string, page: number, data: RawPage, ttlSeconds: number): Promise<void> {
    try {
      await this.client.setex(this.pageKey(queryHash, page), Math.max(1, Math.ceil(ttlSeconds)), JSON.stringify(data));
    } catch (error) {
      this.logger.warn({ error, queryHash, page }, 'Page cache write failed.');
    }
  }

  private sessionKey(sessionId: string): string {
    return `${this.options.keyPrefix}:${sessionId}`;
  }

  private pageKey(queryHash: string, page: number): string {
    return `${this.options.keyPrefix}:page:${queryHash}:${page}`;
  }

  private decode(raw: string): unknown {
    try {
      return JSON.parse(raw);
    } catch {
      return null;
    }
  }
}

import { createHash, randomUUID } from 'node:crypto';

import {
  EndpointThrottle,
  ExternalTransientError,
  SessionExpiredError,
  ValidationError,
  getLogger,
  type Logger
} from '@orgscout/common';

import type { PersonSearchBackend } from './search-backend-client.js';
import { toPersonRecord } from './person-records.js';
import type { RawPage, SessionStore } from './session-store.js';
import type { CompiledQuery, PersonRecord, PersonSearchResult, SearchSession, SessionBatch } from './types.js';

const HOUR_MS = 3_600_000;

export interface SessionManagerOptions {
  pageSize: number;
  maxPages: number;
  ttlHours: number;
  minFetchIntervalMs: number;
  pageCacheTtlSeconds: number;
  disablePageCache?: boolean;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  generateId?: () => string;
  logger?: Logger;
}

export interface LoadMoreOptions {
  signal?: AbortSignal;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/** Stable hash of a compiled query; the page cache is shared between sessions running the same query. */
export function hashQuery(query: CompiledQuery): string {
  return createHash('sha256').update(JSON.stringify(query)).digest('hex').slice(0, 32);
}

export class SessionManager {
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly generateId: () => string;
  private readonly locks = new EndpointThrottle({ minIntervalMs: 0 });

  constructor(
    private readonly backend: PersonSearchBackend,
    private readonly store: SessionStore,
    private readonly options: SessionManagerOptions
  ) {
    this.logger = options.logger ?? getLogger({ module: 'session-manager' });
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Creates a session and returns its first page of records immediately.
   * Several queries make a batched session: they run one after another, each
   * up to the page limit, behind a single cursor.
   */
  async createSession(
    compiledQuery: CompiledQuery | CompiledQuery[],
    options: LoadMoreOptions = {}
  ): Promise<PersonSearchResult> {
    const queries: CompiledQuery[] = Array.isArray(compiledQuery) ? compiledQuery : [compiledQuery];
    if (queries.length === 0) {
      throw new ValidationError('A search session needs at least one compiled query.');
    }

    const session: SearchSession = {
      sessionId: this.generateId(),
      batches: queries.map((query) => ({
        compiledQuery: query,
        queryHash: hashQuery(query),
        cursor: 0,
        totalEstimate: null,
        fetchedItems: 0,
        exhausted: false
      })),
      batchIndex: 0,
      seenRecordIds: [],
      pendingRecords: [],
      createdAt: new Date(this.now()).toISOString(),
      ttlHours: this.options.ttlHours,
      status: 'created',
      totalEstimate: null,
      returnedCount: 0,
      lastFetchedAt: null,
      bypassPageCache: false
    };

    this.logger.info(
      { sessionId: session.sessionId, batches: session.batches.length, queryHash: session.batches[0]?.queryHash },
      'Search session created.'
    );
    return this.locks.schedule(session.sessionId, () => this.collect(session, this.options.pageSize, options.signal));
  }

  /**
   * Returns up to `count` further records, fetching pages only when the
   * session has too few pending. Calls for the same session are serialized
   * so the cursor only moves forward.
   */
  async loadMore(sessionId: string, count = this.options.pageSize, options: LoadMoreOptions = {}): Promise<PersonSearchResult> {
    if (!Number.isInteger(count) || count <= 0) {
      throw new ValidationError('count must be a positive integer.', { count });
    }

    return this.locks.schedule(sessionId, async () => {
      const session = await this.requireActive(sessionId);
      if (session.status === 'exhausted') {
        return this.toResult(session, [], 0);
      }
      return this.collect(session, count, options.signal);
    });
  }

  /** Re-runs every batch from the first page; the session stops using the page cache. */
  async refresh(sessionId: string, options: LoadMoreOptions = {}): Promise<PersonSearchResult> {
    return this.locks.schedule(sessionId, async () => {
      const session = await this.requireActive(sessionId);
      for (const batch of session.batches) {
        batch.cursor = 0;
        batch.totalEstimate = null;
        batch.fetchedItems = 0;
        batch.exhausted = false;
      }
      session.batchIndex = 0;
      session.seenRecordIds = [];
      session.pendingRecords = [];
      session.returnedCount = 0;
      session.totalEstimate = null;
      session.status = 'created';
      session.bypassPageCache = true;
      this.logger.info({ sessionId }, 'Search session refreshed.');
      return this.collect(session, this.options.pageSize, options.signal);
    });
  }

  async getSession(sessionId: string): Promise<SearchSession> {
    return this.requireActive(sessionId);
  }

  /** Ends a session; later calls for it fail as expired. */
  async closeSession(sessionId: string): Promise<void> {
    await this.locks.schedule(sessionId, async () => {
      await this.store.delete(sessionId);
      this.logger.info({ sessionId }, 'Search session closed.');
    });
  }

  private async requireActive(sessionId: string): Promise<SearchSession> {
    const session = await this.store.get(sessionId);
    if (!session) {
      throw new SessionExpiredError(sessionId);
    }
    if (this.remainingMs(session) <= 0) {
      session.status = 'expired';
      await this.store.delete(sessionId);
      this.logger.info({ sessionId }, 'Search session expired.');
      throw new SessionExpiredError(sessionId);
    }
    return session;
  }

  /**
   * Serves pending records first, then fetches pages batch by batch until
   * `count` records are in hand or nothing is left. Records past `count`
   * stay pending on the session. A transient page failure ends the call
   * with the cursor unmoved; any other failure propagates.
   */
  private async collect(session: SearchSession, count: number, signal: AbortSignal | undefined): Promise<PersonSearchResult> {
    session.status = 'fetching';
    const pending = session.pendingRecords;
    const records = pending.splice(0, count);
    const seen = new Set(session.seenRecordIds);
    let failedPages = 0;

    while (records.length < count && !signal?.aborted) {
      const batch = this.currentBatch(session);
      if (!batch) {
        break;
      }

      const pageNumber = batch.cursor + 1;
      let page: RawPage;
      try {
        page = await this.loadPage(session, batch, pageNumber);
      } catch (error) {
        if (!(error instanceof ExternalTransientError)) {
          throw error;
        }
        failedPages += 1;
        this.logger.warn(
          { sessionId: session.sessionId, batch: session.batchIndex, page: pageNumber, error },
          'Page fetch failed; cursor not advanced.'
        );
        break;
      }

      batch.cursor = pageNumber;
      batch.totalEstimate = page.totalEstimate ?? batch.totalEstimate;
      batch.fetchedItems += page.items.length;

      let duplicates = 0;
      for (const raw of page.items) {
        const record = toPersonRecord(raw);
        if (!record) {
          continue;
        }
        if (seen.has(record.recordId)) {
          duplicates += 1;
          continue;
        }
        seen.add(record.recordId);
        pending.push(record);
      }
      if (duplicates > 0) {
        this.logger.debug({ sessionId: session.sessionId, page: pageNumber, duplicates }, 'Dropped records already fetched.');
      }
      records.push(...pending.splice(0, count - records.length));

      if (!this.batchHasMore(batch, page)) {
        batch.exhausted = true;
      }
    }

    session.seenRecordIds = Array.from(seen);
    session.pendingRecords = pending;
    session.returnedCount += records.length;
    session.totalEstimate = this.sumEstimates(session);
    session.status = pending.length > 0 || this.currentBatch(session) ? 'has_more' : 'exhausted';

    await this.store.save(session, this.remainingMs(session) / 1000);
    return this.toResult(session, records, failedPages);
  }

  /** First batch at or after `batchIndex` that can still yield pages; advances the index past finished ones. */
  private currentBatch(session: SearchSession): SessionBatch | undefined {
    while (session.batchIndex < session.batches.length) {
      const batch = session.batches[session.batchIndex];
      if (batch && !batch.exhausted) {
        return batch;
      }
      session.batchIndex += 1;
      if (session.batchIndex < session.batches.length) {
        this.logger.info({ sessionId: session.sessionId, batch: session.batchIndex }, 'Moving to next organization batch.');
      }
    }
    return undefined;
  }

  private async loadPage(session: SearchSession, batch: SessionBatch, pageNumber: number): Promise<RawPage> {
    const useCache = !this.options.disablePageCache;
    if (useCache && !session.bypassPageCache) {
      const cached = await this.store.getPage(batch.queryHash, pageNumber);
      if (cached) {
        return cached;
      }
    }

    await this.waitForInterval(session);
    session.lastFetchedAt = new Date(this.now()).toISOString();
    const page = await this.backend.searchPeople(batch.compiledQuery, pageNumber);

    if (useCache) {
      await this.store.setPage(batch.queryHash, pageNumber, page, this.options.pageCacheTtlSeconds);
    }
    return page;
  }

  private async waitForInterval(session: SearchSession): Promise<void> {
    if (!session.lastFetchedAt || this.options.minFetchIntervalMs <= 0) {
      return;
    }
    const waitMs = Date.parse(session.lastFetchedAt) + this.options.minFetchIntervalMs - this.now();
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
  }

  private batchHasMore(batch: SessionBatch, page: RawPage): boolean {
    if (batch.cursor >= this.options.maxPages) {
      return false;
    }
    if (batch.totalEstimate !== null) {
      return batch.fetchedItems < batch.totalEstimate;
    }
    return page.items.length >= this.options.pageSize;
  }

  /** Sum of the batch totals the backend has reported, or null before any has. */
  private sumEstimates(session: SearchSession): number | null {
    const known = session.batches.flatMap((batch) => (batch.totalEstimate === null ? [] : [batch.totalEstimate]));
    return known.length === 0 ? null : known.reduce((sum, value) => sum + value, 0);
  }

  private remainingMs(session: SearchSession): number {
    return Date.parse(session.createdAt) + session.ttlHours * HOUR_MS - this.now();
  }

  private toResult(session: SearchSession, records: PersonRecord[], failedPages: number): PersonSearchResult {
    return {
      sessionId: session.sessionId,
      records,
      hasMore: session.status === 'has_more',
      totalEstimate: session.totalEstimate,
      returnedCount: session.returnedCount,
      failedPages
    };
  }
}

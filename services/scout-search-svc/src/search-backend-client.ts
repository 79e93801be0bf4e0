import {
  EndpointThrottle,
  ExternalPermanentError,
  classifyHttpError,
  emitCostMetric,
  getLogger,
  withRetry,
  type Logger,
  type RetryPolicy
} from '@orgscout/common';
import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';

import type { SearchBackendConfig } from './config.js';
import type { CompiledQuery, ProfilePayload, SearchPage } from './types.js';

const hitSchema = z.object({
  _id: z.union([z.string(), z.number()]).optional(),
  _score: z.number().nullable().optional(),
  _source: z.record(z.unknown())
});

const hitsEnvelopeSchema = z.object({
  hits: z.object({
    total: z.union([z.number(), z.object({ value: z.number() })]).optional(),
    hits: z.array(hitSchema)
  })
});

const recordArraySchema = z.array(z.record(z.unknown()));

export interface BackendDocument {
  source: Record<string, unknown>;
  score: number | null;
}

export interface CompanySearchRequest {
  query: Record<string, unknown>;
  size?: number;
}

export interface CompanySearchBackend {
  searchCompanies(request: CompanySearchRequest): Promise<BackendDocument[]>;
  collectCompany(stableId: string): Promise<ProfilePayload>;
}

export interface PersonSearchBackend {
  searchPeople(query: CompiledQuery, page: number): Promise<SearchPage<Record<string, unknown>>>;
}

export interface SearchBackendClientOptions {
  logger?: Logger;
  http?: AxiosInstance;
  throttle?: EndpointThrottle;
}

function parseTotalHeader(response: AxiosResponse): number | null {
  const raw: unknown = response.headers['x-total-count'];
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : null;
}

/**
 * Accepts either a bare array of documents or an `hits` envelope; anything
 * else is a permanent failure since retrying will not change its shape.
 */
export function parseSearchResponse(data: unknown, headerTotal: number | null): SearchPage<BackendDocument> {
  const asArray = recordArraySchema.safeParse(data);
  if (asArray.success) {
    return {
      items: asArray.data.map((source) => ({ source, score: null })),
      totalEstimate: headerTotal
    };
  }

  const envelope = hitsEnvelopeSchema.safeParse(data);
  if (envelope.success) {
    const { total, hits } = envelope.data.hits;
    const bodyTotal = typeof total === 'number' ? total : total?.value;
    return {
      items: hits.map((hit) => ({ source: hit._source, score: hit._score ?? null })),
      totalEstimate: headerTotal ?? bodyTotal ?? null
    };
  }

  throw new ExternalPermanentError('Search backend returned an unrecognised response shape.', {
    code: 'unexpected_response',
    details: { issues: envelope.error.issues.slice(0, 5) }
  });
}

export class SearchBackendClient implements CompanySearchBackend, PersonSearchBackend {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private readonly throttle: EndpointThrottle;
  private readonly retryPolicy: RetryPolicy;

  constructor(private readonly config: SearchBackendConfig, options: SearchBackendClientOptions = {}) {
    this.logger = options.logger ?? getLogger({ module: 'search-backend-client' });
    this.http =
      options.http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        headers: {
          'Content-Type': 'application/json',
          accept: 'application/json',
          apikey: config.apiKey
        }
      });
    this.throttle = options.throttle ?? new EndpointThrottle({ minIntervalMs: config.minIntervalMs });
    this.retryPolicy = {
      retries: config.retries,
      minDelayMs: config.retryDelayMs,
      maxDelayMs: config.retryDelayMs * 8,
      // axios enforces the per-request timeout; throttle waits must not count against it
      timeoutMs: 0
    };
  }

  async searchCompanies(request: CompanySearchRequest): Promise<BackendDocument[]> {
    const page = await this.search(this.config.companyEndpoint, { query: request.query, size: request.size }, 1);
    return page.items;
  }

  async searchPeople(query: CompiledQuery, page: number): Promise<SearchPage<Record<string, unknown>>> {
    const result = await this.search(this.config.personEndpoint, query, page);
    return {
      items: result.items.map((item) => item.source),
      totalEstimate: result.totalEstimate
    };
  }

  async collectCompany(stableId: string): Promise<ProfilePayload> {
    const endpoint = this.config.companyEndpoint;
    const path = `/v2/${endpoint}/collect/${encodeURIComponent(stableId)}`;

    const response = await this.call(endpoint, { stableId }, () => this.http.get<unknown>(path));
    const parsed = z.record(z.unknown()).safeParse(response.data);
    if (!parsed.success) {
      throw new ExternalPermanentError('Profile response was not an object.', {
        code: 'unexpected_response',
        details: { stableId }
      });
    }

    emitCostMetric({ api_name: 'collect', provider: 'search-backend', cost_category: 'profile', cost_cents: 1 });
    return parsed.data;
  }

  private async search(endpoint: string, body: object, page: number): Promise<SearchPage<BackendDocument>> {
    const path = `/v2/${endpoint}/search/es_dsl/preview`;

    const response = await this.call(endpoint, { page, query: body }, () =>
      this.http.post<unknown>(path, body, { params: { page } })
    );

    const result = parseSearchResponse(response.data, parseTotalHeader(response));
    this.logger.debug({ endpoint, page, returned: result.items.length, totalEstimate: result.totalEstimate }, 'Search page fetched.');
    emitCostMetric({ api_name: 'search_preview', provider: 'search-backend', cost_category: endpoint, cost_cents: 0.2 });
    return result;
  }

  private async call<T>(
    endpoint: string,
    details: Record<string, unknown>,
    request: () => Promise<AxiosResponse<T>>
  ): Promise<AxiosResponse<T>> {
    try {
      return await withRetry(() => this.throttle.schedule(endpoint, request), {
        dependency: `search-backend:${endpoint}`,
        policy: this.retryPolicy,
        logger: this.logger,
        classify: (error) => classifyHttpError(error, { dependency: 'search-backend', details: { endpoint } })
      });
    } catch (error) {
      if (error instanceof ExternalPermanentError) {
        this.logger.error({ endpoint, ...details, code: error.code, status: error.details?.status }, 'Search backend rejected request.');
      }
      throw error;
    }
  }
}

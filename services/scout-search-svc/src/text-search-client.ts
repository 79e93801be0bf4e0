import {
  EndpointThrottle,
  ExternalPermanentError,
  classifyHttpError,
  emitCostMetric,
  getLogger,
  withRetry,
  type Logger
} from '@orgscout/common';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';

import type { TextSearchResult } from './candidate-extractor.js';
import type { TextSearchConfig } from './config.js';

const responseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        content: z.string().nullish(),
        score: z.number().nullish()
      })
    )
    .default([])
});

/** Web search provider used by the discovery strategies. */
export interface TextSearchProvider {
  search(query: string, maxResults?: number): Promise<TextSearchResult[]>;
}

export interface TextSearchClientOptions {
  logger?: Logger;
  http?: AxiosInstance;
  throttle?: EndpointThrottle;
}

export class TextSearchClient implements TextSearchProvider {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private readonly throttle: EndpointThrottle;

  constructor(private readonly config: TextSearchConfig, options: TextSearchClientOptions = {}) {
    this.logger = options.logger ?? getLogger({ module: 'text-search-client' });
    this.http =
      options.http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${config.apiKey}`
        }
      });
    this.throttle = options.throttle ?? new EndpointThrottle({ minIntervalMs: config.minIntervalMs });
  }

  async search(query: string, maxResults = this.config.resultsPerQuery): Promise<TextSearchResult[]> {
    if (!this.config.enabled) {
      throw new ExternalPermanentError('Text search is disabled via configuration.', { code: 'disabled' });
    }

    const started = Date.now();
    const response = await withRetry(
      () =>
        this.throttle.schedule('search', () =>
          this.http.post<unknown>('/search', {
            query,
            search_depth: this.config.searchDepth,
            max_results: maxResults
          })
        ),
      {
        dependency: 'text-search',
        policy: {
          retries: this.config.retries,
          minDelayMs: this.config.retryDelayMs,
          maxDelayMs: this.config.retryDelayMs * 8,
          timeoutMs: 0
        },
        logger: this.logger,
        classify: (error) => classifyHttpError(error, { dependency: 'text-search', details: { query } })
      }
    );

    const parsed = responseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ExternalPermanentError('Text search returned an unrecognised response shape.', {
        code: 'unexpected_response',
        details: { query }
      });
    }

    emitCostMetric({
      api_name: 'web_search',
      provider: 'text-search',
      cost_category: this.config.searchDepth,
      cost_cents: this.config.searchDepth === 'advanced' ? 1.6 : 0.8
    });

    const results = parsed.data.results.map((result) => ({
      title: result.title ?? '',
      url: result.url ?? '',
      content: result.content ?? '',
      score: result.score ?? null
    }));

    this.logger.debug({ query, results: results.length, latencyMs: Date.now() - started }, 'Text search completed.');
    return results;
  }
}
